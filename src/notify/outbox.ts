import fs from "node:fs";
import path from "node:path";
import { Notification, Notifier } from "./notifier.js";

/** Dev mode: no SMTP, no API key. Each notification becomes a text file. */
export class OutboxNotifier implements Notifier {
  readonly kind = "outbox";

  constructor(private outDir: string) {}

  async send(n: Notification): Promise<void> {
    fs.mkdirSync(this.outDir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const fn = path.join(this.outDir, `email_${stamp}_${process.hrtime.bigint()}.txt`);
    fs.writeFileSync(fn, `FROM: ${n.from}\nTO: ${n.to}\nSUBJECT: ${n.subject}\n\n${n.text}\n`);
  }
}
