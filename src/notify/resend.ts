import { Notification, Notifier } from "./notifier.js";
import { NotificationError, errorMessage } from "../core/errors.js";

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class ResendNotifier implements Notifier {
  readonly kind = "resend";

  private apiKey: string;
  private timeoutMs: number;
  private endpoint: string;
  private fetchImpl: FetchLike;

  constructor(args: { apiKey: string; timeoutMs: number; endpoint?: string; fetchImpl?: FetchLike }) {
    this.apiKey = args.apiKey;
    this.timeoutMs = args.timeoutMs;
    this.endpoint = args.endpoint ?? "https://api.resend.com/emails";
    this.fetchImpl = args.fetchImpl ?? fetch;
  }

  async send(n: Notification): Promise<void> {
    let r: Response;
    try {
      r = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "Authorization": `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ from: n.from, to: n.to, subject: n.subject, text: n.text }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (e) {
      throw new NotificationError(`resend request failed: ${errorMessage(e)}`, e);
    }

    if (!r.ok) {
      const txt = await r.text().catch(() => "");
      throw new NotificationError(`resend_send_failed: ${r.status} ${txt}`.trim());
    }
  }
}
