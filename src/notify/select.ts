import { Notifier } from "./notifier.js";
import { ResendNotifier } from "./resend.js";
import { SmtpNotifier } from "./smtp.js";
import { OutboxNotifier } from "./outbox.js";
import type { NotifyConfig } from "../config.js";

export type NotifySetup = {
  notifier: Notifier | null;
  operator: { to: string; from: string } | null;
};

/**
 * Resend when an API key is set, else SMTP when a URL is set, else the
 * dev outbox. No operator address means notifications are off.
 */
export function selectNotifier(cfg: NotifyConfig): NotifySetup {
  if (!cfg.to) return { notifier: null, operator: null };
  const operator = { to: cfg.to, from: cfg.from ?? cfg.to };

  if (cfg.resendApiKey) {
    return { notifier: new ResendNotifier({ apiKey: cfg.resendApiKey, timeoutMs: cfg.timeoutMs }), operator };
  }
  if (cfg.smtpUrl) {
    return { notifier: SmtpNotifier.fromUrl(cfg.smtpUrl, cfg.timeoutMs), operator };
  }
  return { notifier: new OutboxNotifier(cfg.outboxDir), operator };
}
