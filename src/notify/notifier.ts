import type { Logger } from "pino";
import { Submission } from "../types/contracts.js";
import { NotificationError, errorMessage } from "../core/errors.js";

export type Notification = {
  to: string;
  from: string;
  subject: string;
  text: string;
};

export interface Notifier {
  readonly kind: string;
  send(n: Notification): Promise<void>;
}

export function composeNotification(s: Submission, addr: { to: string; from: string }): Notification {
  return {
    to: addr.to,
    from: addr.from,
    subject: `New contact message: ${s.name}`,
    text: [
      "You have a new message from the contact form:",
      "",
      `Name: ${s.name}`,
      `Email: ${s.email}`,
      `Message: ${s.body}`,
      "",
      `Id: ${s.id}`,
      `Received: ${s.createdAt}`
    ].join("\n")
  };
}

export type DispatchResult = { ok: true } | { ok: false; error: NotificationError };

/**
 * Best effort. Runs after the submission is stored; a failure is logged
 * and returned, never thrown.
 */
export async function dispatchNotification(
  notifier: Notifier,
  n: Notification,
  log: Logger,
  submissionId: string
): Promise<DispatchResult> {
  try {
    await notifier.send(n);
    log.info({ submissionId, notifier: notifier.kind }, "notify: sent");
    return { ok: true };
  } catch (e) {
    const error = e instanceof NotificationError ? e : new NotificationError(errorMessage(e), e);
    log.warn({ submissionId, notifier: notifier.kind, err: error }, "notify: failed");
    return { ok: false, error };
  }
}
