import pino, { type Logger } from "pino";
import { SubmissionStore, storeCall, storeWrite } from "../store/store.js";
import { normalizeContact } from "../core/normalize.js";
import { validateContact } from "../core/validate.js";
import { contentHashOf, dedupeSince, findDuplicate } from "../core/dedupe.js";
import { checkRateLimits, defaultRatePolicy, RateLimitPolicy } from "../core/rate-limit.js";
import { StoreUnavailableError } from "../core/errors.js";
import { Notifier, composeNotification, dispatchNotification } from "../notify/notifier.js";
import { PipelineOutcome, SubmissionDraft } from "../types/contracts.js";

export type PipelineLimits = RateLimitPolicy & {
  /** 0 keeps duplicates forever. */
  dedupeWindowSeconds: number;
};

export const defaultLimits: PipelineLimits = { ...defaultRatePolicy, dedupeWindowSeconds: 0 };

export function createContactPipeline(args: {
  store: SubmissionStore;
  storeTimeoutMs?: number;
  limits?: Partial<PipelineLimits>;
  notifier?: Notifier | null;
  operator?: { to: string; from: string } | null;
  logger?: Logger;
  now?: () => Date;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const limits: PipelineLimits = { ...defaultLimits, ...args.limits };
  const timeoutMs = args.storeTimeoutMs ?? 5000;
  const now = args.now ?? (() => new Date());
  const store = args.store;

  async function notify(submissionId: string, outcome: Extract<PipelineOutcome, { kind: "accepted" }>) {
    if (!args.notifier || !args.operator) {
      log.debug({ submissionId }, "notify: disabled");
      return false;
    }
    const n = composeNotification(outcome.submission, args.operator);
    const r = await dispatchNotification(args.notifier, n, log, submissionId);
    return r.ok;
  }

  /**
   * One submission, start to finish. Expected failures come back as
   * outcomes; nothing submission-specific outlives the call.
   */
  async function submit(raw: unknown, sourceIdentity: string): Promise<PipelineOutcome> {
    const contact = normalizeContact(raw);

    const checked = validateContact(contact);
    if (!checked.ok) {
      log.info({ sourceIdentity, kind: checked.error.kind, fields: checked.error.violations.map((v) => v.field) }, "contact: rejected");
      return { kind: checked.error.kind, violations: checked.error.violations };
    }

    const value = checked.value;
    const contentHash = contentHashOf(value);
    const at = now();

    let outcome: Extract<PipelineOutcome, { kind: "accepted" }>;
    try {
      // dedupe gate (advisory; the conditional insert below is authoritative)
      const existing = await findDuplicate(
        (hash, since) => storeCall("findByContentHash", timeoutMs, () => store.findByContentHash(hash, since)),
        contentHash,
        { now: at, windowSeconds: limits.dedupeWindowSeconds }
      );
      if (existing) {
        log.info({ sourceIdentity, duplicateOf: existing.id }, "contact: duplicate");
        return { kind: "duplicate_message", contentHash };
      }

      const rate = await checkRateLimits(
        (scope, key, since) => storeCall("recentActivity", timeoutMs, () => store.recentActivity(scope, key, since)),
        { sourceIdentity, email: value.email },
        limits,
        at
      );
      if (!rate.ok) {
        log.info({ sourceIdentity, scope: rate.scope, retryAfterSeconds: rate.retryAfterSeconds }, "contact: rate_limited");
        return { kind: "rate_limited", scope: rate.scope, retryAfterSeconds: rate.retryAfterSeconds };
      }

      const draft: SubmissionDraft = {
        name: value.name,
        email: value.email,
        body: value.message,
        contentHash,
        sourceIdentity,
        createdAt: at.toISOString()
      };
      const written = await storeWrite("insertIfAbsent", timeoutMs, (signal) =>
        store.insertIfAbsent(draft, dedupeSince(at, limits.dedupeWindowSeconds), signal)
      );
      if (!written.inserted) {
        log.info({ sourceIdentity }, "contact: duplicate (insert conflict)");
        return { kind: "duplicate_message", contentHash };
      }
      outcome = { kind: "accepted", submission: written.submission, notified: false };
    } catch (e) {
      if (e instanceof StoreUnavailableError) {
        log.error({ err: e, op: e.op }, "store: unavailable");
        return { kind: "store_unavailable" };
      }
      throw e;
    }

    log.info({ submissionId: outcome.submission.id, sourceIdentity }, "contact: accepted");

    // the write above is the commit point; notification cannot undo it
    const notified = await notify(outcome.submission.id, outcome);
    return { ...outcome, notified };
  }

  return { submit };
}

export type ContactPipeline = ReturnType<typeof createContactPipeline>;
