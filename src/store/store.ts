import { nanoid } from "nanoid";
import { z } from "zod";
import { RateScope, Submission, SubmissionDraft } from "../types/contracts.js";
import { StoreUnavailableError, withTimeout } from "../core/errors.js";

export type InsertResult =
  | { inserted: true; submission: Submission }
  | { inserted: false };

/**
 * Append-only submission storage. `since` bounds are ISO timestamps
 * compared against `createdAt` (inclusive); `null` means no bound.
 */
export interface SubmissionStore {
  init(): Promise<void>;

  /**
   * Writes the draft under a fresh id unless a submission with the same
   * contentHash and `createdAt >= since` exists. Check and write are atomic.
   *
   * Once `signal` aborts the driver must either not write at all (and
   * reject) or report the write it already made. It must not reject after
   * committing.
   */
  insertIfAbsent(draft: SubmissionDraft, since: string | null, signal?: AbortSignal): Promise<InsertResult>;

  findByContentHash(contentHash: string, since: string | null): Promise<Submission | null>;
  recentActivity(scope: RateScope, key: string, since: string): Promise<string[]>;
  getSubmission(id: string): Promise<Submission | null>;

  close(): Promise<void>;
}

export const SubmissionSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  email: z.string(),
  body: z.string(),
  contentHash: z.string(),
  sourceIdentity: z.string(),
  createdAt: z.string()
});

export function materialize(draft: SubmissionDraft): Submission {
  return { id: nanoid(), ...draft };
}

/**
 * One bounded attempt at a store operation. Any failure, including the
 * deadline, surfaces as StoreUnavailableError.
 */
export async function storeCall<T>(op: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  try {
    return await withTimeout(fn(), timeoutMs, `store.${op}`);
  } catch (e) {
    if (e instanceof StoreUnavailableError) throw e;
    throw new StoreUnavailableError(op, e);
  }
}

/**
 * Bounded write. The deadline is handed to the driver instead of raced
 * here, so a failure reported to the caller always means nothing was stored.
 */
export async function storeWrite<T>(op: string, timeoutMs: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  try {
    return await fn(AbortSignal.timeout(timeoutMs));
  } catch (e) {
    if (e instanceof StoreUnavailableError) throw e;
    throw new StoreUnavailableError(op, e);
  }
}
