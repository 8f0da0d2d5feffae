import crypto from "crypto";
import { ContactPayload, Submission } from "../types/contracts.js";

export function contentHashOf(contact: ContactPayload): string {
  // JSON framing keeps field boundaries unambiguous ("a|b" + "c" vs "a" + "b|c").
  const raw = JSON.stringify([contact.name, contact.email, contact.message]);
  return crypto.createHash("sha256").update(raw).digest("hex");
}

/** Lower bound for duplicate lookups; null when duplicates never expire. */
export function dedupeSince(now: Date, windowSeconds: number): string | null {
  if (windowSeconds <= 0) return null;
  return new Date(now.getTime() - windowSeconds * 1000).toISOString();
}

export type HashLookup = (contentHash: string, since: string | null) => Promise<Submission | null>;

/**
 * Advisory read before the write. The conditional insert in the store is
 * what actually keeps concurrent duplicates out.
 */
export async function findDuplicate(
  lookup: HashLookup,
  contentHash: string,
  opts: { now: Date; windowSeconds: number }
): Promise<Submission | null> {
  return lookup(contentHash, dedupeSince(opts.now, opts.windowSeconds));
}
