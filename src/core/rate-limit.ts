import { RateScope } from "../types/contracts.js";

export type RateLimitPolicy = {
  windowSeconds: number;
  maxPerSource: number;
  maxPerEmail: number;
};

export const defaultRatePolicy: RateLimitPolicy = {
  windowSeconds: 60 * 60,
  maxPerSource: 10,
  maxPerEmail: 5
};

export type RateDecision =
  | { ok: true }
  | { ok: false; scope: RateScope; retryAfterSeconds: number };

/** Ascending `createdAt` values of accepted submissions for a scope key since `since`. */
export type ActivityLookup = (scope: RateScope, key: string, since: string) => Promise<string[]>;

/**
 * Seconds until the oldest counted entry leaves the window. Past the
 * ceiling (racing writers) one exit may not be enough; the hint stays a hint.
 */
export function retryAfterSeconds(createdAt: string[], windowSeconds: number, nowMs: number): number {
  const oldest = createdAt[0];
  const oldestMs = oldest ? Date.parse(oldest) : nowMs;
  const exitMs = (Number.isFinite(oldestMs) ? oldestMs : nowMs) + windowSeconds * 1000;
  return Math.max(1, Math.ceil((exitMs - nowMs) / 1000));
}

/**
 * Sliding-window ceilings per source identity and per sender email.
 * Source identity is checked first.
 *
 * Count-then-insert is not linearizable: two requests racing near a
 * ceiling can both pass. Accepted for this endpoint; a shared counter
 * would be needed for strict enforcement.
 */
export async function checkRateLimits(
  lookup: ActivityLookup,
  keys: { sourceIdentity: string; email: string },
  policy: RateLimitPolicy,
  now: Date
): Promise<RateDecision> {
  const nowMs = now.getTime();
  const since = new Date(nowMs - policy.windowSeconds * 1000).toISOString();

  const scopes: Array<{ scope: RateScope; key: string; ceiling: number }> = [
    { scope: "sourceIdentity", key: keys.sourceIdentity, ceiling: policy.maxPerSource },
    { scope: "email", key: keys.email, ceiling: policy.maxPerEmail }
  ];

  for (const s of scopes) {
    const seen = await lookup(s.scope, s.key, since);
    if (seen.length >= s.ceiling) {
      return {
        ok: false,
        scope: s.scope,
        retryAfterSeconds: retryAfterSeconds(seen, policy.windowSeconds, nowMs)
      };
    }
  }
  return { ok: true };
}
