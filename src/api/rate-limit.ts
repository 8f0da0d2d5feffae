import rateLimit from "express-rate-limit";

/**
 * Coarse per-IP request throttle in front of the pipeline. Counts every
 * request, accepted or not, in process memory; the submission limits
 * in the pipeline are separate and live in the store.
 */
export function makeFrontDoorLimiter(args: { windowMs: number; max: number }) {
  return rateLimit({
    windowMs: args.windowMs,
    limit: args.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "rate_limited" }
  });
}
