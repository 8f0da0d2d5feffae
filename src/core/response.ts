import { PipelineOutcome } from "../types/contracts.js";

export type HttpResult = {
  status: number;
  body: Record<string, unknown>;
  headers: Record<string, string>;
};

export function toHttpResponse(outcome: PipelineOutcome): HttpResult {
  switch (outcome.kind) {
    case "accepted":
      return { status: 200, body: { id: outcome.submission.id }, headers: {} };
    case "invalid_input":
    case "invalid_email_format":
      return { status: 400, body: { errors: outcome.violations.map((v) => v.field) }, headers: {} };
    case "duplicate_message":
      return { status: 409, body: { error: "duplicate_message" }, headers: {} };
    case "rate_limited":
      return {
        status: 429,
        body: { retryAfterSeconds: outcome.retryAfterSeconds, scope: outcome.scope },
        headers: { "Retry-After": String(outcome.retryAfterSeconds) }
      };
    case "store_unavailable":
    case "internal_error":
      // storage details stay server-side
      return { status: 500, body: { error: "internal_error" }, headers: {} };
  }
}
