export type ContactField = "name" | "email" | "message";
export type RateScope = "sourceIdentity" | "email";
export type ViolationReason = "missing" | "too_long" | "format";

export const CONTACT_FIELDS: readonly ContactField[] = ["name", "email", "message"];

export interface ContactPayload {
  name: string;
  email: string;
  message: string;
}

export interface Submission {
  id: string;
  name: string;
  email: string;
  body: string;
  contentHash: string;
  sourceIdentity: string;
  createdAt: string; // ISO
}

// A submission that has passed every check but has not been written yet.
export type SubmissionDraft = Omit<Submission, "id">;

export interface FieldViolation {
  field: ContactField;
  reason: ViolationReason;
}

export type PipelineOutcome =
  | { kind: "accepted"; submission: Submission; notified: boolean }
  | { kind: "invalid_input"; violations: FieldViolation[] }
  | { kind: "invalid_email_format"; violations: FieldViolation[] }
  | { kind: "duplicate_message"; contentHash: string }
  | { kind: "rate_limited"; scope: RateScope; retryAfterSeconds: number }
  | { kind: "store_unavailable" }
  | { kind: "internal_error" };
