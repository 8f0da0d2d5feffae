import { z } from "zod";
import { CONTACT_FIELDS, ContactField, ContactPayload, FieldViolation, ViolationReason } from "../types/contracts.js";

export const NAME_MAX = 200;
export const EMAIL_MAX = 254;
export const MESSAGE_MAX = 5000;

const ContactSchema = z.object({
  name: z.string().min(1).max(NAME_MAX),
  email: z.string().min(1).max(EMAIL_MAX).email(),
  message: z.string().min(1).max(MESSAGE_MAX)
});

export type ValidationFailure = {
  kind: "invalid_input" | "invalid_email_format";
  violations: FieldViolation[];
};

export type ValidationResult =
  | { ok: true; value: ContactPayload }
  | { ok: false; error: ValidationFailure };

function reasonOf(issue: z.ZodIssue): ViolationReason {
  switch (issue.code) {
    case "too_small": return "missing";
    case "too_big":   return "too_long";
    default:          return "format";
  }
}

function isContactField(v: unknown): v is ContactField {
  return CONTACT_FIELDS.some((f) => f === v);
}

/**
 * Checks every field in one pass. Each violated field is reported once,
 * with the reason of its first failing check, in `name, email, message` order.
 */
export function validateContact(input: ContactPayload): ValidationResult {
  const parsed = ContactSchema.safeParse(input);
  if (parsed.success) return { ok: true, value: parsed.data };

  const byField = new Map<ContactField, ViolationReason>();
  for (const issue of parsed.error.issues) {
    const field = issue.path[0];
    if (!isContactField(field) || byField.has(field)) continue;
    byField.set(field, reasonOf(issue));
  }

  const violations = CONTACT_FIELDS
    .filter((field) => byField.has(field))
    .map((field) => ({ field, reason: byField.get(field) ?? "format" }));

  const onlyFormat = violations.every((v) => v.reason === "format");
  return {
    ok: false,
    error: { kind: onlyFormat ? "invalid_email_format" : "invalid_input", violations }
  };
}
