import { z } from "zod";
import { ContactPayload } from "../types/contracts.js";

const RawBody = z.record(z.unknown());

export function normalizeText(input: string): string {
  return input
    .normalize("NFC")
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t]+/g, " ")
    .replace(/ ?\n ?/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function textField(rec: Record<string, unknown>, key: keyof ContactPayload): string {
  const v = rec[key];
  return typeof v === "string" ? normalizeText(v) : "";
}

/**
 * Canonical form of a submission: every check and the content hash
 * see this, never the raw body. Anything that is not a string counts as empty.
 */
export function normalizeContact(raw: unknown): ContactPayload {
  const parsed = RawBody.safeParse(raw);
  const rec = parsed.success ? parsed.data : {};

  return {
    name: textField(rec, "name"),
    email: textField(rec, "email").toLowerCase(),
    message: textField(rec, "message")
  };
}
