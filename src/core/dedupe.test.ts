import { test, describe } from "node:test";
import assert from "node:assert";
import crypto from "crypto";
import { contentHashOf, dedupeSince, findDuplicate } from "./dedupe.js";
import { normalizeContact } from "./normalize.js";
import type { Submission } from "../types/contracts.js";

describe("contentHashOf", () => {
  test("should be deterministic (same input produces same hash)", () => {
    const input = { name: "John Doe", email: "john@example.com", message: "Hello!" };
    assert.strictEqual(contentHashOf(input), contentHashOf({ ...input }));
  });

  test("should ignore incidental whitespace and email case once normalized", () => {
    const a = normalizeContact({ name: "John Doe", email: "john@example.com", message: "Hello!\nBye" });
    const b = normalizeContact({ name: "  John   Doe ", email: "JOHN@example.com ", message: "Hello! \r\n Bye  " });
    assert.strictEqual(contentHashOf(a), contentHashOf(b));
  });

  test("should be sensitive to changes in any field", () => {
    const base = { name: "Ann", email: "ann@example.com", message: "Hi" };
    const h = contentHashOf(base);
    assert.notStrictEqual(contentHashOf({ ...base, name: "Anne" }), h);
    assert.notStrictEqual(contentHashOf({ ...base, email: "ann@example.org" }), h);
    assert.notStrictEqual(contentHashOf({ ...base, message: "hi" }), h);
  });

  test("should keep field boundaries apart", () => {
    const a = contentHashOf({ name: "a|b", email: "c@d.io", message: "e" });
    const b = contentHashOf({ name: "a", email: "b|c@d.io", message: "e" });
    assert.notStrictEqual(a, b);
  });

  test("should not collide across a corpus of distinct tuples", () => {
    const seen = new Set<string>();
    let count = 0;
    for (const name of ["Ann", "Bob", "Cleo", "Dan"]) {
      for (const email of ["a@x.io", "b@x.io", "c@y.org"]) {
        for (const message of ["Hi", "Hello", "Hello!", "hello", "Hi there"]) {
          seen.add(contentHashOf({ name, email, message }));
          count++;
        }
      }
    }
    assert.strictEqual(seen.size, count);
  });

  test("should match known vector", () => {
    const input = { name: "Test", email: "test@example.com", message: "test body content" };
    const raw = JSON.stringify(["Test", "test@example.com", "test body content"]);
    const expected = crypto.createHash("sha256").update(raw).digest("hex");
    assert.strictEqual(contentHashOf(input), expected);
    assert.strictEqual(expected.length, 64);
  });
});

describe("dedupeSince", () => {
  const now = new Date("2026-03-01T12:00:00.000Z");

  test("should be unbounded when the window is zero", () => {
    assert.strictEqual(dedupeSince(now, 0), null);
  });

  test("should subtract the window", () => {
    assert.strictEqual(dedupeSince(now, 300), "2026-03-01T11:55:00.000Z");
  });
});

describe("findDuplicate", () => {
  const existing: Submission = {
    id: "sub_1",
    name: "Ann",
    email: "ann@example.com",
    body: "Hi",
    contentHash: "abc",
    sourceIdentity: "203.0.113.1",
    createdAt: "2026-03-01T11:00:00.000Z"
  };

  test("should pass the hash and the window bound to the lookup", async () => {
    const calls: Array<[string, string | null]> = [];
    const hit = await findDuplicate(
      async (hash, since) => {
        calls.push([hash, since]);
        return existing;
      },
      "abc",
      { now: new Date("2026-03-01T12:00:00.000Z"), windowSeconds: 600 }
    );
    assert.strictEqual(hit, existing);
    assert.deepStrictEqual(calls, [["abc", "2026-03-01T11:50:00.000Z"]]);
  });

  test("should return null when nothing matches", async () => {
    const hit = await findDuplicate(async () => null, "abc", { now: new Date(), windowSeconds: 0 });
    assert.strictEqual(hit, null);
  });
});
