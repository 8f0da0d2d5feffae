import { test, describe } from "node:test";
import assert from "node:assert";
import { resolveSourceIdentity } from "./source-identity.js";

describe("resolveSourceIdentity", () => {
  test("should prefer req.ip", () => {
    assert.strictEqual(
      resolveSourceIdentity({ ip: "203.0.113.7", headers: { "x-forwarded-for": "198.51.100.1" } }),
      "203.0.113.7"
    );
  });

  test("should fall back to the first forwarded address", () => {
    assert.strictEqual(
      resolveSourceIdentity({ headers: { "x-forwarded-for": " 198.51.100.1 , 10.0.0.2" } }),
      "198.51.100.1"
    );
  });

  test("should read the first value of a repeated header", () => {
    assert.strictEqual(
      resolveSourceIdentity({ ip: "", headers: { "x-forwarded-for": ["198.51.100.3, 10.0.0.1", "10.0.0.9"] } }),
      "198.51.100.3"
    );
  });

  test("should return unknown when nothing identifies the caller", () => {
    assert.strictEqual(resolveSourceIdentity({ headers: {} }), "unknown");
    assert.strictEqual(resolveSourceIdentity({ ip: " ", headers: { "x-forwarded-for": "" } }), "unknown");
  });
});
