import { describe, it } from "node:test";
import assert from "node:assert";
import crypto from "node:crypto";
import { computeSignature, verifyHelpdeskSignature } from "./verify-signature.js";

const secret = "test-secret";
const body = Buffer.from('{"ticket":{"id":42,"subject":"Login broken"}}');

describe("computeSignature", () => {
  it("matches a plain HMAC-SHA256 hex digest of the raw bytes", () => {
    const expected = crypto.createHmac("sha256", secret).update(body).digest("hex");
    assert.strictEqual(computeSignature(body, secret), expected);
    assert.match(computeSignature(body, secret), /^[0-9a-f]{64}$/);
  });

  it("is deterministic for a fixed secret and body", () => {
    assert.strictEqual(computeSignature(body, secret), computeSignature(Buffer.from(body), secret));
  });

  it("changes when any single byte of the body is flipped", () => {
    const original = computeSignature(body, secret);
    for (let i = 0; i < body.length; i++) {
      const copy = Buffer.from(body);
      copy[i] = copy[i] ^ 0x01;
      assert.notStrictEqual(computeSignature(copy, secret), original, `byte ${i}`);
    }
  });

  it("depends on the secret", () => {
    assert.notStrictEqual(computeSignature(body, secret), computeSignature(body, "other-secret"));
  });
});

describe("verifyHelpdeskSignature", () => {
  it("accepts the correct signature", () => {
    const result = verifyHelpdeskSignature(body, computeSignature(body, secret), secret);
    assert.deepStrictEqual(result, { ok: true });
  });

  it("accepts a sha256= prefixed signature with surrounding whitespace", () => {
    const result = verifyHelpdeskSignature(body, `  sha256=${computeSignature(body, secret)} `, secret);
    assert.deepStrictEqual(result, { ok: true });
  });

  it("returns unauthenticated when the header is absent", () => {
    assert.deepStrictEqual(verifyHelpdeskSignature(body, undefined, secret), {
      ok: false,
      error: { kind: "unauthenticated" }
    });
  });

  it("returns unauthenticated when the header is blank", () => {
    assert.deepStrictEqual(verifyHelpdeskSignature(body, "   ", secret), {
      ok: false,
      error: { kind: "unauthenticated" }
    });
  });

  it("returns forbidden for a wrong signature of the right length", () => {
    const wrong = computeSignature(body, "other-secret");
    assert.deepStrictEqual(verifyHelpdeskSignature(body, wrong, secret), {
      ok: false,
      error: { kind: "forbidden" }
    });
  });

  it("returns forbidden when the length does not match", () => {
    assert.deepStrictEqual(verifyHelpdeskSignature(body, "abc123", secret), {
      ok: false,
      error: { kind: "forbidden" }
    });
  });

  it("returns forbidden when the body was altered after signing", () => {
    const sig = computeSignature(body, secret);
    const tampered = Buffer.from(body.toString("utf8").replace("42", "43"));
    assert.deepStrictEqual(verifyHelpdeskSignature(tampered, sig, secret), {
      ok: false,
      error: { kind: "forbidden" }
    });
  });

  it("rejects the signature of a re-serialized body", () => {
    const spaced = Buffer.from('{ "ticket": { "id": 42, "subject": "Login broken" } }');
    const sigOfCompact = computeSignature(Buffer.from(JSON.stringify(JSON.parse(spaced.toString("utf8")))), secret);
    assert.deepStrictEqual(verifyHelpdeskSignature(spaced, sigOfCompact, secret), {
      ok: false,
      error: { kind: "forbidden" }
    });
  });

  it("is case-sensitive against the lowercase digest", () => {
    const upper = computeSignature(body, secret).toUpperCase();
    assert.deepStrictEqual(verifyHelpdeskSignature(body, upper, secret), {
      ok: false,
      error: { kind: "forbidden" }
    });
  });
});
