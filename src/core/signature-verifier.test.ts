import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { UnauthenticatedError } from "../errors.js";
import {
  computeSignature,
  fingerprintOf,
  SignatureVerifier,
  type WebhookDelivery,
} from "./signature-verifier.js";

const SECRET = "test-secret";

function makeDelivery(overrides?: Partial<WebhookDelivery>): WebhookDelivery {
  const rawBody = overrides?.rawBody ?? Buffer.from('{"subscription":{"type":"channel.follow"}}');
  const messageId = overrides?.messageId ?? "msg-1";
  const timestamp = overrides?.timestamp ?? "2026-10-18T12:00:00.000Z";
  return {
    messageId,
    timestamp,
    messageType: "notification",
    signature: computeSignature(SECRET, messageId, timestamp, rawBody),
    ...overrides,
    rawBody,
  };
}

describe("computeSignature", () => {
  it("is HMAC-SHA256 over id + timestamp + body with a sha256= prefix", () => {
    const body = Buffer.from("{}");
    const expected = createHmac("sha256", SECRET).update("id-1ts-1{}").digest("hex");
    expect(computeSignature(SECRET, "id-1", "ts-1", body)).toBe(`sha256=${expected}`);
  });
});

describe("SignatureVerifier", () => {
  const verifier = new SignatureVerifier(SECRET);

  it("accepts a correctly signed delivery and parses its timestamp", () => {
    const verified = verifier.verify(makeDelivery());
    expect(verified.sentAt).toBe(Date.parse("2026-10-18T12:00:00.000Z"));
  });

  it("accepts an upper-case hex signature", () => {
    const delivery = makeDelivery();
    const upper = { ...delivery, signature: delivery.signature?.toUpperCase() };
    expect(() => verifier.verify(upper)).not.toThrow();
  });

  it("rejects a missing signature", () => {
    expect(() => verifier.verify(makeDelivery({ signature: undefined }))).toThrow(
      UnauthenticatedError,
    );
  });

  it("rejects a tampered body", () => {
    const delivery = makeDelivery();
    const tampered = { ...delivery, rawBody: Buffer.from('{"subscription":{"type":"x"}}') };
    expect(() => verifier.verify(tampered)).toThrow("Signature mismatch");
  });

  it("rejects a tampered message id", () => {
    const delivery = makeDelivery();
    expect(() => verifier.verify({ ...delivery, messageId: "msg-2" })).toThrow(
      UnauthenticatedError,
    );
  });

  it("rejects a signature made with another secret", () => {
    const delivery = makeDelivery();
    const forged = computeSignature(
      "other-secret",
      "msg-1",
      delivery.timestamp ?? "",
      delivery.rawBody,
    );
    expect(() => verifier.verify({ ...delivery, signature: forged })).toThrow(
      UnauthenticatedError,
    );
  });

  it("rejects an unsupported scheme", () => {
    expect(() => verifier.verify(makeDelivery({ signature: "md5=abc" }))).toThrow(
      "Unsupported signature scheme",
    );
  });

  it("refuses an empty secret", () => {
    expect(() => new SignatureVerifier("")).toThrow(RangeError);
  });
});

describe("fingerprintOf", () => {
  it("prefers the platform message id", () => {
    expect(fingerprintOf("abc", { a: 1 })).toBe("msg:abc");
  });

  it("hashes the canonical payload when no id is present", () => {
    const a = fingerprintOf(undefined, { a: 1, b: 2 });
    const b = fingerprintOf("  ", { b: 2, a: 1 });
    expect(a).toBe(b);
    expect(a).toMatch(/^sha256:[0-9a-f]{64}$/);
    expect(fingerprintOf(undefined, { a: 2, b: 2 })).not.toBe(a);
  });
});
