/**
 * SignatureVerifier: authenticity check for EventSub webhook deliveries.
 *
 * The platform signs `messageId + timestamp + rawBody` with HMAC-SHA256 using
 * the shared secret given at subscription time, and sends the result as
 * `sha256=<hex>`. Nothing downstream of `verify` runs for a delivery that
 * fails it.
 *
 * @module
 */

import { createHash, createHmac, timingSafeEqual } from "node:crypto";
import { UnauthenticatedError } from "../errors.js";
import { canonicalize } from "../utils/canonical-json.js";

export const SIGNATURE_PREFIX = "sha256=";

/** Transport-neutral view of one webhook request. */
export interface WebhookDelivery {
  messageId?: string;
  timestamp?: string;
  signature?: string;
  messageType?: string;
  rawBody: Buffer;
}

export interface VerifiedDelivery extends WebhookDelivery {
  /** Delivery time declared by the platform, ms since epoch, if parseable. */
  sentAt: number | null;
}

/** Timing-safe string comparison using SHA-256 to normalize lengths. */
function timingSafeCompare(a: string, b: string): boolean {
  const hashA = createHash("sha256").update(a).digest();
  const hashB = createHash("sha256").update(b).digest();
  return timingSafeEqual(hashA, hashB);
}

export function computeSignature(
  secret: string,
  messageId: string,
  timestamp: string,
  rawBody: Buffer,
): string {
  const hmac = createHmac("sha256", secret);
  hmac.update(messageId);
  hmac.update(timestamp);
  hmac.update(rawBody);
  return `${SIGNATURE_PREFIX}${hmac.digest("hex")}`;
}

export class SignatureVerifier {
  constructor(private readonly secret: string) {
    if (secret.length === 0) {
      throw new RangeError("SignatureVerifier requires a non-empty secret");
    }
  }

  verify(delivery: WebhookDelivery): VerifiedDelivery {
    const declared = delivery.signature?.trim().toLowerCase();
    if (!declared) {
      throw new UnauthenticatedError("Missing signature header");
    }
    if (!declared.startsWith(SIGNATURE_PREFIX)) {
      throw new UnauthenticatedError("Unsupported signature scheme");
    }

    const expected = computeSignature(
      this.secret,
      delivery.messageId ?? "",
      delivery.timestamp ?? "",
      delivery.rawBody,
    );
    if (!timingSafeCompare(declared, expected)) {
      throw new UnauthenticatedError("Signature mismatch");
    }

    return { ...delivery, sentAt: parseTimestamp(delivery.timestamp) };
  }
}

function parseTimestamp(value: string | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Stable identity of an event for deduplication: the platform message id when
 * present, otherwise a hash of the payload's canonical JSON.
 */
export function fingerprintOf(messageId: string | undefined, payload: unknown): string {
  if (messageId && messageId.trim().length > 0) {
    return `msg:${messageId.trim()}`;
  }
  return `sha256:${createHash("sha256").update(canonicalize(payload)).digest("hex")}`;
}
