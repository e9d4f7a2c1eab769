/**
 * Factories for signed EventSub webhook deliveries used across tests.
 */

import {
  computeSignature,
  type WebhookDelivery,
} from "../core/signature-verifier.js";

export const TEST_SECRET = "test-secret";

export function notificationBody(
  subscriptionType: string,
  event: Record<string, unknown>,
): Record<string, unknown> {
  return {
    subscription: { id: "sub-1", type: subscriptionType, version: "1", status: "enabled" },
    event,
  };
}

export function cheerEvent(userId: string, bits: number, message = ""): Record<string, unknown> {
  return {
    is_anonymous: false,
    user_id: userId,
    user_login: userId.toLowerCase(),
    user_name: `${userId}_name`,
    broadcaster_user_id: "B1",
    message,
    bits,
  };
}

export function chatEvent(
  userId: string,
  text: string,
  messageId = "chat-1",
  color = "",
): Record<string, unknown> {
  return {
    broadcaster_user_id: "B1",
    chatter_user_id: userId,
    chatter_user_login: userId.toLowerCase(),
    chatter_user_name: `${userId}_name`,
    message_id: messageId,
    message: { text, fragments: [] },
    color,
  };
}

export interface SignOptions {
  messageId?: string;
  timestamp?: string;
  messageType?: string;
  secret?: string;
}

/** Build a delivery whose signature matches `secret` (default TEST_SECRET). */
export function signedDelivery(body: unknown, options: SignOptions = {}): WebhookDelivery {
  const rawBody = Buffer.from(JSON.stringify(body));
  const messageId = options.messageId ?? "msg-1";
  const timestamp = options.timestamp ?? new Date().toISOString();
  return {
    messageId,
    timestamp,
    messageType: options.messageType ?? "notification",
    signature: computeSignature(options.secret ?? TEST_SECRET, messageId, timestamp, rawBody),
    rawBody,
  };
}
