/**
 * EventSub webhook body parsing.
 *
 * Validates the envelope and maps each known subscription type onto the
 * closed StreamEvent union. Types without a mapping become `unknown` rather
 * than an error, so new upstream subscriptions never break the bridge.
 *
 * @module
 */

import type { ZodTypeAny, z } from "zod";
import { MalformedPayloadError } from "../errors.js";
import {
  chatMessageEventSchema,
  cheerEventSchema,
  envelopeSchema,
  followEventSchema,
  giftEventSchema,
  raidEventSchema,
  redemptionEventSchema,
  subscribeEventSchema,
} from "../types/eventsub-schema.js";
import type { StreamEvent, SubscriptionTier } from "../types/stream-events.js";

export const MESSAGE_TYPE_NOTIFICATION = "notification";
export const MESSAGE_TYPE_VERIFICATION = "webhook_callback_verification";
export const MESSAGE_TYPE_REVOCATION = "revocation";

export type ParsedDelivery =
  | { type: "notification"; subscriptionType: string; event: StreamEvent; payload: unknown }
  | { type: "verification"; challenge: string }
  | { type: "revocation"; subscriptionType: string; status: string };

export function parseEventSubDelivery(
  messageType: string | undefined,
  rawBody: Buffer,
): ParsedDelivery {
  let json: unknown;
  try {
    json = JSON.parse(rawBody.toString("utf-8"));
  } catch (err) {
    throw new MalformedPayloadError("Body is not valid JSON", { cause: err });
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new MalformedPayloadError(`Invalid EventSub envelope: ${envelope.error.message}`);
  }
  const { subscription, challenge, event } = envelope.data;

  switch (messageType) {
    case MESSAGE_TYPE_VERIFICATION:
      if (challenge === undefined) {
        throw new MalformedPayloadError("Verification request without a challenge");
      }
      return { type: "verification", challenge };
    case MESSAGE_TYPE_REVOCATION:
      return {
        type: "revocation",
        subscriptionType: subscription.type,
        status: subscription.status ?? "unknown",
      };
    case MESSAGE_TYPE_NOTIFICATION:
      if (event === undefined) {
        throw new MalformedPayloadError("Notification without an event");
      }
      return {
        type: "notification",
        subscriptionType: subscription.type,
        event: toStreamEvent(subscription.type, event),
        payload: event,
      };
    default:
      throw new MalformedPayloadError(`Unsupported message type ${messageType ?? "(none)"}`);
  }
}

function parseWith<S extends ZodTypeAny>(schema: S, type: string, event: unknown): z.output<S> {
  const result = schema.safeParse(event);
  if (!result.success) {
    throw new MalformedPayloadError(`Invalid ${type} event: ${result.error.message}`);
  }
  return result.data;
}

/** Map an EventSub subscription type and its event body to a StreamEvent. */
export function toStreamEvent(subscriptionType: string, event: unknown): StreamEvent {
  switch (subscriptionType) {
    case "channel.chat.message": {
      const e = parseWith(chatMessageEventSchema, subscriptionType, event);
      const color = e.color.replace(/^#/, "");
      return {
        kind: "chat",
        userId: e.chatter_user_id,
        userName: e.chatter_user_name,
        messageId: e.message_id,
        text: e.message.text,
        ...(color ? { color } : {}),
      };
    }
    case "channel.cheer": {
      const e = parseWith(cheerEventSchema, subscriptionType, event);
      // Anonymous cheers have no user to link.
      if (e.is_anonymous || !e.user_id) return { kind: "unknown", subscriptionType };
      return {
        kind: "cheer",
        userId: e.user_id,
        userName: e.user_name ?? e.user_id,
        bits: e.bits,
        message: e.message,
      };
    }
    case "channel.subscribe": {
      const e = parseWith(subscribeEventSchema, subscriptionType, event);
      return {
        kind: "subscribe",
        userId: e.user_id,
        userName: e.user_name,
        tier: toTier(e.tier),
        isGift: e.is_gift,
      };
    }
    case "channel.subscription.gift": {
      const e = parseWith(giftEventSchema, subscriptionType, event);
      if (e.is_anonymous || !e.user_id) return { kind: "unknown", subscriptionType };
      return {
        kind: "gift",
        userId: e.user_id,
        userName: e.user_name ?? e.user_id,
        tier: toTier(e.tier),
        total: e.total,
      };
    }
    case "channel.follow": {
      const e = parseWith(followEventSchema, subscriptionType, event);
      return { kind: "follow", userId: e.user_id, userName: e.user_name };
    }
    case "channel.raid": {
      const e = parseWith(raidEventSchema, subscriptionType, event);
      return {
        kind: "raid",
        userId: e.from_broadcaster_user_id,
        userName: e.from_broadcaster_user_name,
        viewers: e.viewers,
      };
    }
    case "channel.channel_points_custom_reward_redemption.add": {
      const e = parseWith(redemptionEventSchema, subscriptionType, event);
      return {
        kind: "redemption",
        userId: e.user_id,
        userName: e.user_name,
        rewardTitle: e.reward.title,
        userInput: e.user_input,
      };
    }
    default:
      return { kind: "unknown", subscriptionType };
  }
}

function toTier(raw: string): SubscriptionTier {
  switch (raw.toLowerCase()) {
    case "2000":
      return "2";
    case "3000":
      return "3";
    case "prime":
      return "prime";
    default:
      return "1";
  }
}
