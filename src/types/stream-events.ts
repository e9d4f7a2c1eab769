/**
 * Stream-side events after webhook validation.
 *
 * A closed union on `kind`. Upstream subscription types the bridge does not
 * map arrive as `unknown` and translate to nothing.
 * @module
 */

interface StreamUser {
  userId: string;
  userName: string;
}

export interface ChatEvent extends StreamUser {
  kind: "chat";
  messageId: string;
  text: string;
  /** Hex color without `#`, when the chatter has one set. */
  color?: string;
}

export interface CheerEvent extends StreamUser {
  kind: "cheer";
  bits: number;
  message: string;
}

export type SubscriptionTier = "1" | "2" | "3" | "prime";

export interface SubscribeEvent extends StreamUser {
  kind: "subscribe";
  tier: SubscriptionTier;
  isGift: boolean;
}

export interface GiftEvent extends StreamUser {
  kind: "gift";
  tier: SubscriptionTier;
  total: number;
}

export interface FollowEvent extends StreamUser {
  kind: "follow";
}

export interface RaidEvent extends StreamUser {
  kind: "raid";
  viewers: number;
}

export interface RedemptionEvent extends StreamUser {
  kind: "redemption";
  rewardTitle: string;
  userInput: string;
}

export interface UnknownStreamEvent {
  kind: "unknown";
  subscriptionType: string;
}

export type StreamEvent =
  | ChatEvent
  | CheerEvent
  | SubscribeEvent
  | GiftEvent
  | FollowEvent
  | RaidEvent
  | RedemptionEvent
  | UnknownStreamEvent;

export type StreamEventKind = StreamEvent["kind"];
export type UserStreamEvent = Exclude<StreamEvent, UnknownStreamEvent>;

export function isUserEvent(event: StreamEvent): event is UserStreamEvent {
  return event.kind !== "unknown";
}
