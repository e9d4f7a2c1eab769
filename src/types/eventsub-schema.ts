import { z } from "zod";

const subscriptionSchema = z.object({
  id: z.string().optional(),
  type: z.string(),
  version: z.string().optional(),
  status: z.string().optional(),
});

export const envelopeSchema = z.object({
  subscription: subscriptionSchema,
  challenge: z.string().optional(),
  event: z.record(z.unknown()).optional(),
});

export const chatMessageEventSchema = z.object({
  chatter_user_id: z.string(),
  chatter_user_name: z.string(),
  message_id: z.string(),
  message: z.object({ text: z.string() }),
  color: z.string().optional().default(""),
});

export const cheerEventSchema = z.object({
  is_anonymous: z.boolean().optional().default(false),
  user_id: z.string().nullable().optional(),
  user_name: z.string().nullable().optional(),
  message: z.string().optional().default(""),
  bits: z.number().int().nonnegative(),
});

const tierSchema = z.string();

export const subscribeEventSchema = z.object({
  user_id: z.string(),
  user_name: z.string(),
  tier: tierSchema,
  is_gift: z.boolean().optional().default(false),
});

export const giftEventSchema = z.object({
  is_anonymous: z.boolean().optional().default(false),
  user_id: z.string().nullable().optional(),
  user_name: z.string().nullable().optional(),
  tier: tierSchema,
  total: z.number().int().nonnegative(),
});

export const followEventSchema = z.object({
  user_id: z.string(),
  user_name: z.string(),
});

export const raidEventSchema = z.object({
  from_broadcaster_user_id: z.string(),
  from_broadcaster_user_name: z.string(),
  viewers: z.number().int().nonnegative(),
});

export const redemptionEventSchema = z.object({
  user_id: z.string(),
  user_name: z.string(),
  user_input: z.string().optional().default(""),
  reward: z.object({ title: z.string() }),
});
