/**
 * CommandTranslator: stream events to console command lines.
 *
 * Pure mapping. Chat becomes a `/puppet` line (or the player-list request),
 * every other kind renders the operator's templates for that kind. Every
 * value substituted into a template passes through the console sanitizer;
 * templates themselves are trusted config.
 *
 * @module
 */

import type { UserRef } from "../types/identity.js";
import type { ConsoleCommand } from "../types/relay.js";
import type { ChatEvent, StreamEvent, UserStreamEvent } from "../types/stream-events.js";
import {
  DEFAULT_MAX_TEXT_LENGTH,
  MAX_NAME_LENGTH,
  sanitizeText,
  sanitizeToken,
} from "./console-sanitizer.js";

export const PLAYER_LIST_COMMAND = "/bridge-player-list";

export interface CommandTemplates {
  cheer: string[];
  subscribe: string[];
  gift: string[];
  follow: string[];
  raid: string[];
  /** Keyed by reward title. */
  redemptions: Record<string, string[]>;
}

export const DEFAULT_COMMAND_TEMPLATES: CommandTemplates = {
  cheer: ["give {player} {amount}"],
  subscribe: ["/puppet [{platform}] {user} subscribed at tier {tier}"],
  gift: ["/puppet [{platform}] {user} gifted {amount} tier {tier} subs"],
  follow: ["/puppet [{platform}] {user} is now following"],
  raid: ["/puppet [{platform}] {user} is raiding with {amount} viewers"],
  redemptions: {},
};

export interface CommandTranslatorOptions {
  /** Label for the stream platform shown in game, e.g. "Twitch". */
  platformAlias: string;
  templates: CommandTemplates;
  maxTextLength?: number;
}

/**
 * Translate one event. `player` is the linked game identity, or `null` when
 * the caller relays an unlinked chatter.
 */
export function translateInbound(
  event: StreamEvent,
  player: UserRef | null,
  fingerprint: string,
  options: CommandTranslatorOptions,
): ConsoleCommand[] {
  const toCommands = (lines: string[]): ConsoleCommand[] =>
    lines.map((text) => ({ text, originFingerprint: fingerprint }));

  switch (event.kind) {
    case "chat":
      return toCommands(translateChat(event, options));
    case "cheer":
      return toCommands(renderAll(options.templates.cheer, event, player, options, event.bits));
    case "subscribe":
      return toCommands(renderAll(options.templates.subscribe, event, player, options));
    case "gift":
      return toCommands(renderAll(options.templates.gift, event, player, options, event.total));
    case "follow":
      return toCommands(renderAll(options.templates.follow, event, player, options));
    case "raid":
      return toCommands(renderAll(options.templates.raid, event, player, options, event.viewers));
    case "redemption": {
      const templates = options.templates.redemptions[event.rewardTitle] ?? [];
      return toCommands(renderAll(templates, event, player, options));
    }
    default:
      return [];
  }
}

/** Chat asking for the in-game player list: `/players`, optionally followed by words. */
export function isPlayerListRequest(text: string): boolean {
  const trimmed = text.trim();
  return trimmed === "/players" || trimmed.startsWith("/players ");
}

function translateChat(event: ChatEvent, options: CommandTranslatorOptions): string[] {
  if (isPlayerListRequest(event.text)) return [PLAYER_LIST_COMMAND];

  const text = sanitizeText(event.text, options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH);
  const name = sanitizeText(event.userName, MAX_NAME_LENGTH);
  if (!text || !name) return [];

  const prefix = `/puppet [${options.platformAlias}]`;
  if (event.color && /^[0-9a-fA-F]{6}$/.test(event.color)) {
    return [`${prefix} [color=#${event.color}]${name}:[/color] ${text}`];
  }
  return [`${prefix} ${name}: ${text}`];
}

function renderAll(
  templates: string[],
  event: UserStreamEvent,
  player: UserRef | null,
  options: CommandTranslatorOptions,
  amount?: number,
): string[] {
  const values = placeholderValues(event, player, options, amount);
  const lines: string[] = [];
  for (const template of templates) {
    // A command aimed at a player is meaningless without one.
    if (template.includes("{player}") && !values.player) continue;
    lines.push(renderTemplate(template, values));
  }
  return lines;
}

function placeholderValues(
  event: UserStreamEvent,
  player: UserRef | null,
  options: CommandTranslatorOptions,
  amount?: number,
): Record<string, string> {
  const maxText = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
  const values: Record<string, string> = {
    player: player ? sanitizeToken(player.userId) : "",
    user: sanitizeText(event.userName, MAX_NAME_LENGTH),
    platform: options.platformAlias,
  };
  if (amount !== undefined) values.amount = String(Math.trunc(amount));
  if (event.kind === "subscribe" || event.kind === "gift") values.tier = event.tier;
  if (event.kind === "cheer") values.message = sanitizeText(event.message, maxText);
  if (event.kind === "redemption") {
    values.reward = sanitizeText(event.rewardTitle, MAX_NAME_LENGTH);
    values.message = sanitizeText(event.userInput, maxText);
  }
  return values;
}

/** Replace `{name}` placeholders. Unknown placeholders are left as written. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match);
}
