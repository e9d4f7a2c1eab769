/**
 * OutboundTranslator: parsed log lines to chat payloads for the stream.
 *
 * Pure. Player chat needs the player's linked stream identity, which becomes
 * the message author; announcements (player list, system lines) are sent by
 * the bot.
 *
 * @module
 */

import type { UserRef } from "../types/identity.js";
import type { OutboundMessage } from "../types/relay.js";
import type { ParsedLogLine, PlayerLocation } from "./log-line-parser.js";

/** Platform chat messages are capped at 500 characters. */
export const DEFAULT_MAX_CONTENT_LENGTH = 500;

/** Invisible tag character placed inside relayed names so they do not ping the user. */
export const ZERO_WIDTH_MARK = "\u{E0000}";

export interface OutboundTranslatorOptions {
  /** Label for the game shown in chat, e.g. "Factorio". */
  platformAlias: string;
  insertZeroWidth: boolean;
  relaySystemEvents: boolean;
  /** A message whose final content matches any filter is dropped. */
  excludeFilters: RegExp[];
  maxContentLength?: number;
}

export function translateOutbound(
  line: ParsedLogLine,
  author: UserRef | null,
  origin: number,
  options: OutboundTranslatorOptions,
): OutboundMessage[] {
  const content = render(line, author, options);
  if (content === null) return [];
  if (isExcluded(content, options.excludeFilters)) return [];

  return [
    {
      author: line.kind === "chat" ? author : null,
      content: truncate(content, options.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH),
      origin,
    },
  ];
}

function render(
  line: ParsedLogLine,
  author: UserRef | null,
  options: OutboundTranslatorOptions,
): string | null {
  const prefix = `[${options.platformAlias}]`;
  switch (line.kind) {
    case "chat": {
      if (!author) return null;
      const name = options.insertZeroWidth ? markName(line.player) : line.player;
      return `${prefix} ${name}: ${line.text}`;
    }
    case "player-list":
      return `${prefix} ${describePlayers(line.players)}`;
    case "system":
      return options.relaySystemEvents ? `${prefix} ${line.text}` : null;
    default:
      return null;
  }
}

export function describePlayers(players: PlayerLocation[]): string {
  if (players.length === 0) return "No players online";
  return players
    .map((p) => (p.surface ? `${p.name} is on ${p.surface}` : `${p.name} is online`))
    .join(", ");
}

/** Insert the zero-width mark after the first character of names longer than one. */
export function markName(name: string): string {
  const chars = Array.from(name);
  if (chars.length < 2) return name;
  return `${chars[0]}${ZERO_WIDTH_MARK}${chars.slice(1).join("")}`;
}

export function isExcluded(content: string, filters: RegExp[]): boolean {
  return filters.some((filter) => {
    // Global and sticky regexes carry state between test() calls.
    filter.lastIndex = 0;
    return filter.test(content);
  });
}

function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return Array.from(value).slice(0, maxLength).join("");
}
