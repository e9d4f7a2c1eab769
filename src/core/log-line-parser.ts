/**
 * Parser for the lines the game-side bridge mod writes to its log.
 *
 * Each line is `TAG contents` (the tag may also be bracketed, `[TAG]`):
 *
 *   CHAT Steve: hello
 *   PLAYERLIST Steve nauvis;Alex Nauvis Orbit
 *   JOIN Steve joined the game
 *
 * @module
 */

export interface PlayerLocation {
  name: string;
  /** Surface the player is on; absent when the mod wrote a bare name. */
  surface: string | null;
}

export type ParsedLogLine =
  | { kind: "chat"; player: string; text: string }
  | { kind: "player-list"; players: PlayerLocation[] }
  | { kind: "system"; tag: string; text: string };

/** Chat written by the server console itself; never relayed. */
export const SERVER_SPEAKER = "<server>";

/** Returns null for lines that carry nothing to relay. */
export function parseLogLine(line: string): ParsedLogLine | null {
  const trimmed = line.trim();
  const space = trimmed.indexOf(" ");
  if (space <= 0) return null;

  const tag = unbracket(trimmed.slice(0, space));
  const contents = trimmed.slice(space + 1).trim();
  if (!tag || !contents) return null;

  switch (tag) {
    case "CHAT":
      return parseChat(contents);
    case "PLAYERLIST":
      return { kind: "player-list", players: parsePlayerList(contents) };
    default:
      return { kind: "system", tag, text: contents };
  }
}

function unbracket(token: string): string {
  return token.startsWith("[") && token.endsWith("]") ? token.slice(1, -1) : token;
}

function parseChat(contents: string): ParsedLogLine | null {
  const separator = contents.indexOf(": ");
  if (separator <= 0) return null;
  const player = contents.slice(0, separator);
  const text = contents.slice(separator + 2).trim();
  if (player === SERVER_SPEAKER || !text) return null;
  return { kind: "chat", player, text };
}

function parsePlayerList(contents: string): PlayerLocation[] {
  return contents
    .split(";")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const space = entry.indexOf(" ");
      if (space < 0) return { name: entry, surface: null };
      return { name: entry.slice(0, space), surface: displaySurface(entry.slice(space + 1)) };
    });
}

/** The home planet is logged in lowercase, unlike every other surface. */
function displaySurface(surface: string): string {
  return surface === "nauvis" ? "Nauvis" : surface;
}
