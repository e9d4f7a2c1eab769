/**
 * Sanitization for user-controlled text bound for the game console.
 *
 * Console commands are single lines, and the game renders `[tag=...]`
 * sequences as rich text, so chat and display names must not be able to
 * start a new command line or open a tag.
 * @module
 */

export const DEFAULT_MAX_TEXT_LENGTH = 256;
export const MAX_NAME_LENGTH = 64;

// biome-ignore lint/suspicious/noControlCharactersInRegex: matches control characters
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f\u2028\u2029]/g;
const TOKEN_DISALLOWED = /[^A-Za-z0-9_.-]/g;

/** Free text: control characters become spaces, brackets become parentheses. */
export function sanitizeText(value: string, maxLength = DEFAULT_MAX_TEXT_LENGTH): string {
  const cleaned = value
    .replace(CONTROL_CHARS, " ")
    .replace(/\[/g, "(")
    .replace(/\]/g, ")")
    .replace(/\s+/g, " ")
    .trim();
  return truncateCodePoints(cleaned, maxLength).trimEnd();
}

/** Identifiers substituted into command arguments. May return an empty string. */
export function sanitizeToken(value: string, maxLength = MAX_NAME_LENGTH): string {
  return value.replace(TOKEN_DISALLOWED, "").slice(0, maxLength);
}

function truncateCodePoints(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return Array.from(value).slice(0, maxLength).join("");
}
