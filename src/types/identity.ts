/** Built-in platform ids. Links may name any platform string. */
export const STREAM_PLATFORM = "twitch";
export const GAME_PLATFORM = "factorio";

/** A user on one platform. */
export interface UserRef {
  platform: string;
  userId: string;
}

/**
 * Directional identity mapping. At most one link exists per
 * `(sourcePlatform, sourceUserId)`.
 */
export interface IdentityLink {
  sourcePlatform: string;
  sourceUserId: string;
  targetPlatform: string;
  targetUserId: string;
}

export function formatUserRef(ref: UserRef): string {
  return `${ref.platform}:${ref.userId}`;
}

/** Parse `platform:user`. The user part may itself contain colons. */
export function parseUserRef(value: string): UserRef | null {
  const idx = value.indexOf(":");
  if (idx <= 0 || idx === value.length - 1) return null;
  return { platform: value.slice(0, idx), userId: value.slice(idx + 1) };
}
