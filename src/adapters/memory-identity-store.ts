import type { WritableIdentityLinkStore } from "../interfaces/identity-store.js";
import type { IdentityLink, UserRef } from "../types/identity.js";

/**
 * In-memory identity links for tests and ephemeral use.
 * Same semantics as the SQLite store: one link per source pair, upsert replaces.
 */
export class MemoryIdentityLinkStore implements WritableIdentityLinkStore {
  private links = new Map<string, IdentityLink>();

  constructor(initial: IdentityLink[] = []) {
    for (const link of initial) this.upsert(link);
  }

  resolve(platform: string, userId: string): UserRef | null {
    const link = this.links.get(key(platform, userId));
    return link ? { platform: link.targetPlatform, userId: link.targetUserId } : null;
  }

  resolveReverse(platform: string, userId: string): UserRef[] {
    const matches: UserRef[] = [];
    for (const link of this.links.values()) {
      if (link.targetPlatform === platform && link.targetUserId === userId) {
        matches.push({ platform: link.sourcePlatform, userId: link.sourceUserId });
      }
    }
    return matches;
  }

  upsert(link: IdentityLink): void {
    this.links.set(key(link.sourcePlatform, link.sourceUserId), { ...link });
  }

  /** For testing: get the number of stored links. */
  get size(): number {
    return this.links.size;
  }
}

function key(platform: string, userId: string): string {
  return `${platform}\u0000${userId}`;
}
