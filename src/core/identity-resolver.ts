/**
 * IdentityResolver: find a user's counterpart on another platform.
 *
 * Tries the stored forward link first. Falls back to the reverse direction
 * (links pointing at the user), which is only accepted when exactly one
 * candidate remains on the wanted platform; ambiguous matches are rejected
 * rather than guessed.
 *
 * @module
 */

import type { IdentityLinkStore } from "../interfaces/identity-store.js";
import type { Logger } from "../interfaces/logger.js";
import { formatUserRef, type UserRef } from "../types/identity.js";
import { noopLogger } from "../utils/noop-logger.js";

export class IdentityResolver {
  constructor(
    private readonly store: IdentityLinkStore,
    private readonly logger: Logger = noopLogger,
  ) {}

  counterpart(ref: UserRef, wantedPlatform: string): UserRef | null {
    const forward = this.store.resolve(ref.platform, ref.userId);
    if (forward && forward.platform === wantedPlatform) return forward;

    const candidates = this.store
      .resolveReverse(ref.platform, ref.userId)
      .filter((candidate) => candidate.platform === wantedPlatform);

    if (candidates.length === 1) return candidates[0] ?? null;
    if (candidates.length > 1) {
      this.logger.info("Ambiguous reverse identity link, not relaying", {
        component: "identity",
        user: formatUserRef(ref),
        candidates: candidates.map(formatUserRef),
      });
    }
    return null;
  }
}
