/**
 * Identity link storage consumed by the relay core.
 *
 * The store is keyed by `(platform, userId)` of the link's source side.
 * Writes happen through an external linking flow; the core only reads.
 * @module
 */

import type { IdentityLink, UserRef } from "../types/identity.js";

export interface IdentityLinkStore {
  /** Forward lookup on the primary key. Unambiguous by construction. */
  resolve(platform: string, userId: string): UserRef | null;
  /** Every source whose link targets the given user. May be empty or plural. */
  resolveReverse(platform: string, userId: string): UserRef[];
}

/** Stores that also accept writes (CLI `link` subcommand, tests). */
export interface WritableIdentityLinkStore extends IdentityLinkStore {
  upsert(link: IdentityLink): void;
  close?(): void;
}
