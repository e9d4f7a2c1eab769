/**
 * SQLite-backed identity links (better-sqlite3).
 *
 * Table layout is owned by the external linking flow; the store only creates
 * it when missing so a fresh database works out of the box.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { WritableIdentityLinkStore } from "../interfaces/identity-store.js";
import type { IdentityLink, UserRef } from "../types/identity.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS user_link (
    source_platform TEXT NOT NULL,
    source_user_id TEXT NOT NULL,
    target_platform TEXT NOT NULL,
    target_user_id TEXT NOT NULL,
    PRIMARY KEY(source_platform, source_user_id)
);
CREATE INDEX IF NOT EXISTS user_link_target ON user_link(target_platform, target_user_id);
`;

interface TargetRow {
  target_platform: string;
  target_user_id: string;
}

interface SourceRow {
  source_platform: string;
  source_user_id: string;
}

export class SqliteIdentityLinkStore implements WritableIdentityLinkStore {
  private db: Database.Database;
  private readonly forwardStmt: Database.Statement<[string, string], TargetRow>;
  private readonly reverseStmt: Database.Statement<[string, string], SourceRow>;
  private readonly upsertStmt: Database.Statement<[string, string, string, string]>;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA);

    this.forwardStmt = this.db.prepare<[string, string], TargetRow>(
      `SELECT target_platform, target_user_id FROM user_link
       WHERE source_platform = ? AND source_user_id = ?`,
    );
    this.reverseStmt = this.db.prepare<[string, string], SourceRow>(
      `SELECT source_platform, source_user_id FROM user_link
       WHERE target_platform = ? AND target_user_id = ?
       ORDER BY source_platform, source_user_id`,
    );
    this.upsertStmt = this.db.prepare<[string, string, string, string]>(
      `INSERT INTO user_link(source_platform, source_user_id, target_platform, target_user_id)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(source_platform, source_user_id) DO UPDATE
       SET target_platform = excluded.target_platform, target_user_id = excluded.target_user_id`,
    );
  }

  resolve(platform: string, userId: string): UserRef | null {
    const row = this.forwardStmt.get(platform, userId);
    return row ? { platform: row.target_platform, userId: row.target_user_id } : null;
  }

  resolveReverse(platform: string, userId: string): UserRef[] {
    return this.reverseStmt
      .all(platform, userId)
      .map((row) => ({ platform: row.source_platform, userId: row.source_user_id }));
  }

  upsert(link: IdentityLink): void {
    this.upsertStmt.run(
      link.sourcePlatform,
      link.sourceUserId,
      link.targetPlatform,
      link.targetUserId,
    );
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
