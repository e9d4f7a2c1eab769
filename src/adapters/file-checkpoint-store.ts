import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { CheckpointStore, TailCheckpoint } from "../interfaces/checkpoint-store.js";
import type { Logger } from "../interfaces/logger.js";
import { errnoCode } from "../utils/errno.js";
import { noopLogger } from "../utils/noop-logger.js";

const checkpointSchema = z.object({
  path: z.string(),
  offset: z.number().int().nonnegative(),
  marker: z.object({
    dev: z.number(),
    ino: z.number(),
    head: z.string(),
    headLength: z.number().int().nonnegative(),
  }),
});

/**
 * Tail checkpoint persisted as a small JSON file, written atomically
 * (temp file + rename) so a crash never leaves a half-written checkpoint.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = noopLogger,
  ) {}

  /** Returns null when the file is absent, unreadable or corrupt. */
  async load(): Promise<TailCheckpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      // First run.
      if (errnoCode(err) === "ENOENT") return null;
      this.logger.error("Failed to read tail checkpoint", {
        component: "tailer",
        checkpointPath: this.filePath,
        error: err,
      });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn("Ignoring corrupt tail checkpoint", {
        component: "tailer",
        checkpointPath: this.filePath,
        error: err,
      });
      return null;
    }

    const parsed = checkpointSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn("Ignoring tail checkpoint with unexpected shape", {
        component: "tailer",
        checkpointPath: this.filePath,
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  async save(checkpoint: TailCheckpoint): Promise<void> {
    const tmpPath = `${this.filePath}.${randomBytes(4).toString("hex")}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(checkpoint), "utf-8");
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw new Error(`Failed to write tail checkpoint to ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
