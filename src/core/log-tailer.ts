/**
 * LogTailer: follows the game's bridge log and yields complete lines.
 *
 * Two states. `seeking` waits for the file to exist and decides where to
 * start (checkpoint, start of file, or end of file). `following` reads
 * appended bytes and watches for the file being replaced or cut short.
 *
 * A file is identified by a marker: device, inode and a hash of its first
 * bytes. Same inode with a different head means the file was truncated and
 * rewritten in place; a different inode means it was rotated. Either way the
 * tailer restarts at offset 0 of the new content.
 *
 * @module
 */

import { createHash } from "node:crypto";
import type { Stats } from "node:fs";
import { type FileHandle, open } from "node:fs/promises";
import { LogRotatedError, LogSourceMissingError } from "../errors.js";
import type {
  CheckpointStore,
  FileMarker,
  TailCheckpoint,
} from "../interfaces/checkpoint-store.js";
import type { Logger } from "../interfaces/logger.js";
import type { LogEvent } from "../types/relay.js";
import { errnoCode } from "../utils/errno.js";
import { noopLogger } from "../utils/noop-logger.js";

export type TailerState = "seeking" | "following";

export const DEFAULT_POLL_INTERVAL_MS = 250;
export const DEFAULT_MAX_READ_BYTES = 64 * 1024;
export const DEFAULT_HEAD_LENGTH = 256;

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const COMPONENT = "tailer";

export interface LogTailerOptions {
  path: string;
  checkpointStore?: CheckpointStore;
  /** Skip existing content when there is no checkpoint. */
  startAtEnd?: boolean;
  pollIntervalMs?: number;
  maxReadBytes?: number;
  headLength?: number;
  logger?: Logger;
  now?: () => number;
}

export interface TailerStats {
  state: TailerState;
  path: string;
  offset: number;
  committedOffset: number;
  linesRead: number;
  /** Outages: periods during which the file did not exist. */
  missing: number;
  rotations: number;
  truncations: number;
}

export class LogTailer {
  private _state: TailerState = "seeking";
  private marker: FileMarker | null = null;
  private readOffset = 0;
  private committedOffset = 0;
  private savedOffset: number | null = null;
  /** Incremented on every switch to new content; events from older content are not committable. */
  private generation = 0;
  private readonly issued = new WeakMap<LogEvent, number>();
  private resume: TailCheckpoint | null = null;
  private checkpointLoaded = false;
  private firstAttach = true;
  private missingReported = false;
  private counters = { linesRead: 0, missing: 0, rotations: 0, truncations: 0 };

  private readonly path: string;
  private readonly pollIntervalMs: number;
  private readonly maxReadBytes: number;
  private readonly headLength: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: LogTailerOptions) {
    this.path = options.path;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxReadBytes = options.maxReadBytes ?? DEFAULT_MAX_READ_BYTES;
    this.headLength = options.headLength ?? DEFAULT_HEAD_LENGTH;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  get state(): TailerState {
    return this._state;
  }

  stats(): TailerStats {
    return {
      state: this._state,
      path: this.path,
      offset: this.readOffset,
      committedOffset: this.committedOffset,
      ...this.counters,
    };
  }

  /**
   * One step of the state machine. Never throws: I/O problems are logged and
   * the tailer retries on the next poll.
   */
  async poll(): Promise<LogEvent[]> {
    if (!this.checkpointLoaded) await this.loadCheckpoint();

    let handle: FileHandle;
    try {
      handle = await open(this.path, "r");
    } catch (err) {
      this.handleOpenFailure(err);
      return [];
    }

    try {
      if (this._state === "seeking") {
        await this.attach(handle);
      } else {
        await this.checkIdentity(handle);
      }
      return await this.readLines(handle);
    } catch (err) {
      this.logger.error("Log tail poll failed", {
        component: COMPONENT,
        path: this.path,
        error: err,
      });
      return [];
    } finally {
      await handle.close();
    }
  }

  /** Mark everything up to and including `event` as processed. */
  commit(event: LogEvent): void {
    if (this.issued.get(event) !== this.generation) return;
    if (event.nextOffset > this.committedOffset) this.committedOffset = event.nextOffset;
  }

  /** Persist the committed position if it moved since the last save. */
  async flush(): Promise<void> {
    const store = this.options.checkpointStore;
    if (!store || !this.marker || this.savedOffset === this.committedOffset) return;
    const checkpoint: TailCheckpoint = {
      path: this.path,
      offset: this.committedOffset,
      marker: { ...this.marker },
    };
    try {
      await store.save(checkpoint);
      this.savedOffset = checkpoint.offset;
    } catch (err) {
      this.logger.warn("Failed to save tail checkpoint", {
        component: COMPONENT,
        path: this.path,
        error: err,
      });
    }
  }

  /**
   * Poll until `signal` aborts. An event counts as processed once the consumer
   * asks for the next one; the checkpoint is saved after each poll cycle and
   * when the loop ends.
   */
  async *follow(signal: AbortSignal): AsyncGenerator<LogEvent, void, undefined> {
    try {
      while (!signal.aborted) {
        const events = await this.poll();
        for (const event of events) {
          yield event;
          this.commit(event);
          if (signal.aborted) break;
        }
        await this.flush();
        if (signal.aborted) break;
        await sleep(this.pollIntervalMs, signal);
      }
    } finally {
      await this.flush();
    }
  }

  // ── seeking ──

  private async loadCheckpoint(): Promise<void> {
    this.checkpointLoaded = true;
    const stored = (await this.options.checkpointStore?.load()) ?? null;
    if (stored && stored.path !== this.path) {
      this.logger.info("Ignoring tail checkpoint for a different file", {
        component: COMPONENT,
        path: this.path,
        checkpointPath: stored.path,
      });
      return;
    }
    this.resume = stored;
  }

  private handleOpenFailure(err: unknown): void {
    if (errnoCode(err) !== "ENOENT") {
      this.logger.error("Cannot open log file", {
        component: COMPONENT,
        path: this.path,
        error: err,
      });
      return;
    }

    if (this._state === "following") {
      // Renamed away and not yet recreated. Remember the position in case the
      // same file comes back.
      this.counters.rotations++;
      this.logger.warn(new LogRotatedError(this.path, "rotated").message, {
        component: COMPONENT,
        offset: this.readOffset,
      });
      if (this.marker) {
        this.resume = { path: this.path, offset: this.readOffset, marker: this.marker };
      }
      this._state = "seeking";
    }

    // Content that shows up later was written after startup, so nothing is skipped.
    this.firstAttach = false;
    if (!this.missingReported) {
      this.missingReported = true;
      this.counters.missing++;
      this.logger.warn(new LogSourceMissingError(this.path).message, { component: COMPONENT });
    }
  }

  private async attach(handle: FileHandle): Promise<void> {
    const stat = await handle.stat();
    const marker = await this.markerOf(handle, stat);
    const resume = this.resume;
    this.resume = null;

    let offset = 0;
    let origin = "start";
    if (resume && stat.size >= resume.offset && (await sameFile(handle, stat, resume.marker))) {
      offset = resume.offset;
      origin = "checkpoint";
    } else if (!resume && this.firstAttach && this.options.startAtEnd) {
      offset = stat.size;
      origin = "end";
    }

    this.switchTo(marker, offset);
    if (origin === "checkpoint") this.savedOffset = offset;
    this._state = "following";
    this.firstAttach = false;
    this.missingReported = false;
    this.logger.info("Tailing log file", { component: COMPONENT, path: this.path, offset, origin });
  }

  // ── following ──

  private async checkIdentity(handle: FileHandle): Promise<void> {
    const marker = this.marker;
    const stat = await handle.stat();
    if (!marker) return;

    let reason: "rotated" | "truncated" | null = null;
    if (stat.dev !== marker.dev || stat.ino !== marker.ino) {
      reason = "rotated";
    } else if (stat.size < this.readOffset || !(await sameFile(handle, stat, marker))) {
      reason = "truncated";
    }

    if (reason) {
      if (reason === "rotated") this.counters.rotations++;
      else this.counters.truncations++;
      this.logger.warn(new LogRotatedError(this.path, reason).message, {
        component: COMPONENT,
        previousOffset: this.readOffset,
        size: stat.size,
      });
      this.switchTo(await this.markerOf(handle, stat), 0);
      return;
    }

    // Widen the head hash as the file grows past a short initial head.
    if (marker.headLength < this.headLength && stat.size > marker.headLength) {
      this.marker = await this.markerOf(handle, stat);
    }
  }

  private markerOf(handle: FileHandle, stat: Stats): Promise<FileMarker> {
    return computeMarker(handle, stat.dev, stat.ino, Math.min(stat.size, this.headLength));
  }

  private switchTo(marker: FileMarker, offset: number): void {
    this.generation++;
    this.marker = marker;
    this.readOffset = offset;
    this.committedOffset = offset;
    this.savedOffset = null;
  }

  private async readLines(handle: FileHandle): Promise<LogEvent[]> {
    const buffer = Buffer.alloc(this.maxReadBytes);
    const { bytesRead } = await handle.read(buffer, 0, this.maxReadBytes, this.readOffset);
    if (bytesRead === 0) return [];

    const timestamp = this.now();
    const events: LogEvent[] = [];
    const base = this.readOffset;
    let start = 0;

    for (let i = 0; i < bytesRead; i++) {
      if (buffer[i] !== NEWLINE) continue;
      const end = i > start && buffer[i - 1] === CARRIAGE_RETURN ? i - 1 : i;
      const line = buffer.toString("utf-8", start, end);
      this.pushLine(events, line, base + start, base + i + 1, timestamp);
      start = i + 1;
    }

    if (start === 0 && bytesRead === this.maxReadBytes) {
      // A single line longer than the read window; emit it in pieces rather than stall.
      const cut = utf8Boundary(buffer, bytesRead);
      const piece = buffer.toString("utf-8", 0, cut);
      this.pushLine(events, piece, base, base + cut, timestamp);
      start = cut;
    }

    // Bytes after the last newline are re-read once their terminator arrives.
    this.readOffset = base + start;
    return events;
  }

  private pushLine(
    events: LogEvent[],
    rawLine: string,
    byteOffset: number,
    nextOffset: number,
    timestamp: number,
  ): void {
    if (rawLine.length === 0) return;
    const event: LogEvent = { rawLine, byteOffset, nextOffset, timestamp };
    this.issued.set(event, this.generation);
    this.counters.linesRead++;
    events.push(event);
  }
}

async function computeMarker(
  handle: FileHandle,
  dev: number,
  ino: number,
  headLength: number,
): Promise<FileMarker> {
  return { dev, ino, head: await hashHead(handle, headLength), headLength };
}

async function hashHead(handle: FileHandle, length: number): Promise<string> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = length > 0 ? await handle.read(buffer, 0, length, 0) : { bytesRead: 0 };
  return createHash("sha256").update(buffer.subarray(0, bytesRead)).digest("hex");
}

async function sameFile(
  handle: FileHandle,
  stat: { dev: number; ino: number; size: number },
  marker: FileMarker,
): Promise<boolean> {
  if (stat.dev !== marker.dev || stat.ino !== marker.ino) return false;
  if (stat.size < marker.headLength) return false;
  return (await hashHead(handle, marker.headLength)) === marker.head;
}

/** Largest cut point not after `end` that keeps every UTF-8 sequence whole. */
export function utf8Boundary(buffer: Buffer, end: number): number {
  let lead = end - 1;
  while (lead > 0 && lead > end - 4 && (buffer.readUInt8(lead) & 0xc0) === 0x80) lead--;
  const byte = buffer.readUInt8(lead);
  const length = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
  if (lead + length <= end || lead === 0) return end;
  return lead;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}
