import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TailCheckpoint } from "../interfaces/checkpoint-store.js";
import { FileCheckpointStore } from "./file-checkpoint-store.js";

describe("FileCheckpointStore", () => {
  let dir: string;
  let checkpointPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "streambridge-checkpoint-"));
    checkpointPath = join(dir, "state", "tail.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const sample: TailCheckpoint = {
    path: "/srv/factorio/script-output/bridge.log",
    offset: 1234,
    marker: { dev: 2049, ino: 77, head: "ab".repeat(32), headLength: 256 },
  };

  it("persists and reloads a checkpoint, creating the directory", async () => {
    const store = new FileCheckpointStore(checkpointPath);
    await store.save(sample);
    expect(await store.load()).toEqual(sample);
  });

  it("leaves no temp files behind", async () => {
    const store = new FileCheckpointStore(checkpointPath);
    await store.save(sample);
    await store.save({ ...sample, offset: 2000 });
    expect(await readdir(join(dir, "state"))).toEqual(["tail.json"]);
  });

  it("returns null on first run", async () => {
    expect(await new FileCheckpointStore(checkpointPath).load()).toBeNull();
  });

  it("ignores corrupt or mis-shaped files with a warning", async () => {
    const warn = vi.fn();
    const store = new FileCheckpointStore(checkpointPath, {
      info: vi.fn(),
      warn,
      error: vi.fn(),
    });
    await mkdir(join(dir, "state"));

    await writeFile(checkpointPath, "{not json");
    expect(await store.load()).toBeNull();

    await writeFile(checkpointPath, JSON.stringify({ path: "x", offset: -1 }));
    expect(await store.load()).toBeNull();
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("cleans up and rethrows when the rename fails", async () => {
    await mkdir(checkpointPath, { recursive: true });
    const store = new FileCheckpointStore(checkpointPath);

    await expect(store.save(sample)).rejects.toThrow(/Failed to write tail checkpoint/);
    expect(await readdir(join(dir, "state"))).toEqual(["tail.json"]);
  });
});
