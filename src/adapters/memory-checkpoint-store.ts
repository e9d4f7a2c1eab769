import type { CheckpointStore, TailCheckpoint } from "../interfaces/checkpoint-store.js";

/** Keeps the checkpoint in memory. Used when no checkpoint path is configured, and in tests. */
export class MemoryCheckpointStore implements CheckpointStore {
  saves = 0;

  constructor(private checkpoint: TailCheckpoint | null = null) {}

  async load(): Promise<TailCheckpoint | null> {
    return this.checkpoint ? structuredClone(this.checkpoint) : null;
  }

  async save(checkpoint: TailCheckpoint): Promise<void> {
    this.checkpoint = structuredClone(checkpoint);
    this.saves++;
  }

  get current(): TailCheckpoint | null {
    return this.checkpoint;
  }
}
