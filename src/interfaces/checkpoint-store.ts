/** Identity of a tailed file, compared across polls and restarts. */
export interface FileMarker {
  dev: number;
  ino: number;
  /** SHA-256 hex of the first `headLength` bytes. */
  head: string;
  headLength: number;
}

export interface TailCheckpoint {
  path: string;
  offset: number;
  marker: FileMarker;
}

export interface CheckpointStore {
  load(): Promise<TailCheckpoint | null>;
  save(checkpoint: TailCheckpoint): Promise<void>;
}
