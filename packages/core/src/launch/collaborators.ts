/**
 * @fileoverview Capabilities the launcher consumes but does not implement.
 */

import type { BlobId } from '../types.js';

/**
 * Package storage. The core never looks inside a blob.
 */
export interface BlobStore {
  /** Bytes of a stored package */
  fetch(blobId: BlobId): Promise<Uint8Array>;
  /** Materialize a package into `targetDir`, creating it */
  unpack(bytes: Uint8Array, targetDir: string): Promise<void>;
  /** Remove a directory previously created by {@link unpack} */
  discard(targetDir: string): Promise<void>;
}

export interface SpawnRequest {
  /** Absolute path of the server entry inside the unpacked package */
  readonly executable: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Port the process is expected to listen on once it is up */
  readonly readyPort?: number;
}

export interface ProcessHandle {
  readonly pid: number | undefined;
  /** Register a callback for process exit; fires at most once */
  onExit(listener: (code: number | null) => void): void;
  /** Ask the process to stop; no-op once it has exited */
  kill(): void;
}

/**
 * Spawns detached game servers.
 */
export interface ProcessHost {
  /** A port that is free at the time of the call */
  freePort(): Promise<number>;
  /** Start a process; rejects if it cannot be started or never becomes ready */
  spawn(request: SpawnRequest): Promise<ProcessHandle>;
}
