import type { ResultAsync } from 'neverthrow';
import type { SpawnFailedError } from '../../core/errors/index.js';

export type SpawnRequest = {
  readonly executable: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly cwd?: string;
};

/** How a child ended, as reported by the OS once it has been reaped. */
export type ChildTermination =
  | { readonly kind: 'exited'; readonly code: number }
  | { readonly kind: 'signaled'; readonly signal: NodeJS.Signals; readonly signalNumber: number };

/** Signals the supervisor ever sends to a child's process group. */
export type GroupSignal = 'SIGINT' | 'SIGTERM' | 'SIGKILL';

export interface SpawnedChild {
  readonly pid: number;
  /** Process-group id, or null where the platform has no process groups. */
  readonly pgid: number | null;
  readonly startedAt: number;
  /** Settles once, after the child has exited and been reaped. */
  readonly termination: Promise<ChildTermination>;
  /** Non-blocking check: the termination if it has already happened. */
  poll(): ChildTermination | null;
  /**
   * Delivers `signal` to the whole process group.
   * Returns false when nothing was there to receive it.
   */
  signalGroup(signal: GroupSignal): boolean;
  /**
   * True while any member of the child's process group still exists,
   * including processes the child started and left behind.
   */
  groupAlive(): boolean;
}

/**
 * Port for starting the supervised child in its own process group.
 */
export interface ProcessSpawner {
  spawn(request: SpawnRequest): ResultAsync<SpawnedChild, SpawnFailedError>;
}
