import type { Unsubscribe } from './process-signals.js';

export type { Unsubscribe };

/** Signals that ask the launcher to stop its child. */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * A single delivery of a shutdown signal. `receivedAt` is epoch milliseconds
 * from the injected clock; the supervisor assigns the ordinal when it counts
 * requests within a session.
 */
export type ShutdownEvent = {
  readonly kind: 'shutdown_requested';
  readonly signal: ShutdownSignal;
  readonly receivedAt: number;
};

/**
 * Port carrying shutdown requests from whoever owns the signal handlers
 * (the CLI entrypoint) to whoever owns the child (the supervisor).
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
