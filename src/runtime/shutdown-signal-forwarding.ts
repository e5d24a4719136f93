import type { Clock } from './ports/clock.js';
import type { ProcessSignals, Unsubscribe } from './ports/process-signals.js';
import type { ShutdownEvents, ShutdownSignal } from './ports/shutdown-events.js';
import { SHUTDOWN_SIGNALS } from './ports/shutdown-events.js';

/**
 * Turns each delivery of SIGINT/SIGTERM/SIGHUP into a shutdown event.
 * The handler only emits; stopping the child is the supervisor's job.
 */
export function forwardShutdownSignals(
  signals: ProcessSignals,
  events: ShutdownEvents,
  clock: Clock,
  which: readonly ShutdownSignal[] = SHUTDOWN_SIGNALS
): Unsubscribe {
  const subscriptions = which.map(signal =>
    signals.on(signal, () => {
      events.emit({ kind: 'shutdown_requested', signal, receivedAt: clock.now() });
    })
  );
  return () => {
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
  };
}

/** SIGHUP is not deliverable on Windows. */
export function shutdownSignalsFor(platform: NodeJS.Platform): readonly ShutdownSignal[] {
  return platform === 'win32' ? ['SIGINT', 'SIGTERM'] : SHUTDOWN_SIGNALS;
}
