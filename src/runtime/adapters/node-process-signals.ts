import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Registering a listener replaces Node's default action for that signal,
 * so SIGINT/SIGTERM no longer end the launcher on their own.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void): Unsubscribe {
    const listener = (): void => {
      handler();
    };

    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}
