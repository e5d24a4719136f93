import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../../src/runtime/ports/process-signals.js';

/** Records handlers so tests can "deliver" a signal by calling raise(). */
export class FakeProcessSignals implements ProcessSignals {
  private readonly handlers = new Map<ProcessSignal, Set<() => void>>();

  on(signal: ProcessSignal, handler: () => void): Unsubscribe {
    const set = this.handlers.get(signal) ?? new Set<() => void>();
    set.add(handler);
    this.handlers.set(signal, set);
    return () => {
      set.delete(handler);
    };
  }

  raise(signal: ProcessSignal): void {
    for (const handler of [...(this.handlers.get(signal) ?? [])]) {
      handler();
    }
  }

  handlerCount(signal: ProcessSignal): number {
    return this.handlers.get(signal)?.size ?? 0;
  }
}
