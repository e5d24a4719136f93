import type { ShutdownEvent, ShutdownEvents, Unsubscribe } from '../ports/shutdown-events.js';

/**
 * In-process shutdown bus. Listeners run synchronously, in subscription order,
 * on the caller's turn of the event loop.
 */
export class InMemoryShutdownEvents implements ShutdownEvents {
  private readonly listeners = new Set<(event: ShutdownEvent) => void>();

  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ShutdownEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
