import type { RuntimeMode } from './runtime-mode.js';

/**
 * Whether this process may own OS signal handlers.
 * Tests never do: the supervisor under test receives shutdown requests through
 * the in-memory event bus instead.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };

export function lifecyclePolicyFor(mode: RuntimeMode): ProcessLifecyclePolicy {
  return mode.kind === 'test'
    ? { kind: 'no_signal_handlers' }
    : { kind: 'install_signal_handlers' };
}
