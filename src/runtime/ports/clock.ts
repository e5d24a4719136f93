/**
 * Time source for the escalation loop. Backed by `Date.now`/`setTimeout`
 * so vitest fake timers control it in tests.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}
