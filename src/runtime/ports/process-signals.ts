/**
 * Port for OS signal subscription.
 * Keeps `process.on` out of the supervisor so tests can drive it in memory.
 */
export type ProcessSignal = NodeJS.Signals;

export type Unsubscribe = () => void;

export interface ProcessSignals {
  on(signal: ProcessSignal, handler: () => void): Unsubscribe;
}
