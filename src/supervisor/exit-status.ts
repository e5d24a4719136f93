import type { ChildTermination } from '../runtime/ports/process-spawner.js';

/** How the supervised child ended; the launcher's own exit mirrors it. */
export type ExitStatus = ChildTermination;

/** Shell convention for signal deaths: 128 + signal number. */
export const SIGNAL_EXIT_BASE = 128;

export function toExitCode(status: ExitStatus): number {
  return status.kind === 'exited' ? status.code : SIGNAL_EXIT_BASE + status.signalNumber;
}

export function describeExitStatus(status: ExitStatus): string {
  return status.kind === 'exited'
    ? `exited with code ${status.code}`
    : `killed by ${status.signal} (status ${toExitCode(status)})`;
}
