/**
 * Port for ending the current process.
 * Only the composition root calls it.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'status'; code: number };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
