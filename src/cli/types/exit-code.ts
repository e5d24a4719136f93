/**
 * Typed exit codes for CLI commands, following Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }                          // 0
  | { kind: 'general_error' }                    // 1
  | { kind: 'misuse' }                           // 2 - bad arguments or config
  | { kind: 'diagnostic_failed' }                // 2 - diagnostic script reported failure
  | { kind: 'not_executable' }                   // 126 - found but cannot run
  | { kind: 'not_found' }                        // 127 - could not be started
  | { kind: 'child_status'; code: number };      // whatever the child ended with

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): { kind: 'success' } | { kind: 'status'; code: number } {
  const code = toNumericExitCode(exitCode);
  return code === 0 ? { kind: 'success' } : { kind: 'status', code };
}

/**
 * Numeric value for a raw process.exit(), for boundaries without DI.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
    case 'diagnostic_failed':
      return 2;
    case 'not_executable':
      return 126;
    case 'not_found':
      return 127;
    case 'child_status':
      return exitCode.code;
  }
}
