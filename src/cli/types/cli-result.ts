/**
 * Commands return these; only the composition root turns them into output
 * and an exit status.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output for CLI display.
 * `json` is printed verbatim on stdout for machine consumers.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
  readonly json?: unknown;
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function successJson(json: unknown): CliResult {
  return { kind: 'success', output: { message: '', json } };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
    json?: unknown;
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
      json: options?.json,
    },
  };
}
