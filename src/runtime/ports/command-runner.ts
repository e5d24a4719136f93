import type { ResultAsync } from 'neverthrow';
import type { SpawnFailedError } from '../../core/errors/index.js';

export type CommandOutput = {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
};

export type CommandOptions = {
  readonly env: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
};

/**
 * Port for short, captured, unsupervised commands (interpreter diagnostics).
 * A non-zero exit is still `ok`; only a failure to start is an error.
 */
export interface CommandRunner {
  run(
    executable: string,
    args: readonly string[],
    options: CommandOptions
  ): ResultAsync<CommandOutput, SpawnFailedError>;
}
