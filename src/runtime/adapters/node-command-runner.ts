import { execFile } from 'child_process';
import { ResultAsync, err, ok, type Result } from 'neverthrow';
import type { SpawnFailedError } from '../../core/errors/index.js';
import { SIGNAL_EXIT_BASE } from '../../supervisor/exit-status.js';
import type { CommandOptions, CommandOutput, CommandRunner } from '../ports/command-runner.js';
import { signalNumberOf, toSpawnFailure } from './spawn-failure.js';

const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

function isSignal(value: unknown): value is NodeJS.Signals {
  return typeof value === 'string' && value.startsWith('SIG');
}

/**
 * execFile-backed runner. Exit codes and signals are reported as output;
 * only a failure to start becomes SpawnFailed.
 */
export class NodeCommandRunner implements CommandRunner {
  run(
    executable: string,
    args: readonly string[],
    options: CommandOptions
  ): ResultAsync<CommandOutput, SpawnFailedError> {
    const outcome = new Promise<Result<CommandOutput, SpawnFailedError>>(resolve => {
      try {
        execFile(
          executable,
          [...args],
          {
            env: { ...options.env },
            timeout: options.timeoutMs,
            maxBuffer: MAX_OUTPUT_BYTES,
            encoding: 'utf8',
          },
          (error, stdout, stderr) => {
            if (error === null) {
              resolve(ok({ exitCode: 0, stdout, stderr }));
              return;
            }
            const code: unknown = error.code;
            if (typeof code === 'number') {
              resolve(ok({ exitCode: code, stdout, stderr }));
              return;
            }
            const signal: unknown = error.signal;
            if (isSignal(signal)) {
              resolve(ok({ exitCode: SIGNAL_EXIT_BASE + signalNumberOf(signal), stdout, stderr }));
              return;
            }
            resolve(err(toSpawnFailure(executable, error)));
          }
        );
      } catch (error) {
        // Invalid arguments throw synchronously instead of emitting 'error'.
        resolve(err(toSpawnFailure(executable, error)));
      }
    });
    return new ResultAsync(outcome);
  }
}
