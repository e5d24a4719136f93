import type { Result } from 'neverthrow';
import type { LaunchConfiguration } from '../../supervisor/launch-configuration.js';
import type { SupervisorError } from '../../supervisor/process-supervisor.js';
import { describeExitStatus, toExitCode, type ExitStatus } from '../../supervisor/exit-status.js';
import type { CliResult } from '../types/cli-result.js';
import { failure, success } from '../types/cli-result.js';
import { errorResult } from './error-result.js';

/** What `serve` and `run` need from the supervisor. */
export interface ChildSupervisor {
  run(config: LaunchConfiguration): Promise<Result<ExitStatus, SupervisorError>>;
}

/**
 * Runs `config` to completion. The CLI exits with exactly the status the
 * child ended with; a clean exit prints nothing.
 */
export async function superviseToCompletion(
  supervisor: ChildSupervisor,
  config: LaunchConfiguration
): Promise<CliResult> {
  const outcome = await supervisor.run(config);
  if (outcome.isErr()) {
    return errorResult(outcome.error);
  }

  const status = outcome.value;
  const code = toExitCode(status);
  if (code === 0) {
    return success();
  }
  return failure(`${config.executable} ${describeExitStatus(status)}`, {
    exitCode: { kind: 'child_status', code },
  });
}
