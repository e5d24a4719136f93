/**
 * Run Command
 *
 * Supervises an arbitrary command under the same signal protocol and
 * environment contract as `serve`.
 */

import { z } from 'zod';
import type { ValidatedConfig } from '../../config/app-config.js';
import { validateCliOptions } from '../../core/errors/index.js';
import { createLaunchConfiguration } from '../../supervisor/launch-configuration.js';
import type { CliResult } from '../types/cli-result.js';
import { errorResult } from './error-result.js';
import { SupervisionOptionsSchema } from './options.js';
import { superviseToCompletion, type ChildSupervisor } from './supervise.js';

export interface RunCommandOptions {
  readonly cwd?: string;
  readonly gracePeriod?: string;
  readonly pollInterval?: string;
}

export interface RunCommandDeps {
  readonly config: ValidatedConfig;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly supervisor: ChildSupervisor;
  readonly setProcessTitle: (title: string) => void;
}

const RunOptionsSchema = SupervisionOptionsSchema.extend({
  cwd: z.string().min(1).optional(),
});

export async function executeRunCommand(
  deps: RunCommandDeps,
  executable: string,
  args: readonly string[],
  rawOptions: RunCommandOptions
): Promise<CliResult> {
  const parsed = validateCliOptions(RunOptionsSchema, rawOptions);
  if (parsed.isErr()) {
    return errorResult(parsed.error);
  }

  const launch = createLaunchConfiguration({
    executable,
    args: [...args],
    baseEnv: deps.env,
    cwd: parsed.value.cwd,
    gracePeriodMs: parsed.value.gracePeriod ?? deps.config.supervision.gracePeriodMs,
    pollIntervalMs: parsed.value.pollInterval ?? deps.config.supervision.pollIntervalMs,
  });
  if (launch.kind === 'err') {
    return errorResult(launch.error);
  }

  deps.setProcessTitle(deps.config.supervision.processName);
  return superviseToCompletion(deps.supervisor, launch.value);
}
