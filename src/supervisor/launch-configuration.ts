import { z } from 'zod';
import type { ValidationFailedError } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';
import { err, ok, type Result } from '../runtime/result.js';

export const DEFAULT_GRACE_PERIOD_MS = 5000;
export const DEFAULT_POLL_INTERVAL_MS = 100;

/**
 * Marks the child as already supervised so the server does not start a
 * supervisor of its own. Applied after every other overlay.
 */
export const NO_SELF_SUPERVISION_ENV = { MLXK2_SUPERVISE: '0' } as const;

export type EnvironmentMap = Readonly<Record<string, string>>;

/**
 * Everything needed to start and stop one child. Frozen when built.
 */
export interface LaunchConfiguration {
  readonly executable: string;
  readonly args: readonly string[];
  /** Fully merged environment the child receives. */
  readonly env: EnvironmentMap;
  /** What the launcher added on top of the base environment. */
  readonly overlay: EnvironmentMap;
  readonly cwd?: string;
  readonly gracePeriodMs: number;
  readonly pollIntervalMs: number;
}

const LaunchInputSchema = z.object({
  executable: z.string().min(1, 'executable must not be empty'),
  args: z.array(z.string()).default([]),
  baseEnv: z.record(z.string().optional()).default({}),
  overlay: z.record(z.string()).default({}),
  cwd: z.string().min(1).optional(),
  gracePeriodMs: z.number().int().positive().default(DEFAULT_GRACE_PERIOD_MS),
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
});

export type LaunchConfigurationInput = z.input<typeof LaunchInputSchema>;

/**
 * Base environment without unset entries, then the overlay, then the
 * no-self-supervision flag, which nothing earlier can override.
 */
export function mergeEnvironment(
  base: Readonly<Record<string, string | undefined>>,
  overlay: EnvironmentMap
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return { ...merged, ...overlay, ...NO_SELF_SUPERVISION_ENV };
}

export function createLaunchConfiguration(
  input: LaunchConfigurationInput
): Result<LaunchConfiguration, ValidationFailedError> {
  const parsed = LaunchInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map(e => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    return err(Err.validationFailed('launch configuration', input.executable, issues));
  }

  const data = parsed.data;
  if (data.pollIntervalMs > data.gracePeriodMs) {
    return err(Err.validationFailed(
      'pollIntervalMs',
      String(data.pollIntervalMs),
      `must not exceed the grace period (${data.gracePeriodMs} ms)`
    ));
  }

  const overlay = Object.freeze({ ...data.overlay, ...NO_SELF_SUPERVISION_ENV });
  return ok(Object.freeze({
    executable: data.executable,
    args: Object.freeze([...data.args]),
    env: Object.freeze(mergeEnvironment(data.baseEnv, overlay)),
    overlay,
    cwd: data.cwd,
    gracePeriodMs: data.gracePeriodMs,
    pollIntervalMs: data.pollIntervalMs,
  }));
}
