/**
 * Launcher configuration from the environment - parse, don't validate.
 *
 * CLI options are merged over these values per command; this module only
 * owns the environment surface and its defaults.
 */

import { z } from 'zod';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../core/errors/index.js';
import type { ConfigIssue, ConfigInvalidError } from '../core/errors/index.js';
import {
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_POLL_INTERVAL_MS,
} from '../supervisor/launch-configuration.js';
import {
  DEFAULT_SERVER_MODULE,
  ServerLogLevelSchema,
  type ServerLogLevel,
} from '../launch/serve-launch.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type Port = Brand<number, 'Port'>;
export type GracePeriodMs = Brand<number, 'GracePeriodMs'>;
export type PollIntervalMs = Brand<number, 'PollIntervalMs'>;
export type BundleRoot = Brand<string, 'BundleRoot'>;

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;
export const DEFAULT_PROCESS_NAME = 'mlxk-launcher';

export interface AppConfig {
  readonly interpreter: {
    /** MLXK_PYTHON; `--python` still wins over it. */
    readonly override: string | null;
    readonly resourcesPath: string | null;
    readonly bundleRoot: BundleRoot;
  };
  readonly server: {
    readonly module: string;
    readonly host: string;
    readonly port: Port;
    readonly maxTokens: number | null;
    readonly logLevel: ServerLogLevel;
    readonly reload: boolean;
  };
  readonly supervision: {
    readonly gracePeriodMs: GracePeriodMs;
    readonly pollIntervalMs: PollIntervalMs;
    readonly processName: string;
  };
}

export type ValidatedConfig = Brand<AppConfig, 'ValidatedConfig'>;

export interface LoadConfigOptions {
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Directory the launcher was installed into; used when MLXK_BUNDLE_ROOT is unset. */
  readonly defaultBundleRoot: string;
}

// =============================================================================
// Schema
// =============================================================================

const blankToUndefined = (v: string | undefined): string | undefined =>
  v === undefined || v.trim() === '' ? undefined : v;

const numberFromEnv = (v: string | undefined): number | undefined => {
  const value = blankToUndefined(v);
  return value === undefined ? undefined : Number(value);
};

const EnvSchema = z.object({
  MLXK_PYTHON: z.string().optional().transform(blankToUndefined),
  RESOURCES_PATH: z.string().optional().transform(blankToUndefined),
  MLXK_BUNDLE_ROOT: z.string().optional().transform(blankToUndefined),

  MLXK2_HOST: z.string().optional().transform(blankToUndefined),

  MLXK2_PORT: z
    .string()
    .optional()
    .transform(numberFromEnv)
    .pipe(z.number().int().min(1, 'Port must be >= 1').max(65535, 'Port must be <= 65535').default(DEFAULT_PORT)),

  MLXK2_MAX_TOKENS: z
    .string()
    .optional()
    .transform(numberFromEnv)
    .pipe(z.number().int().positive('MLXK2_MAX_TOKENS must be a positive integer').optional()),

  MLXK2_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => blankToUndefined(v)?.toLowerCase())
    .pipe(ServerLogLevelSchema.default('info')),

  MLXK2_RELOAD: z.enum(['0', '1']).default('0'),

  MLXK_SERVER_MODULE: z
    .string()
    .optional()
    .transform(blankToUndefined)
    .pipe(z.string().regex(/^[A-Za-z_][\w.]*$/, 'Must be a dotted module name').default(DEFAULT_SERVER_MODULE)),

  MLXK_GRACE_PERIOD_MS: z
    .string()
    .optional()
    .transform(numberFromEnv)
    .pipe(
      z
        .number()
        .int()
        .positive('MLXK_GRACE_PERIOD_MS must be positive')
        .max(600_000, 'MLXK_GRACE_PERIOD_MS cannot exceed 10 minutes')
        .default(DEFAULT_GRACE_PERIOD_MS)
    ),

  MLXK_POLL_INTERVAL_MS: z
    .string()
    .optional()
    .transform(numberFromEnv)
    .pipe(z.number().int().positive('MLXK_POLL_INTERVAL_MS must be positive').default(DEFAULT_POLL_INTERVAL_MS)),

  MLXK_PROCESS_NAME: z.string().optional().transform(blankToUndefined),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  if (parsed.data.MLXK_POLL_INTERVAL_MS > parsed.data.MLXK_GRACE_PERIOD_MS) {
    return err(Err.configInvalid([{
      path: 'MLXK_POLL_INTERVAL_MS',
      message: 'Poll interval cannot exceed the grace period',
    }]));
  }

  return ok(buildConfig(parsed.data, options.defaultBundleRoot) as ValidatedConfig);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, defaultBundleRoot: string): AppConfig {
  return {
    interpreter: {
      override: env.MLXK_PYTHON ?? null,
      resourcesPath: env.RESOURCES_PATH ?? null,
      bundleRoot: (env.MLXK_BUNDLE_ROOT ?? defaultBundleRoot) as BundleRoot,
    },
    server: {
      module: env.MLXK_SERVER_MODULE,
      host: env.MLXK2_HOST ?? DEFAULT_HOST,
      port: env.MLXK2_PORT as Port,
      maxTokens: env.MLXK2_MAX_TOKENS ?? null,
      logLevel: env.MLXK2_LOG_LEVEL,
      reload: env.MLXK2_RELOAD === '1',
    },
    supervision: {
      gracePeriodMs: env.MLXK_GRACE_PERIOD_MS as GracePeriodMs,
      pollIntervalMs: env.MLXK_POLL_INTERVAL_MS as PollIntervalMs,
      processName: env.MLXK_PROCESS_NAME ?? DEFAULT_PROCESS_NAME,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
