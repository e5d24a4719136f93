/**
 * Serve Command
 *
 * Resolves the interpreter, builds the server's argv and environment, and
 * supervises it until it exits. Pure function with dependency injection.
 */

import { z } from 'zod';
import type { ValidatedConfig } from '../../config/app-config.js';
import { validateCliOptions } from '../../core/errors/index.js';
import type { Logger } from '../../core/logging/index.js';
import { resolveLaunchTarget, type InterpreterLookup } from '../../launch/launch-target.js';
import {
  ServerLogLevelSchema,
  buildServeArgs,
  buildServeOverlay,
  type ServeSettings,
} from '../../launch/serve-launch.js';
import type { FileInspector } from '../../runtime/ports/file-inspector.js';
import { createLaunchConfiguration } from '../../supervisor/launch-configuration.js';
import type { CliResult } from '../types/cli-result.js';
import { errorResult } from './error-result.js';
import { SupervisionOptionsSchema, wholeNumber } from './options.js';
import { superviseToCompletion, type ChildSupervisor } from './supervise.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/** Raw commander options; every value is still unparsed. */
export interface ServeCommandOptions {
  readonly python?: string;
  readonly bundleRoot?: string;
  readonly module?: string;
  readonly host?: string;
  readonly port?: string;
  readonly maxTokens?: string;
  readonly logLevel?: string;
  readonly reload?: boolean;
  readonly gracePeriod?: string;
  readonly pollInterval?: string;
}

export interface ServeCommandDeps {
  readonly config: ValidatedConfig;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly resolver: InterpreterLookup;
  readonly files: FileInspector;
  readonly supervisor: ChildSupervisor;
  readonly setProcessTitle: (title: string) => void;
  readonly logger: Logger;
}

const ServeOptionsSchema = SupervisionOptionsSchema.extend({
  python: z.string().min(1).optional(),
  bundleRoot: z.string().min(1).optional(),
  module: z.string().regex(/^[A-Za-z_][\w.]*$/, 'Must be a dotted module name').optional(),
  host: z.string().min(1).optional(),
  port: wholeNumber(z.number().int().min(1).max(65535, 'Port must be <= 65535')),
  maxTokens: wholeNumber(z.number().int().positive('Max tokens must be positive')),
  logLevel: ServerLogLevelSchema.optional(),
  reload: z.boolean().optional(),
});

type ParsedServeOptions = z.infer<typeof ServeOptionsSchema>;

function serveSettings(config: ValidatedConfig, options: ParsedServeOptions): ServeSettings {
  return {
    module: options.module ?? config.server.module,
    host: options.host ?? config.server.host,
    port: options.port ?? config.server.port,
    maxTokens: options.maxTokens ?? config.server.maxTokens,
    logLevel: options.logLevel ?? config.server.logLevel,
    reload: options.reload ?? config.server.reload,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeServeCommand(
  deps: ServeCommandDeps,
  rawOptions: ServeCommandOptions
): Promise<CliResult> {
  const parsed = validateCliOptions(ServeOptionsSchema, rawOptions);
  if (parsed.isErr()) {
    return errorResult(parsed.error);
  }
  const options = parsed.value;

  const target = resolveLaunchTarget(
    {
      config: deps.config,
      env: deps.env,
      pythonOption: options.python,
      bundleRootOption: options.bundleRoot,
    },
    deps.resolver,
    deps.files
  );
  if (target.kind === 'err') {
    return errorResult(target.error);
  }

  const settings = serveSettings(deps.config, options);
  const launch = createLaunchConfiguration({
    executable: target.value.interpreter.path,
    args: buildServeArgs(settings),
    baseEnv: deps.env,
    overlay: { ...target.value.bundleOverlay, ...buildServeOverlay(settings) },
    gracePeriodMs: options.gracePeriod ?? deps.config.supervision.gracePeriodMs,
    pollIntervalMs: options.pollInterval ?? deps.config.supervision.pollIntervalMs,
  });
  if (launch.kind === 'err') {
    return errorResult(launch.error);
  }

  deps.setProcessTitle(deps.config.supervision.processName);
  deps.logger.info(
    {
      interpreter: target.value.interpreter.path,
      source: target.value.interpreter.source.kind,
      host: settings.host,
      port: settings.port,
    },
    'starting server'
  );

  return superviseToCompletion(deps.supervisor, launch.value);
}
