import type { ValidatedConfig } from '../config/app-config.js';
import type { InterpreterNotFoundError } from '../core/errors/index.js';
import type { FileInspector } from '../runtime/ports/file-inspector.js';
import { map, type Result } from '../runtime/result.js';
import { buildBundleEnvironment } from './bundle-environment.js';
import type {
  InterpreterOverride,
  ResolveInterpreterRequest,
  ResolvedInterpreter,
} from './interpreter-resolver.js';

export interface InterpreterLookup {
  resolve(request: ResolveInterpreterRequest): Result<ResolvedInterpreter, InterpreterNotFoundError>;
}

export type LaunchTargetRequest = {
  readonly config: ValidatedConfig;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly pythonOption?: string;
  readonly bundleRootOption?: string;
};

/** Interpreter plus the environment overlay that makes its bundle importable. */
export type LaunchTarget = {
  readonly interpreter: ResolvedInterpreter;
  readonly bundleRoot: string;
  readonly bundleOverlay: Readonly<Record<string, string>>;
};

function overrideFor(request: LaunchTargetRequest): InterpreterOverride | null {
  if (request.pythonOption !== undefined && request.pythonOption !== '') {
    return { path: request.pythonOption, origin: 'option' };
  }
  const fromConfig = request.config.interpreter.override;
  return fromConfig === null ? null : { path: fromConfig, origin: 'env' };
}

/**
 * Shared by `serve` and the diagnostics: the scripts must see the same
 * interpreter and environment the server would.
 */
export function resolveLaunchTarget(
  request: LaunchTargetRequest,
  resolver: InterpreterLookup,
  files: FileInspector
): Result<LaunchTarget, InterpreterNotFoundError> {
  const bundleRoot = request.bundleRootOption ?? request.config.interpreter.bundleRoot;
  const resolved = resolver.resolve({
    override: overrideFor(request),
    resourcesPath: request.config.interpreter.resourcesPath,
    bundleRoot,
    searchPath: request.env['PATH'],
  });

  return map(resolved, interpreter => ({
    interpreter,
    bundleRoot,
    bundleOverlay: buildBundleEnvironment({ env: request.env, interpreter, bundleRoot }, files),
  }));
}
