import { delimiter, dirname, join, resolve } from 'path';
import type { InterpreterCandidate, InterpreterNotFoundError } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import type { FileInspector } from '../runtime/ports/file-inspector.js';
import { err, ok, type Result } from '../runtime/result.js';

export const PYTHON_BASENAME = 'python3';

export type InterpreterSource =
  | { readonly kind: 'override'; readonly origin: 'option' | 'env' }
  | { readonly kind: 'resources' }
  | { readonly kind: 'bundle' }
  | { readonly kind: 'bundle_parent' }
  | { readonly kind: 'system_path' };

export type ResolvedInterpreter = {
  readonly path: string;
  readonly source: InterpreterSource;
  /** The `python/` directory for an interpreter shipped inside the app bundle. */
  readonly pythonHome: string | null;
};

export type InterpreterOverride = {
  readonly path: string;
  /** `option` is `--python`, which the caller prefers over MLXK_PYTHON (`env`). */
  readonly origin: 'option' | 'env';
};

export type ResolveInterpreterRequest = {
  readonly override: InterpreterOverride | null;
  /** RESOURCES_PATH of the hosting app, when set. */
  readonly resourcesPath: string | null;
  readonly bundleRoot: string;
  /** PATH to search last. */
  readonly searchPath: string | undefined;
};

function sourceLabel(source: InterpreterSource): string {
  return source.kind === 'override' ? `override:${source.origin}` : source.kind;
}

function embeddedInterpreter(pythonDir: string): string {
  return join(pythonDir, 'bin', PYTHON_BASENAME);
}

/**
 * Finds the interpreter the launcher should run, in this order:
 * explicit override, `$RESOURCES_PATH/python`, `<bundle>/python`,
 * `<bundle>/../python`, then `python3` on PATH.
 */
export class InterpreterResolver {
  constructor(
    private readonly files: FileInspector,
    private readonly logger: Logger
  ) {}

  resolve(request: ResolveInterpreterRequest): Result<ResolvedInterpreter, InterpreterNotFoundError> {
    const override = request.override;
    if (override !== null) {
      const source: InterpreterSource = { kind: 'override', origin: override.origin };
      // An explicit choice that does not work is an error, not a hint.
      if (!this.files.isExecutable(override.path)) {
        return err(Err.interpreterNotFound([{ source: sourceLabel(source), path: override.path }]));
      }
      return ok(this.found(override.path, source, null));
    }

    const tried: InterpreterCandidate[] = [];
    for (const candidate of this.embeddedCandidates(request)) {
      const path = embeddedInterpreter(candidate.pythonDir);
      tried.push({ source: sourceLabel(candidate.source), path });
      if (this.files.isExecutable(path)) {
        return ok(this.found(path, candidate.source, candidate.pythonDir));
      }
    }

    for (const dir of (request.searchPath ?? '').split(delimiter)) {
      if (dir === '') continue;
      const path = join(dir, PYTHON_BASENAME);
      tried.push({ source: 'system_path', path });
      if (this.files.isExecutable(path)) {
        return ok(this.found(path, { kind: 'system_path' }, null));
      }
    }

    this.logger.debug({ tried }, 'no interpreter candidate is executable');
    return err(Err.interpreterNotFound(tried));
  }

  private embeddedCandidates(
    request: ResolveInterpreterRequest
  ): readonly { readonly pythonDir: string; readonly source: InterpreterSource }[] {
    const candidates: { pythonDir: string; source: InterpreterSource }[] = [];
    if (request.resourcesPath !== null) {
      candidates.push({ pythonDir: join(request.resourcesPath, 'python'), source: { kind: 'resources' } });
    }
    candidates.push({ pythonDir: join(request.bundleRoot, 'python'), source: { kind: 'bundle' } });
    candidates.push({ pythonDir: join(resolve(request.bundleRoot, '..'), 'python'), source: { kind: 'bundle_parent' } });
    return candidates;
  }

  private found(path: string, source: InterpreterSource, pythonHome: string | null): ResolvedInterpreter {
    this.logger.debug({ path, source: sourceLabel(source), pythonHome }, 'interpreter resolved');
    return { path, source, pythonHome };
  }
}

/** Directory holding the interpreter binary (`.../python/bin`). */
export function interpreterBinDir(interpreter: ResolvedInterpreter): string {
  return dirname(interpreter.path);
}
