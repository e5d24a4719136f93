import { err, errAsync, ok, type ResultAsync } from 'neverthrow';
import type {
  DiagnosticFailedError,
  ParseFailedError,
  SpawnFailedError,
  ValidationFailedError,
} from '../core/errors/index.js';
import { Err, parseJsonOutput } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import type { CommandOutput, CommandRunner } from '../runtime/ports/command-runner.js';
import { CHECK_STACK_SCRIPT, PACKAGE_INFO_SCRIPT, PYTHON_INFO_SCRIPT } from './interpreter-scripts.js';
import {
  PackageInfoSchema,
  PackageNameSchema,
  ReportedErrorSchema,
  PythonInfoSchema,
  StackHealthSchema,
  type PackageInfo,
  type PythonInfo,
  type StackHealth,
} from './schemas.js';

export type DiagnosticError =
  | SpawnFailedError
  | ParseFailedError
  | DiagnosticFailedError
  | ValidationFailedError;

export type DiagnosticTarget = {
  readonly interpreter: string;
  readonly env: Readonly<Record<string, string>>;
};

export const DIAGNOSTIC_TIMEOUT_MS = 30_000;

/** Last line of what the script wrote (the exception message for a traceback). */
function summarize(output: CommandOutput): string {
  const text = output.stderr.trim() || output.stdout.trim();
  const lastLine = text.split('\n').pop() ?? '';
  return lastLine === '' ? 'no output' : lastLine;
}

/**
 * One-shot interpreter checks, each a single `python3 -c` run whose JSON
 * stdout is parsed at the boundary.
 */
export class DiagnosticsService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  pythonInfo(target: DiagnosticTarget): ResultAsync<PythonInfo, DiagnosticError> {
    return this.runScript('python-info', target, PYTHON_INFO_SCRIPT, []).andThen(output =>
      output.exitCode === 0
        ? parseJsonOutput(PythonInfoSchema, output.stdout, 'python-info')
        : err(Err.diagnosticFailed('python-info', output.exitCode, summarize(output)))
    );
  }

  packageInfo(target: DiagnosticTarget, packageName: string): ResultAsync<PackageInfo, DiagnosticError> {
    const name = PackageNameSchema.safeParse(packageName);
    if (!name.success) {
      const issues = name.error.errors.map(e => e.message).join('; ');
      return errAsync(Err.validationFailed('package', packageName, issues));
    }

    return this.runScript('pkg-info', target, PACKAGE_INFO_SCRIPT, [name.data]).andThen(output => {
      if (output.exitCode === 0) {
        return parseJsonOutput(PackageInfoSchema, output.stdout, 'pkg-info');
      }
      const reported = parseJsonOutput(ReportedErrorSchema, output.stdout, 'pkg-info');
      const details = reported.isOk() ? reported.value.error : summarize(output);
      return err(Err.diagnosticFailed(`pkg-info ${name.data}`, output.exitCode, details));
    });
  }

  /**
   * An unhealthy stack is still `ok` here: the report itself is the answer.
   * Only a script that printed nothing usable is an error.
   */
  checkStack(target: DiagnosticTarget): ResultAsync<StackHealth, DiagnosticError> {
    return this.runScript('check-stack', target, CHECK_STACK_SCRIPT, []).andThen(output => {
      const report = parseJsonOutput(StackHealthSchema, output.stdout, 'check-stack');
      if (report.isOk()) {
        return ok(report.value);
      }
      return output.exitCode === 0
        ? err(report.error)
        : err(Err.diagnosticFailed('check-stack', output.exitCode, summarize(output)));
    });
  }

  private runScript(
    name: string,
    target: DiagnosticTarget,
    script: string,
    args: readonly string[]
  ): ResultAsync<CommandOutput, DiagnosticError> {
    this.logger.debug({ script: name, interpreter: target.interpreter }, 'running diagnostic script');
    return this.runner
      .run(target.interpreter, ['-c', script, ...args], { env: target.env, timeoutMs: DIAGNOSTIC_TIMEOUT_MS })
      .map(output => {
        this.logger.debug({ script: name, exitCode: output.exitCode }, 'diagnostic script finished');
        return output;
      });
  }
}

export type { PythonInfo, PackageInfo, StackHealth };
