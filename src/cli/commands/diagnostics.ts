/**
 * Diagnostic Commands
 *
 * python-info, pkg-info and check-stack. Each resolves the interpreter the
 * way `serve` would, runs one diagnostic script, and prints its JSON report on stdout.
 */

import type { ResultAsync } from 'neverthrow';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { DiagnosticError, DiagnosticTarget } from '../../diagnostics/diagnostics-service.js';
import type { PackageInfo, PythonInfo, StackHealth } from '../../diagnostics/schemas.js';
import { resolveLaunchTarget, type InterpreterLookup } from '../../launch/launch-target.js';
import type { FileInspector } from '../../runtime/ports/file-inspector.js';
import { mergeEnvironment } from '../../supervisor/launch-configuration.js';
import type { CliResult } from '../types/cli-result.js';
import { failure, successJson } from '../types/cli-result.js';
import { errorResult } from './error-result.js';

export interface Diagnostics {
  pythonInfo(target: DiagnosticTarget): ResultAsync<PythonInfo, DiagnosticError>;
  packageInfo(target: DiagnosticTarget, packageName: string): ResultAsync<PackageInfo, DiagnosticError>;
  checkStack(target: DiagnosticTarget): ResultAsync<StackHealth, DiagnosticError>;
}

export interface DiagnosticCommandOptions {
  readonly python?: string;
  readonly bundleRoot?: string;
}

export interface DiagnosticCommandDeps {
  readonly config: ValidatedConfig;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly resolver: InterpreterLookup;
  readonly files: FileInspector;
  readonly diagnostics: Diagnostics;
}

type TargetOutcome =
  | { readonly kind: 'ready'; readonly target: DiagnosticTarget }
  | { readonly kind: 'failed'; readonly result: CliResult };

function resolveTarget(deps: DiagnosticCommandDeps, options: DiagnosticCommandOptions): TargetOutcome {
  const resolved = resolveLaunchTarget(
    { config: deps.config, env: deps.env, pythonOption: options.python, bundleRootOption: options.bundleRoot },
    deps.resolver,
    deps.files
  );
  if (resolved.kind === 'err') {
    return { kind: 'failed', result: errorResult(resolved.error) };
  }
  return {
    kind: 'ready',
    target: {
      interpreter: resolved.value.interpreter.path,
      env: mergeEnvironment(deps.env, resolved.value.bundleOverlay),
    },
  };
}

export async function executePythonInfoCommand(
  deps: DiagnosticCommandDeps,
  options: DiagnosticCommandOptions
): Promise<CliResult> {
  const outcome = resolveTarget(deps, options);
  if (outcome.kind === 'failed') return outcome.result;

  return (await deps.diagnostics.pythonInfo(outcome.target)).match(successJson, errorResult);
}

export async function executePackageInfoCommand(
  deps: DiagnosticCommandDeps,
  packageName: string,
  options: DiagnosticCommandOptions
): Promise<CliResult> {
  const outcome = resolveTarget(deps, options);
  if (outcome.kind === 'failed') return outcome.result;

  return (await deps.diagnostics.packageInfo(outcome.target, packageName)).match(successJson, errorResult);
}

export async function executeCheckStackCommand(
  deps: DiagnosticCommandDeps,
  options: DiagnosticCommandOptions
): Promise<CliResult> {
  const outcome = resolveTarget(deps, options);
  if (outcome.kind === 'failed') return outcome.result;

  const report = await deps.diagnostics.checkStack(outcome.target);
  if (report.isErr()) {
    return errorResult(report.error);
  }
  if (!report.value.ok) {
    return failure(`MLX stack is not importable: ${report.value.error ?? 'unknown error'}`, {
      exitCode: { kind: 'diagnostic_failed' },
      json: report.value,
    });
  }
  return successJson(report.value);
}
