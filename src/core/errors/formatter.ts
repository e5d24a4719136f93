/**
 * Error rendering for the terminal and for structured logs.
 */

import type { AppError } from './app-error.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface FormattedError {
  readonly error: string;
  readonly message: string;
  readonly details: Record<string, unknown>;
  readonly suggestions: readonly string[];
}

export function formatAppError(error: AppError): FormattedError {
  switch (error._tag) {
    case 'SpawnFailed':
      return {
        error: error._tag,
        message: error.message,
        details: { executable: error.executable, reason: error.reason, code: error.code },
        suggestions: error.reason === 'permission_denied'
          ? [`Make ${error.executable} executable (chmod +x)`]
          : error.reason === 'not_found'
            ? ['Check the path, or pass --python <path>']
            : [],
      };

    case 'AlreadyRunning':
      return {
        error: error._tag,
        message: error.message,
        details: { pid: error.pid },
        suggestions: ['Wait for the current child to exit before starting another'],
      };

    case 'InterpreterNotFound':
      return {
        error: error._tag,
        message: error.message,
        details: { candidates: error.candidates },
        suggestions: [
          'Pass --python <path> or set MLXK_PYTHON',
          'Or set RESOURCES_PATH to the directory containing python/bin/python3',
        ],
      };

    case 'ValidationFailed':
      return {
        error: error._tag,
        message: error.message,
        details: { field: error.field, value: error.value },
        suggestions: [],
      };

    case 'ParseFailed':
      return {
        error: error._tag,
        message: error.message,
        details: { source: error.source, details: error.details },
        suggestions: ['Run python-info to check the interpreter'],
      };

    case 'DiagnosticFailed':
      return {
        error: error._tag,
        message: error.message,
        details: { diagnostic: error.diagnostic, exitCode: error.exitCode },
        suggestions: [],
      };

    case 'ConfigInvalid':
      return {
        error: error._tag,
        message: error.message,
        details: { issues: error.issues },
        suggestions: ['Fix the environment variables listed above'],
      };

    case 'UnexpectedError':
      return {
        error: error._tag,
        message: error.message,
        details: { operation: error.operation },
        suggestions: ['Re-run with MLXK_LOG_LEVEL=debug for details'],
      };

    default:
      return assertNever(error);
  }
}

export function formatErrorForLogs(error: AppError): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorTag: error._tag,
    message: error.message,
  };

  for (const [key, value] of Object.entries(error)) {
    if (key !== '_tag' && key !== 'message') {
      base[key] = value;
    }
  }

  return base;
}
