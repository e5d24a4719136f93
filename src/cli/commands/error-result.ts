import type { AppError } from '../../core/errors/index.js';
import { formatAppError } from '../../core/errors/index.js';
import { assertNever } from '../../runtime/assert-never.js';
import type { CliResult } from '../types/cli-result.js';
import { failure } from '../types/cli-result.js';
import type { ExitCode } from '../types/exit-code.js';

export function exitCodeFor(error: AppError): ExitCode {
  switch (error._tag) {
    case 'SpawnFailed':
      return error.reason === 'permission_denied' ? { kind: 'not_executable' } : { kind: 'not_found' };
    case 'InterpreterNotFound':
      return { kind: 'not_found' };
    case 'ValidationFailed':
    case 'ConfigInvalid':
      return { kind: 'misuse' };
    case 'DiagnosticFailed':
    case 'ParseFailed':
      return { kind: 'diagnostic_failed' };
    case 'AlreadyRunning':
    case 'UnexpectedError':
      return { kind: 'general_error' };
    default:
      return assertNever(error);
  }
}

export function errorResult(error: AppError): CliResult {
  const formatted = formatAppError(error);
  return failure(formatted.message, {
    exitCode: exitCodeFor(error),
    suggestions: formatted.suggestions,
  });
}
