/**
 * `Err.*` constructors keep error shape and wording in one place.
 */

import type {
  SpawnFailedError,
  SpawnFailureReason,
  AlreadyRunningError,
  InterpreterCandidate,
  InterpreterNotFoundError,
  ValidationFailedError,
  ParseFailedError,
  DiagnosticFailedError,
  ConfigIssue,
  ConfigInvalidError,
  UnexpectedError,
} from './app-error.js';

const SPAWN_REASON_TEXT: Record<SpawnFailureReason, string> = {
  not_found: 'executable not found',
  permission_denied: 'permission denied',
  invalid_arguments: 'invalid arguments',
  unknown: 'spawn failed',
};

export const Err = {
  // ==========================================================================
  // Process Errors
  // ==========================================================================

  spawnFailed: (
    executable: string,
    reason: SpawnFailureReason,
    details: string,
    code?: string
  ): SpawnFailedError => ({
    _tag: 'SpawnFailed',
    executable,
    reason,
    code,
    details,
    message: `Cannot start ${executable}: ${SPAWN_REASON_TEXT[reason]} (${details})`,
  }),

  alreadyRunning: (pid: number | null): AlreadyRunningError => ({
    _tag: 'AlreadyRunning',
    pid,
    message: pid === null
      ? 'Supervisor is already starting a child'
      : `Supervisor is already running child ${pid}`,
  }),

  // ==========================================================================
  // Resolution Errors
  // ==========================================================================

  interpreterNotFound: (candidates: readonly InterpreterCandidate[]): InterpreterNotFoundError => ({
    _tag: 'InterpreterNotFound',
    candidates,
    message: candidates.length === 1
      ? `Python interpreter is not executable: ${candidates[0]?.path ?? ''}`
      : `No Python interpreter found (tried ${candidates.length} locations)`,
  }),

  // ==========================================================================
  // Data Errors
  // ==========================================================================

  validationFailed: (field: string, value: string, issues: string): ValidationFailedError => ({
    _tag: 'ValidationFailed',
    field,
    value,
    issues,
    message: `Invalid ${field}: ${issues}`,
  }),

  parseFailed: (source: string, details: string): ParseFailedError => ({
    _tag: 'ParseFailed',
    source,
    details,
    message: `Failed to parse output of ${source}: ${details}`,
  }),

  diagnosticFailed: (
    diagnostic: string,
    exitCode: number,
    details: string
  ): DiagnosticFailedError => ({
    _tag: 'DiagnosticFailed',
    diagnostic,
    exitCode,
    details,
    message: `${diagnostic} failed with exit code ${exitCode}: ${details}`,
  }),

  // ==========================================================================
  // Configuration Errors
  // ==========================================================================

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: `Configuration invalid:\n${issues.map(i => `  - ${i.path}: ${i.message}`).join('\n')}`,
  }),

  // ==========================================================================
  // Internal Errors
  // ==========================================================================

  unexpectedError: (operation: string, cause?: Error): UnexpectedError => ({
    _tag: 'UnexpectedError',
    operation,
    cause,
    message: `Unexpected error during ${operation}: ${cause?.message ?? 'Unknown error'}`,
  }),
};
