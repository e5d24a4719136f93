/**
 * Launcher errors as data: discriminated on `_tag`, readonly, grouped by
 * what the operator has to fix.
 */

export type AppError =
  | ProcessError
  | ResolutionError
  | DataError
  | ConfigurationError
  | InternalError;

// ============================================================================
// Process Errors (child could not be started or supervised)
// ============================================================================

export type ProcessError =
  | SpawnFailedError
  | AlreadyRunningError;

export type SpawnFailureReason =
  | 'not_found'
  | 'permission_denied'
  | 'invalid_arguments'
  | 'unknown';

export interface SpawnFailedError {
  readonly _tag: 'SpawnFailed';
  readonly executable: string;
  readonly reason: SpawnFailureReason;
  /** errno-style code from the OS (`ENOENT`, `EACCES`), when there was one. */
  readonly code?: string;
  readonly details: string;
  readonly message: string;
}

export interface AlreadyRunningError {
  readonly _tag: 'AlreadyRunning';
  readonly pid: number | null;
  readonly message: string;
}

// ============================================================================
// Resolution Errors
// ============================================================================

export type ResolutionError = InterpreterNotFoundError;

export type InterpreterCandidate = {
  readonly source: string;
  readonly path: string;
};

export interface InterpreterNotFoundError {
  readonly _tag: 'InterpreterNotFound';
  readonly candidates: readonly InterpreterCandidate[];
  readonly message: string;
}

// ============================================================================
// Data Errors
// ============================================================================

export type DataError =
  | ValidationFailedError
  | ParseFailedError
  | DiagnosticFailedError;

export interface ValidationFailedError {
  readonly _tag: 'ValidationFailed';
  readonly field: string;
  readonly value: string;
  readonly issues: string;
  readonly message: string;
}

export interface ParseFailedError {
  readonly _tag: 'ParseFailed';
  readonly source: string;
  readonly details: string;
  readonly message: string;
}

export interface DiagnosticFailedError {
  readonly _tag: 'DiagnosticFailed';
  readonly diagnostic: string;
  readonly exitCode: number;
  readonly details: string;
  readonly message: string;
}

// ============================================================================
// Configuration Errors
// ============================================================================

export type ConfigurationError = ConfigInvalidError;

export type ConfigIssue = {
  readonly path: string;
  readonly message: string;
};

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}

// ============================================================================
// Internal Errors (bugs)
// ============================================================================

export type InternalError = UnexpectedError;

export interface UnexpectedError {
  readonly _tag: 'UnexpectedError';
  readonly operation: string;
  readonly cause?: Error;
  readonly message: string;
}
