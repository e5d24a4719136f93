import { constants } from 'os';
import type { SpawnFailedError, SpawnFailureReason } from '../../core/errors/index.js';
import { Err } from '../../core/errors/index.js';
import type { ChildTermination } from '../ports/process-spawner.js';

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function reasonFor(code: string | undefined): SpawnFailureReason {
  switch (code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'not_found';
    case 'EACCES':
    case 'EPERM':
      return 'permission_denied';
    case 'E2BIG':
    case 'ERR_INVALID_ARG_TYPE':
    case 'ERR_INVALID_ARG_VALUE':
      return 'invalid_arguments';
    default:
      return 'unknown';
  }
}

/** Maps a spawn error from node:child_process to SpawnFailed. */
export function toSpawnFailure(executable: string, error: unknown): SpawnFailedError {
  const code = errorCode(error);
  const details = error instanceof Error ? error.message : String(error);
  return Err.spawnFailed(executable, reasonFor(code), details, code);
}

export function signalNumberOf(signal: NodeJS.Signals): number {
  return SIGNAL_NUMBERS.get(signal) ?? 0;
}

/** Translates Node's `(code, signal)` exit pair. */
export function toChildTermination(code: number | null, signal: NodeJS.Signals | null): ChildTermination {
  if (signal !== null) {
    return { kind: 'signaled', signal, signalNumber: signalNumberOf(signal) };
  }
  return { kind: 'exited', code: code ?? 0 };
}
