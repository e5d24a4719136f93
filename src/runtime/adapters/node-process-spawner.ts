import { spawn, type ChildProcess } from 'child_process';
import { ResultAsync } from 'neverthrow';
import type { SpawnFailedError } from '../../core/errors/index.js';
import type { Logger } from '../../core/logging/index.js';
import type {
  ChildTermination,
  GroupSignal,
  ProcessSpawner,
  SpawnedChild,
  SpawnRequest,
} from '../ports/process-spawner.js';
import { toChildTermination, toSpawnFailure } from './spawn-failure.js';

const USES_PROCESS_GROUPS = process.platform !== 'win32';

class NodeSpawnedChild implements SpawnedChild {
  readonly pgid: number | null;
  readonly startedAt: number;
  readonly termination: Promise<ChildTermination>;
  private exitStatus: ChildTermination | null = null;

  constructor(
    private readonly child: ChildProcess,
    readonly pid: number,
    private readonly logger: Logger
  ) {
    // A detached child calls setsid(), so it leads its own group.
    this.pgid = USES_PROCESS_GROUPS ? pid : null;
    this.startedAt = Date.now();
    this.termination = new Promise(resolve => {
      child.once('exit', (code, signal) => {
        this.exitStatus = toChildTermination(code, signal);
        resolve(this.exitStatus);
      });
    });
  }

  poll(): ChildTermination | null {
    return this.exitStatus;
  }

  signalGroup(signal: GroupSignal): boolean {
    if (this.pgid === null) {
      return this.child.kill(signal);
    }
    try {
      process.kill(-this.pgid, signal);
      return true;
    } catch (error) {
      // ESRCH: the group is already gone.
      this.logger.debug({ err: error, pgid: this.pgid, signal }, 'group signal not delivered');
      return false;
    }
  }

  groupAlive(): boolean {
    if (this.pgid === null) {
      return this.exitStatus === null;
    }
    try {
      process.kill(-this.pgid, 0);
      return true;
    } catch (error) {
      // EPERM still means a member exists.
      return error instanceof Error && 'code' in error && error.code === 'EPERM';
    }
  }
}

/**
 * Starts the child detached into a new process group with inherited stdio,
 * so the child owns the terminal output while the launcher logs to stderr.
 */
export class NodeProcessSpawner implements ProcessSpawner {
  constructor(private readonly logger: Logger) {}

  spawn(request: SpawnRequest): ResultAsync<SpawnedChild, SpawnFailedError> {
    const started = new Promise<SpawnedChild>((resolve, reject) => {
      const child = spawn(request.executable, [...request.args], {
        cwd: request.cwd,
        env: { ...request.env },
        detached: USES_PROCESS_GROUPS,
        stdio: 'inherit',
      });

      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(error);
      };
      const onSpawn = (): void => {
        child.off('error', onError);
        child.on('error', error => {
          this.logger.warn({ err: error, pid: child.pid }, 'child process error');
        });
        if (child.pid === undefined) {
          reject(new Error('spawned child has no pid'));
          return;
        }
        resolve(new NodeSpawnedChild(child, child.pid, this.logger));
      };

      child.once('error', onError);
      child.once('spawn', onSpawn);
    });

    return ResultAsync.fromPromise(started, error => toSpawnFailure(request.executable, error));
  }
}
