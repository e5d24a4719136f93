import { err, ok, type Result } from 'neverthrow';
import type { AlreadyRunningError, SpawnFailedError } from '../core/errors/index.js';
import { Err, formatErrorForLogs } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import { assertNever } from '../runtime/assert-never.js';
import type { Clock } from '../runtime/ports/clock.js';
import type { GroupSignal, ProcessSpawner, SpawnedChild } from '../runtime/ports/process-spawner.js';
import type { ShutdownEvent, ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { describeExitStatus, toExitCode, type ExitStatus } from './exit-status.js';
import type { LaunchConfiguration } from './launch-configuration.js';

export type SupervisorError = SpawnFailedError | AlreadyRunningError;

export type SupervisorPhase = SessionState['kind'];

/** A shutdown request numbered within its session (1 = first). */
export type ShutdownRequest = ShutdownEvent & { readonly ordinal: number };

export type ForceKillReason = 'grace_period_elapsed' | 'repeated_request' | 'group_outlived_child';

export type SupervisedChildSnapshot = {
  readonly pid: number;
  readonly pgid: number | null;
  readonly phase: SupervisorPhase;
  readonly startedAt: number;
};

/**
 * Lifecycle of one supervision session.
 *
 * idle → spawning → running → stopping → killing → exited
 *
 * `stopping` and `killing` are only ever entered in that order; a session
 * never goes back from a forced kill to a graceful stop.
 */
type SessionState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'spawning'; readonly pending: ShutdownRequest[] }
  | { readonly kind: 'running'; readonly child: SpawnedChild }
  | { readonly kind: 'stopping'; readonly child: SpawnedChild; readonly deadline: number }
  | { readonly kind: 'killing'; readonly child: SpawnedChild }
  | { readonly kind: 'exited' };

/**
 * Runs one child in its own process group and turns shutdown requests into
 * graceful-stop → SIGKILL escalation against that group.
 *
 * All state changes happen on the event loop (shutdown listeners, timers,
 * spawn/exit callbacks), so the fields below are never observed half-written.
 */
export class ProcessSupervisor {
  private state: SessionState = { kind: 'idle' };
  private requestCount = 0;
  private forceKillSent = false;
  private escalation: Promise<void> | null = null;
  private wake: () => void = () => undefined;
  private config: LaunchConfiguration | null = null;

  constructor(
    private readonly spawner: ProcessSpawner,
    private readonly shutdownEvents: ShutdownEvents,
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {}

  get phase(): SupervisorPhase {
    return this.state.kind;
  }

  snapshot(): SupervisedChildSnapshot | null {
    const child = this.currentChild();
    if (child === null) return null;
    return { pid: child.pid, pgid: child.pgid, phase: this.state.kind, startedAt: child.startedAt };
  }

  /**
   * Starts `config` and resolves once the child has terminated and been
   * reaped, and anything left in its process group has been killed.
   * Shutdown requests are accepted from before the spawn until the child
   * is gone.
   */
  async run(config: LaunchConfiguration): Promise<Result<ExitStatus, SupervisorError>> {
    if (this.state.kind !== 'idle' && this.state.kind !== 'exited') {
      const pid = this.currentChild()?.pid ?? null;
      this.logger.warn({ pid, phase: this.state.kind }, 'run rejected: a child is already supervised');
      return err(Err.alreadyRunning(pid));
    }

    this.beginSession(config);
    const unsubscribe = this.shutdownEvents.onShutdown(event => {
      this.onShutdownRequest(event);
    });

    try {
      const spawned = await this.spawner.spawn({
        executable: config.executable,
        args: config.args,
        env: config.env,
        cwd: config.cwd,
      });

      if (spawned.isErr()) {
        this.state = { kind: 'exited' };
        this.logger.error(formatErrorForLogs(spawned.error), 'child failed to start');
        return err(spawned.error);
      }

      const child = spawned.value;
      const pending = this.takePending();
      this.state = { kind: 'running', child };
      this.logger.info(
        { pid: child.pid, pgid: child.pgid, executable: config.executable, overlay: config.overlay },
        'child started'
      );

      for (const request of pending) {
        this.dispatch(request, child);
      }

      const status = await child.termination;
      this.state = { kind: 'exited' };
      this.wake();
      if (this.escalation !== null) {
        await this.escalation;
      }
      await this.clearProcessGroup(child);

      this.logger.info(
        { pid: child.pid, status, exitCode: toExitCode(status), requests: this.requestCount },
        `child ${describeExitStatus(status)}`
      );
      return ok(status);
    } finally {
      unsubscribe();
    }
  }

  private beginSession(config: LaunchConfiguration): void {
    this.config = config;
    this.requestCount = 0;
    this.forceKillSent = false;
    this.escalation = null;
    this.wake = () => undefined;
    this.state = { kind: 'spawning', pending: [] };
  }

  private takePending(): readonly ShutdownRequest[] {
    const state = this.state;
    return state.kind === 'spawning' ? state.pending : [];
  }

  private currentChild(): SpawnedChild | null {
    const state = this.state;
    switch (state.kind) {
      case 'running':
      case 'stopping':
      case 'killing':
        return state.child;
      default:
        return null;
    }
  }

  private onShutdownRequest(event: ShutdownEvent): void {
    this.requestCount += 1;
    const request: ShutdownRequest = { ...event, ordinal: this.requestCount };
    this.logger.info(
      { signal: request.signal, ordinal: request.ordinal, receivedAt: request.receivedAt },
      'shutdown requested'
    );

    const state = this.state;
    if (state.kind === 'spawning') {
      state.pending.push(request);
      return;
    }
    const child = this.currentChild();
    if (child === null) {
      this.logger.debug({ phase: state.kind }, 'no child to stop');
      return;
    }
    this.dispatch(request, child);
  }

  private dispatch(request: ShutdownRequest, child: SpawnedChild): void {
    const state = this.state;
    switch (state.kind) {
      case 'running':
        this.beginGracefulStop(request, child);
        return;
      case 'stopping':
        this.forceKill(child, 'repeated_request');
        return;
      case 'killing':
        this.logger.debug({ ordinal: request.ordinal }, 'SIGKILL already sent');
        return;
      case 'idle':
      case 'spawning':
      case 'exited':
        return;
      default:
        assertNever(state);
    }
  }

  private beginGracefulStop(request: ShutdownRequest, child: SpawnedChild): void {
    const gracePeriodMs = this.config?.gracePeriodMs ?? 0;
    const signal: GroupSignal = request.signal === 'SIGINT' ? 'SIGINT' : 'SIGTERM';
    const deadline = this.clock.now() + gracePeriodMs;
    this.state = { kind: 'stopping', child, deadline };

    const delivered = child.signalGroup(signal);
    this.logger.info({ pid: child.pid, pgid: child.pgid, signal, delivered, gracePeriodMs }, 'graceful stop sent');

    this.escalation = this.awaitGracePeriod(child, deadline);
  }

  /**
   * Polls for the child's exit until `deadline`, then escalates. Each wait
   * also ends early on child exit or on a repeated request.
   */
  private async awaitGracePeriod(child: SpawnedChild, deadline: number): Promise<void> {
    const pollIntervalMs = this.config?.pollIntervalMs ?? 0;
    const interrupted = new Promise<void>(resolve => {
      this.wake = resolve;
    });

    let now = this.clock.now();
    while (now < deadline) {
      if (child.poll() !== null || this.forceKillSent) return;
      await Promise.race([
        this.clock.sleep(Math.min(pollIntervalMs, deadline - now)),
        child.termination,
        interrupted,
      ]);
      now = this.clock.now();
    }

    if (child.poll() === null) {
      this.forceKill(child, 'grace_period_elapsed');
    }
  }

  private forceKill(child: SpawnedChild, reason: ForceKillReason): void {
    if (this.forceKillSent) return;
    this.state = { kind: 'killing', child };
    this.wake();
    this.sendKill(child, reason);
  }

  private sendKill(child: SpawnedChild, reason: ForceKillReason): void {
    if (this.forceKillSent) return;
    this.forceKillSent = true;

    const delivered = child.signalGroup('SIGKILL');
    if (delivered) {
      this.logger.warn({ pid: child.pid, pgid: child.pgid, reason }, 'SIGKILL sent to child process group');
    } else {
      this.logger.warn({ pid: child.pid, pgid: child.pgid, reason }, 'SIGKILL not delivered: process group already gone');
    }
  }

  /**
   * The child is gone but processes it started may still hold its group.
   * They get the session's one SIGKILL, then up to a grace period to leave.
   */
  private async clearProcessGroup(child: SpawnedChild): Promise<void> {
    if (!child.groupAlive()) return;

    this.sendKill(child, 'group_outlived_child');
    const pollIntervalMs = this.config?.pollIntervalMs ?? 0;
    const deadline = this.clock.now() + (this.config?.gracePeriodMs ?? 0);
    let now = this.clock.now();
    while (child.groupAlive() && now < deadline) {
      await this.clock.sleep(Math.min(pollIntervalMs, deadline - now));
      now = this.clock.now();
    }

    if (child.groupAlive()) {
      this.logger.warn({ pid: child.pid, pgid: child.pgid }, 'process group still present after SIGKILL');
    }
  }
}
