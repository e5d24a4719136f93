/**
 * ProcessSupervisor: shutdown protocol against a fake child under fake timers.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Err } from '../../src/core/errors/index.js';
import { InMemoryShutdownEvents } from '../../src/runtime/adapters/in-memory-shutdown-events.js';
import { SystemClock } from '../../src/runtime/adapters/system-clock.js';
import type { ShutdownSignal } from '../../src/runtime/ports/shutdown-events.js';
import { toExitCode } from '../../src/supervisor/exit-status.js';
import {
  createLaunchConfiguration,
  type LaunchConfiguration,
  type LaunchConfigurationInput,
} from '../../src/supervisor/launch-configuration.js';
import { ProcessSupervisor, type SupervisorPhase } from '../../src/supervisor/process-supervisor.js';
import { FakeChild, FakeProcessSpawner } from '../fakes/fake-process-spawner.js';
import { FakeLogger } from '../helpers/FakeLogger.js';
import { asLogger } from '../helpers/FakeLoggerFactory.js';
import { expectErr, expectLocalOk, expectOk } from '../helpers/result-helpers.js';

const T0 = 1_700_000_000_000;

function launch(overrides: Partial<LaunchConfigurationInput> = {}): LaunchConfiguration {
  return expectLocalOk(
    createLaunchConfiguration({
      executable: '/opt/bundle/python/bin/python3',
      args: ['-m', 'mlxk2.cli', 'serve'],
      baseEnv: {},
      gracePeriodMs: 5000,
      pollIntervalMs: 100,
      ...overrides,
    }),
    'building launch configuration'
  );
}

describe('ProcessSupervisor', () => {
  let spawner: FakeProcessSpawner;
  let events: InMemoryShutdownEvents;
  let logger: FakeLogger;
  let supervisor: ProcessSupervisor;

  async function untilPhase(phase: SupervisorPhase): Promise<void> {
    for (let i = 0; i < 50 && supervisor.phase !== phase; i++) {
      await Promise.resolve();
    }
    expect(supervisor.phase).toBe(phase);
  }

  function request(signal: ShutdownSignal = 'SIGTERM'): void {
    events.emit({ kind: 'shutdown_requested', signal, receivedAt: Date.now() });
  }

  beforeEach(() => {
    vi.useFakeTimers({ now: T0 });
    spawner = new FakeProcessSpawner();
    events = new InMemoryShutdownEvents();
    logger = new FakeLogger();
    supervisor = new ProcessSupervisor(spawner, events, new SystemClock(), asLogger(logger));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('normal exit', () => {
    it('resolves with the child exit code', async () => {
      const child = new FakeChild();
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      child.exit(3);

      const status = expectOk(await running, 'supervising child');
      expect(status).toEqual({ kind: 'exited', code: 3 });
      expect(toExitCode(status)).toBe(3);
      expect(child.signals).toEqual([]);
      expect(supervisor.phase).toBe('exited');
    });

    it('maps a signal death to 128 + signal number', async () => {
      const child = new FakeChild();
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      child.killedBy('SIGSEGV');

      const status = expectOk(await running, 'supervising child');
      expect(status).toEqual({ kind: 'signaled', signal: 'SIGSEGV', signalNumber: 11 });
      expect(toExitCode(status)).toBe(139);
    });

    it('spawns exactly one child with the no-self-supervision flag set', async () => {
      const child = new FakeChild();
      spawner.willSpawn(child);

      const running = supervisor.run(launch({ baseEnv: { MLXK2_SUPERVISE: '1', HOME: '/home/tester' } }));
      await untilPhase('running');
      child.exit(0);
      await running;

      expect(spawner.requests).toHaveLength(1);
      expect(spawner.requests[0]?.env).toEqual({ HOME: '/home/tester', MLXK2_SUPERVISE: '0' });
      expect(spawner.requests[0]?.args).toEqual(['-m', 'mlxk2.cli', 'serve']);
    });
  });

  describe('graceful stop and escalation', () => {
    it('sends SIGTERM to the group, then SIGKILL when the grace period elapses', async () => {
      const child = new FakeChild();
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');

      await vi.advanceTimersByTimeAsync(4999);
      expect(child.signalNames()).toEqual(['SIGTERM']);
      expect(supervisor.phase).toBe('stopping');

      await vi.advanceTimersByTimeAsync(1);
      const status = expectOk(await running, 'supervising child');

      expect(status).toEqual({ kind: 'signaled', signal: 'SIGKILL', signalNumber: 9 });
      expect(toExitCode(status)).toBe(137);
      expect(child.signals).toEqual([
        { signal: 'SIGTERM', at: T0 },
        { signal: 'SIGKILL', at: T0 + 5000 },
      ]);
    });

    it('forwards SIGINT as SIGINT', async () => {
      const child = new FakeChild(4242, 4242, { kind: 'die' });
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGINT');

      const status = expectOk(await running, 'supervising child');
      expect(child.signalNames()).toEqual(['SIGINT']);
      expect(toExitCode(status)).toBe(130);
    });

    it('answers SIGHUP with SIGTERM', async () => {
      const child = new FakeChild(4242, 4242, { kind: 'exit', exitCode: 0 });
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGHUP');

      expectOk(await running, 'supervising child');
      expect(child.signalNames()).toEqual(['SIGTERM']);
    });

    it('never sends SIGKILL when the child exits within the grace period', async () => {
      const child = new FakeChild(4242, 4242, { kind: 'exit', exitCode: 0 });
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');

      const status = expectOk(await running, 'supervising child');
      await vi.advanceTimersByTimeAsync(10_000);

      expect(status).toEqual({ kind: 'exited', code: 0 });
      expect(child.signalNames()).toEqual(['SIGTERM']);
    });

    it('escalates immediately on a second request within the grace period', async () => {
      const child = new FakeChild();
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');
      await vi.advanceTimersByTimeAsync(1200);
      request('SIGTERM');

      const status = expectOk(await running, 'supervising child');
      expect(toExitCode(status)).toBe(137);
      expect(child.signals).toEqual([
        { signal: 'SIGTERM', at: T0 },
        { signal: 'SIGKILL', at: T0 + 1200 },
      ]);
      expect(logger.entries.find(e => e.msg === 'SIGKILL sent to child process group')?.obj).toEqual({
        pid: 4242,
        pgid: 4242,
        reason: 'repeated_request',
      });
    });

    it('sends SIGKILL at most once however many requests arrive', async () => {
      const child = new FakeChild(4242, 4242, { kind: 'ignore' }, false);
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');
      request('SIGINT');
      request('SIGTERM');
      request('SIGHUP');
      await vi.advanceTimersByTimeAsync(20_000);

      expect(child.signalNames()).toEqual(['SIGTERM', 'SIGKILL']);
      expect(supervisor.phase).toBe('killing');

      child.killedBy('SIGKILL');
      expectOk(await running, 'supervising child');
      expect(child.signalNames()).toEqual(['SIGTERM', 'SIGKILL']);
    });

    it('waits for the child without a timeout after SIGKILL', async () => {
      const child = new FakeChild(4242, 4242, { kind: 'ignore' }, false);
      spawner.willSpawn(child);

      let settled = false;
      const running = supervisor.run(launch({ gracePeriodMs: 1000, pollIntervalMs: 250 }));
      void running.then(() => {
        settled = true;
      });
      await untilPhase('running');
      request('SIGTERM');

      await vi.advanceTimersByTimeAsync(1000);
      expect(child.signals).toEqual([
        { signal: 'SIGTERM', at: T0 },
        { signal: 'SIGKILL', at: T0 + 1000 },
      ]);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(settled).toBe(false);

      child.exit(0);
      expect(expectOk(await running, 'supervising child')).toEqual({ kind: 'exited', code: 0 });
    });
  });

  describe('processes left in the child group', () => {
    it('kills members that outlive a child which exited on its own', async () => {
      const child = new FakeChild().leavesGroupMembers();
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      child.exit(0);

      const status = expectOk(await running, 'supervising child');
      expect(status).toEqual({ kind: 'exited', code: 0 });
      expect(child.signals).toEqual([{ signal: 'SIGKILL', at: T0 }]);
      expect(child.groupAlive()).toBe(false);
      expect(logger.entries.find(e => e.msg === 'SIGKILL sent to child process group')?.obj).toEqual({
        pid: 4242,
        pgid: 4242,
        reason: 'group_outlived_child',
      });
    });

    it('kills members left behind after a graceful stop', async () => {
      const child = new FakeChild(4242, 4242, { kind: 'exit', exitCode: 0 }).leavesGroupMembers();
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');

      expect(expectOk(await running, 'supervising child')).toEqual({ kind: 'exited', code: 0 });
      expect(child.signalNames()).toEqual(['SIGTERM', 'SIGKILL']);
    });

    it('does not send a second SIGKILL when the group already got one', async () => {
      const child = new FakeChild().leavesGroupMembers(false);
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');
      await vi.advanceTimersByTimeAsync(5000);
      expect(child.poll()).toEqual({ kind: 'signaled', signal: 'SIGKILL', signalNumber: 9 });

      await vi.advanceTimersByTimeAsync(5000);
      expectOk(await running, 'supervising child');

      expect(child.signalNames()).toEqual(['SIGTERM', 'SIGKILL']);
    });

    it('gives up waiting on unkillable members after one grace period', async () => {
      const child = new FakeChild().leavesGroupMembers(false);
      spawner.willSpawn(child);

      let settled = false;
      const running = supervisor.run(launch({ gracePeriodMs: 1000, pollIntervalMs: 250 }));
      void running.then(() => {
        settled = true;
      });
      await untilPhase('running');
      child.exit(0);

      await vi.advanceTimersByTimeAsync(999);
      expect(settled).toBe(false);
      request('SIGTERM');

      await vi.advanceTimersByTimeAsync(1);
      expect(expectOk(await running, 'supervising child')).toEqual({ kind: 'exited', code: 0 });
      expect(child.signals).toEqual([{ signal: 'SIGKILL', at: T0 }]);
      expect(logger.entries.find(e => e.msg === 'process group still present after SIGKILL')?.level).toBe('warn');
    });
  });

  describe('requests outside a running child', () => {
    it('applies a request that arrived while the spawn was in flight', async () => {
      const gate = spawner.hold();
      const running = supervisor.run(launch());
      expect(supervisor.phase).toBe('spawning');

      request('SIGTERM');
      const child = new FakeChild(4242, 4242, { kind: 'exit', exitCode: 0 });
      gate.release(child);

      expect(expectOk(await running, 'supervising child')).toEqual({ kind: 'exited', code: 0 });
      expect(child.signalNames()).toEqual(['SIGTERM']);
    });

    it('replays two early requests as a graceful stop followed by SIGKILL', async () => {
      const gate = spawner.hold();
      const running = supervisor.run(launch());

      request('SIGTERM');
      request('SIGTERM');
      const child = new FakeChild();
      gate.release(child);

      expectOk(await running, 'supervising child');
      expect(child.signalNames()).toEqual(['SIGTERM', 'SIGKILL']);
    });

    it('stops listening once the child is gone', async () => {
      const child = new FakeChild();
      spawner.willSpawn(child);

      const running = supervisor.run(launch());
      await untilPhase('running');
      expect(events.listenerCount).toBe(1);
      child.exit(0);
      await running;

      expect(events.listenerCount).toBe(0);
      request('SIGTERM');
      expect(child.signals).toEqual([]);
    });
  });

  describe('failures', () => {
    it('returns SpawnFailed without retrying', async () => {
      spawner.willFail(Err.spawnFailed('/missing/python3', 'not_found', 'spawn /missing/python3 ENOENT', 'ENOENT'));

      const error = expectErr(await supervisor.run(launch({ executable: '/missing/python3' })), 'spawning');

      expect(error._tag).toBe('SpawnFailed');
      expect(spawner.requests).toHaveLength(1);
      expect(supervisor.phase).toBe('exited');
      expect(events.listenerCount).toBe(0);
    });

    it('rejects a concurrent run with AlreadyRunning', async () => {
      const child = new FakeChild(5151, 5151);
      spawner.willSpawn(child);

      const first = supervisor.run(launch());
      await untilPhase('running');

      const error = expectErr(await supervisor.run(launch()), 'second run');
      expect(error).toEqual(Err.alreadyRunning(5151));
      expect(spawner.requests).toHaveLength(1);

      child.exit(0);
      expectOk(await first, 'first run');
    });

    it('gives each sequential run its own escalation state', async () => {
      const first = new FakeChild(1001, 1001);
      const second = new FakeChild(1002, 1002, { kind: 'exit', exitCode: 0 });
      spawner.willSpawn(first).willSpawn(second);

      const firstRun = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');
      request('SIGTERM');
      expectOk(await firstRun, 'first run');
      expect(first.signalNames()).toEqual(['SIGTERM', 'SIGKILL']);

      const secondRun = supervisor.run(launch());
      await untilPhase('running');
      request('SIGTERM');
      expectOk(await secondRun, 'second run');
      expect(second.signalNames()).toEqual(['SIGTERM']);
    });
  });

  describe('snapshot', () => {
    it('describes the supervised child while it runs', async () => {
      const child = new FakeChild(777, 777);
      spawner.willSpawn(child);

      expect(supervisor.snapshot()).toBeNull();
      const running = supervisor.run(launch());
      await untilPhase('running');

      expect(supervisor.snapshot()).toEqual({ pid: 777, pgid: 777, phase: 'running', startedAt: T0 });

      child.exit(0);
      await running;
      expect(supervisor.snapshot()).toBeNull();
    });
  });
});
