import { describe, it, expect, beforeEach } from 'vitest';
import { err, ok } from 'neverthrow';
import { executeServeCommand, type ServeCommandDeps } from '../../src/cli/commands/serve.js';
import { loadConfig } from '../../src/config/app-config.js';
import { Err } from '../../src/core/errors/index.js';
import { InterpreterResolver } from '../../src/launch/interpreter-resolver.js';
import { FakeChildSupervisor } from '../fakes/fake-child-supervisor.js';
import { FakeFileInspector } from '../fakes/fake-file-inspector.js';
import { FakeLogger } from '../helpers/FakeLogger.js';
import { asLogger } from '../helpers/FakeLoggerFactory.js';
import { expectLocalOk } from '../helpers/result-helpers.js';

const BUNDLE_PYTHON = '/bundle/python/bin/python3';
const ENV = { PATH: '/usr/bin', HOME: '/home/tester' };

describe('executeServeCommand', () => {
  let supervisor: FakeChildSupervisor;
  let titles: string[];

  function deps(executables: string[] = [BUNDLE_PYTHON]): ServeCommandDeps {
    const logger = asLogger(new FakeLogger());
    const files = new FakeFileInspector(executables, ['/bundle/_vendor']);
    return {
      config: expectLocalOk(loadConfig({ env: ENV, defaultBundleRoot: '/bundle' }), 'config'),
      env: ENV,
      resolver: new InterpreterResolver(files, logger),
      files,
      supervisor,
      setProcessTitle: title => {
        titles.push(title);
      },
      logger,
    };
  }

  beforeEach(() => {
    supervisor = new FakeChildSupervisor();
    titles = [];
  });

  it('launches the bundled server with config defaults', async () => {
    const result = await executeServeCommand(deps(), {});

    expect(result).toEqual({ kind: 'success', output: undefined });
    expect(titles).toEqual(['mlxk-launcher']);
    expect(supervisor.launches).toHaveLength(1);

    const launch = supervisor.launches[0];
    expect(launch?.executable).toBe(BUNDLE_PYTHON);
    expect(launch?.args).toEqual([
      '-m', 'mlxk2.cli', 'serve', '--host', '127.0.0.1', '--port', '8000', '--log-level', 'info',
    ]);
    expect(launch?.overlay).toEqual({
      MLXK_PYTHON: BUNDLE_PYTHON,
      PYTHONNOUSERSITE: '1',
      PYTHONPATH: '/bundle/_vendor',
      PYTHONHOME: '/bundle/python',
      PYTHONEXECUTABLE: BUNDLE_PYTHON,
      PATH: '/bundle/python/bin:/usr/bin',
      MLXK2_HOST: '127.0.0.1',
      MLXK2_PORT: '8000',
      MLXK2_LOG_LEVEL: 'info',
      MLXK2_RELOAD: '0',
      MLXK2_SUPERVISE: '0',
    });
    expect(launch?.env['HOME']).toBe('/home/tester');
    expect(launch?.env['PATH']).toBe('/bundle/python/bin:/usr/bin');
    expect(launch?.gracePeriodMs).toBe(5000);
    expect(launch?.pollIntervalMs).toBe(100);
  });

  it('lets CLI options override config', async () => {
    await executeServeCommand(deps(['/custom/python3']), {
      python: '/custom/python3',
      host: '0.0.0.0',
      port: '9000',
      maxTokens: '128',
      logLevel: 'debug',
      reload: true,
      gracePeriod: '2000',
      pollInterval: '50',
    });

    const launch = supervisor.launches[0];
    expect(launch?.executable).toBe('/custom/python3');
    expect(launch?.args).toEqual([
      '-m', 'mlxk2.cli', 'serve',
      '--host', '0.0.0.0',
      '--port', '9000',
      '--max-tokens', '128',
      '--log-level', 'debug',
      '--reload',
    ]);
    expect(launch?.overlay['PYTHONHOME']).toBeUndefined();
    expect(launch?.overlay['MLXK2_MAX_TOKENS']).toBe('128');
    expect(launch?.gracePeriodMs).toBe(2000);
    expect(launch?.pollIntervalMs).toBe(50);
  });

  it('rejects an invalid port without starting anything', async () => {
    const result = await executeServeCommand(deps(), { port: '99999' });

    expect(result).toMatchObject({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: 'Invalid options: port: Port must be <= 65535' },
    });
    expect(supervisor.launches).toEqual([]);
    expect(titles).toEqual([]);
  });

  it('rejects a port that is not a number', async () => {
    const result = await executeServeCommand(deps(), { port: '80a' });

    expect(result).toMatchObject({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: 'Invalid options: port: Must be a whole number' },
    });
  });

  it('exits 127 when no interpreter can be found', async () => {
    const result = await executeServeCommand(deps([]), {});

    expect(result.kind).toBe('failure');
    if (result.kind === 'failure') {
      expect(result.exitCode).toEqual({ kind: 'not_found' });
      expect(result.output.message).toBe('No Python interpreter found (tried 3 locations)');
    }
    expect(supervisor.launches).toEqual([]);
  });

  it('mirrors a non-zero child exit', async () => {
    supervisor.resolvesWith(ok({ kind: 'exited', code: 3 }));

    const result = await executeServeCommand(deps(), {});

    expect(result).toMatchObject({
      kind: 'failure',
      exitCode: { kind: 'child_status', code: 3 },
      output: { message: `${BUNDLE_PYTHON} exited with code 3` },
    });
  });

  it('mirrors a signal death as 128 + n', async () => {
    supervisor.resolvesWith(ok({ kind: 'signaled', signal: 'SIGKILL', signalNumber: 9 }));

    const result = await executeServeCommand(deps(), {});

    expect(result).toMatchObject({
      kind: 'failure',
      exitCode: { kind: 'child_status', code: 137 },
      output: { message: `${BUNDLE_PYTHON} killed by SIGKILL (status 137)` },
    });
  });

  it('maps a permission-denied spawn failure to 126', async () => {
    supervisor.resolvesWith(err(Err.spawnFailed(BUNDLE_PYTHON, 'permission_denied', 'spawn EACCES', 'EACCES')));

    const result = await executeServeCommand(deps(), {});

    expect(result).toMatchObject({ kind: 'failure', exitCode: { kind: 'not_executable' } });
  });
});
