import { describe, it, expect } from 'vitest';
import { buildBundleEnvironment } from '../../src/launch/bundle-environment.js';
import type { ResolvedInterpreter } from '../../src/launch/interpreter-resolver.js';
import { FakeFileInspector } from '../fakes/fake-file-inspector.js';

const EMBEDDED: ResolvedInterpreter = {
  path: '/bundle/python/bin/python3',
  source: { kind: 'bundle' },
  pythonHome: '/bundle/python',
};

const SYSTEM: ResolvedInterpreter = {
  path: '/usr/bin/python3',
  source: { kind: 'system_path' },
  pythonHome: null,
};

describe('buildBundleEnvironment', () => {
  it('isolates an embedded interpreter from the user environment', () => {
    const overlay = buildBundleEnvironment(
      {
        env: { PATH: '/usr/bin:/bin', PYTHONPATH: '/home/tester/lib' },
        interpreter: EMBEDDED,
        bundleRoot: '/bundle',
      },
      new FakeFileInspector([], ['/bundle/_vendor'])
    );

    expect(overlay).toEqual({
      MLXK_PYTHON: '/bundle/python/bin/python3',
      PYTHONNOUSERSITE: '1',
      PYTHONPATH: '/bundle/_vendor:/home/tester/lib',
      PYTHONHOME: '/bundle/python',
      PYTHONEXECUTABLE: '/bundle/python/bin/python3',
      PATH: '/bundle/python/bin:/usr/bin:/bin',
    });
  });

  it('leaves PYTHONHOME and PATH alone for a system interpreter', () => {
    const overlay = buildBundleEnvironment(
      { env: { PATH: '/usr/bin' }, interpreter: SYSTEM, bundleRoot: '/bundle' },
      new FakeFileInspector()
    );

    expect(overlay).toEqual({ MLXK_PYTHON: '/usr/bin/python3', PYTHONNOUSERSITE: '1' });
  });

  it('keeps a PYTHONNOUSERSITE the user already chose', () => {
    const overlay = buildBundleEnvironment(
      { env: { PYTHONNOUSERSITE: '' }, interpreter: SYSTEM, bundleRoot: '/bundle' },
      new FakeFileInspector()
    );

    expect(overlay['PYTHONNOUSERSITE']).toBeUndefined();
  });

  it('sets PYTHONPATH to the vendor directory alone when none was set', () => {
    const overlay = buildBundleEnvironment(
      { env: { PYTHONPATH: '' }, interpreter: SYSTEM, bundleRoot: '/bundle' },
      new FakeFileInspector([], ['/bundle/_vendor'])
    );

    expect(overlay['PYTHONPATH']).toBe('/bundle/_vendor');
  });
});
