import { delimiter, join } from 'path';
import type { FileInspector } from '../runtime/ports/file-inspector.js';
import { interpreterBinDir, type ResolvedInterpreter } from './interpreter-resolver.js';

export const VENDOR_DIRNAME = '_vendor';

export type BundleEnvironmentRequest = {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly interpreter: ResolvedInterpreter;
  readonly bundleRoot: string;
};

function prependPath(entry: string, existing: string | undefined): string {
  return existing !== undefined && existing !== '' ? `${entry}${delimiter}${existing}` : entry;
}

/**
 * Variables that make the child import the bundle's own packages instead of
 * whatever the user's site directory or an unrelated PYTHONHOME provides.
 * Returns only the overlay; the caller merges it over the base environment.
 */
export function buildBundleEnvironment(
  request: BundleEnvironmentRequest,
  files: FileInspector
): Record<string, string> {
  const { env, interpreter, bundleRoot } = request;
  const overlay: Record<string, string> = {
    MLXK_PYTHON: interpreter.path,
  };

  if (env['PYTHONNOUSERSITE'] === undefined) {
    overlay['PYTHONNOUSERSITE'] = '1';
  }

  const vendorDir = join(bundleRoot, VENDOR_DIRNAME);
  if (files.isDirectory(vendorDir)) {
    overlay['PYTHONPATH'] = prependPath(vendorDir, env['PYTHONPATH']);
  }

  if (interpreter.pythonHome !== null) {
    overlay['PYTHONHOME'] = interpreter.pythonHome;
    overlay['PYTHONEXECUTABLE'] = interpreter.path;
    overlay['PATH'] = prependPath(interpreterBinDir(interpreter), env['PATH']);
  }

  return overlay;
}
