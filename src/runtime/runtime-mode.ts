/**
 * How the current process was started. Injected through DI rather than read
 * from the environment at each call site.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'test' };

export function detectRuntimeMode(env: NodeJS.ProcessEnv): RuntimeMode {
  if (env['VITEST'] !== undefined || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}
