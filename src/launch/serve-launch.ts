import { z } from 'zod';

export const DEFAULT_SERVER_MODULE = 'mlxk2.cli';

export const SERVER_LOG_LEVELS = ['critical', 'error', 'warning', 'info', 'debug', 'trace'] as const;
export const ServerLogLevelSchema = z.enum(SERVER_LOG_LEVELS);
export type ServerLogLevel = z.infer<typeof ServerLogLevelSchema>;

/** Server settings after CLI options have been merged over config. */
export type ServeSettings = {
  readonly module: string;
  readonly host: string;
  readonly port: number;
  readonly maxTokens: number | null;
  readonly logLevel: ServerLogLevel;
  readonly reload: boolean;
};

/** `-m <module> serve --host ... --port ...` for the interpreter. */
export function buildServeArgs(settings: ServeSettings): string[] {
  const args = [
    '-m', settings.module,
    'serve',
    '--host', settings.host,
    '--port', String(settings.port),
  ];
  if (settings.maxTokens !== null) {
    args.push('--max-tokens', String(settings.maxTokens));
  }
  args.push('--log-level', settings.logLevel);
  if (settings.reload) {
    args.push('--reload');
  }
  return args;
}

/**
 * The same settings as environment, for server code paths that read
 * configuration from MLXK2_* rather than argv.
 */
export function buildServeOverlay(settings: ServeSettings): Record<string, string> {
  const overlay: Record<string, string> = {
    MLXK2_HOST: settings.host,
    MLXK2_PORT: String(settings.port),
    MLXK2_LOG_LEVEL: settings.logLevel,
    MLXK2_RELOAD: settings.reload ? '1' : '0',
  };
  if (settings.maxTokens !== null) {
    overlay['MLXK2_MAX_TOKENS'] = String(settings.maxTokens);
  }
  return overlay;
}
