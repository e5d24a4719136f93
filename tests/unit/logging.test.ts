import { describe, it, expect } from 'vitest';
import { DEFAULT_LOG_LEVEL, parseLogLevel, REDACTION_CONFIG } from '../../src/core/logging/index.js';
import { formatErrorForLogs } from '../../src/core/errors/index.js';
import { Err } from '../../src/core/errors/index.js';

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' silent ')).toBe('silent');
  });

  it('falls back to warn', () => {
    expect(DEFAULT_LOG_LEVEL).toBe('warn');
    expect(parseLogLevel(undefined)).toBe('warn');
    expect(parseLogLevel('loud')).toBe('warn');
  });
});

describe('REDACTION_CONFIG', () => {
  it('covers hub tokens in logged environment overlays', () => {
    expect(REDACTION_CONFIG.paths).toContain('overlay.HF_TOKEN');
    expect(REDACTION_CONFIG.paths).toContain('env.HF_TOKEN');
  });
});

describe('formatErrorForLogs', () => {
  it('flattens the error fields next to its tag', () => {
    expect(formatErrorForLogs(Err.alreadyRunning(7))).toEqual({
      errorTag: 'AlreadyRunning',
      message: 'Supervisor is already running child 7',
      pid: 7,
    });
  });
});
