import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import chalk from 'chalk';
import { formatOutput, formatResult, printResult } from '../../src/cli/output-formatter.js';
import { failure, success, successJson } from '../../src/cli/types/cli-result.js';

describe('output formatter', () => {
  let previousLevel: typeof chalk.level;

  beforeAll(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  it('renders a failure with its suggestions', () => {
    expect(formatOutput({ message: 'Cannot start', suggestions: ['Check the path'] }, true)).toBe(
      '❌ Cannot start\n\n💡 Suggestions:\n  • Check the path'
    );
  });

  it('renders nothing for a bare success', () => {
    expect(formatResult(success())).toBe('');
    expect(formatResult(successJson({ ok: true }))).toBe('');
  });

  it('prints JSON on stdout and the failure message on stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    printResult(failure('MLX stack is not importable: boom', { json: { ok: false } }));

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('{\n  "ok": false\n}');
    expect(error).toHaveBeenCalledWith('❌ MLX stack is not importable: boom');
  });

  it('prints nothing for a clean child exit', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    printResult(success());

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
