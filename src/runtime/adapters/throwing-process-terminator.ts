import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws instead of exiting, so an accidental terminate()
 * fails the test rather than killing the runner.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    const detail = code.kind === 'status' ? `status ${code.code}` : code.kind;
    throw new Error(`[ProcessTerminator] terminate(${detail})`);
  }
}
