import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    switch (code.kind) {
      case 'success':
        return process.exit(0);
      case 'status':
        return process.exit(code.code);
      default:
        return assertNever(code);
    }
  }
}
