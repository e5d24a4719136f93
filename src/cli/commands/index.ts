/**
 * CLI Commands - Public API
 */

export { executeServeCommand, type ServeCommandDeps, type ServeCommandOptions } from './serve.js';
export { executeRunCommand, type RunCommandDeps, type RunCommandOptions } from './run.js';
export {
  executePythonInfoCommand,
  executePackageInfoCommand,
  executeCheckStackCommand,
  type Diagnostics,
  type DiagnosticCommandDeps,
  type DiagnosticCommandOptions,
} from './diagnostics.js';
export { superviseToCompletion, type ChildSupervisor } from './supervise.js';
export { errorResult, exitCodeFor } from './error-result.js';
