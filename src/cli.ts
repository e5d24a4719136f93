#!/usr/bin/env node
/**
 * mlxk-launcher CLI - Composition Root
 *
 * Wires dependencies for each command, owns the OS signal handlers and turns
 * CliResult into the process exit status. Command logic lives in
 * src/cli/commands/*.ts.
 */

import 'reflect-metadata';
import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { getBootstrapLogger } from './core/logging/index.js';
import type { ProcessSupervisor } from './supervisor/process-supervisor.js';
import type { InterpreterResolver } from './launch/interpreter-resolver.js';
import type { DiagnosticsService } from './diagnostics/diagnostics-service.js';
import type { Clock } from './runtime/ports/clock.js';
import type { FileInspector } from './runtime/ports/file-inspector.js';
import type { ProcessSignals } from './runtime/ports/process-signals.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ShutdownEvents } from './runtime/ports/shutdown-events.js';
import { forwardShutdownSignals, shutdownSignalsFor } from './runtime/shutdown-signal-forwarding.js';
import { LAUNCHER_VERSION } from './version.js';

import type { CliResult } from './cli/types/cli-result.js';
import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import {
  errorResult,
  executeServeCommand,
  executeRunCommand,
  executePythonInfoCommand,
  executePackageInfoCommand,
  executeCheckStackCommand,
  type DiagnosticCommandDeps,
  type DiagnosticCommandOptions,
  type RunCommandOptions,
  type ServeCommandOptions,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initializes the container, runs `command`, and exits with its result.
 * A configuration error exits 2 before anything is spawned.
 */
async function runWithContainer(command: () => Promise<CliResult>): Promise<void> {
  const initialized = initializeContainer();
  if (initialized.kind === 'err') {
    interpretCliResultWithoutDI(errorResult(initialized.error));
    return;
  }

  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  interpretCliResult(await command(), terminator);
}

/**
 * Installs SIGINT/SIGTERM/SIGHUP forwarding for the duration of a
 * supervised run. Handlers are in place before the child is spawned.
 */
async function withSignalForwarding(command: () => Promise<CliResult>): Promise<CliResult> {
  const stopForwarding = forwardShutdownSignals(
    container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
    container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents),
    container.resolve<Clock>(DI.Runtime.Clock),
    shutdownSignalsFor(process.platform)
  );
  try {
    return await command();
  } finally {
    stopForwarding();
  }
}

function setProcessTitle(title: string): void {
  process.title = title;
}

function diagnosticDeps(): DiagnosticCommandDeps {
  return {
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    env: process.env,
    resolver: container.resolve<InterpreterResolver>(DI.Services.InterpreterResolver),
    files: container.resolve<FileInspector>(DI.Runtime.FileInspector),
    diagnostics: container.resolve<DiagnosticsService>(DI.Services.Diagnostics),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('mlxk-launcher')
  .description('Supervising launcher for the mlxk2 server')
  .version(LAUNCHER_VERSION)
  .enablePositionalOptions();

program
  .command('serve')
  .description('Start the mlxk2 server under supervision')
  .option('--python <path>', 'Python interpreter (overrides MLXK_PYTHON)')
  .option('--bundle-root <dir>', 'Bundle directory holding python/ and _vendor/')
  .option('--module <name>', 'Server module run with python -m')
  .option('--host <host>', 'Bind address')
  .option('--port <port>', 'Bind port')
  .option('--max-tokens <n>', 'Default max tokens per request')
  .option('--log-level <level>', 'Server log level (critical|error|warning|info|debug|trace)')
  .option('--reload', 'Enable server auto-reload')
  .option('--grace-period <ms>', 'Wait before SIGKILL after a graceful stop')
  .option('--poll-interval <ms>', 'Child exit polling interval')
  .action(async (options: ServeCommandOptions) => {
    await runWithContainer(() => withSignalForwarding(() => {
      const loggers = container.resolve<ILoggerFactory>(DI.Logging.Factory);
      return executeServeCommand(
        {
          config: container.resolve<ValidatedConfig>(DI.Config.App),
          env: process.env,
          resolver: container.resolve<InterpreterResolver>(DI.Services.InterpreterResolver),
          files: container.resolve<FileInspector>(DI.Runtime.FileInspector),
          supervisor: container.resolve<ProcessSupervisor>(DI.Services.Supervisor),
          setProcessTitle,
          logger: loggers.create('serve'),
        },
        options
      );
    }));
  });

program
  .command('run')
  .description('Supervise an arbitrary command (use -- before its arguments)')
  .argument('<executable>', 'Program to run')
  .argument('[args...]', 'Arguments passed to the program')
  .option('--cwd <dir>', 'Working directory for the child')
  .option('--grace-period <ms>', 'Wait before SIGKILL after a graceful stop')
  .option('--poll-interval <ms>', 'Child exit polling interval')
  .passThroughOptions()
  .action(async (executable: string, args: string[], options: RunCommandOptions) => {
    await runWithContainer(() => withSignalForwarding(() =>
      executeRunCommand(
        {
          config: container.resolve<ValidatedConfig>(DI.Config.App),
          env: process.env,
          supervisor: container.resolve<ProcessSupervisor>(DI.Services.Supervisor),
          setProcessTitle,
        },
        executable,
        args,
        options
      )
    ));
  });

program
  .command('python-info')
  .description('Print interpreter details as JSON')
  .option('--python <path>', 'Python interpreter (overrides MLXK_PYTHON)')
  .option('--bundle-root <dir>', 'Bundle directory holding python/ and _vendor/')
  .action(async (options: DiagnosticCommandOptions) => {
    await runWithContainer(() => executePythonInfoCommand(diagnosticDeps(), options));
  });

program
  .command('pkg-info')
  .description('Print version and location of an installed package as JSON')
  .argument('<package>', 'Importable package name')
  .option('--python <path>', 'Python interpreter (overrides MLXK_PYTHON)')
  .option('--bundle-root <dir>', 'Bundle directory holding python/ and _vendor/')
  .action(async (packageName: string, options: DiagnosticCommandOptions) => {
    await runWithContainer(() => executePackageInfoCommand(diagnosticDeps(), packageName, options));
  });

program
  .command('check-stack')
  .description('Verify that mlx and mlx_lm import cleanly (exit 2 if not)')
  .option('--python <path>', 'Python interpreter (overrides MLXK_PYTHON)')
  .option('--bundle-root <dir>', 'Bundle directory holding python/ and _vendor/')
  .action(async (options: DiagnosticCommandOptions) => {
    await runWithContainer(() => executeCheckStackCommand(diagnosticDeps(), options));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  getBootstrapLogger().fatal({ err: error }, 'unhandled CLI error');
  process.exit(1);
});
