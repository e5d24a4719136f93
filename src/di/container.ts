import 'reflect-metadata';
import { fileURLToPath } from 'url';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import { detectRuntimeMode } from '../runtime/runtime-mode.js';
import { lifecyclePolicyFor } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ProcessSpawner } from '../runtime/ports/process-spawner.js';
import { NodeProcessSpawner } from '../runtime/adapters/node-process-spawner.js';
import type { CommandRunner } from '../runtime/ports/command-runner.js';
import { NodeCommandRunner } from '../runtime/adapters/node-command-runner.js';
import type { Clock } from '../runtime/ports/clock.js';
import { SystemClock } from '../runtime/adapters/system-clock.js';
import type { FileInspector } from '../runtime/ports/file-inspector.js';
import { NodeFileInspector } from '../runtime/adapters/node-file-inspector.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../core/errors/index.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import { ProcessSupervisor } from '../supervisor/process-supervisor.js';
import { InterpreterResolver } from '../launch/interpreter-resolver.js';
import { DiagnosticsService } from '../diagnostics/diagnostics-service.js';
import { err, ok, type Result } from '../runtime/result.js';

let initialized = false;

/** Package root: `<root>/src/di` in development, `<root>/dist/di` when built. */
export const DEFAULT_BUNDLE_ROOT = fileURLToPath(new URL('../..', import.meta.url));

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: NodeJS.ProcessEnv;
  readonly defaultBundleRoot?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════

function registerRuntime(options: ContainerInitOptions, env: NodeJS.ProcessEnv): void {
  const mode = options.runtimeMode ?? detectRuntimeMode(env);
  const policy = lifecyclePolicyFor(mode);

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });

  // Tests may pre-register fakes for anything below.
  if (!container.isRegistered(DI.Runtime.ProcessSpawner)) {
    container.register<ProcessSpawner>(DI.Runtime.ProcessSpawner, {
      useFactory: instanceCachingFactory((c: DependencyContainer) =>
        new NodeProcessSpawner(loggerFactory(c).create('spawner'))),
    });
  }
  if (!container.isRegistered(DI.Runtime.CommandRunner)) {
    container.register<CommandRunner>(DI.Runtime.CommandRunner, {
      useFactory: instanceCachingFactory(() => new NodeCommandRunner()),
    });
  }
  if (!container.isRegistered(DI.Runtime.Clock)) {
    container.register<Clock>(DI.Runtime.Clock, { useValue: new SystemClock() });
  }
  if (!container.isRegistered(DI.Runtime.FileInspector)) {
    container.register<FileInspector>(DI.Runtime.FileInspector, { useValue: new NodeFileInspector() });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions, env: NodeJS.ProcessEnv): Result<void, ConfigInvalidError> {
  if (container.isRegistered(DI.Config.App)) {
    return ok(undefined);
  }

  const configResult = loadConfig({
    env,
    defaultBundleRoot: options.defaultBundleRoot ?? DEFAULT_BUNDLE_ROOT,
  });
  if (configResult.kind === 'err') {
    return configResult;
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function loggerFactory(c: DependencyContainer): ILoggerFactory {
  return c.resolve<ILoggerFactory>(DI.Logging.Factory);
}

function registerServices(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c: DependencyContainer) => c.resolve(PinoLoggerFactory)),
    });
  }

  container.register(DI.Services.Supervisor, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => new ProcessSupervisor(
      c.resolve<ProcessSpawner>(DI.Runtime.ProcessSpawner),
      c.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents),
      c.resolve<Clock>(DI.Runtime.Clock),
      loggerFactory(c).create('supervisor')
    )),
  });
  container.register(DI.Services.InterpreterResolver, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => new InterpreterResolver(
      c.resolve<FileInspector>(DI.Runtime.FileInspector),
      loggerFactory(c).create('interpreter')
    )),
  });
  container.register(DI.Services.Diagnostics, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => new DiagnosticsService(
      c.resolve<CommandRunner>(DI.Runtime.CommandRunner),
      loggerFactory(c).create('diagnostics')
    )),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Registers runtime ports, configuration and services. Idempotent.
 * Returns the config error instead of exiting; the caller owns termination.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const env = options.env ?? process.env;
  registerRuntime(options, env);
  const configured = registerConfig(options, env);
  if (configured.kind === 'err') {
    createBootstrapLogger('di').error({ issues: configured.error.issues }, 'configuration invalid');
    return err(configured.error);
  }
  registerServices();
  initialized = true;
  return ok(undefined);
}

/** Tests only: clears every registration, including pre-registered fakes. */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}

export { container };
