// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Supervisor
export { ProcessSupervisor } from './supervisor/process-supervisor.js';
export type {
  SupervisorError,
  SupervisorPhase,
  ShutdownRequest,
  SupervisedChildSnapshot,
} from './supervisor/process-supervisor.js';
export {
  createLaunchConfiguration,
  mergeEnvironment,
  NO_SELF_SUPERVISION_ENV,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_POLL_INTERVAL_MS,
} from './supervisor/launch-configuration.js';
export type { LaunchConfiguration, LaunchConfigurationInput } from './supervisor/launch-configuration.js';
export { toExitCode, describeExitStatus, SIGNAL_EXIT_BASE } from './supervisor/exit-status.js';
export type { ExitStatus } from './supervisor/exit-status.js';

// Launch
export { InterpreterResolver } from './launch/interpreter-resolver.js';
export type { ResolvedInterpreter, InterpreterSource } from './launch/interpreter-resolver.js';
export { buildBundleEnvironment } from './launch/bundle-environment.js';
export { buildServeArgs, buildServeOverlay } from './launch/serve-launch.js';
export type { ServeSettings, ServerLogLevel } from './launch/serve-launch.js';

// Diagnostics
export { DiagnosticsService } from './diagnostics/diagnostics-service.js';
export type { PythonInfo, PackageInfo, StackHealth } from './diagnostics/schemas.js';

// Runtime ports and Node adapters
export type { ProcessSpawner, SpawnedChild, SpawnRequest, ChildTermination } from './runtime/ports/process-spawner.js';
export type { ShutdownEvent, ShutdownEvents, ShutdownSignal } from './runtime/ports/shutdown-events.js';
export { NodeProcessSpawner } from './runtime/adapters/node-process-spawner.js';
export { InMemoryShutdownEvents } from './runtime/adapters/in-memory-shutdown-events.js';
export { SystemClock } from './runtime/adapters/system-clock.js';
export { forwardShutdownSignals } from './runtime/shutdown-signal-forwarding.js';

// Configuration
export { loadConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
