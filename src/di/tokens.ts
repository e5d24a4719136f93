/**
 * DI token registry, grouped by layer.
 *
 * Adding a service: declare its token here, register a factory in
 * container.ts, resolve it by token from the composition root.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Shutdown request bus between signal handlers and the supervisor */
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Composition roots only */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    ProcessSpawner: Symbol('Runtime.ProcessSpawner'),
    CommandRunner: Symbol('Runtime.CommandRunner'),
    Clock: Symbol('Runtime.Clock'),
    FileInspector: Symbol('Runtime.FileInspector'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated launcher configuration */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    Supervisor: Symbol('Services.Supervisor'),
    InterpreterResolver: Symbol('Services.InterpreterResolver'),
    Diagnostics: Symbol('Services.Diagnostics'),
  },
} as const;
