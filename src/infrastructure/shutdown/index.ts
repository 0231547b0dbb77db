// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN MODULE INDEX — Graceful Shutdown Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ShutdownCoordinator,
  DEFAULT_SHUTDOWN_CONFIG,
  type ShutdownConfig,
  type ShutdownHook,
  type ShutdownHookFn,
  type HookResult,
  type ShutdownResult,
} from './handler.js';
