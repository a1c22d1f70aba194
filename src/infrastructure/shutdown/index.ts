// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN MODULE INDEX — Graceful Shutdown Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ShutdownPriority,
  PRIORITY_VALUES,
  type ShutdownHookFn,
  type ShutdownHook,
  type HookResult,
  type ShutdownResult,
  isShutdownInProgress,
  registerShutdownHook,
  getHooksByPriority,
  clearShutdownHooks,
  executeShutdownHooks,
  createDisconnectHook,
  createStopHook,
} from './hooks.js';

export {
  type ShutdownConfig,
  DEFAULT_SHUTDOWN_CONFIG,
  type ShutdownState,
  getShutdownState,
  installSignalHandlers,
  removeSignalHandlers,
  initiateShutdown,
  resetShutdownState,
  simulateShutdown,
} from './handler.js';
