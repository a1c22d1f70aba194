// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HANDLER — Graceful Shutdown Coordinator
// ═══════════════════════════════════════════════════════════════════════════════
//
// Handles graceful shutdown:
// - Signal handlers (SIGTERM, SIGINT)
// - Global timeout enforcement
// - Exit code management
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { executeShutdownHooks, type ShutdownResult } from './hooks.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ShutdownConfig {
  /** Total timeout for shutdown in ms */
  readonly timeoutMs: number;

  readonly signals: NodeJS.Signals[];

  readonly exitCodeSuccess: number;
  readonly exitCodeFailure: number;
  readonly exitCodeTimeout: number;

  /** Whether to call process.exit() */
  readonly exitProcess: boolean;
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  timeoutMs: 30000,
  signals: ['SIGTERM', 'SIGINT'],
  exitCodeSuccess: 0,
  exitCodeFailure: 1,
  exitCodeTimeout: 124,
  exitProcess: true,
};

export interface ShutdownState {
  readonly isShuttingDown: boolean;
  readonly shutdownStartedAt?: number;
  readonly reason?: string;
  readonly result?: ShutdownResult;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLER STATE
// ─────────────────────────────────────────────────────────────────────────────────

const logger = getLogger({ component: 'shutdown' });

let config: ShutdownConfig = { ...DEFAULT_SHUTDOWN_CONFIG };
let state: ShutdownState = { isShuttingDown: false };
let shutdownPromise: Promise<ShutdownResult> | null = null;
const installedListeners = new Map<NodeJS.Signals, () => void>();

export function getShutdownState(): ShutdownState {
  return { ...state };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SIGNAL HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export function installSignalHandlers(): void {
  if (installedListeners.size > 0) {
    logger.warn('Signal handlers already installed');
    return;
  }

  for (const signal of config.signals) {
    const listener = (): void => {
      if (state.isShuttingDown) {
        logger.warn('Received signal during shutdown, ignoring', { signal });
        return;
      }
      logger.info('Received shutdown signal', { signal });
      initiateShutdown(signal).catch((error: unknown) => {
        logger.fatal('Shutdown failed', error);
        process.exit(config.exitCodeFailure);
      });
    };
    process.on(signal, listener);
    installedListeners.set(signal, listener);
  }

  logger.debug('Signal handlers installed', { signals: config.signals });
}

export function removeSignalHandlers(): void {
  for (const [signal, listener] of installedListeners) {
    process.off(signal, listener);
  }
  installedListeners.clear();
}

// ─────────────────────────────────────────────────────────────────────────────────
// SHUTDOWN EXECUTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Initiate graceful shutdown. Concurrent calls share one run.
 */
export function initiateShutdown(reason = 'manual'): Promise<ShutdownResult> {
  if (!shutdownPromise) {
    shutdownPromise = performShutdown(reason);
  }
  return shutdownPromise;
}

async function performShutdown(reason: string): Promise<ShutdownResult> {
  state = { isShuttingDown: true, shutdownStartedAt: Date.now(), reason };

  logger.info('Starting graceful shutdown', { reason, timeoutMs: config.timeoutMs });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutResult = new Promise<ShutdownResult>(resolve => {
    timer = setTimeout(() => resolve({
      success: false,
      totalDurationMs: config.timeoutMs,
      hooks: [],
      failed: [],
      timedOut: ['global'],
    }), config.timeoutMs);
  });

  const result = await Promise.race([executeShutdownHooks(), timeoutResult]);
  clearTimeout(timer);

  state = { ...state, result };

  let exitCode: number;
  if (result.timedOut.includes('global')) {
    exitCode = config.exitCodeTimeout;
    logger.error('Shutdown timed out', undefined, { timeoutMs: config.timeoutMs });
  } else if (result.success) {
    exitCode = config.exitCodeSuccess;
    logger.info('Graceful shutdown completed', {
      totalDurationMs: result.totalDurationMs,
      hooksExecuted: result.hooks.length,
    });
  } else {
    exitCode = config.exitCodeFailure;
    logger.warn('Shutdown completed with failures', { failed: result.failed });
  }

  if (config.exitProcess) {
    process.exit(exitCode);
  }

  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TESTING HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function resetShutdownState(): void {
  state = { isShuttingDown: false };
  shutdownPromise = null;
}

/**
 * Run shutdown without exiting the process.
 */
export async function simulateShutdown(reason = 'test'): Promise<ShutdownResult> {
  const original = config;
  config = { ...config, exitProcess: false };

  try {
    return await initiateShutdown(reason);
  } finally {
    config = original;
    resetShutdownState();
  }
}
