// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HOOKS — Shutdown Hook Registry
// ═══════════════════════════════════════════════════════════════════════════════
//
// Hooks run in priority groups, highest first; hooks within a group run in
// parallel. Each hook has its own timeout and a failing hook does not stop
// the others. Typical order for this service:
//
//   critical  stop the reminder scheduler (no new ticks)
//   high      wait for in-flight mutations to commit
//   normal    disconnect the store
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ShutdownPriority = 'critical' | 'high' | 'normal' | 'low';

/**
 * Execution order; higher runs first.
 */
export const PRIORITY_VALUES: Record<ShutdownPriority, number> = {
  critical: 100,
  high: 75,
  normal: 50,
  low: 25,
};

const PRIORITY_ORDER: readonly ShutdownPriority[] = ['critical', 'high', 'normal', 'low'];

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
  readonly priority: ShutdownPriority;

  /** Timeout in ms (0 = use default) */
  readonly timeoutMs: number;
}

export interface HookResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: Error;
  readonly timedOut?: boolean;
}

export interface ShutdownResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly hooks: HookResult[];
  readonly failed: string[];
  readonly timedOut: string[];
}

class HookTimeoutError extends Error {
  constructor(name: string, timeoutMs: number) {
    super(`Shutdown hook "${name}" timed out after ${timeoutMs}ms`);
    this.name = 'HookTimeoutError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// HOOKS REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

const hooks = new Map<string, ShutdownHook>();
const logger = getLogger({ component: 'shutdown' });

const DEFAULT_HOOK_TIMEOUT_MS = 5000;
let hooksRunning = false;

export function isShutdownInProgress(): boolean {
  return hooksRunning;
}

/**
 * Register a shutdown hook. A hook with the same name is replaced.
 */
export function registerShutdownHook(
  name: string,
  fn: ShutdownHookFn,
  options?: {
    priority?: ShutdownPriority;
    timeoutMs?: number;
  }
): void {
  if (hooks.has(name)) {
    logger.warn('Overwriting existing shutdown hook', { name });
  }

  const priority = options?.priority ?? 'normal';
  hooks.set(name, {
    name,
    fn,
    priority,
    timeoutMs: options?.timeoutMs ?? 0,
  });

  logger.debug('Registered shutdown hook', { name, priority });
}

/**
 * Hooks sorted by priority (highest first), registration order within a priority.
 */
export function getHooksByPriority(): ShutdownHook[] {
  return Array.from(hooks.values()).sort(
    (a, b) => PRIORITY_VALUES[b.priority] - PRIORITY_VALUES[a.priority]
  );
}

export function clearShutdownHooks(): void {
  hooks.clear();
}

// ─────────────────────────────────────────────────────────────────────────────────
// HOOK EXECUTION
// ─────────────────────────────────────────────────────────────────────────────────

async function executeHook(hook: ShutdownHook): Promise<HookResult> {
  const startTime = Date.now();
  const timeout = hook.timeoutMs > 0 ? hook.timeoutMs : DEFAULT_HOOK_TIMEOUT_MS;
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    await Promise.race([
      Promise.resolve().then(hook.fn),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new HookTimeoutError(hook.name, timeout)), timeout);
      }),
    ]);

    const durationMs = Date.now() - startTime;
    logger.debug('Shutdown hook completed', { name: hook.name, durationMs });
    return { name: hook.name, success: true, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const timedOut = error instanceof HookTimeoutError;

    logger.error('Shutdown hook failed', error, { name: hook.name, durationMs, timedOut });

    return {
      name: hook.name,
      success: false,
      durationMs,
      error: error instanceof Error ? error : new Error(String(error)),
      timedOut,
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Execute all hooks in priority order.
 */
export async function executeShutdownHooks(): Promise<ShutdownResult> {
  if (hooksRunning) {
    logger.warn('Shutdown already in progress');
    return { success: false, totalDurationMs: 0, hooks: [], failed: [], timedOut: [] };
  }

  hooksRunning = true;
  const startTime = Date.now();
  const results: HookResult[] = [];

  try {
    const sortedHooks = getHooksByPriority();
    logger.info('Executing shutdown hooks', {
      count: sortedHooks.length,
      hooks: sortedHooks.map(h => h.name),
    });

    for (const priority of PRIORITY_ORDER) {
      const group = sortedHooks.filter(h => h.priority === priority);
      if (group.length === 0) continue;
      results.push(...(await Promise.all(group.map(executeHook))));
    }
  } finally {
    hooksRunning = false;
  }

  const failed = results.filter(r => !r.success).map(r => r.name);
  const timedOut = results.filter(r => r.timedOut === true).map(r => r.name);
  const totalDurationMs = Date.now() - startTime;
  const success = failed.length === 0;

  logger.info('Shutdown hooks completed', {
    success,
    totalDurationMs,
    total: results.length,
    failed: failed.length,
    timedOut: timedOut.length,
  });

  return { success, totalDurationMs, hooks: results, failed, timedOut };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create a hook for disconnecting a client (store, queue, ...).
 */
export function createDisconnectHook(
  client: { disconnect: () => Promise<void> | void }
): ShutdownHookFn {
  return () => client.disconnect();
}

/**
 * Create a hook for stopping a recurring job.
 */
export function createStopHook(job: { stop: () => void }): ShutdownHookFn {
  return () => job.stop();
}
