// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Process Bootstrap
// ═══════════════════════════════════════════════════════════════════════════════
//
// Startup order:
//   1. load + validate config        (invalid -> exit 1)
//   2. configure logging
//   3. connect the store             (Redis unreachable -> exit 1)
//   4. wire state manager, router, scheduler
//   5. register shutdown hooks, install signal handlers, start ticking
//
// ═══════════════════════════════════════════════════════════════════════════════

import { pathToFileURL } from 'node:url';
import { loadConfig, resolveGraceMs, type AppConfig } from './config/index.js';
import { configureLogger, getLogger } from './observability/logging/index.js';
import { createKeyValueStore, type KeyValueStore } from './storage/index.js';
import {
  createDisconnectHook,
  createStopHook,
  installSignalHandlers,
  registerShutdownHook,
} from './infrastructure/shutdown/index.js';
import {
  LoggingChannel,
  createActionRouter,
  createPlayerStateManager,
  createPlayerStore,
  createQuestCatalog,
  createReminderScheduler,
  type ActionRouter,
  type OutboundChannel,
  type PlayerStateManager,
  type QuestCatalog,
  type ReminderScheduler,
} from './services/progression/index.js';

const logger = getLogger({ component: 'server' });

// ─────────────────────────────────────────────────────────────────────────────────
// WIRING
// ─────────────────────────────────────────────────────────────────────────────────

export interface AppContext {
  readonly config: AppConfig;
  readonly store: KeyValueStore;
  readonly catalog: QuestCatalog;
  readonly manager: PlayerStateManager;
  readonly router: ActionRouter;
  readonly scheduler: ReminderScheduler;
}

export interface CreateAppOptions {
  /** Transport for events and reminders; logs them when omitted */
  readonly channel?: OutboundChannel;
  readonly catalog?: QuestCatalog;
}

/**
 * Wire every component over an already connected store. Starts nothing.
 */
export function createApp(
  config: AppConfig,
  store: KeyValueStore,
  options: CreateAppOptions = {}
): AppContext {
  const channel = options.channel ?? new LoggingChannel();
  const catalog = options.catalog ?? createQuestCatalog();

  const players = createPlayerStore(store, { keyPrefix: config.storage.keyPrefix });
  const manager = createPlayerStateManager(players, { lockWaitMs: config.state.lockWaitMs });

  const router = createActionRouter(manager, catalog, channel, {
    penaltyXp: config.scheduler.penaltyXp,
    storageRetryAttempts: config.router.storageRetryAttempts,
    storageRetryDelayMs: config.router.storageRetryDelayMs,
  });

  const scheduler = createReminderScheduler(manager, channel, {
    cronExpression: config.scheduler.cronExpression,
    intervalMs: config.scheduler.intervalMs,
    graceMs: resolveGraceMs(config.scheduler),
    penaltyXp: config.scheduler.penaltyXp,
    lockWaitMs: config.scheduler.lockWaitMs,
  });

  return { config, store, catalog, manager, router, scheduler };
}

/**
 * Shutdown order: stop ticking, let running mutations commit, then close
 * the store.
 */
export function registerAppShutdownHooks(app: AppContext): void {
  registerShutdownHook('reminder-scheduler', createStopHook(app.scheduler), { priority: 'critical' });
  registerShutdownHook('player-state', () => app.manager.drain(), { priority: 'high' });
  registerShutdownHook('storage', createDisconnectHook(app.store), { priority: 'normal' });
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENTRY POINT
// ─────────────────────────────────────────────────────────────────────────────────

export async function startServer(): Promise<AppContext> {
  const config = loadConfig();
  configureLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    environment: config.environment,
  });

  const store = await createKeyValueStore(config.storage);
  const app = createApp(config, store);

  registerAppShutdownHooks(app);
  installSignalHandlers();

  if (config.scheduler.enabled) {
    app.scheduler.start();
  } else {
    logger.warn('Reminder scheduler disabled');
  }

  logger.info('Progression service started', {
    environment: config.environment,
    storage: config.storage.backend,
    quests: app.catalog.size,
  });
  return app;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(script).href;
}

if (isEntryPoint()) {
  startServer().catch((error: unknown) => {
    logger.fatal('Startup failed', error);
    process.exit(1);
  });
}
