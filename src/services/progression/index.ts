// ═══════════════════════════════════════════════════════════════════════════════
// PROGRESSION MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export {
  PLAYER_SCHEMA_VERSION,
  MAX_NOTE_LENGTH,
  INPUT_MODES,
  type InputMode,
  type GoldRange,
  type QuestDefinition,
  type GoldRoll,
  type PenaltyReason,
  type ActivityEvent,
  type ProgressionEvent,
  type ActivityLogEntry,
  type Note,
  type PlayerRecord,
  type Transition,
  type ProgressSummary,
  type ProfileView,
} from './types.js';

// Errors
export {
  ProgressionErrorCode,
  type ProgressionError,
  storageFailure,
  invalidQuest,
  inconsistentMode,
  noPendingReminder,
  invalidInput,
  lockTimeout,
  invariantViolation,
  isTransientError,
} from './errors.js';

// Levels and rolls
export {
  LEVEL_THRESHOLDS,
  XP_PER_LEVEL_BEYOND_TABLE,
  levelFor,
  xpForLevel,
  describeProgress,
} from './levels.js';
export { randomGoldRoll, createSeededGoldRoll, fixedGoldRoll } from './gold-roll.js';

// Engine
export {
  createPlayerRecord,
  applyQuest,
  applyPenalty,
  completeQuest,
  dueForReminder,
  reminderIsOverdue,
  beginNote,
  submitNote,
  openReminderReply,
  cancelInput,
  resolveReminderReply,
  expireReminder,
  validateTransition,
} from './engine.js';

// Catalog
export {
  QuestDefinitionSchema,
  QuestCatalogSchema,
  DEFAULT_QUESTS,
  type QuestDefinitionInput,
  QuestCatalog,
  createQuestCatalog,
} from './catalog.js';

// Persistence
export { PlayerRecordSchema, serializePlayerRecord, deserializePlayerRecord } from './serialization.js';
export {
  type PlayerStoreConfig,
  DEFAULT_PLAYER_STORE_CONFIG,
  PlayerStore,
  createPlayerStore,
} from './player-store.js';

// State
export {
  type MutationStep,
  type Transform,
  type MutationOutcome,
  type StateManagerConfig,
  type MutateOptions,
  DEFAULT_STATE_MANAGER_CONFIG,
  unchangedStep,
  changedStep,
  fromTransition,
  PlayerStateManager,
  createPlayerStateManager,
} from './state-manager.js';

// Outbound
export { type OutboundChannel, LoggingChannel } from './outbound.js';

// Scheduler
export {
  type ReminderSchedulerConfig,
  DEFAULT_REMINDER_SCHEDULER_CONFIG,
  type TickOutcomeKind,
  type UserTickOutcome,
  type TickReport,
  ReminderScheduler,
  createReminderScheduler,
} from './reminder-scheduler.js';

// Router
export {
  type ActionRouterConfig,
  DEFAULT_ACTION_ROUTER_CONFIG,
  type CommandOutcome,
  type HistoryQuery,
  parseReminderReply,
  ActionRouter,
  createActionRouter,
} from './action-router.js';
