// ═══════════════════════════════════════════════════════════════════════════════
// JOB HUNT PROGRESSION — Public API
// ═══════════════════════════════════════════════════════════════════════════════
//
// Quick Start:
//   import { createApp, MemoryStore, loadTestConfig, createUserId } from 'jobhunt-progression';
//
//   const app = createApp(loadTestConfig(), new MemoryStore());
//   const result = await app.router.completeQuest(createUserId('42'), 'apply');
//   if (result.ok) console.log(result.value.record.level);
//
// ═══════════════════════════════════════════════════════════════════════════════

export * from './types/result.js';
export * from './types/branded.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './storage/index.js';
export * from './infrastructure/index.js';
export * from './services/progression/index.js';
export {
  createApp,
  registerAppShutdownHooks,
  startServer,
  type AppContext,
  type CreateAppOptions,
} from './server.js';
