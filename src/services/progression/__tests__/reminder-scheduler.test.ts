// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER SCHEDULER TESTS — Reminders, Penalties, Skips, Races
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createUserId } from '../../../types/branded.js';
import { unwrap } from '../../../types/result.js';
import { createQuestCatalog } from '../catalog.js';
import { beginNote, completeQuest } from '../engine.js';
import { fixedGoldRoll } from '../gold-roll.js';
import { PlayerStore } from '../player-store.js';
import { ReminderScheduler } from '../reminder-scheduler.js';
import { PlayerStateManager, fromTransition } from '../state-manager.js';
import { FlakyStore, RecordingChannel, flush } from './helpers.js';

const U1 = createUserId('u1');
const resume = unwrap(createQuestCatalog().find('resume'));

describe('ReminderScheduler', () => {
  let store: FlakyStore;
  let clock: number;
  let manager: PlayerStateManager;
  let channel: RecordingChannel;
  let scheduler: ReminderScheduler;

  const completeResume = () =>
    manager.mutate(U1, (record, now) => fromTransition(completeQuest(record, resume, fixedGoldRoll('min'), now)));

  const penaltyCount = async (): Promise<number> =>
    unwrap(await manager.read(U1)).activityLog.filter(entry => entry.event.kind === 'penalty_applied').length;

  beforeEach(async () => {
    store = new FlakyStore();
    clock = 0;
    manager = new PlayerStateManager(new PlayerStore(store, { keyPrefix: 'test:' }), {
      lockWaitMs: 1000,
      clock: () => clock,
    });
    channel = new RecordingChannel();
    scheduler = new ReminderScheduler(manager, channel, {
      intervalMs: 1000,
      graceMs: 500,
      penaltyXp: 10,
      lockWaitMs: 1000,
    });

    // u1 earns 30 xp at t=0
    unwrap(await completeResume());
  });

  afterEach(() => {
    scheduler.stop();
  });

  it('should remind once a full interval has passed', async () => {
    expect((await scheduler.runTick(999)).outcomes).toEqual([{ userId: 'u1', outcome: 'idle' }]);

    const report = await scheduler.runTick(1000);

    expect(report.outcomes).toEqual([{ userId: 'u1', outcome: 'reminded' }]);
    expect(report.evaluated).toBe(1);
    expect(report.reminded).toBe(1);
    expect(channel.reminders).toEqual(['u1']);
    expect(unwrap(await manager.read(U1)).pendingReminderAt).toBe(1000);
  });

  it('should penalize an unanswered reminder exactly once', async () => {
    await scheduler.runTick(1000);
    expect((await scheduler.runTick(1200)).outcomes[0]?.outcome).toBe('idle');

    const report = await scheduler.runTick(1500);
    expect(report.penalized).toBe(1);

    const record = unwrap(await manager.read(U1));
    expect(record.xp).toBe(20);
    expect(record.pendingReminderAt).toBeNull();
    expect(channel.published).toEqual([
      {
        userId: 'u1',
        events: [{ event: { kind: 'penalty_applied', reason: 'reminder_expired' }, xpDelta: -10, goldDelta: 0 }],
      },
    ]);

    expect((await scheduler.runTick(1501)).outcomes[0]?.outcome).toBe('reminded');
    expect(await penaltyCount()).toBe(1);
  });

  it('should judge every player against the time the tick started', async () => {
    clock = 1040;
    const reminding = scheduler.runTick();
    // the clock moves on before the player's lock is taken
    clock = 1100;
    expect((await reminding).outcomes).toEqual([{ userId: 'u1', outcome: 'reminded' }]);
    expect(unwrap(await manager.read(U1)).pendingReminderAt).toBe(1040);

    clock = 1540;
    const report = await scheduler.runTick();

    expect(report.outcomes).toEqual([{ userId: 'u1', outcome: 'penalized' }]);
    expect(unwrap(await manager.read(U1)).xp).toBe(20);
  });

  it('should leave a player who is mid-conversation alone', async () => {
    unwrap(await manager.mutate(U1, record => fromTransition(beginNote(record))));

    const report = await scheduler.runTick(5000);

    expect(report.outcomes).toEqual([{ userId: 'u1', outcome: 'skipped_busy' }]);
    expect(report.skippedBusy).toBe(1);
    expect(channel.reminders).toEqual([]);
  });

  it('should defer a player whose lock stays busy', async () => {
    const impatient = new ReminderScheduler(manager, channel, { intervalMs: 1000, penaltyXp: 10, lockWaitMs: 20 });
    const release = store.holdWrites('test:player:u1');
    const inFlight = completeResume();

    const report = await impatient.runTick(5000);

    expect(report.outcomes).toEqual([{ userId: 'u1', outcome: 'skipped_contended' }]);
    expect(report.skippedContended).toBe(1);
    expect(channel.reminders).toEqual([]);

    release();
    expect((await inFlight).ok).toBe(true);
  });

  it('should keep the reminder pending when delivery fails', async () => {
    channel.failReminders = true;

    expect((await scheduler.runTick(1000)).outcomes).toEqual([
      { userId: 'u1', outcome: 'reminded', deliveryFailed: true },
    ]);
    expect(unwrap(await manager.read(U1)).pendingReminderAt).toBe(1000);

    channel.failReminders = false;
    expect((await scheduler.runTick(1500)).outcomes[0]?.outcome).toBe('penalized');
  });

  it('should see a completion that commits while the tick waits', async () => {
    await scheduler.runTick(1000);

    clock = 1200;
    const release = store.holdWrites('test:player:u1');
    const completion = completeResume();
    const tick = scheduler.runTick(1500);
    await flush();
    release();

    const [completed, report] = await Promise.all([completion, tick]);

    expect(unwrap(completed).record.xp).toBe(60);
    expect(report.outcomes).toEqual([{ userId: 'u1', outcome: 'idle' }]);
    const record = unwrap(await manager.read(U1));
    expect(record.pendingReminderAt).toBeNull();
    expect(record.xp).toBe(60);
    expect(await penaltyCount()).toBe(0);
  });

  it('should report a failed write and change nothing', async () => {
    store.failNextWrites(1);

    const report = await scheduler.runTick(1000);

    expect(report.failed).toBe(1);
    expect(report.outcomes[0]?.outcome).toBe('failed');
    expect(report.outcomes[0]?.error?.code).toBe('STORAGE_FAILURE');
    expect(unwrap(await manager.read(U1)).pendingReminderAt).toBeNull();
  });

  it('should sweep cached players when the index cannot be read', async () => {
    store.failIndex = true;

    const report = await scheduler.runTick(1000);

    expect(report.outcomes).toEqual([{ userId: 'u1', outcome: 'reminded' }]);
  });

  it('should tag each tick with its own id', async () => {
    const first = await scheduler.runTick(10);
    const second = await scheduler.runTick(20);

    expect(first.tickId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(second.tickId).not.toBe(first.tickId);
  });

  describe('lifecycle', () => {
    it('should start and stop the cron job', () => {
      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);
      expect(scheduler.nextRunAt()).toBeInstanceOf(Date);

      scheduler.stop();
      expect(scheduler.isRunning()).toBe(false);
      expect(scheduler.nextRunAt()).toBeNull();
    });

    it('should reject an invalid cron expression', () => {
      const broken = new ReminderScheduler(manager, channel, { cronExpression: 'every now and then' });
      expect(() => broken.start()).toThrow();
      expect(broken.isRunning()).toBe(false);
    });

    it('should default the grace period to one interval', () => {
      expect(new ReminderScheduler(manager, channel, { intervalMs: 4000 }).graceMs).toBe(4000);
      expect(scheduler.graceMs).toBe(500);
    });

    it('should reject a non-positive penalty', () => {
      expect(() => new ReminderScheduler(manager, channel, { penaltyXp: 0 })).toThrow(RangeError);
    });
  });
});
