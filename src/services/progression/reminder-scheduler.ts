// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER SCHEDULER — Periodic Accountability Sweep
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every tick, for every known player, inside that player's mutate():
//   - mid-conversation (inputMode != idle)     -> skipped_busy
//   - quiet for a full interval, no reminder   -> set pending, deliver after commit
//   - reminder unanswered for the grace period -> penalty, clear pending
//   - otherwise                                -> idle
//
// Decisions are made against the record read under the lock, never a
// snapshot taken before it, and against one tick time taken when the sweep
// starts. A player whose lock is not free within lockWaitMs is skipped and
// looked at again next tick.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Cron } from 'croner';
import { v4 as uuidv4 } from 'uuid';
import { createTimestamp, type UserId } from '../../types/branded.js';
import { ok } from '../../types/result.js';
import { getLogger } from '../../observability/logging/index.js';
import { dueForReminder, expireReminder, reminderIsOverdue } from './engine.js';
import type { ProgressionError } from './errors.js';
import type { OutboundChannel } from './outbound.js';
import { changedStep, unchangedStep, type PlayerStateManager } from './state-manager.js';

const logger = getLogger({ component: 'reminder-scheduler' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ReminderSchedulerConfig {
  /** When ticks fire */
  readonly cronExpression: string;

  /** Inactivity before a reminder is sent */
  readonly intervalMs: number;

  /** Time to answer a reminder before the penalty; defaults to intervalMs */
  readonly graceMs?: number;

  readonly penaltyXp: number;

  /** Per-player lock wait inside a tick */
  readonly lockWaitMs: number;
}

export const DEFAULT_REMINDER_SCHEDULER_CONFIG: ReminderSchedulerConfig = {
  cronExpression: '*/15 * * * *',
  intervalMs: 15 * 60 * 1000,
  penaltyXp: 10,
  lockWaitMs: 2000,
};

export type TickOutcomeKind =
  | 'reminded'
  | 'penalized'
  | 'skipped_busy'
  | 'skipped_contended'
  | 'idle'
  | 'failed';

export interface UserTickOutcome {
  readonly userId: UserId;
  readonly outcome: TickOutcomeKind;

  /** Set when the notification after a commit was rejected */
  readonly deliveryFailed?: boolean;

  readonly error?: ProgressionError;
}

export interface TickReport {
  /** Correlates the per-player log lines of one sweep */
  readonly tickId: string;
  readonly startedAt: number;
  readonly durationMs: number;
  readonly evaluated: number;
  readonly reminded: number;
  readonly penalized: number;
  readonly skippedBusy: number;
  readonly skippedContended: number;
  readonly failed: number;
  readonly outcomes: readonly UserTickOutcome[];
}

type Decision = 'reminded' | 'penalized' | 'skipped_busy' | 'idle';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEDULER
// ─────────────────────────────────────────────────────────────────────────────────

export class ReminderScheduler {
  private readonly manager: PlayerStateManager;
  private readonly channel: OutboundChannel;
  private readonly config: ReminderSchedulerConfig;
  private job: Cron | null = null;

  constructor(
    manager: PlayerStateManager,
    channel: OutboundChannel,
    config?: Partial<ReminderSchedulerConfig>
  ) {
    this.manager = manager;
    this.channel = channel;
    this.config = { ...DEFAULT_REMINDER_SCHEDULER_CONFIG, ...config };

    if (!Number.isSafeInteger(this.config.penaltyXp) || this.config.penaltyXp <= 0) {
      throw new RangeError(`penaltyXp must be a positive integer, got ${this.config.penaltyXp}`);
    }
  }

  get graceMs(): number {
    return this.config.graceMs ?? this.config.intervalMs;
  }

  /**
   * Start firing ticks on the cron schedule. Ticks never overlap.
   * Throws on an invalid cron expression.
   */
  start(): void {
    if (this.job) {
      logger.warn('Reminder scheduler already running');
      return;
    }

    this.job = new Cron(
      this.config.cronExpression,
      { protect: true },
      () => this.runScheduledTick()
    );

    logger.info('Reminder scheduler started', {
      cron: this.config.cronExpression,
      intervalMs: this.config.intervalMs,
      graceMs: this.graceMs,
      nextRunAt: this.job.nextRun()?.toISOString(),
    });
  }

  stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    logger.info('Reminder scheduler stopped');
  }

  isRunning(): boolean {
    return this.job !== null;
  }

  nextRunAt(): Date | null {
    return this.job?.nextRun() ?? null;
  }

  /**
   * One sweep over all known players. Every player is judged against the
   * same tick time: `now` when given, else the manager's clock at the start
   * of the sweep.
   */
  async runTick(now?: number): Promise<TickReport> {
    const tickNow = now ?? this.manager.now();
    const startedAt = Date.now();
    const tickId = uuidv4();

    const known = await this.manager.knownUserIds();
    let userIds: UserId[];
    if (known.ok) {
      userIds = known.value;
    } else {
      logger.error('Could not list players; sweeping cached players only', known.error, { tickId });
      userIds = this.manager.cachedUserIds();
    }

    const outcomes = await Promise.all(userIds.map(userId => this.safeEvaluate(tickId, userId, tickNow)));

    const count = (kind: TickOutcomeKind): number => outcomes.filter(o => o.outcome === kind).length;
    const report: TickReport = {
      tickId,
      startedAt,
      durationMs: Date.now() - startedAt,
      evaluated: outcomes.length,
      reminded: count('reminded'),
      penalized: count('penalized'),
      skippedBusy: count('skipped_busy'),
      skippedContended: count('skipped_contended'),
      failed: count('failed'),
      outcomes,
    };

    logger.info('Reminder tick completed', {
      tickId,
      durationMs: report.durationMs,
      evaluated: report.evaluated,
      reminded: report.reminded,
      penalized: report.penalized,
      skippedBusy: report.skippedBusy,
      skippedContended: report.skippedContended,
      failed: report.failed,
    });

    return report;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private async runScheduledTick(): Promise<void> {
    try {
      await this.runTick();
    } catch (error) {
      logger.error('Reminder tick crashed', error);
    }
  }

  private async safeEvaluate(tickId: string, userId: UserId, tickNow: number): Promise<UserTickOutcome> {
    try {
      return await this.evaluateUser(tickId, userId, tickNow);
    } catch (error) {
      logger.error('Reminder evaluation threw', error, { tickId, userId });
      return { userId, outcome: 'failed' };
    }
  }

  private async evaluateUser(tickId: string, userId: UserId, now: number): Promise<UserTickOutcome> {
    const { intervalMs, penaltyXp, lockWaitMs } = this.config;
    const graceMs = this.graceMs;

    const result = await this.manager.mutate<Decision>(
      userId,
      record => {
        if (record.inputMode !== 'idle') {
          return ok(unchangedStep<Decision>('skipped_busy'));
        }
        if (dueForReminder(record, now, intervalMs)) {
          const reminded = { ...record, pendingReminderAt: createTimestamp(now) };
          return ok(changedStep<Decision>({ record: reminded, events: [] }, 'reminded'));
        }
        if (reminderIsOverdue(record, now, graceMs)) {
          return ok(changedStep<Decision>(expireReminder(record, penaltyXp), 'penalized'));
        }
        return ok(unchangedStep<Decision>('idle'));
      },
      { waitTimeoutMs: lockWaitMs }
    );

    if (!result.ok) {
      if (result.error.code === 'LOCK_TIMEOUT') {
        return { userId, outcome: 'skipped_contended' };
      }
      logger.error('Reminder evaluation failed', result.error, { tickId, userId });
      return { userId, outcome: 'failed', error: result.error };
    }

    const outcome = result.value.value;
    if (outcome === 'reminded') {
      return { userId, outcome, ...(await this.notify(userId, () => this.channel.deliverReminder(userId))) };
    }
    if (outcome === 'penalized') {
      const events = result.value.events;
      return { userId, outcome, ...(await this.notify(userId, () => this.channel.publishEvents(userId, events))) };
    }
    return { userId, outcome };
  }

  /**
   * Send a post-commit notification. The commit stands either way; a
   * reminder that failed to deliver stays pending so the grace period
   * still runs.
   */
  private async notify(userId: UserId, send: () => Promise<void>): Promise<{ deliveryFailed?: true }> {
    try {
      await send();
      return {};
    } catch (error) {
      logger.warn('Outbound notification failed', { userId, error: error instanceof Error ? error.message : String(error) });
      return { deliveryFailed: true };
    }
  }
}

export function createReminderScheduler(
  manager: PlayerStateManager,
  channel: OutboundChannel,
  config?: Partial<ReminderSchedulerConfig>
): ReminderScheduler {
  return new ReminderScheduler(manager, channel, config);
}
