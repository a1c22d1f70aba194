// ═══════════════════════════════════════════════════════════════════════════════
// OUTBOUND CHANNEL — Notifications Toward the Chat Transport
// ═══════════════════════════════════════════════════════════════════════════════

import type { UserId } from '../../types/branded.js';
import { getLogger, type ILogger } from '../../observability/logging/index.js';
import type { ProgressionEvent } from './types.js';

/**
 * Where committed events and reminders go. The chat transport implements
 * this; rejections are logged by callers and never undo a commit.
 */
export interface OutboundChannel {
  publishEvents(userId: UserId, events: readonly ProgressionEvent[]): Promise<void>;
  deliverReminder(userId: UserId): Promise<void>;
}

/**
 * Channel that only writes to the log. Used when no transport is attached.
 */
export class LoggingChannel implements OutboundChannel {
  private readonly logger: ILogger;

  constructor(logger: ILogger = getLogger({ component: 'outbound' })) {
    this.logger = logger;
  }

  async publishEvents(userId: UserId, events: readonly ProgressionEvent[]): Promise<void> {
    for (const { event, xpDelta, goldDelta } of events) {
      this.logger.info('Progression event', { userId, ...event, xpDelta, goldDelta });
    }
  }

  async deliverReminder(userId: UserId): Promise<void> {
    this.logger.info('Reminder delivered', { userId });
  }
}
