// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Exponential Backoff with Jitter
// ═══════════════════════════════════════════════════════════════════════════════

import type { BackoffCalculator, BackoffConfig } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF CALCULATOR IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export class BackoffCalculatorImpl implements BackoffCalculator {
  private readonly config: BackoffConfig;
  private readonly random: () => number;

  constructor(config: BackoffConfig, random: () => number = Math.random) {
    this.config = config;
    this.random = random;
  }

  calculate(attempt: number): number {
    const baseDelay = this.config.backoffStrategy === 'fixed'
      ? this.config.initialDelayMs
      : this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);

    return Math.round(Math.min(this.applyJitter(baseDelay), this.config.maxDelayMs));
  }

  private applyJitter(delay: number): number {
    switch (this.config.jitter) {
      case 'full':
        return this.random() * delay;
      case 'equal':
        return delay / 2 + (this.random() * delay) / 2;
      case 'none':
        return delay;
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function createBackoffCalculator(
  config: BackoffConfig,
  random?: () => number
): BackoffCalculator {
  return new BackoffCalculatorImpl(config, random);
}

// ─────────────────────────────────────────────────────────────────────────────────
// UTILITY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else {
    return `${(ms / 60000).toFixed(1)}m`;
  }
}
