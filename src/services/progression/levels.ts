// ═══════════════════════════════════════════════════════════════════════════════
// LEVELS — XP Thresholds and Progress Math
// ═══════════════════════════════════════════════════════════════════════════════

import type { PlayerRecord, ProgressSummary } from './types.js';

/**
 * Cumulative xp needed to reach level N is LEVEL_THRESHOLDS[N - 1].
 */
export const LEVEL_THRESHOLDS: readonly number[] = [0, 40, 100, 180, 280, 400, 550, 730, 940, 1180];

const TOP_TABLE_LEVEL = LEVEL_THRESHOLDS.length;
const TOP_TABLE_XP = LEVEL_THRESHOLDS[TOP_TABLE_LEVEL - 1] ?? 0;

/**
 * Past the table every level costs the table's last step.
 */
export const XP_PER_LEVEL_BEYOND_TABLE =
  TOP_TABLE_XP - (LEVEL_THRESHOLDS[TOP_TABLE_LEVEL - 2] ?? 0);

function assertXp(xp: number): void {
  if (!Number.isSafeInteger(xp) || xp < 0) {
    throw new RangeError(`xp must be a non-negative integer, got ${xp}`);
  }
}

/**
 * Level reached with `xp` cumulative experience.
 */
export function levelFor(xp: number): number {
  assertXp(xp);

  if (xp >= TOP_TABLE_XP) {
    return TOP_TABLE_LEVEL + Math.floor((xp - TOP_TABLE_XP) / XP_PER_LEVEL_BEYOND_TABLE);
  }

  let level = 1;
  for (let i = 1; i < LEVEL_THRESHOLDS.length; i++) {
    const threshold = LEVEL_THRESHOLDS[i] ?? Infinity;
    if (xp < threshold) break;
    level = i + 1;
  }
  return level;
}

/**
 * Cumulative xp at which `level` is reached.
 */
export function xpForLevel(level: number): number {
  if (!Number.isSafeInteger(level) || level < 1) {
    throw new RangeError(`level must be a positive integer, got ${level}`);
  }

  if (level > TOP_TABLE_LEVEL) {
    return TOP_TABLE_XP + (level - TOP_TABLE_LEVEL) * XP_PER_LEVEL_BEYOND_TABLE;
  }
  return LEVEL_THRESHOLDS[level - 1] ?? TOP_TABLE_XP;
}

export function describeProgress(record: Pick<PlayerRecord, 'xp' | 'level' | 'gold'>): ProgressSummary {
  const floor = xpForLevel(record.level);
  const next = xpForLevel(record.level + 1);

  return {
    level: record.level,
    xp: record.xp,
    xpIntoLevel: record.xp - floor,
    xpForNextLevel: next - floor,
    gold: record.gold,
  };
}
