// ═══════════════════════════════════════════════════════════════════════════════
// GOLD ROLLS — Uniform Integer Draws for Quest Rewards
// ═══════════════════════════════════════════════════════════════════════════════

import type { GoldRoll } from './types.js';

function drawInRange(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export const randomGoldRoll: GoldRoll = (min, max) => drawInRange(Math.random, min, max);

/**
 * Deterministic roll sequence (mulberry32) for tests and replays.
 */
export function createSeededGoldRoll(seed: number): GoldRoll {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return (min, max) => drawInRange(next, min, max);
}

/**
 * Always rolls the bottom or the top of the range.
 */
export function fixedGoldRoll(offset: 'min' | 'max'): GoldRoll {
  return (min, max) => (offset === 'min' ? min : max);
}
