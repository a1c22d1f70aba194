// ═══════════════════════════════════════════════════════════════════════════════
// LEVEL TESTS — Threshold Table and Progress Math
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  LEVEL_THRESHOLDS,
  XP_PER_LEVEL_BEYOND_TABLE,
  describeProgress,
  levelFor,
  xpForLevel,
} from '../levels.js';

describe('levelFor', () => {
  it.each([
    [0, 1],
    [39, 1],
    [40, 2],
    [99, 2],
    [100, 3],
    [179, 3],
    [180, 4],
    [1179, 9],
    [1180, 10],
    [1419, 10],
    [1420, 11],
    [1660, 12],
  ])('should place %i xp at level %i', (xp, level) => {
    expect(levelFor(xp)).toBe(level);
  });

  it('should reject negative or fractional xp', () => {
    expect(() => levelFor(-1)).toThrow(RangeError);
    expect(() => levelFor(1.5)).toThrow(RangeError);
  });

  it('should never decrease as xp grows', () => {
    let previous = levelFor(0);
    for (let xp = 1; xp <= 3000; xp++) {
      const level = levelFor(xp);
      expect(level).toBeGreaterThanOrEqual(previous);
      previous = level;
    }
  });

  it('should agree with xpForLevel at every boundary', () => {
    for (let xp = 0; xp <= 3000; xp += 7) {
      const level = levelFor(xp);
      expect(xpForLevel(level)).toBeLessThanOrEqual(xp);
      expect(xpForLevel(level + 1)).toBeGreaterThan(xp);
    }
  });
});

describe('xpForLevel', () => {
  it('should read the table and extrapolate past it', () => {
    expect(xpForLevel(1)).toBe(0);
    expect(xpForLevel(2)).toBe(40);
    expect(xpForLevel(10)).toBe(1180);
    expect(xpForLevel(11)).toBe(1420);
    expect(XP_PER_LEVEL_BEYOND_TABLE).toBe(240);
    expect(LEVEL_THRESHOLDS).toHaveLength(10);
  });

  it('should reject levels below 1', () => {
    expect(() => xpForLevel(0)).toThrow(RangeError);
  });
});

describe('describeProgress', () => {
  it('should measure progress within the current level', () => {
    expect(describeProgress({ xp: 120, level: 3, gold: 4 })).toEqual({
      level: 3,
      xp: 120,
      xpIntoLevel: 20,
      xpForNextLevel: 80,
      gold: 4,
    });
  });

  it('should use the flat step past the table', () => {
    expect(describeProgress({ xp: 1500, level: 11, gold: 0 })).toEqual({
      level: 11,
      xp: 1500,
      xpIntoLevel: 80,
      xpForNextLevel: 240,
      gold: 0,
    });
  });
});
