// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG TESTS — Quest Lookup, Validation and Gold Rolls
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import { unwrap, unwrapErr } from '../../../types/result.js';
import { DEFAULT_QUESTS, QuestCatalog, createQuestCatalog } from '../catalog.js';
import { createSeededGoldRoll, fixedGoldRoll, randomGoldRoll } from '../gold-roll.js';

describe('QuestCatalog', () => {
  const catalog = createQuestCatalog();

  it('should load the default quests', () => {
    expect(catalog.size).toBe(DEFAULT_QUESTS.length);
    expect(catalog.list().map(q => q.id)).toEqual(['apply', 'study', 'resume', 'recruiter', 'project']);
  });

  it('should find a quest by id', () => {
    const quest = unwrap(catalog.find('apply'));
    expect(quest).toEqual({ id: 'apply', name: 'Apply for a job', xpReward: 50, goldReward: { min: 1, max: 3 } });
  });

  it('should find a quest by name ignoring case and padding', () => {
    expect(unwrap(catalog.find('  UPDATE resume ')).id).toBe('resume');
    expect(unwrap(catalog.find('Study')).id).toBe('study');
  });

  it('should reject an unknown quest', () => {
    const error = unwrapErr(catalog.find('teleport'));
    expect(error.code).toBe('INVALID_QUEST');
    expect(error.message).toBe('Unknown quest: teleport');
  });

  it('should reject duplicate ids', () => {
    expect(() => new QuestCatalog([
      { id: 'a', name: 'First', xpReward: 10, goldReward: { min: 0, max: 0 } },
      { id: 'a', name: 'Second', xpReward: 10, goldReward: { min: 0, max: 0 } },
    ])).toThrow(ZodError);
  });

  it('should reject duplicate names regardless of case', () => {
    expect(() => new QuestCatalog([
      { id: 'a', name: 'Same', xpReward: 10, goldReward: { min: 0, max: 0 } },
      { id: 'b', name: 'SAME', xpReward: 10, goldReward: { min: 0, max: 0 } },
    ])).toThrow(ZodError);
  });

  it('should reject an inverted gold range and an empty catalog', () => {
    expect(() => new QuestCatalog([
      { id: 'a', name: 'A', xpReward: 10, goldReward: { min: 3, max: 1 } },
    ])).toThrow(ZodError);
    expect(() => new QuestCatalog([])).toThrow(ZodError);
  });
});

describe('gold rolls', () => {
  it('should roll the ends of the range', () => {
    expect(fixedGoldRoll('min')(1, 3)).toBe(1);
    expect(fixedGoldRoll('max')(1, 3)).toBe(3);
  });

  it('should map Math.random onto the inclusive range', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(randomGoldRoll(1, 3)).toBe(1);
    vi.spyOn(Math, 'random').mockReturnValue(0.999);
    expect(randomGoldRoll(1, 3)).toBe(3);
  });

  it('should repeat a seeded sequence and stay in range', () => {
    const a = createSeededGoldRoll(42);
    const b = createSeededGoldRoll(42);
    for (let i = 0; i < 100; i++) {
      const value = a(1, 3);
      expect(b(1, 3)).toBe(value);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(3);
    }
  });
});
