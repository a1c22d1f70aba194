// ═══════════════════════════════════════════════════════════════════════════════
// QUEST CATALOG — Validated Static Quest Definitions
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import { createQuestId, type QuestId } from '../../types/branded.js';
import { invalidQuest, type ProgressionError } from './errors.js';
import type { QuestDefinition } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const QuestDefinitionSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]{0,39}$/, 'Quest id must be a lowercase slug'),
  name: z.string().trim().min(1).max(100),
  xpReward: z.number().int().positive(),
  goldReward: z
    .object({
      min: z.number().int().nonnegative(),
      max: z.number().int().nonnegative(),
    })
    .refine(range => range.min <= range.max, { message: 'goldReward.min must not exceed goldReward.max' }),
});

export const QuestCatalogSchema = z
  .array(QuestDefinitionSchema)
  .min(1)
  .superRefine((quests, ctx) => {
    const ids = new Set<string>();
    const names = new Set<string>();
    quests.forEach((quest, index) => {
      if (ids.has(quest.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate quest id "${quest.id}"` });
      }
      const name = quest.name.toLowerCase();
      if (names.has(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'name'], message: `Duplicate quest name "${quest.name}"` });
      }
      ids.add(quest.id);
      names.add(name);
    });
  });

export type QuestDefinitionInput = z.input<typeof QuestDefinitionSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

export const DEFAULT_QUESTS: readonly QuestDefinitionInput[] = [
  { id: 'apply', name: 'Apply for a job', xpReward: 50, goldReward: { min: 1, max: 3 } },
  { id: 'study', name: 'Study session', xpReward: 15, goldReward: { min: 0, max: 0 } },
  { id: 'resume', name: 'Update resume', xpReward: 30, goldReward: { min: 0, max: 1 } },
  { id: 'recruiter', name: 'Contact a recruiter', xpReward: 25, goldReward: { min: 1, max: 2 } },
  { id: 'project', name: 'Work on a project', xpReward: 40, goldReward: { min: 0, max: 2 } },
];

// ─────────────────────────────────────────────────────────────────────────────────
// CATALOG
// ─────────────────────────────────────────────────────────────────────────────────

export class QuestCatalog {
  private readonly quests: readonly QuestDefinition[];
  private readonly byId: ReadonlyMap<QuestId, QuestDefinition>;
  private readonly byName: ReadonlyMap<string, QuestDefinition>;

  /**
   * @throws ZodError when the definitions are invalid or duplicated
   */
  constructor(definitions: readonly QuestDefinitionInput[]) {
    const parsed = QuestCatalogSchema.parse(definitions);

    this.quests = Object.freeze(
      parsed.map(quest => ({ ...quest, id: createQuestId(quest.id) }))
    );
    this.byId = new Map(this.quests.map(quest => [quest.id, quest]));
    this.byName = new Map(this.quests.map(quest => [quest.name.toLowerCase(), quest]));
  }

  list(): readonly QuestDefinition[] {
    return this.quests;
  }

  /**
   * Look a quest up by id or by name (case-insensitive).
   */
  find(query: string): Result<QuestDefinition, ProgressionError> {
    const key = query.trim().toLowerCase();
    const quest = this.byId.get(createQuestId(key)) ?? this.byName.get(key);
    return quest ? ok(quest) : err(invalidQuest(query));
  }

  get size(): number {
    return this.quests.length;
  }
}

export function createQuestCatalog(
  definitions: readonly QuestDefinitionInput[] = DEFAULT_QUESTS
): QuestCatalog {
  return new QuestCatalog(definitions);
}
