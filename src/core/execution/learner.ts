/**
 * Learning Store
 *
 * Persists usage history for skills to a single JSON document:
 * per-skill counters, argument value frequencies, a recency list and
 * successful query exemplars. Loaded lazily, saved after every tracked
 * execution.
 */

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';

import type {
  ExecutionResult,
  LearningData,
  LearningStats,
  SkillMatch,
} from '../../types/index.js';
import { errorMessage } from '../errors/index.js';
import { getSkillRouterHome } from '../../utils/index.js';

export const MAX_RECENT_SKILLS = 10;
export const MAX_QUERY_PATTERNS = 10;
export const MAX_LEARNING_BOOST = 0.1;

/**
 * On-disk document; keys are snake_case, mapped to LearningData at load and save
 */
const storedLearningSchema = z.object({
  skill_usage: z
    .record(z.object({ count: z.number().int().min(0), success_count: z.number().int().min(0) }))
    .default({}),
  argument_patterns: z.record(z.record(z.number())).default({}),
  recent_skills: z.array(z.string()).default([]),
  query_patterns: z.record(z.array(z.string())).default({}),
});

type StoredLearningData = z.infer<typeof storedLearningSchema>;

/**
 * Record without a prototype, so keys like "constructor" are plain data
 */
function dictionary<T>(): Record<string, T> {
  return Object.create(null);
}

function own<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

function mapRecord<A, B>(record: Record<string, A>, fn: (value: A) => B): Record<string, B> {
  const result = dictionary<B>();
  for (const [key, value] of Object.entries(record)) {
    result[key] = fn(value);
  }
  return result;
}

export function emptyLearningData(): LearningData {
  return { skillUsage: dictionary(), argumentPatterns: dictionary(), recentSkills: [], queryPatterns: dictionary() };
}

function toStoredLearningData(data: LearningData): StoredLearningData {
  return {
    skill_usage: mapRecord(data.skillUsage, (usage) => ({ count: usage.count, success_count: usage.successCount })),
    argument_patterns: mapRecord(data.argumentPatterns, (counts) => mapRecord(counts, (count) => count)),
    recent_skills: [...data.recentSkills],
    query_patterns: mapRecord(data.queryPatterns, (queries) => [...queries]),
  };
}

function fromStoredLearningData(stored: StoredLearningData): LearningData {
  return {
    skillUsage: mapRecord(stored.skill_usage, (usage) => ({ count: usage.count, successCount: usage.success_count })),
    argumentPatterns: mapRecord(stored.argument_patterns, (counts) => mapRecord(counts, (count) => count)),
    recentSkills: [...stored.recent_skills],
    queryPatterns: mapRecord(stored.query_patterns, (queries) => [...queries]),
  };
}

export function defaultLearningPath(): string {
  return path.join(getSkillRouterHome(), 'learning.json');
}

/**
 * Move a skill to the front of the recency list, without duplicates
 */
export function promoteRecent(recent: string[], skillName: string, max = MAX_RECENT_SKILLS): string[] {
  return [skillName, ...recent.filter((name) => name !== skillName)].slice(0, max);
}

export class LearningStore {
  readonly storagePath: string;
  private data: LearningData | null = null;

  constructor(storagePath: string = defaultLearningPath()) {
    this.storagePath = storagePath;
  }

  /**
   * Record one execution attempt and persist
   */
  track(query: string, match: Pick<SkillMatch, 'skill' | 'arguments'>, result: Pick<ExecutionResult, 'success'>): void {
    const data = this.load();
    const skillName = match.skill.name;

    const usage = own(data.skillUsage, skillName) ?? { count: 0, successCount: 0 };
    usage.count++;
    if (result.success) {
      usage.successCount++;
    }
    data.skillUsage[skillName] = usage;

    if (result.success) {
      const patterns = own(data.queryPatterns, skillName) ?? [];
      if (!patterns.includes(query) && patterns.length < MAX_QUERY_PATTERNS) {
        patterns.push(query);
      }
      data.queryPatterns[skillName] = patterns;
    }

    for (const [argName, value] of Object.entries(match.arguments)) {
      const key = `${skillName}.${argName}`;
      const counts = own(data.argumentPatterns, key) ?? dictionary<number>();
      const valueKey = String(value);
      counts[valueKey] = (own(counts, valueKey) ?? 0) + 1;
      data.argumentPatterns[key] = counts;
    }

    data.recentSkills = promoteRecent(data.recentSkills, skillName);

    this.save(data);
  }

  getRecent(limit = 5): string[] {
    return this.load().recentSkills.slice(0, limit);
  }

  /**
   * Most frequent recorded value for an argument, first seen on ties
   */
  getCommonArgument(skillName: string, argName: string): string | undefined {
    const counts = own(this.load().argumentPatterns, `${skillName}.${argName}`) ?? {};
    let best: string | undefined;
    let bestCount = 0;
    for (const [value, count] of Object.entries(counts)) {
      if (count > bestCount) {
        best = value;
        bestCount = count;
      }
    }
    return best;
  }

  getSuccessRate(skillName: string): number {
    const usage = own(this.load().skillUsage, skillName);
    if (!usage || usage.count === 0) {
      return 0;
    }
    return usage.successCount / usage.count;
  }

  /**
   * Confidence boost from history, at most 0.10:
   * +0.05 among the 5 most recent skills, +0.03 for a success rate above 90%,
   * +0.02 when the query overlaps a stored successful query.
   *
   * Not applied by IntentMatcher; callers opt in.
   */
  calculateBoost(skillName: string, query: string): number {
    const data = this.load();
    let boost = 0;

    if (data.recentSkills.slice(0, 5).includes(skillName)) {
      boost += 0.05;
    }

    if (this.getSuccessRate(skillName) > 0.9) {
      boost += 0.03;
    }

    const lowered = query.toLowerCase();
    const patterns = own(data.queryPatterns, skillName) ?? [];
    if (patterns.some((pattern) => {
      const candidate = pattern.toLowerCase();
      return lowered.includes(candidate) || candidate.includes(lowered);
    })) {
      boost += 0.02;
    }

    return Math.round(Math.min(boost, MAX_LEARNING_BOOST) * 1e6) / 1e6;
  }

  /**
   * Cached after the first call. A missing or unreadable file yields empty data.
   */
  load(): LearningData {
    if (this.data) {
      return this.data;
    }

    this.data = this.readFromDisk();
    return this.data;
  }

  /**
   * Replace the in-memory data and write it out; a failed write is logged, not thrown
   */
  save(data: LearningData): void {
    const stored = toStoredLearningData(data);
    this.data = fromStoredLearningData(stored);
    try {
      fs.outputJsonSync(this.storagePath, stored, { spaces: 2 });
    } catch (error) {
      console.warn(`Failed to save learning data to ${this.storagePath}: ${errorMessage(error)}`);
    }
  }

  reset(): void {
    this.save(emptyLearningData());
  }

  getStats(): LearningStats {
    const data = this.load();
    let totalExecutions = 0;
    let mostUsedSkill: string | null = null;
    let mostUsedCount = -1;

    for (const [name, usage] of Object.entries(data.skillUsage)) {
      totalExecutions += usage.count;
      if (usage.count > mostUsedCount) {
        mostUsedSkill = name;
        mostUsedCount = usage.count;
      }
    }

    return {
      totalSkillsTracked: Object.keys(data.skillUsage).length,
      totalExecutions,
      mostUsedSkill,
      recentSkillsCount: data.recentSkills.length,
      argumentPatternsCount: Object.keys(data.argumentPatterns).length,
    };
  }

  private readFromDisk(): LearningData {
    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.storagePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        console.warn(`Ignoring unreadable learning data at ${this.storagePath}: ${errorMessage(error)}`);
      }
      return emptyLearningData();
    }

    const parsed = storedLearningSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`Ignoring malformed learning data at ${this.storagePath}`);
      return emptyLearningData();
    }
    return fromStoredLearningData(parsed.data);
  }
}
