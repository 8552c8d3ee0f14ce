/**
 * IntentMatcher
 *
 * Maps a free-text query to ranked skill candidates.
 *
 * Base scores:
 * - Primary template: 0.90
 * - Regex pattern:    0.85
 * - Keywords:         0.60 for the first hit, +0.15 per further hit, capped at 0.75
 *
 * Boosts (+0.05 each, applied after merge):
 * - Context relevance
 * - Recent usage
 * - Argument completeness
 */

import type {
  ContextProvider,
  MatchResult,
  ProjectContext,
  Skill,
  SkillArguments,
  SkillMatch,
} from '../../types/index.js';
import type { SkillRegistry } from '../skills/registry.js';
import { ArgumentInferrer } from './inferrer.js';
import { compilePattern, namedGroups, templateToRegExp } from './template.js';

export const KEYWORD_BASE_CONFIDENCE = 0.6;
export const KEYWORD_STEP = 0.15;
export const KEYWORD_MAX_CONFIDENCE = 0.75;
export const PATTERN_CONFIDENCE = 0.85;
export const PRIMARY_CONFIDENCE = 0.9;
export const BOOST_AMOUNT = 0.05;
export const MAX_MATCHES = 3;

/**
 * Clamp to [0, 1], rounding away float drift so 0.75 + 0.05 + 0.05 compares equal to 0.85
 */
export function clampConfidence(value: number): number {
  const clamped = Math.min(1, Math.max(0, value));
  return Math.round(clamped * 1e6) / 1e6;
}

export interface IntentMatcherOptions {
  /** Used when match() is called without a context */
  contextProvider?: ContextProvider;
  inferrer?: ArgumentInferrer;
}

export class IntentMatcher {
  private readonly registry: SkillRegistry;
  private readonly contextProvider?: ContextProvider;
  private readonly inferrer: ArgumentInferrer;

  constructor(registry: SkillRegistry, options: IntentMatcherOptions = {}) {
    this.registry = registry;
    this.contextProvider = options.contextProvider;
    this.inferrer = options.inferrer ?? new ArgumentInferrer();
  }

  /**
   * Match a query against every registered skill.
   * Returns at most 3 matches, best first; no candidates is an empty result, not an error.
   */
  async match(query: string, context?: ProjectContext): Promise<MatchResult> {
    const startTime = performance.now();

    const resolvedContext = context ?? (await this.analyzeContext());

    const candidates = this.combineMatches(
      this.matchKeywords(query),
      this.matchPatterns(query),
      this.matchPrimary(query),
    );

    for (const candidate of candidates) {
      this.applyBoosts(candidate, resolvedContext);
    }

    // Array.prototype.sort is stable, so ties keep first-seen order
    const ranked = [...candidates]
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, MAX_MATCHES);

    for (const candidate of ranked) {
      candidate.arguments = this.inferrer.infer(query, candidate.skill, resolvedContext);
    }

    return {
      query,
      matches: ranked,
      topMatch: ranked[0],
      context: resolvedContext,
      elapsedMs: performance.now() - startTime,
    };
  }

  /**
   * Stage 1: inverted keyword index over lowercase whitespace-delimited words
   */
  matchKeywords(query: string): SkillMatch[] {
    const matches = new Map<string, SkillMatch>();
    const words = new Set(query.toLowerCase().split(/\s+/).filter(Boolean));

    for (const word of words) {
      for (const skillName of this.registry.lookupKeyword(word)) {
        const existing = matches.get(skillName);
        if (existing) {
          existing.confidence = clampConfidence(
            Math.min(existing.confidence + KEYWORD_STEP, KEYWORD_MAX_CONFIDENCE),
          );
          existing.baseConfidence = existing.confidence;
          existing.explanation.push(`Keyword match: ${word}`);
          continue;
        }

        const skill = this.registry.get(skillName);
        if (skill) {
          matches.set(
            skillName,
            createMatch(skill, 'keyword', KEYWORD_BASE_CONFIDENCE, {}, `Keyword match: ${word}`),
          );
        }
      }
    }

    return Array.from(matches.values());
  }

  /**
   * Stage 2: declared regex patterns against the raw query, first match per skill
   */
  matchPatterns(query: string): SkillMatch[] {
    const matches: SkillMatch[] = [];

    for (const skill of this.registry.list()) {
      for (const pattern of skill.intents.patterns) {
        const regex = compilePattern(pattern);
        if (!regex) {
          continue;
        }

        const found = regex.exec(query);
        if (found) {
          matches.push(
            createMatch(
              skill,
              'pattern',
              PATTERN_CONFIDENCE,
              declaredOnly(skill, namedGroups(found)),
              `Pattern match: ${pattern}`,
            ),
          );
          break;
        }
      }
    }

    return matches;
  }

  /**
   * Stage 3: primary templates against the lowercased query, first match per skill
   */
  matchPrimary(query: string): SkillMatch[] {
    const matches: SkillMatch[] = [];
    const lowered = query.toLowerCase();

    for (const skill of this.registry.list()) {
      for (const template of skill.intents.primary) {
        const found = templateToRegExp(template, undefined, 'i')?.exec(lowered);
        if (found) {
          matches.push(
            createMatch(
              skill,
              'primary',
              PRIMARY_CONFIDENCE,
              declaredOnly(skill, namedGroups(found)),
              `Primary pattern match: ${template}`,
            ),
          );
          break;
        }
      }
    }

    return matches;
  }

  /**
   * One candidate per skill; a later stage replaces an earlier one only with strictly higher confidence
   */
  private combineMatches(...stages: SkillMatch[][]): SkillMatch[] {
    const combined = new Map<string, SkillMatch>();

    for (const stage of stages) {
      for (const match of stage) {
        const existing = combined.get(match.skill.name);
        if (!existing || match.confidence > existing.confidence) {
          combined.set(match.skill.name, match);
        }
      }
    }

    return Array.from(combined.values());
  }

  private applyBoosts(match: SkillMatch, context: ProjectContext): void {
    let score = match.baseConfidence;

    if (match.skill.intents.contexts.some((tag) => context.activeContexts.includes(tag))) {
      score += BOOST_AMOUNT;
      match.explanation.push('Context boost');
    }

    if (context.recentSkills.includes(match.skill.name)) {
      score += BOOST_AMOUNT;
      match.explanation.push('Recent usage boost');
    }

    const required = match.skill.arguments.filter((arg) => arg.required);
    if (required.length > 0 && required.every((arg) => Object.hasOwn(match.arguments, arg.name))) {
      score += BOOST_AMOUNT;
      match.explanation.push('Complete arguments');
    }

    match.confidence = clampConfidence(score);
  }

  private async analyzeContext(): Promise<ProjectContext> {
    if (this.contextProvider) {
      return this.contextProvider.analyze();
    }
    const { ContextAnalyzer } = await import('./analyzer.js');
    return new ContextAnalyzer().analyze();
  }

  getSkill(name: string): Skill | undefined {
    return this.registry.get(name);
  }

  listSkills(): Skill[] {
    return this.registry.list();
  }
}

function createMatch(
  skill: Skill,
  source: SkillMatch['source'],
  confidence: number,
  args: SkillArguments,
  explanation: string,
): SkillMatch {
  return {
    skill,
    confidence,
    source,
    arguments: args,
    explanation: [explanation],
    baseConfidence: confidence,
  };
}

/**
 * Drop captures that are not declared arguments of the skill
 */
function declaredOnly(skill: Skill, captured: Record<string, string>): SkillArguments {
  const args: SkillArguments = {};
  for (const arg of skill.arguments) {
    const value = captured[arg.name];
    if (Object.hasOwn(captured, arg.name) && value !== undefined) {
      args[arg.name] = value;
    }
  }
  return args;
}
