/**
 * Execution Router
 *
 * Query -> match -> eligibility -> safety -> execute or suggest -> learn.
 * Every branch returns a structured ExecutionResult; faults never escape.
 */

import type {
  ExecutionResult,
  LearningStats,
  ProjectContext,
  SkillExecutor,
  SkillMatch,
  SkillOutcome,
} from '../../types/index.js';
import { errorMessage } from '../errors/index.js';
import type { IntentMatcher } from '../intent/matcher.js';
import {
  NO_MATCHES_MESSAGE,
  formatCommand,
  formatSafetyWarnings,
  formatSuggestions,
  isAutoExecutable,
} from '../intent/format.js';
import { SimulatedSkillExecutor } from './executor.js';
import { LearningStore } from './learner.js';
import { SafetyValidator } from './validator.js';

export interface ExecutionRouterOptions {
  learner?: LearningStore;
  /** Storage path for a router-owned LearningStore; ignored when `learner` is given */
  learningPath?: string;
  validator?: SafetyValidator;
  executor?: SkillExecutor;
}

export interface ExecuteOptions {
  context?: ProjectContext;
  /** Resolve and validate but do not execute or record learning */
  dryRun?: boolean;
}

export class ExecutionRouter {
  readonly matcher: IntentMatcher;
  readonly learner: LearningStore;
  private readonly validator: SafetyValidator;
  private readonly executor: SkillExecutor;

  constructor(matcher: IntentMatcher, options: ExecutionRouterOptions = {}) {
    this.matcher = matcher;
    this.learner = options.learner ?? new LearningStore(options.learningPath);
    this.validator = options.validator ?? new SafetyValidator();
    this.executor = options.executor ?? new SimulatedSkillExecutor();
  }

  async executeOrSuggest(query: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const startTime = performance.now();
    const finish = (partial: Partial<ExecutionResult>): ExecutionResult => ({
      query,
      executed: false,
      success: false,
      output: '',
      suggestions: '',
      argumentsUsed: {},
      ...partial,
      executionTimeMs: performance.now() - startTime,
    });

    try {
      const matchResult = await this.matcher.match(query, options.context);
      const topMatch = matchResult.topMatch;

      if (!topMatch) {
        return finish({ suggestions: NO_MATCHES_MESSAGE });
      }

      const suggestions = formatSuggestions(matchResult);

      if (!this.shouldAutoExecute(topMatch)) {
        return finish({ suggestions });
      }

      const safety = this.validator.validate(topMatch, matchResult.context);
      if (!safety.safe) {
        return finish({ suggestions, warning: safety.warning });
      }

      const resolved = {
        skillUsed: topMatch.skill.name,
        argumentsUsed: { ...topMatch.arguments },
      };

      let result: Partial<ExecutionResult>;
      if (options.dryRun) {
        result = {
          ...resolved,
          success: true,
          output: `[DRY RUN] Would execute: ${formatCommand(topMatch)}`,
        };
      } else {
        const outcome = await this.runSkill(topMatch, matchResult.context);
        result = {
          ...resolved,
          executed: true,
          success: outcome.ok,
          output: outcome.ok ? outcome.output : outcome.error,
        };
        this.learner.track(query, topMatch, { success: outcome.ok });
      }

      const warnings = formatSafetyWarnings(safety);
      if (warnings) {
        result.output = result.output ? `${result.output}\n\n${warnings}` : warnings;
      }

      return finish(result);
    } catch (error) {
      return finish({ suggestions: `Skill routing failed: ${errorMessage(error)}` });
    }
  }

  /**
   * Eligibility for unattended execution; confirmation always wins over confidence
   */
  shouldAutoExecute(match: SkillMatch): boolean {
    return isAutoExecutable(match);
  }

  getLearningStats(): LearningStats {
    return this.learner.getStats();
  }

  resetLearning(): void {
    this.learner.reset();
  }

  private async runSkill(match: SkillMatch, context: ProjectContext): Promise<SkillOutcome> {
    try {
      return await this.executor.execute(match.skill, match.arguments, context);
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }
}
