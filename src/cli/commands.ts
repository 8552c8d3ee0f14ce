import chalk from 'chalk';

import { createSkillRouter } from '../core/factory.js';
import { loadConfig } from '../core/config/loader.js';
import { LearningStore } from '../core/execution/learner.js';
import { errorMessage, RegistryError, ConfigError } from '../core/errors/index.js';
import { formatExecutionResult } from '../core/intent/format.js';
import { SkillValidator, formatValidationResult } from '../core/skills/validator.js';
import type { SkillExecutor } from '../types/index.js';

export interface CommandResult {
  success: boolean;
  output: string;
}

export interface RouterCommandOptions {
  skillsDir?: string;
  learningPath?: string;
  cwd?: string;
  executor?: SkillExecutor;
}

export type LearningCommandOptions = Pick<RouterCommandOptions, 'cwd' | 'learningPath'>;

export interface QueryCommandOptions extends RouterCommandOptions {
  dryRun?: boolean;
  json?: boolean;
}

function failure(error: unknown): CommandResult {
  const lines = [chalk.red(`Error: ${errorMessage(error)}`)];
  if ((error instanceof RegistryError || error instanceof ConfigError) && error.suggestion) {
    lines.push(chalk.dim(error.suggestion));
  }
  return { success: false, output: lines.join('\n') };
}

/**
 * Learning store from config alone; no skills directory is needed
 */
async function openLearningStore(options: LearningCommandOptions): Promise<LearningStore> {
  const config = await loadConfig({ cwd: options.cwd });
  return new LearningStore(options.learningPath ?? config.learningPath);
}

/**
 * Route a natural-language query: execute the top match or list suggestions
 */
export async function handleQuery(text: string, options: QueryCommandOptions = {}): Promise<CommandResult> {
  try {
    const { router, config } = await createSkillRouter(options);
    const result = await router.executeOrSuggest(text, {
      dryRun: options.dryRun ?? config.settings.dryRun,
    });

    if (options.json) {
      return { success: !result.executed || result.success, output: JSON.stringify(result, null, 2) };
    }

    const rendered = formatExecutionResult(result);
    const timing = chalk.dim(`(${result.executionTimeMs.toFixed(1)}ms)`);

    if (result.warning) {
      return { success: true, output: `${chalk.yellow(rendered)}\n${timing}` };
    }
    if (result.executed && !result.success) {
      return { success: false, output: chalk.red(rendered) };
    }
    return { success: true, output: `${result.executed ? chalk.green(rendered) : rendered}\n${timing}` };
  } catch (error) {
    return failure(error);
  }
}

/**
 * List loaded skills with their auto-trigger settings
 */
export async function handleList(options: RouterCommandOptions = {}): Promise<CommandResult> {
  try {
    const { registry, config } = await createSkillRouter(options);
    const skills = registry.list();

    const lines = [chalk.bold(`Skills in ${config.skillsDir ?? ''} (${skills.length}):`), ''];
    for (const skill of skills) {
      const { enabled, confidenceThreshold, confirmBeforeExecution } = skill.autoTrigger;
      const trigger = enabled
        ? `auto >= ${Math.round(confidenceThreshold * 100)}%${confirmBeforeExecution ? ', confirm' : ''}`
        : 'manual';
      lines.push(`  ${chalk.cyan(`/${skill.name}`)} ${chalk.dim(`[${trigger}]`)}`);
      if (skill.description) {
        lines.push(`    ${skill.description}`);
      }
    }

    const errors = registry.getLoadErrors();
    if (errors.length > 0) {
      lines.push('', chalk.yellow(`Skipped ${errors.length} definition(s):`));
      for (const error of errors) {
        lines.push(chalk.yellow(`  ${error.filePath}: ${error.message}`));
      }
    }

    return { success: true, output: lines.join('\n') };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Lint SKILL.md files; --strict fails on warnings too
 */
export async function handleValidate(
  files: string[],
  options: { strict?: boolean } = {},
): Promise<CommandResult> {
  const validator = new SkillValidator();
  const sections: string[] = [];
  let allValid = true;

  for (const file of files) {
    const result = await validator.validateFile(file);
    sections.push(formatValidationResult(result));
    if (!result.valid || (options.strict && result.warnings.length > 0)) {
      allValid = false;
    }
  }

  sections.push(allValid ? chalk.green('All skills valid') : chalk.red('Validation failed'));
  return { success: allValid, output: sections.join('\n\n') };
}

/**
 * Show learning statistics
 */
export async function handleStats(options: LearningCommandOptions = {}): Promise<CommandResult> {
  try {
    const stats = (await openLearningStore(options)).getStats();
    const lines = [
      chalk.bold('Learning statistics:'),
      `  Skills tracked:   ${stats.totalSkillsTracked}`,
      `  Executions:       ${stats.totalExecutions}`,
      `  Most used:        ${stats.mostUsedSkill ?? '-'}`,
      `  Recent skills:    ${stats.recentSkillsCount}`,
      `  Argument records: ${stats.argumentPatternsCount}`,
    ];
    return { success: true, output: lines.join('\n') };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Clear all learning data
 */
export async function handleResetLearning(options: LearningCommandOptions = {}): Promise<CommandResult> {
  try {
    const learner = await openLearningStore(options);
    learner.reset();
    return { success: true, output: chalk.green(`Learning data reset (${learner.storagePath})`) };
  } catch (error) {
    return failure(error);
  }
}
