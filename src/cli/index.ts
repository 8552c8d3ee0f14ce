import { Command } from 'commander';
import chalk from 'chalk';

import {
  type CommandResult,
  handleList,
  handleQuery,
  handleResetLearning,
  handleStats,
  handleValidate,
} from './commands.js';

function report(result: CommandResult): void {
  if (result.success) {
    console.log(result.output);
  } else {
    console.error(result.output);
    process.exitCode = 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('skill-router')
    .description('Match natural-language requests to skills and run them when safe')
    .version('0.1.0');

  program
    .command('query')
    .description('Execute or suggest skills for a request')
    .argument('<text...>', 'Natural-language request')
    .option('--dry-run', 'Show what would execute without running it')
    .option('--skills-dir <dir>', 'Skills directory (default: auto-detect)')
    .option('--learning-path <file>', 'Learning data file')
    .option('--json', 'Print the raw result as JSON')
    .action(async (text: string[], options: { dryRun?: boolean; skillsDir?: string; learningPath?: string; json?: boolean }) => {
      report(await handleQuery(text.join(' '), options));
    });

  program
    .command('list')
    .description('List available skills')
    .option('--skills-dir <dir>', 'Skills directory (default: auto-detect)')
    .action(async (options: { skillsDir?: string }) => {
      report(await handleList(options));
    });

  program
    .command('validate')
    .description('Validate SKILL.md metadata')
    .argument('<files...>', 'Skill files to validate')
    .option('--strict', 'Treat warnings as errors')
    .action(async (files: string[], options: { strict?: boolean }) => {
      report(await handleValidate(files, options));
    });

  program
    .command('stats')
    .description('Show learning statistics')
    .option('--learning-path <file>', 'Learning data file')
    .action(async (options: { learningPath?: string }) => {
      report(await handleStats(options));
    });

  program
    .command('reset-learning')
    .description('Clear all learning data')
    .option('--learning-path <file>', 'Learning data file')
    .action(async (options: { learningPath?: string }) => {
      report(await handleResetLearning(options));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(chalk.red('Fatal Error:'), error.message);
    process.exit(1);
  }
}
