/**
 * Display helpers for matches, router results and safety findings
 */

import type {
  ArgumentValue,
  ExecutionResult,
  MatchResult,
  SafetyResult,
  SkillArguments,
  SkillMatch,
} from '../../types/index.js';

export const NO_MATCHES_MESSAGE = 'No matching skills found for your query.';

/**
 * Whether a match may run without confirmation.
 * Confidence alone never overrides confirm_before_execution.
 */
export function isAutoExecutable(match: SkillMatch): boolean {
  const { autoTrigger } = match.skill;

  if (!autoTrigger.enabled) {
    return false;
  }
  if (match.confidence < autoTrigger.confidenceThreshold) {
    return false;
  }
  const required = match.skill.arguments.filter((arg) => arg.required);
  if (!required.every((arg) => Object.hasOwn(match.arguments, arg.name))) {
    return false;
  }
  return !autoTrigger.confirmBeforeExecution;
}

function formatArgument(name: string, value: ArgumentValue): string | null {
  if (typeof value === 'boolean') {
    return value ? `--${name}` : null;
  }
  if (typeof value === 'string' && /\s/.test(value)) {
    return `--${name} "${value}"`;
  }
  return `--${name} ${value}`;
}

export function formatArguments(args: SkillArguments): string {
  return Object.entries(args)
    .map(([name, value]) => formatArgument(name, value))
    .filter((part): part is string => part !== null)
    .join(' ');
}

/**
 * Render a match as a slash command, e.g. `/troubleshoot --issue "the login bug"`
 */
export function formatCommand(match: Pick<SkillMatch, 'skill' | 'arguments'>): string {
  const args = formatArguments(match.arguments);
  return args ? `/${match.skill.name} ${args}` : `/${match.skill.name}`;
}

export function formatSuggestions(result: MatchResult): string {
  if (result.matches.length === 0) {
    return NO_MATCHES_MESSAGE;
  }

  const lines = [`Intent detection results (${result.matches.length} matches):`, ''];

  result.matches.slice(0, 3).forEach((match, index) => {
    lines.push(`${index + 1}. ${formatCommand(match)}`);
    lines.push(`   Confidence: ${Math.round(match.confidence * 100)}% | Source: ${match.source}`);
    lines.push(`   ${match.skill.description}`);
    if (match.explanation.length > 0) {
      lines.push(`   ${match.explanation.join(', ')}`);
    }
    lines.push('');
  });

  if (result.topMatch && isAutoExecutable(result.topMatch)) {
    lines.push('Top match will auto-execute (high confidence)');
  } else {
    lines.push('Press [1] to execute top match, or [2-3] for alternatives');
  }

  return lines.join('\n');
}

export function formatExecutionResult(result: ExecutionResult): string {
  if (result.warning) {
    return `Warning: ${result.warning}\n\n${result.suggestions}`;
  }

  if (!result.executed) {
    return result.output || result.suggestions;
  }

  if (!result.success) {
    return `Execution failed: ${result.output}`;
  }

  const args = formatArguments(result.argumentsUsed);
  const header = `Executed: /${result.skillUsed ?? ''}${args ? ` ${args}` : ''}`;
  return `${header}\n\n${result.output}`;
}

export function formatSafetyWarnings(result: SafetyResult): string {
  const lines: string[] = [];
  if (result.warning) {
    lines.push(`Warning: ${result.warning}`);
  }
  for (const warning of result.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  return lines.join('\n');
}
