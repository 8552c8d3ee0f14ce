import { describe, it, expect } from 'vitest';
import {
  NO_MATCHES_MESSAGE,
  formatCommand,
  formatExecutionResult,
  formatSafetyWarnings,
  formatSuggestions,
  isAutoExecutable,
} from '../../../src/core/intent/format.js';
import { createProjectContext } from '../../../src/core/intent/context.js';
import type { ExecutionResult, Skill, SkillArguments, SkillMatch } from '../../../src/types/index.js';
import { skillFrom } from '../../helpers.js';

function matchOf(skill: Skill, confidence: number, args: SkillArguments = {}, explanation: string[] = []): SkillMatch {
  return { skill, confidence, source: 'primary', arguments: args, explanation, baseConfidence: confidence };
}

const autoSkill = skillFrom({
  name: 'troubleshoot',
  description: 'Diagnose problems',
  auto_trigger: { enabled: true, confidence_threshold: 0.85, confirm_before_execution: false },
  arguments: [{ name: 'issue', required: true }],
});

describe('isAutoExecutable', () => {
  it('should accept an enabled skill above threshold with its required arguments', () => {
    expect(isAutoExecutable(matchOf(autoSkill, 0.9, { issue: 'x' }))).toBe(true);
    expect(isAutoExecutable(matchOf(autoSkill, 0.85, { issue: 'x' }))).toBe(true);
  });

  it('should reject low confidence or missing required arguments', () => {
    expect(isAutoExecutable(matchOf(autoSkill, 0.84, { issue: 'x' }))).toBe(false);
    expect(isAutoExecutable(matchOf(autoSkill, 0.9))).toBe(false);
  });

  it('should never auto-execute when confirmation is required', () => {
    const confirm = skillFrom({
      auto_trigger: { enabled: true, confidence_threshold: 0.5, confirm_before_execution: true },
    });
    expect(isAutoExecutable(matchOf(confirm, 1))).toBe(false);
  });

  it('should not take object members for required arguments', () => {
    const skill = skillFrom({
      name: 'scaffold',
      auto_trigger: { enabled: true, confirm_before_execution: false },
      arguments: [{ name: 'constructor', required: true }],
    });

    expect(isAutoExecutable(matchOf(skill, 0.95))).toBe(false);
    expect(isAutoExecutable(matchOf(skill, 0.95, { constructor: 'Widget' }))).toBe(true);
  });

  it('should reject disabled auto-trigger', () => {
    expect(isAutoExecutable(matchOf(skillFrom({}), 1))).toBe(false);
  });
});

describe('formatCommand', () => {
  it('should render arguments as flags', () => {
    const skill = skillFrom({ name: 'test' });

    expect(formatCommand(matchOf(skill, 1, { issue: 'the login bug', depth: 3, verbose: true, quiet: false }))).toBe(
      '/test --issue "the login bug" --depth 3 --verbose',
    );
    expect(formatCommand(matchOf(skill, 1))).toBe('/test');
  });
});

describe('formatSuggestions', () => {
  it('should report an empty result', () => {
    const output = formatSuggestions({ query: 'q', matches: [], context: createProjectContext(), elapsedMs: 0 });
    expect(output).toBe(NO_MATCHES_MESSAGE);
  });

  it('should list matches and the auto-execute notice', () => {
    const top = matchOf(autoSkill, 0.9, { issue: 'crash' }, ['Primary pattern match: troubleshoot {issue}']);
    const output = formatSuggestions({ query: 'q', matches: [top], topMatch: top, context: createProjectContext(), elapsedMs: 1 });

    expect(output).toBe(
      [
        'Intent detection results (1 matches):',
        '',
        '1. /troubleshoot --issue crash',
        '   Confidence: 90% | Source: primary',
        '   Diagnose problems',
        '   Primary pattern match: troubleshoot {issue}',
        '',
        'Top match will auto-execute (high confidence)',
      ].join('\n'),
    );
  });

  it('should end with a selection hint when the top match is not eligible', () => {
    const top = matchOf(autoSkill, 0.6, { issue: 'crash' });
    const output = formatSuggestions({ query: 'q', matches: [top], topMatch: top, context: createProjectContext(), elapsedMs: 1 });

    expect(output.split('\n').at(-1)).toBe('Press [1] to execute top match, or [2-3] for alternatives');
  });
});

describe('formatExecutionResult', () => {
  const base: ExecutionResult = {
    query: 'q',
    executed: false,
    success: false,
    output: '',
    suggestions: 'suggested',
    executionTimeMs: 1,
    argumentsUsed: {},
  };

  it('should lead with a blocking warning', () => {
    expect(formatExecutionResult({ ...base, warning: 'blocked' })).toBe('Warning: blocked\n\nsuggested');
  });

  it('should show suggestions or dry-run output when nothing ran', () => {
    expect(formatExecutionResult(base)).toBe('suggested');
    expect(formatExecutionResult({ ...base, success: true, output: '[DRY RUN] Would execute: /x' })).toBe(
      '[DRY RUN] Would execute: /x',
    );
  });

  it('should render success and failure', () => {
    expect(
      formatExecutionResult({ ...base, executed: true, success: true, output: 'done', skillUsed: 'x', argumentsUsed: { n: 1 } }),
    ).toBe('Executed: /x --n 1\n\ndone');
    expect(formatExecutionResult({ ...base, executed: true, output: 'boom' })).toBe('Execution failed: boom');
  });
});

describe('formatSafetyWarnings', () => {
  it('should list the blocking warning first', () => {
    expect(formatSafetyWarnings({ safe: false, warning: 'stop', warnings: ['careful'], checksPerformed: [] })).toBe(
      'Warning: stop\nWarning: careful',
    );
    expect(formatSafetyWarnings({ safe: true, warnings: [], checksPerformed: [] })).toBe('');
  });
});
