/**
 * Skill Metadata Validator
 *
 * Lint pass over SKILL.md frontmatter. Unlike loading, which fills in
 * defaults, this reports every missing or malformed field as an error
 * or warning. Never throws.
 */

import { readFile } from 'fs/promises';

import type { ValidationIssue, ValidationResult } from '../../types/index.js';
import { INFER_SOURCES } from '../../types/index.js';
import { errorMessage } from '../errors/index.js';
import { compilePattern } from '../intent/template.js';
import { hasFrontmatter, isRecord, parseFrontmatter } from '../utils/frontmatter.js';

export const VALID_CATEGORIES = ['workflow', 'utility', 'research', 'special', 'orchestration'];
export const VALID_COMPLEXITIES = ['basic', 'standard', 'enhanced', 'advanced', 'high'];
export const VALID_ARGUMENT_TYPES = ['string', 'enum', 'int', 'bool', 'path'];

const REQUIRED_BASIC_FIELDS = ['name', 'display_name', 'description', 'version', 'category', 'complexity'];
const REQUIRED_INTENT_FIELDS = ['primary', 'keywords', 'patterns'];
const REQUIRED_ARGUMENT_FIELDS = ['name', 'type', 'required', 'description', 'infer_from'];
const REQUIRED_AUTO_TRIGGER_FIELDS = ['enabled', 'confidence_threshold', 'confirm_before_execution'];
const LIST_FIELDS: Array<[field: string, what: string]> = [
  ['mcp_servers', 'server names'],
  ['personas', 'persona names'],
  ['requires_skills', 'skill names'],
  ['optional_skills', 'skill names'],
];

const KEBAB_CASE = /^[a-z0-9]+(-[a-z0-9]+)*$/;
const SNAKE_CASE = /^[a-z_][a-z0-9_]*$/;
const SEMVER = /^\d+\.\d+\.\d+$/;

const MAX_DESCRIPTION_LENGTH = 100;
const LOW_THRESHOLD = 0.7;

class IssueCollector {
  readonly errors: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];

  error(field: string, message: string, suggestion?: string): void {
    this.errors.push({ field, message, severity: 'error', suggestion });
  }

  warn(field: string, message: string, suggestion?: string): void {
    this.warnings.push({ field, message, severity: 'warning', suggestion });
  }

  result(skillName: string): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      skillName,
    };
  }
}

export class SkillValidator {
  async validateFile(filePath: string): Promise<ValidationResult> {
    let markdown: string;
    try {
      markdown = await readFile(filePath, 'utf-8');
    } catch (error) {
      const issues = new IssueCollector();
      issues.error('file', `Cannot read ${filePath}: ${errorMessage(error)}`);
      return issues.result(filePath);
    }

    let frontmatter: Record<string, unknown> | null = null;
    if (hasFrontmatter(markdown)) {
      try {
        frontmatter = parseFrontmatter(markdown).frontmatter;
      } catch {
        frontmatter = null;
      }
    }

    if (!frontmatter) {
      const issues = new IssueCollector();
      issues.error(
        'frontmatter',
        'Failed to parse YAML frontmatter',
        "Check YAML syntax, ensure it starts with '---'",
      );
      return issues.result(filePath);
    }

    return this.validateFrontmatter(frontmatter, filePath);
  }

  validateFrontmatter(data: Record<string, unknown>, fallbackName = '(unnamed)'): ValidationResult {
    const issues = new IssueCollector();

    this.validateBasicInfo(data, issues);
    this.validateIntents(data, issues);
    this.validateArguments(data, issues);
    this.validateAutoTrigger(data, issues);
    this.validateLists(data, issues);

    return issues.result(typeof data.name === 'string' ? data.name : fallbackName);
  }

  private validateBasicInfo(data: Record<string, unknown>, issues: IssueCollector): void {
    for (const field of REQUIRED_BASIC_FIELDS) {
      if (!(field in data)) {
        issues.error(field, `Required field '${field}' is missing`, `Add '${field}:' to frontmatter`);
      }
    }

    if ('name' in data) {
      const name = String(data.name);
      if (!KEBAB_CASE.test(name)) {
        issues.error(
          'name',
          `Name '${name}' must be kebab-case`,
          "Use lowercase letters, numbers, and hyphens (e.g., 'my-skill')",
        );
      }
      if (name.length < 2 || name.length > 30) {
        issues.error('name', `Name length must be 2-30 characters (got ${name.length})`);
      }
    }

    if ('version' in data && !SEMVER.test(String(data.version))) {
      issues.error(
        'version',
        `Version '${String(data.version)}' must follow semantic versioning (X.Y.Z)`,
        "Use format like '1.0.0'",
      );
    }

    if ('category' in data && !VALID_CATEGORIES.includes(String(data.category))) {
      issues.error(
        'category',
        `Invalid category '${String(data.category)}'`,
        `Must be one of: ${VALID_CATEGORIES.join(', ')}`,
      );
    }

    if ('complexity' in data && !VALID_COMPLEXITIES.includes(String(data.complexity))) {
      issues.error(
        'complexity',
        `Invalid complexity '${String(data.complexity)}'`,
        `Must be one of: ${VALID_COMPLEXITIES.join(', ')}`,
      );
    }

    if (typeof data.description === 'string' && data.description.length > MAX_DESCRIPTION_LENGTH) {
      issues.warn(
        'description',
        `Description is ${data.description.length} chars (recommended <${MAX_DESCRIPTION_LENGTH})`,
        'Keep description concise',
      );
    }
  }

  private validateIntents(data: Record<string, unknown>, issues: IssueCollector): void {
    const intents = data.intents;
    if (!isRecord(intents)) {
      issues.error(
        'intents',
        "Required section 'intents' is missing",
        "Add 'intents:' with primary, keywords, patterns",
      );
      return;
    }

    for (const field of REQUIRED_INTENT_FIELDS) {
      if (!(field in intents)) {
        issues.error(`intents.${field}`, `Required field 'intents.${field}' is missing`);
      }
    }

    if ('primary' in intents) {
      const primary = intents.primary;
      if (!Array.isArray(primary) || primary.length === 0) {
        issues.error('intents.primary', 'Must be a non-empty array', 'Add at least one primary intent pattern');
      } else {
        for (const template of primary) {
          if (!String(template).includes('{')) {
            issues.warn(
              'intents.primary',
              `Pattern '${String(template)}' has no {param} placeholder`,
              'Use {param} to mark extractable parts',
            );
          }
        }
      }
    }

    if ('keywords' in intents) {
      const keywords = intents.keywords;
      if (!Array.isArray(keywords) || keywords.length < 2) {
        issues.error('intents.keywords', 'Must have at least 2 keywords');
      }
    }

    if ('patterns' in intents) {
      const patterns = intents.patterns;
      if (!Array.isArray(patterns) || patterns.length === 0) {
        issues.error('intents.patterns', 'Must be a non-empty array');
      } else {
        for (const pattern of patterns.map(String)) {
          if (!compilePattern(pattern)) {
            issues.error('intents.patterns', `Invalid regex '${pattern}'`);
          }
          if (!pattern.includes('(?<') && !pattern.includes('(?P<')) {
            issues.warn(
              'intents.patterns',
              `Pattern '${pattern}' has no named groups`,
              'Use (?<name>...) for argument extraction',
            );
          }
        }
      }
    }
  }

  private validateArguments(data: Record<string, unknown>, issues: IssueCollector): void {
    if (!('arguments' in data) || data.arguments == null) {
      return;
    }

    const args = data.arguments;
    if (!Array.isArray(args)) {
      issues.error('arguments', 'Must be an array of argument objects');
      return;
    }

    args.forEach((arg: unknown, index) => {
      if (!isRecord(arg)) {
        issues.error(`arguments[${index}]`, 'Must be an object');
        return;
      }

      const argName = typeof arg.name === 'string' ? arg.name : `[${index}]`;
      const field = (name: string) => `arguments.${argName}.${name}`;

      for (const required of REQUIRED_ARGUMENT_FIELDS) {
        if (!(required in arg)) {
          issues.error(field(required), `Required field '${required}' is missing`);
        }
      }

      if ('name' in arg && !SNAKE_CASE.test(String(arg.name))) {
        issues.error(field('name'), `Name '${String(arg.name)}' must be snake_case`);
      }

      if ('type' in arg) {
        const type = String(arg.type);
        if (!VALID_ARGUMENT_TYPES.includes(type)) {
          issues.error(
            field('type'),
            `Invalid type '${type}'`,
            `Must be one of: ${VALID_ARGUMENT_TYPES.join(', ')}`,
          );
        }
        if (type === 'enum' && !('values' in arg)) {
          issues.error(field('values'), "Enum type requires 'values' field", "Add 'values: [opt1, opt2, ...]'");
        }
      }

      if ('infer_from' in arg) {
        const sources: unknown[] = Array.isArray(arg.infer_from) ? arg.infer_from : [arg.infer_from];
        for (const source of sources) {
          if (!INFER_SOURCES.some((known) => known === source)) {
            issues.error(
              field('infer_from'),
              `Invalid inference source '${String(source)}'`,
              `Must be one of: ${INFER_SOURCES.join(', ')}`,
            );
          }
        }
      }

      if ('required' in arg) {
        if (typeof arg.required !== 'boolean') {
          issues.error(field('required'), 'Must be boolean (true/false)');
        }
        if (!arg.required && !('default' in arg)) {
          issues.warn(field('default'), 'Non-required argument should have a default value');
        }
      }
    });
  }

  private validateAutoTrigger(data: Record<string, unknown>, issues: IssueCollector): void {
    const autoTrigger = data.auto_trigger;
    if (!isRecord(autoTrigger)) {
      issues.error('auto_trigger', "Required section 'auto_trigger' is missing");
      return;
    }

    for (const field of REQUIRED_AUTO_TRIGGER_FIELDS) {
      if (!(field in autoTrigger)) {
        issues.error(`auto_trigger.${field}`, `Required field '${field}' is missing`);
      }
    }

    if ('enabled' in autoTrigger && typeof autoTrigger.enabled !== 'boolean') {
      issues.error('auto_trigger.enabled', 'Must be boolean (true/false)');
    }

    if ('confidence_threshold' in autoTrigger) {
      const threshold = autoTrigger.confidence_threshold;
      if (typeof threshold !== 'number') {
        issues.error('auto_trigger.confidence_threshold', 'Must be a number');
      } else if (threshold < 0 || threshold > 1) {
        issues.error('auto_trigger.confidence_threshold', `Must be between 0.0 and 1.0 (got ${threshold})`);
      } else if (threshold < LOW_THRESHOLD) {
        issues.warn(
          'auto_trigger.confidence_threshold',
          `Threshold ${threshold} is very low (recommended >=0.85)`,
        );
      }
    }

    if ('confirm_before_execution' in autoTrigger) {
      const confirm = autoTrigger.confirm_before_execution;
      if (typeof confirm !== 'boolean') {
        issues.error('auto_trigger.confirm_before_execution', 'Must be boolean (true/false)');
      } else if (!confirm) {
        issues.warn(
          'auto_trigger.confirm_before_execution',
          'Auto-execution without confirmation is dangerous',
          "Consider setting to 'true'",
        );
      }
    }
  }

  private validateLists(data: Record<string, unknown>, issues: IssueCollector): void {
    for (const [field, what] of LIST_FIELDS) {
      if (field in data && !Array.isArray(data[field])) {
        issues.error(field, `Must be an array of ${what}`);
      }
    }
  }
}

export function formatValidationResult(result: ValidationResult): string {
  const lines = [`Validation result for '${result.skillName}':`, result.valid ? 'VALID' : 'INVALID'];

  const section = (title: string, findings: ValidationIssue[], marker: string) => {
    if (findings.length === 0) return;
    lines.push('', `${title} (${findings.length}):`);
    for (const finding of findings) {
      lines.push(`  ${marker} ${finding.field}: ${finding.message}`);
      if (finding.suggestion) {
        lines.push(`     hint: ${finding.suggestion}`);
      }
    }
  };

  section('Errors', result.errors, 'x');
  section('Warnings', result.warnings, '!');

  return lines.join('\n');
}
