import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { SkillValidator, formatValidationResult } from '../../../src/core/skills/validator.js';
import { FIXTURES_PATH } from '../../helpers.js';

function validFrontmatter(): Record<string, unknown> {
  return {
    name: 'code-review',
    display_name: 'Code Review',
    description: 'Review code for defects',
    version: '1.0.0',
    category: 'utility',
    complexity: 'standard',
    intents: {
      primary: ['review {target}'],
      keywords: ['review', 'audit'],
      patterns: ['review (?P<target>\\S+)'],
    },
    arguments: [
      { name: 'target', type: 'path', required: true, description: 'What to review', infer_from: ['user_query'] },
    ],
    auto_trigger: { enabled: true, confidence_threshold: 0.85, confirm_before_execution: true },
  };
}

describe('SkillValidator', () => {
  const validator = new SkillValidator();

  describe('validateFrontmatter', () => {
    it('should accept a complete definition without findings', () => {
      const result = validator.validateFrontmatter(validFrontmatter());

      expect(result).toEqual({ valid: true, errors: [], warnings: [], skillName: 'code-review' });
    });

    it('should report missing basic fields', () => {
      const data = validFrontmatter();
      delete data.display_name;

      const result = validator.validateFrontmatter(data);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          field: 'display_name',
          message: "Required field 'display_name' is missing",
          severity: 'error',
          suggestion: "Add 'display_name:' to frontmatter",
        },
      ]);
    });

    it('should check name, version, category and complexity formats', () => {
      const result = validator.validateFrontmatter({
        ...validFrontmatter(),
        name: 'Code_Review',
        version: '1.0',
        category: 'misc',
        complexity: 'extreme',
      });

      expect(result.errors.map((e) => e.field)).toEqual(['name', 'version', 'category', 'complexity']);
      expect(result.errors[0]?.message).toBe("Name 'Code_Review' must be kebab-case");
      expect(result.skillName).toBe('Code_Review');
    });

    it('should check name length', () => {
      const result = validator.validateFrontmatter({ ...validFrontmatter(), name: 'x' });
      expect(result.errors.map((e) => e.message)).toEqual(['Name length must be 2-30 characters (got 1)']);
    });

    it('should validate intents', () => {
      const result = validator.validateFrontmatter({
        ...validFrontmatter(),
        intents: { primary: ['review code'], keywords: ['review'], patterns: ['(unclosed'] },
      });

      expect(result.errors.map((e) => e.message)).toEqual([
        'Must have at least 2 keywords',
        "Invalid regex '(unclosed'",
      ]);
      expect(result.warnings.map((w) => w.message)).toEqual([
        "Pattern 'review code' has no {param} placeholder",
        "Pattern '(unclosed' has no named groups",
      ]);
    });

    it('should report a missing intents section', () => {
      const data = validFrontmatter();
      delete data.intents;

      const result = validator.validateFrontmatter(data);
      expect(result.errors.map((e) => e.field)).toEqual(['intents']);
    });

    it('should validate argument definitions', () => {
      const result = validator.validateFrontmatter({
        ...validFrontmatter(),
        arguments: [
          { name: 'Target', type: 'enum', required: 'yes', description: 'd', infer_from: 'magic' },
          { name: 'depth', type: 'int', required: false, description: 'd', infer_from: ['user_query'] },
          'not-an-object',
        ],
      });

      expect(result.errors.map((e) => e.field)).toEqual([
        'arguments.Target.name',
        'arguments.Target.values',
        'arguments.Target.infer_from',
        'arguments.Target.required',
        'arguments[2]',
      ]);
      expect(result.warnings).toEqual([
        {
          field: 'arguments.depth.default',
          message: 'Non-required argument should have a default value',
          severity: 'warning',
          suggestion: undefined,
        },
      ]);
    });

    it('should validate auto_trigger', () => {
      const tooHigh = validator.validateFrontmatter({
        ...validFrontmatter(),
        auto_trigger: { enabled: 'yes', confidence_threshold: 1.5, confirm_before_execution: true },
      });
      expect(tooHigh.errors.map((e) => e.message)).toEqual([
        'Must be boolean (true/false)',
        'Must be between 0.0 and 1.0 (got 1.5)',
      ]);

      const risky = validator.validateFrontmatter({
        ...validFrontmatter(),
        auto_trigger: { enabled: true, confidence_threshold: 0.5, confirm_before_execution: false },
      });
      expect(risky.valid).toBe(true);
      expect(risky.warnings.map((w) => w.field)).toEqual([
        'auto_trigger.confidence_threshold',
        'auto_trigger.confirm_before_execution',
      ]);
    });

    it('should require list-valued dependency fields', () => {
      const result = validator.validateFrontmatter({ ...validFrontmatter(), mcp_servers: 'context7' });
      expect(result.errors).toEqual([
        { field: 'mcp_servers', message: 'Must be an array of server names', severity: 'error', suggestion: undefined },
      ]);
    });
  });

  describe('validateFile', () => {
    it('should validate a fixture skill', async () => {
      const result = await validator.validateFile(join(FIXTURES_PATH, 'troubleshoot', 'SKILL.md'));

      expect(result.valid).toBe(true);
      expect(result.skillName).toBe('troubleshoot');
      expect(result.warnings.map((w) => w.field)).toEqual(['auto_trigger.confirm_before_execution']);
    });

    it('should report unparseable frontmatter', async () => {
      const file = join(FIXTURES_PATH, 'broken', 'SKILL.md');
      const result = await validator.validateFile(file);

      expect(result.valid).toBe(false);
      expect(result.skillName).toBe(file);
      expect(result.errors[0]?.field).toBe('frontmatter');
    });

    it('should report a missing file', async () => {
      const result = await validator.validateFile(join(FIXTURES_PATH, 'missing', 'SKILL.md'));

      expect(result.valid).toBe(false);
      expect(result.errors[0]?.field).toBe('file');
    });
  });

  describe('formatValidationResult', () => {
    it('should render errors with hints', () => {
      const output = formatValidationResult({
        valid: false,
        skillName: 'demo',
        errors: [{ field: 'version', message: 'bad version', severity: 'error', suggestion: "Use format like '1.0.0'" }],
        warnings: [],
      });

      expect(output).toBe(
        [
          "Validation result for 'demo':",
          'INVALID',
          '',
          'Errors (1):',
          '  x version: bad version',
          "     hint: Use format like '1.0.0'",
        ].join('\n'),
      );
    });
  });
});
