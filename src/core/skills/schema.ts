/**
 * Skill Schema
 *
 * Declarative SKILL.md frontmatter, validated with zod and normalized
 * into the immutable Skill model. Loading is lenient (defaults fill the
 * gaps); the stricter lint pass lives in validator.ts.
 */

import { z } from 'zod';

import type {
  ArgumentSchema,
  InferSource,
  SafetyCheckSpec,
  Skill,
  SkillParseResult,
} from '../../types/index.js';
import { INFER_SOURCES } from '../../types/index.js';
import { errorMessage } from '../errors/index.js';
import { hasFrontmatter, parseFrontmatter } from '../utils/frontmatter.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.85;
export const DEFAULT_MINIMUM_DISK_MB = 100;

const stringList = () =>
  z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []);

const argumentValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const argumentSchema = z.object({
  name: z.string().min(1),
  type: z
    .enum(['string', 'enum', 'int', 'bool', 'path'])
    .nullish()
    .transform((value) => value ?? 'string'),
  required: z.boolean().nullish(),
  description: z.string().nullish(),
  default: argumentValueSchema.nullish(),
  values: z.array(z.union([z.string(), z.number()]).transform((value) => String(value))).nullish(),
  infer_from: z.union([z.string(), z.array(z.string())]).nullish(),
});

const intentsSchema = z.object({
  primary: stringList(),
  keywords: stringList(),
  patterns: stringList(),
  contexts: stringList(),
});

const autoTriggerSchema = z.object({
  enabled: z.boolean().nullish(),
  confidence_threshold: z.number().min(0).max(1).nullish(),
  confirm_before_execution: z.boolean().nullish(),
  safety_checks: z.array(z.unknown()).nullish(),
});

export const skillFrontmatterSchema = z.object({
  name: z.string().min(1),
  display_name: z.string().nullish(),
  description: z.string().nullish(),
  version: z.union([z.string(), z.number()]).nullish(),
  category: z.string().nullish(),
  complexity: z.string().nullish(),
  intents: intentsSchema.nullish(),
  arguments: z.array(argumentSchema).nullish(),
  auto_trigger: autoTriggerSchema.nullish(),
  mcp_servers: stringList(),
  personas: stringList(),
  author: z.string().nullish(),
  tags: stringList(),
});

export type SkillFrontmatter = z.infer<typeof skillFrontmatterSchema>;

const rawCheckSchema = z
  .object({
    check: z.string(),
    message: z.string().optional(),
  })
  .passthrough();

/**
 * Normalize one declared safety check into the closed check union.
 * Entries that are not `{ check: ... }` objects are dropped.
 */
export function toSafetyCheck(raw: unknown): SafetyCheckSpec | undefined {
  const parsed = rawCheckSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }

  const { check, message, ...params } = parsed.data;

  switch (check) {
    case 'git_branch':
      return {
        checkType: 'git_branch',
        allowed: z.array(z.string()).catch([]).parse(params.allowed),
        message,
      };
    case 'disk_space':
      return {
        checkType: 'disk_space',
        minimumMb: z.number().catch(DEFAULT_MINIMUM_DISK_MB).parse(params.minimum_mb),
        message,
      };
    case 'no_conflicts':
      return {
        checkType: 'no_conflicts',
        files: z.array(z.string()).catch([]).parse(params.files),
        message,
      };
    default:
      return { checkType: 'unknown', name: check, params, message };
  }
}

function isInferSource(value: string): value is InferSource {
  return INFER_SOURCES.some((source) => source === value);
}

function toInferSources(raw: string | string[] | null | undefined): InferSource[] {
  if (raw == null) {
    return [];
  }
  const list = Array.isArray(raw) ? raw : [raw];
  return list.filter(isInferSource);
}

/**
 * Build a Skill from already-parsed frontmatter data
 */
export function buildSkill(
  data: Record<string, unknown>,
  content = '',
  path?: string,
): SkillParseResult {
  const parsed = skillFrontmatterSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: issues };
  }

  const fm = parsed.data;

  const args: ArgumentSchema[] = (fm.arguments ?? []).map((arg) => ({
    name: arg.name,
    type: arg.type,
    required: arg.required ?? false,
    description: arg.description ?? '',
    default: arg.default ?? undefined,
    values: arg.values ?? undefined,
    inferFrom: toInferSources(arg.infer_from),
  }));

  const argNames = new Set<string>();
  for (const arg of args) {
    if (argNames.has(arg.name)) {
      return { success: false, error: `Duplicate argument name: ${arg.name}` };
    }
    argNames.add(arg.name);
  }

  const safetyChecks = (fm.auto_trigger?.safety_checks ?? [])
    .map(toSafetyCheck)
    .filter((check): check is SafetyCheckSpec => check !== undefined);

  const skill: Skill = {
    name: fm.name,
    displayName: fm.display_name ?? fm.name,
    description: fm.description ?? '',
    version: fm.version == null ? '1.0.0' : String(fm.version),
    category: fm.category ?? 'utility',
    complexity: fm.complexity ?? 'standard',
    intents: fm.intents ?? { primary: [], keywords: [], patterns: [], contexts: [] },
    arguments: args,
    autoTrigger: {
      enabled: fm.auto_trigger?.enabled ?? false,
      confidenceThreshold: fm.auto_trigger?.confidence_threshold ?? DEFAULT_CONFIDENCE_THRESHOLD,
      confirmBeforeExecution: fm.auto_trigger?.confirm_before_execution ?? true,
      safetyChecks,
    },
    mcpServers: fm.mcp_servers,
    personas: fm.personas,
    author: fm.author ?? '',
    tags: fm.tags,
    path,
    content,
  };

  return { success: true, skill: Object.freeze(skill) };
}

/**
 * Parse a SKILL.md document into a Skill
 */
export function parseSkillFile(markdown: string, filePath?: string): SkillParseResult {
  if (!hasFrontmatter(markdown)) {
    return { success: false, error: 'Missing YAML frontmatter' };
  }

  try {
    const { frontmatter, content } = parseFrontmatter(markdown);
    return buildSkill(frontmatter, content, filePath);
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}
