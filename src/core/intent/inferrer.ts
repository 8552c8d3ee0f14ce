/**
 * ArgumentInferrer
 *
 * Fills a skill's declared arguments from ranked sources. For each
 * argument the `inferFrom` list is walked in declared order and the first
 * source yielding a value wins; otherwise the schema default applies.
 */

import type {
  ArgumentSchema,
  ArgumentType,
  ArgumentValue,
  GitInfo,
  InferSource,
  ProjectContext,
  Skill,
  SkillArguments,
} from '../../types/index.js';
import { escapeRegExp, templateToRegExp } from './template.js';

const POSITIVE_CUES = ['yes', 'true', 'enable', 'on'];
const NEGATIVE_CUES = ['no', 'false', 'disable', 'off'];
const TRUTHY_VALUES = ['true', 'yes', '1', 'on', 'enable'];

const PATH_ARGUMENTS = ['target', 'path', 'file', 'directory'];
const CHANGE_ARGUMENTS = ['changes', 'uncommitted', 'dirty'];
const COMMIT_ARGUMENTS = ['message', 'commit'];

const LANGUAGE_BY_PROJECT_TYPE: Partial<Record<string, string>> = {
  python: 'python',
  typescript: 'typescript',
  javascript: 'javascript',
  mixed: 'typescript',
};

/**
 * Cast an extracted string to the argument's declared type.
 * Unparseable or unsafe integers fall back to the trimmed raw string.
 */
export function castValue(raw: string, type: ArgumentType): ArgumentValue {
  const value = raw.trim();

  switch (type) {
    case 'int': {
      const parsed = /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
      return Number.isSafeInteger(parsed) ? parsed : value;
    }
    case 'bool':
      return TRUTHY_VALUES.includes(value.toLowerCase());
    case 'string':
    case 'path':
    case 'enum':
      return value;
  }
}

export class ArgumentInferrer {
  infer(query: string, skill: Skill, context: ProjectContext): SkillArguments {
    const args: SkillArguments = {};

    for (const arg of skill.arguments) {
      const value = this.resolve(query, arg, skill, context);
      if (value !== undefined) {
        args[arg.name] = value;
      } else if (arg.default !== undefined) {
        args[arg.name] = arg.default;
      }
    }

    return args;
  }

  private resolve(
    query: string,
    arg: ArgumentSchema,
    skill: Skill,
    context: ProjectContext,
  ): ArgumentValue | undefined {
    for (const source of arg.inferFrom) {
      const value = this.fromSource(source, query, arg, skill, context);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  private fromSource(
    source: InferSource,
    query: string,
    arg: ArgumentSchema,
    skill: Skill,
    context: ProjectContext,
  ): ArgumentValue | undefined {
    switch (source) {
      case 'user_query':
        return this.fromQuery(query, arg, skill);
      case 'project_context':
        return this.fromContext(context, arg);
      case 'git_history':
        return this.fromGit(context.git, arg);
      case 'learning':
        return this.fromLearning(skill, arg);
      default: {
        const unreachable: never = source;
        return unreachable;
      }
    }
  }

  /**
   * Strategies, first hit wins:
   * 1. `--name value` flag (bool args: presence alone)
   * 2. yes/no style cue words for bool args
   * 3. the `{name}` placeholder of a primary template
   * 4. a declared enum value mentioned in the query
   */
  fromQuery(query: string, arg: ArgumentSchema, skill: Skill): ArgumentValue | undefined {
    const flag = new RegExp(`--${escapeRegExp(arg.name)}(?![\\w-])(?:\\s+([^\\s-]+))?`).exec(query);
    if (flag) {
      if (arg.type === 'bool') {
        return true;
      }
      if (flag[1]) {
        return castValue(flag[1], arg.type);
      }
    }

    const lowered = query.toLowerCase();

    if (arg.type === 'bool') {
      const words = new Set(lowered.split(/[^\w]+/).filter(Boolean));
      if (POSITIVE_CUES.some((cue) => words.has(cue))) {
        return true;
      }
      if (NEGATIVE_CUES.some((cue) => words.has(cue))) {
        return false;
      }
    }

    const placeholder = `{${arg.name}}`;
    for (const template of skill.intents.primary) {
      if (!template.includes(placeholder)) {
        continue;
      }
      const captured = templateToRegExp(template, arg.name, 'i')?.exec(query)?.groups?.[arg.name];
      if (captured !== undefined) {
        return castValue(captured, arg.type);
      }
    }

    if (arg.type === 'enum' && arg.values) {
      return arg.values.find((value) => lowered.includes(value.toLowerCase()));
    }

    return undefined;
  }

  fromContext(context: ProjectContext, arg: ArgumentSchema): ArgumentValue | undefined {
    if (PATH_ARGUMENTS.includes(arg.name)) {
      return context.structure.sourceDirs[0] ?? context.structure.rootDir;
    }

    if (arg.name === 'type' && arg.type === 'enum' && arg.values?.includes(context.projectType)) {
      return context.projectType;
    }

    if (arg.name === 'framework' && context.testing.framework) {
      return context.testing.framework;
    }

    if (arg.name === 'language' || arg.name === 'platform') {
      return LANGUAGE_BY_PROJECT_TYPE[context.projectType];
    }

    return undefined;
  }

  fromGit(git: GitInfo, arg: ArgumentSchema): ArgumentValue | undefined {
    if (!git.hasRepo) {
      return undefined;
    }

    if (arg.name === 'branch') {
      return git.currentBranch || undefined;
    }

    if (CHANGE_ARGUMENTS.includes(arg.name) && arg.type === 'bool') {
      return git.uncommittedChanges > 0;
    }

    if (COMMIT_ARGUMENTS.includes(arg.name)) {
      return git.recentCommits[0]?.message || undefined;
    }

    return undefined;
  }

  /**
   * Extension point for values learned from past executions.
   * Yields nothing for now; LearningStore.getCommonArgument holds the data.
   */
  protected fromLearning(_skill: Skill, _arg: ArgumentSchema): ArgumentValue | undefined {
    return undefined;
  }
}
