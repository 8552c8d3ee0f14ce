import type { SkillExecutor } from '../types/index.js';
import { RegistryError, RegistryErrorCode } from './errors/index.js';
import { loadConfig, resolveSkillsDir } from './config/loader.js';
import type { SkillRouterConfig } from './config/types.js';
import { SkillRegistry } from './skills/registry.js';
import { IntentMatcher } from './intent/matcher.js';
import { ContextAnalyzer } from './intent/analyzer.js';
import { LearningStore } from './execution/learner.js';
import { SafetyValidator } from './execution/validator.js';
import { ExecutionRouter } from './execution/router.js';

export interface SkillRouterOptions {
  cwd?: string;
  /** Overrides the configured skills directory */
  skillsDir?: string;
  /** Overrides the configured learning file */
  learningPath?: string;
  executor?: SkillExecutor;
}

/**
 * Wire registry, matcher, validator, learning store and router from config.
 * The learning store also feeds recently used skills into context analysis.
 */
export async function createSkillRouter(
  options: SkillRouterOptions = {},
): Promise<{ router: ExecutionRouter; registry: SkillRegistry; config: SkillRouterConfig }> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig({ cwd });

  const skillsDir = await resolveSkillsDir(
    { ...config, skillsDir: options.skillsDir ?? config.skillsDir },
    cwd,
  );
  if (!skillsDir) {
    throw new RegistryError(
      'No skills directory found',
      RegistryErrorCode.SKILLS_DIR_NOT_FOUND,
      'Create ./skills, ~/.skill-router/skills, or pass --skills-dir.',
    );
  }

  const registry = await SkillRegistry.fromDirectory(skillsDir);
  const learner = new LearningStore(options.learningPath ?? config.learningPath);
  const matcher = new IntentMatcher(registry, {
    contextProvider: new ContextAnalyzer({ rootDir: cwd, recentSkills: () => learner.getRecent() }),
  });
  const router = new ExecutionRouter(matcher, {
    learner,
    validator: new SafetyValidator({ minimumDiskMb: config.settings.minimumDiskMb }),
    executor: options.executor,
  });

  return { router, registry, config: { ...config, skillsDir } };
}
