/**
 * Public API
 */

export * from '../types/index.js';
export { ConfigError, ConfigErrorCode, RegistryError, RegistryErrorCode } from './errors/index.js';
export { loadConfig, resolveSkillsDir, getDefaultConfig } from './config/loader.js';
export type { SkillRouterConfig, SettingsConfig } from './config/types.js';
export { SkillRegistry } from './skills/registry.js';
export { SkillLoader, SKILL_FILE_NAME } from './skills/loader.js';
export { buildSkill, parseSkillFile } from './skills/schema.js';
export { SkillValidator, formatValidationResult } from './skills/validator.js';
export { IntentMatcher } from './intent/matcher.js';
export type { IntentMatcherOptions } from './intent/matcher.js';
export { ArgumentInferrer, castValue } from './intent/inferrer.js';
export { ContextAnalyzer } from './intent/analyzer.js';
export { createProjectContext } from './intent/context.js';
export type { ProjectContextInit } from './intent/context.js';
export {
  formatCommand,
  formatSuggestions,
  formatExecutionResult,
  formatSafetyWarnings,
  isAutoExecutable,
} from './intent/format.js';
export { SafetyValidator, matchesBranchPattern } from './execution/validator.js';
export type { SafetyValidatorOptions } from './execution/validator.js';
export { LearningStore } from './execution/learner.js';
export { SimulatedSkillExecutor } from './execution/executor.js';
export { ExecutionRouter } from './execution/router.js';
export type { ExecuteOptions, ExecutionRouterOptions } from './execution/router.js';
export { createSkillRouter } from './factory.js';
export type { SkillRouterOptions } from './factory.js';
