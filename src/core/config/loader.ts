import fs from 'fs/promises';
import path from 'path';
import fse from 'fs-extra';
import { z } from 'zod';
import type { ConfigFile, SettingsConfig, SkillRouterConfig } from './types.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import { DEFAULT_MINIMUM_DISK_MB } from '../skills/schema.js';
import { defaultLearningPath } from '../execution/learner.js';
import { SKILL_ROUTER_DIR_NAME, expandHome, getSkillRouterHome } from '../../utils/index.js';

const CONFIG_FILE_NAME = 'config.json';

export const SKILLS_DIR_ENV = 'SKILL_ROUTER_SKILLS_DIR';
export const LEARNING_PATH_ENV = 'SKILL_ROUTER_LEARNING_PATH';

const configFileSchema = z
  .object({
    skillsDir: z.string().min(1),
    learningPath: z.string().min(1),
    settings: z
      .object({
        dryRun: z.boolean(),
        minimumDiskMb: z.number().min(0),
      })
      .partial(),
  })
  .partial();

/**
 * Load and merge configuration from all sources
 *
 * Loading order (priority):
 * 1. Defaults
 * 2. Global config (~/.skill-router/config.json)
 * 3. Project config (./.skill-router/config.json) - Overrides global
 * 4. Environment (SKILL_ROUTER_SKILLS_DIR, SKILL_ROUTER_LEARNING_PATH)
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<SkillRouterConfig> {
  const cwd = options.cwd || process.cwd();

  let config = getDefaultConfig();

  const globalConfig = await readConfigFile(path.join(getSkillRouterHome(), CONFIG_FILE_NAME));
  if (globalConfig) {
    config = mergeConfigs(config, globalConfig);
  }

  const projectConfigPath = path.join(cwd, SKILL_ROUTER_DIR_NAME, CONFIG_FILE_NAME);
  const projectConfig = await readConfigFile(projectConfigPath);
  if (projectConfig) {
    config = mergeConfigs(config, resolvePaths(projectConfig, cwd));
  }

  const skillsDir = process.env[SKILLS_DIR_ENV];
  const learningPath = process.env[LEARNING_PATH_ENV];
  config = mergeConfigs(config, {
    skillsDir: skillsDir || undefined,
    learningPath: learningPath || undefined,
  });

  return {
    ...config,
    skillsDir: config.skillsDir === undefined ? undefined : expandHome(config.skillsDir),
    learningPath: expandHome(config.learningPath),
  };
}

/**
 * Merge a config file over a configuration
 * - paths: override when set
 * - settings: shallow merge
 */
export function mergeConfigs(base: SkillRouterConfig, override: ConfigFile): SkillRouterConfig {
  return {
    skillsDir: override.skillsDir ?? base.skillsDir,
    learningPath: override.learningPath ?? base.learningPath,
    settings: mergeSettings(base.settings, override.settings),
  };
}

/**
 * Get the default configuration
 */
export function getDefaultConfig(): SkillRouterConfig {
  return {
    learningPath: defaultLearningPath(),
    settings: {
      dryRun: false,
      minimumDiskMb: DEFAULT_MINIMUM_DISK_MB,
    },
  };
}

/**
 * First existing skills directory among the configured one, ./skills and ~/.skill-router/skills
 */
export async function resolveSkillsDir(
  config: SkillRouterConfig,
  cwd: string = process.cwd(),
): Promise<string | undefined> {
  if (config.skillsDir) {
    return path.resolve(cwd, config.skillsDir);
  }

  const candidates = [path.join(cwd, 'skills'), path.join(getSkillRouterHome(), 'skills')];
  for (const candidate of candidates) {
    if (await fse.pathExists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

// Helper functions

async function readConfigFile(filePath: string): Promise<ConfigFile | null> {
  let content: string;
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) return null;

    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(
      `Invalid JSON in config file: ${filePath}`,
      ConfigErrorCode.INVALID_JSON,
      'Check the configuration file syntax.',
    );
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(
      `Invalid config file ${filePath}: ${issues}`,
      ConfigErrorCode.INVALID_SHAPE,
      'Expected { "skillsDir"?: string, "learningPath"?: string, "settings"?: { "dryRun"?: boolean, "minimumDiskMb"?: number } }.',
    );
  }

  return parsed.data;
}

/**
 * Relative paths in a project config are relative to the project root
 */
function resolvePaths(config: ConfigFile, cwd: string): ConfigFile {
  const resolve = (value: string | undefined) =>
    value === undefined || value.startsWith('~') ? value : path.resolve(cwd, value);
  return { ...config, skillsDir: resolve(config.skillsDir), learningPath: resolve(config.learningPath) };
}

function mergeSettings(base: SettingsConfig, override?: Partial<SettingsConfig>): SettingsConfig {
  return {
    dryRun: override?.dryRun ?? base.dryRun,
    minimumDiskMb: override?.minimumDiskMb ?? base.minimumDiskMb,
  };
}
