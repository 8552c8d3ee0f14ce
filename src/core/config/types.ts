/**
 * Skill Router Config Types
 */

/**
 * General settings
 */
export interface SettingsConfig {
  /** Preview matches without executing */
  dryRun: boolean;

  /** Free space required by the built-in disk check, in MB */
  minimumDiskMb: number;
}

/**
 * Main configuration, after merging every source
 */
export interface SkillRouterConfig {
  /** Skills directory; auto-detected when unset */
  skillsDir?: string;

  /** Learning data file */
  learningPath: string;

  settings: SettingsConfig;
}

/**
 * Shape of a single config.json file; every field is optional
 */
export interface ConfigFile {
  skillsDir?: string;
  learningPath?: string;
  settings?: Partial<SettingsConfig>;
}
