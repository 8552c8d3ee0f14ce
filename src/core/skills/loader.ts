/**
 * Skill Loader
 *
 * Discovers and loads skills from a skills directory.
 * Each skill is a directory containing a SKILL.md file.
 *
 * A malformed definition is skipped and recorded; only a missing
 * skills directory aborts the load.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';

import type { Skill, SkillLoadError } from '../../types/index.js';
import { RegistryError, RegistryErrorCode, errorMessage } from '../errors/index.js';
import { parseSkillFile } from './schema.js';

export const SKILL_FILE_NAME = 'SKILL.md';

export class SkillLoader {
  private readonly skillsPath: string;
  private errors: SkillLoadError[] = [];

  constructor(skillsPath: string) {
    this.skillsPath = skillsPath;
  }

  /**
   * Discover all skills in the skills directory, in directory-name order
   */
  async discoverSkills(): Promise<Skill[]> {
    this.errors = [];
    await this.assertDirectory();

    const entries = await readdir(this.skillsPath, { withFileTypes: true });
    const directories = entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();

    const skills: Skill[] = [];
    const loadedNames = new Set<string>();

    for (const dirName of directories) {
      const skill = await this.loadSkill(dirName);
      if (!skill) {
        continue;
      }

      if (loadedNames.has(skill.name)) {
        this.recordError({
          type: 'DUPLICATE_SKILL',
          message: `Skill "${skill.name}" already loaded`,
          filePath: skill.path ?? join(this.skillsPath, dirName),
        });
        continue;
      }

      loadedNames.add(skill.name);
      skills.push(skill);
    }

    return skills;
  }

  /**
   * Load a single skill from a directory
   * Returns null when the directory has no SKILL.md or it fails to parse
   */
  private async loadSkill(dirName: string): Promise<Skill | null> {
    const skillMdPath = join(this.skillsPath, dirName, SKILL_FILE_NAME);

    let markdown: string;
    try {
      const skillMdStat = await stat(skillMdPath);
      if (!skillMdStat.isFile()) {
        return null;
      }
      markdown = await readFile(skillMdPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.recordError({ type: 'IO_ERROR', message: errorMessage(error), filePath: skillMdPath });
      }
      return null;
    }

    const result = parseSkillFile(markdown, skillMdPath);
    if (!result.success) {
      this.recordError({ type: 'PARSE_ERROR', message: result.error, filePath: skillMdPath });
      return null;
    }

    return result.skill;
  }

  private async assertDirectory(): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(this.skillsPath)).isDirectory();
    } catch {
      throw new RegistryError(
        `Skills directory not found: ${this.skillsPath}`,
        RegistryErrorCode.SKILLS_DIR_NOT_FOUND,
        'Create the directory or point --skills-dir at an existing one.',
      );
    }

    if (!isDirectory) {
      throw new RegistryError(
        `Skills path is not a directory: ${this.skillsPath}`,
        RegistryErrorCode.SKILLS_DIR_NOT_DIRECTORY,
      );
    }
  }

  private recordError(error: SkillLoadError): void {
    this.errors.push(error);
    console.warn(`Skipping skill at ${error.filePath}: ${error.message}`);
  }

  /**
   * Get all errors that occurred during the last discovery
   */
  getErrors(): SkillLoadError[] {
    return [...this.errors];
  }
}
