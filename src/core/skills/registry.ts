/**
 * Skill Registry
 *
 * Holds loaded skill definitions by name together with an inverted
 * keyword index (lowercased keyword -> skill names).
 */

import type { Skill, SkillLoadError } from '../../types/index.js';
import { SkillLoader } from './loader.js';

export class SkillRegistry {
  private readonly skills: Map<string, Skill> = new Map();
  private readonly keywordIndex: Map<string, string[]> = new Map();
  private loadErrors: SkillLoadError[] = [];

  /**
   * Create a registry from a skills directory
   */
  static async fromDirectory(directory: string): Promise<SkillRegistry> {
    const registry = new SkillRegistry();
    await registry.load(directory);
    return registry;
  }

  /**
   * Create a registry from in-memory skills
   */
  static fromSkills(skills: Skill[]): SkillRegistry {
    const registry = new SkillRegistry();
    for (const skill of skills) {
      registry.add(skill);
    }
    return registry;
  }

  /**
   * Replace the registry contents with the skills found in `directory`.
   * Throws RegistryError if the directory does not exist.
   */
  async load(directory: string): Promise<void> {
    const loader = new SkillLoader(directory);
    const skills = await loader.discoverSkills();

    this.skills.clear();
    this.keywordIndex.clear();
    this.loadErrors = loader.getErrors();

    for (const skill of skills) {
      this.add(skill);
    }
  }

  /**
   * Register a single skill. Returns false if the name is already taken.
   */
  add(skill: Skill): boolean {
    if (this.skills.has(skill.name)) {
      console.warn(`Skill "${skill.name}" already registered, ignoring duplicate`);
      return false;
    }

    this.skills.set(skill.name, skill);
    this.indexKeywords(skill);
    return true;
  }

  get(name: string): Skill | undefined {
    return this.skills.get(name);
  }

  list(): Skill[] {
    return Array.from(this.skills.values());
  }

  get size(): number {
    return this.skills.size;
  }

  /**
   * Skill names registered for a (lowercase) keyword
   */
  lookupKeyword(word: string): readonly string[] {
    return this.keywordIndex.get(word) ?? [];
  }

  getLoadErrors(): SkillLoadError[] {
    return [...this.loadErrors];
  }

  private indexKeywords(skill: Skill): void {
    for (const keyword of skill.intents.keywords) {
      const key = keyword.toLowerCase();
      const names = this.keywordIndex.get(key) ?? [];
      if (!names.includes(skill.name)) {
        names.push(skill.name);
      }
      this.keywordIndex.set(key, names);
    }
  }
}
