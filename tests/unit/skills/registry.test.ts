import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { SkillRegistry } from '../../../src/core/skills/registry.js';
import { RegistryError, RegistryErrorCode } from '../../../src/core/errors/index.js';
import { FIXTURES_PATH, skillFrom } from '../../helpers.js';

describe('SkillRegistry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('fromDirectory', () => {
    it('should load valid skills in directory order', async () => {
      const registry = await SkillRegistry.fromDirectory(FIXTURES_PATH);

      expect(registry.list().map((s) => s.name)).toEqual(['cleanup', 'implement', 'troubleshoot']);
      expect(registry.size).toBe(3);
    });

    it('should skip a malformed definition and record the failure', async () => {
      const registry = await SkillRegistry.fromDirectory(FIXTURES_PATH);
      const errors = registry.getLoadErrors();

      expect(errors).toHaveLength(1);
      expect(errors[0]?.type).toBe('PARSE_ERROR');
      expect(errors[0]?.filePath).toBe(join(FIXTURES_PATH, 'broken', 'SKILL.md'));
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('should ignore directories without SKILL.md', async () => {
      const registry = await SkillRegistry.fromDirectory(FIXTURES_PATH);
      expect(registry.get('notes')).toBeUndefined();
    });

    it('should throw when the directory does not exist', async () => {
      const missing = join(FIXTURES_PATH, 'does-not-exist');

      await expect(SkillRegistry.fromDirectory(missing)).rejects.toBeInstanceOf(RegistryError);
      await expect(SkillRegistry.fromDirectory(missing)).rejects.toMatchObject({
        code: RegistryErrorCode.SKILLS_DIR_NOT_FOUND,
      });
    });

    it('should throw when the path is a file', async () => {
      const file = join(FIXTURES_PATH, 'notes', 'README.md');

      await expect(SkillRegistry.fromDirectory(file)).rejects.toMatchObject({
        code: RegistryErrorCode.SKILLS_DIR_NOT_DIRECTORY,
      });
    });
  });

  describe('keyword index', () => {
    it('should map lowercased keywords to skill names', () => {
      const registry = SkillRegistry.fromSkills([
        skillFrom({ name: 'alpha', intents: { keywords: ['Fix', 'bug'] } }),
        skillFrom({ name: 'beta', intents: { keywords: ['fix', 'fix'] } }),
      ]);

      expect(registry.lookupKeyword('fix')).toEqual(['alpha', 'beta']);
      expect(registry.lookupKeyword('bug')).toEqual(['alpha']);
      expect(registry.lookupKeyword('Fix')).toEqual([]);
    });
  });

  describe('add', () => {
    it('should keep the first definition of a name', () => {
      const registry = new SkillRegistry();
      const first = skillFrom({ name: 'same', description: 'first' });

      expect(registry.add(first)).toBe(true);
      expect(registry.add(skillFrom({ name: 'same', description: 'second' }))).toBe(false);
      expect(registry.get('same')).toBe(first);
      expect(console.warn).toHaveBeenCalledWith('Skill "same" already registered, ignoring duplicate');
    });
  });
});
