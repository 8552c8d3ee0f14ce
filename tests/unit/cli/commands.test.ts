import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  handleList,
  handleQuery,
  handleResetLearning,
  handleStats,
  handleValidate,
} from '../../../src/cli/commands.js';
import { LEARNING_PATH_ENV, SKILLS_DIR_ENV } from '../../../src/core/config/loader.js';
import { FIXTURES_PATH } from '../../helpers.js';

const fixture = (name: string) => path.join(FIXTURES_PATH, name, 'SKILL.md');

describe('CLI commands', () => {
  describe('handleValidate', () => {
    it('should pass a clean definition', async () => {
      const result = await handleValidate([fixture('implement')]);

      expect(result.success).toBe(true);
      expect(result.output).toContain("Validation result for 'implement':\nVALID");
      expect(result.output).toContain('All skills valid');
    });

    it('should fail an unparseable definition', async () => {
      const result = await handleValidate([fixture('implement'), fixture('broken')]);

      expect(result.success).toBe(false);
      expect(result.output).toContain('  x frontmatter: Failed to parse YAML frontmatter');
      expect(result.output).toContain('Validation failed');
    });

    it('should fail on warnings only in strict mode', async () => {
      const lenient = await handleValidate([fixture('troubleshoot')]);
      const strict = await handleValidate([fixture('troubleshoot')], { strict: true });

      expect(lenient.success).toBe(true);
      expect(lenient.output).toContain(
        '  ! auto_trigger.confirm_before_execution: Auto-execution without confirmation is dangerous',
      );
      expect(strict.success).toBe(false);
    });
  });

  describe('router commands', () => {
    let tmpDir: string;
    let cwd: string;
    let learningPath: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-test-'));
      cwd = path.join(tmpDir, 'project');
      learningPath = path.join(tmpDir, 'learning.json');
      await fs.mkdir(cwd);
      await fs.mkdir(path.join(tmpDir, 'home'));
      vi.spyOn(os, 'homedir').mockReturnValue(path.join(tmpDir, 'home'));
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      vi.stubEnv(SKILLS_DIR_ENV, '');
      vi.stubEnv(LEARNING_PATH_ENV, '');
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should execute a confident query', async () => {
      const result = await handleQuery('troubleshoot the login bug', { cwd, skillsDir: FIXTURES_PATH, learningPath });

      expect(result.success).toBe(true);
      expect(result.output).toContain('Executed: /troubleshoot --issue "the login bug"');
      expect(result.output).toContain('Execution completed successfully');
    });

    it('should print the raw result as JSON', async () => {
      const result = await handleQuery('troubleshoot the login bug', {
        cwd,
        skillsDir: FIXTURES_PATH,
        learningPath,
        json: true,
      });

      expect(JSON.parse(result.output)).toMatchObject({
        executed: true,
        success: true,
        skillUsed: 'troubleshoot',
        argumentsUsed: { issue: 'the login bug' },
      });
    });

    it('should preview on a dry run', async () => {
      const result = await handleQuery('troubleshoot the login bug', {
        cwd,
        skillsDir: FIXTURES_PATH,
        learningPath,
        dryRun: true,
      });

      expect(result.output).toContain('[DRY RUN] Would execute: /troubleshoot --issue "the login bug"');
    });

    it('should report a missing skills directory with a hint', async () => {
      const result = await handleQuery('anything', { cwd, learningPath });

      expect(result.success).toBe(false);
      expect(result.output).toContain('Error: No skills directory found');
      expect(result.output).toContain('Create ./skills, ~/.skill-router/skills, or pass --skills-dir.');
    });

    it('should list loaded skills and skipped definitions', async () => {
      const result = await handleList({ cwd, skillsDir: FIXTURES_PATH, learningPath });

      expect(result.success).toBe(true);
      expect(result.output).toContain('(3):');
      expect(result.output).toContain('/implement');
      expect(result.output).toContain('auto >= 90%, confirm');
      expect(result.output).toContain('Skipped 1 definition(s):');
    });

    it('should show and reset learning statistics', async () => {
      await handleQuery('troubleshoot the login bug', { cwd, skillsDir: FIXTURES_PATH, learningPath });

      const before = await handleStats({ cwd, learningPath });
      expect(before.output).toContain('Executions:       1');
      expect(before.output).toContain('Most used:        troubleshoot');

      const reset = await handleResetLearning({ cwd, learningPath });
      expect(reset.output).toContain(`Learning data reset (${learningPath})`);

      const after = await handleStats({ cwd, learningPath });
      expect(after.output).toContain('Executions:       0');
    });

    it('should manage learning data without a skills directory', async () => {
      const stats = await handleStats({ cwd, learningPath });
      const reset = await handleResetLearning({ cwd, learningPath });

      expect(stats.success).toBe(true);
      expect(stats.output).toContain('Skills tracked:   0');
      expect(reset.success).toBe(true);
      expect(JSON.parse(await fs.readFile(learningPath, 'utf-8'))).toEqual({
        skill_usage: {},
        argument_patterns: {},
        recent_skills: [],
        query_patterns: {},
      });
    });
  });
});
