import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { buildSkill } from '../src/core/skills/schema.js';
import type { Skill } from '../src/types/index.js';

export const FIXTURES_PATH = join(dirname(fileURLToPath(import.meta.url)), 'fixtures/skills');

/**
 * Build a skill from raw frontmatter, failing the test on invalid input
 */
export function skillFrom(data: Record<string, unknown>): Skill {
  const result = buildSkill({ name: 'sample', ...data });
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.skill;
}
