/**
 * Utility Functions
 */

import os from 'os';
import path from 'path';

export const SKILL_ROUTER_DIR_NAME = '.skill-router';

/**
 * Per-user state directory (~/.skill-router), resolved on every call
 */
export function getSkillRouterHome(): string {
  return path.join(os.homedir(), SKILL_ROUTER_DIR_NAME);
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}
