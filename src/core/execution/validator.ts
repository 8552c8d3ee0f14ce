/**
 * Safety Validator
 *
 * Gate in front of unattended execution. Checks run in a fixed order and
 * the first blocking check ends validation; soft findings accumulate as
 * warnings without blocking.
 *
 * Order:
 * 1. destructive_operation  blocks destructive skills on main/master
 * 2. dependencies           warns about unavailable MCP servers
 * 3. disk_space             blocks file-modifying skills below the free-space minimum
 * 4. file_conflicts         warns about many uncommitted changes
 * 5. custom:<type>          the skill's declared checks, in order
 */

import { statfsSync } from 'fs';

import type {
  DiskSpaceCheck,
  GitBranchCheck,
  NoConflictsCheck,
  ProjectContext,
  SafetyCheckSpec,
  SafetyResult,
  Skill,
  SkillMatch,
} from '../../types/index.js';
import { DEFAULT_MINIMUM_DISK_MB } from '../skills/schema.js';

export const DESTRUCTIVE_KEYWORDS = [
  'delete',
  'remove',
  'cleanup',
  'reset',
  'drop',
  'destroy',
  'clear',
  'purge',
  'wipe',
];

export const FILE_MODIFICATION_KEYWORDS = [
  'write',
  'create',
  'update',
  'modify',
  'edit',
  'generate',
  'build',
  'compile',
];

const MAIN_BRANCHES = ['main', 'master'];
const MANY_CHANGES_THRESHOLD = 10;

export const DESTRUCTIVE_ON_MAIN_MESSAGE =
  'Destructive operation blocked on main/master branch. Switch to a feature branch first.';

/** Free bytes on the volume holding `directory` */
export type FreeSpaceCheck = (directory: string) => number;

/** Names of the given MCP servers that are not reachable */
export type ServiceCheck = (servers: readonly string[], context: ProjectContext) => string[];

export interface SafetyValidatorOptions {
  freeSpace?: FreeSpaceCheck;
  /** Defaults to reporting every server as available */
  unavailableServices?: ServiceCheck;
  /** Free space required by the built-in disk check */
  minimumDiskMb?: number;
  /** Directory whose volume is measured; defaults to process.cwd() */
  workingDir?: () => string;
}

export function statfsFreeSpace(directory: string): number {
  const stats = statfsSync(directory);
  return stats.bavail * stats.bsize;
}

/**
 * Branch pattern match: exact name, `prefix/*` or `*` + `/suffix`.
 * The slash is part of the match, so `feature/*` accepts `feature/login`
 * but not `feature-login` or `featurex`. Any other use of `*` never matches.
 */
export function matchesBranchPattern(branch: string, pattern: string): boolean {
  if (!pattern.includes('*')) {
    return branch === pattern;
  }
  if (pattern.endsWith('/*')) {
    return branch.startsWith(pattern.slice(0, -1));
  }
  if (pattern.startsWith('*/')) {
    return branch.endsWith(pattern.slice(1));
  }
  return false;
}

function skillText(skill: Skill): string {
  return `${skill.name} ${skill.description}`.toLowerCase();
}

export function isDestructive(skill: Skill): boolean {
  const text = skillText(skill);
  return DESTRUCTIVE_KEYWORDS.some((keyword) => text.includes(keyword));
}

export function mayModifyFiles(skill: Skill): boolean {
  const text = skillText(skill);
  return FILE_MODIFICATION_KEYWORDS.some((keyword) => text.includes(keyword));
}

/**
 * Paths of tracked files that `git status --short` reports as changed
 */
export function modifiedFiles(status: string): string[] {
  return status
    .split('\n')
    .filter((line) => line.trim() && !line.startsWith('??'))
    .map((line) => line.trim().split(/\s+/).pop() ?? '')
    .filter(Boolean);
}

function blocked(warning: string, checksPerformed: string[]): SafetyResult {
  return { safe: false, warning, warnings: [], checksPerformed };
}

const PASS: SafetyResult = { safe: true, warnings: [], checksPerformed: [] };

export class SafetyValidator {
  private readonly freeSpace: FreeSpaceCheck;
  private readonly unavailableServices: ServiceCheck;
  private readonly minimumDiskMb: number;
  private readonly workingDir: () => string;

  constructor(options: SafetyValidatorOptions = {}) {
    this.freeSpace = options.freeSpace ?? statfsFreeSpace;
    this.unavailableServices = options.unavailableServices ?? (() => []);
    this.minimumDiskMb = options.minimumDiskMb ?? DEFAULT_MINIMUM_DISK_MB;
    this.workingDir = options.workingDir ?? (() => process.cwd());
  }

  validate(match: SkillMatch, context: ProjectContext): SafetyResult {
    const { skill } = match;
    const { git } = context;
    const warnings: string[] = [];
    const checks: string[] = [];
    const modifiesFiles = mayModifyFiles(skill);

    if (isDestructive(skill)) {
      checks.push('destructive_operation');
      if (git.hasRepo && MAIN_BRANCHES.includes(git.currentBranch)) {
        return blocked(DESTRUCTIVE_ON_MAIN_MESSAGE, checks);
      }
    }

    if (skill.mcpServers.length > 0) {
      checks.push('dependencies');
      const missing = this.unavailableServices(skill.mcpServers, context);
      if (missing.length > 0) {
        warnings.push(`MCP servers may not be available: ${missing.join(', ')}`);
      }
    }

    if (modifiesFiles) {
      checks.push('disk_space');
      if (!this.hasDiskSpace(this.minimumDiskMb)) {
        return blocked(`Insufficient disk space. At least ${this.minimumDiskMb}MB required.`, checks);
      }
    }

    if (git.hasRepo && modifiesFiles) {
      checks.push('file_conflicts');
      if (git.uncommittedChanges > MANY_CHANGES_THRESHOLD) {
        warnings.push(
          `Many uncommitted changes (${git.uncommittedChanges}). Consider committing or stashing first.`,
        );
      }
    }

    for (const check of skill.autoTrigger.safetyChecks) {
      checks.push(`custom:${check.checkType === 'unknown' ? check.name : check.checkType}`);
      const result = this.runCustomCheck(check, context);
      if (!result.safe) {
        return { ...result, checksPerformed: checks };
      }
    }

    return { safe: true, warnings, checksPerformed: checks };
  }

  runCustomCheck(check: SafetyCheckSpec, context: ProjectContext): SafetyResult {
    switch (check.checkType) {
      case 'git_branch':
        return this.checkGitBranch(check, context);
      case 'disk_space':
        return this.checkDiskSpace(check);
      case 'no_conflicts':
        return this.checkNoConflicts(check, context);
      case 'unknown':
        return PASS;
      default: {
        const unreachable: never = check;
        return unreachable;
      }
    }
  }

  /**
   * True when at least `minimumMb` is free; a failed disk check counts as enough
   */
  hasDiskSpace(minimumMb: number): boolean {
    try {
      return this.freeSpace(this.workingDir()) / (1024 * 1024) >= minimumMb;
    } catch {
      return true;
    }
  }

  private checkGitBranch(check: GitBranchCheck, context: ProjectContext): SafetyResult {
    const { hasRepo, currentBranch } = context.git;
    if (!hasRepo || check.allowed.length === 0) {
      return PASS;
    }
    if (check.allowed.some((pattern) => matchesBranchPattern(currentBranch, pattern))) {
      return PASS;
    }
    return blocked(
      check.message || `Branch '${currentBranch}' not in allowed list: ${check.allowed.join(', ')}`,
      [],
    );
  }

  private checkDiskSpace(check: DiskSpaceCheck): SafetyResult {
    if (this.hasDiskSpace(check.minimumMb)) {
      return PASS;
    }
    return blocked(check.message || `Requires at least ${check.minimumMb}MB free space`, []);
  }

  private checkNoConflicts(check: NoConflictsCheck, context: ProjectContext): SafetyResult {
    const { hasRepo, uncommittedChanges, status } = context.git;
    if (!hasRepo || uncommittedChanges === 0 || check.files.length === 0) {
      return PASS;
    }

    const changed = modifiedFiles(status);
    const conflicts = check.files.filter((file) => changed.includes(file));
    if (conflicts.length === 0) {
      return PASS;
    }
    return blocked(check.message || `Modified files conflict: ${conflicts.join(', ')}`, []);
  }
}
