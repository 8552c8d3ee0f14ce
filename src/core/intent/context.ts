import type {
  DependencyInfo,
  FileStructure,
  GitInfo,
  ProjectContext,
  ProjectType,
  TestingInfo,
} from '../../types/index.js';

export interface ProjectContextInit {
  projectType?: ProjectType;
  structure?: Partial<FileStructure>;
  git?: Partial<GitInfo>;
  dependencies?: Partial<DependencyInfo>;
  testing?: Partial<TestingInfo>;
  activeContexts?: string[];
  recentSkills?: string[];
}

export function emptyGitInfo(): GitInfo {
  return {
    hasRepo: false,
    currentBranch: '',
    mainBranch: '',
    recentCommits: [],
    uncommittedChanges: 0,
    status: '',
  };
}

/**
 * Build a complete ProjectContext, filling every omitted field with its empty value
 */
export function createProjectContext(init: ProjectContextInit = {}): ProjectContext {
  return {
    projectType: init.projectType ?? 'unknown',
    structure: {
      rootDir: process.cwd(),
      sourceDirs: [],
      testDirs: [],
      configFiles: [],
      totalFiles: 0,
      ...init.structure,
    },
    git: { ...emptyGitInfo(), ...init.git },
    dependencies: {
      packageManager: '',
      dependencies: {},
      devDependencies: {},
      ...init.dependencies,
    },
    testing: { framework: '', testDirs: [], ...init.testing },
    activeContexts: init.activeContexts ?? [],
    recentSkills: init.recentSkills ?? [],
  };
}
