/**
 * Context Analyzer
 *
 * Builds a ProjectContext snapshot for a project root: top-level layout,
 * git summary, dependency manifest, testing framework and active context tags.
 */

import path from 'path';
import fs from 'fs-extra';
import { execa } from 'execa';
import { z } from 'zod';

import type {
  ContextProvider,
  DependencyInfo,
  FileStructure,
  GitInfo,
  ProjectContext,
  ProjectType,
  TestingInfo,
} from '../../types/index.js';
import { emptyGitInfo } from './context.js';

const SOURCE_DIR_PATTERNS = ['src', 'lib', 'app', 'source', 'components', 'modules'];
const TEST_DIR_PATTERNS = ['tests', 'test', '__tests__', 'spec', 'specs'];
const CONFIG_EXTENSIONS = ['.json', '.toml', '.yaml', '.yml', '.ini', '.cfg'];

const GIT_TIMEOUT_MS = 2000;

const packageJsonSchema = z
  .object({
    dependencies: z.record(z.string()).catch({}),
    devDependencies: z.record(z.string()).catch({}),
  })
  .partial()
  .passthrough();

type PackageJson = z.infer<typeof packageJsonSchema>;

export interface ContextAnalyzerOptions {
  rootDir?: string;
  /** Skill names to report as recently used */
  recentSkills?: () => string[];
}

export class ContextAnalyzer implements ContextProvider {
  private readonly rootDir: string;
  private readonly recentSkills: () => string[];

  constructor(options: ContextAnalyzerOptions = {}) {
    this.rootDir = path.resolve(options.rootDir ?? process.cwd());
    this.recentSkills = options.recentSkills ?? (() => []);
  }

  async analyze(): Promise<ProjectContext> {
    const [structure, git, dependencies, testing] = await Promise.all([
      this.analyzeStructure(),
      this.analyzeGit(),
      this.analyzeDependencies(),
      this.detectTestingFramework(),
    ]);

    return {
      projectType: await this.detectProjectType(dependencies),
      structure,
      git,
      dependencies,
      testing,
      activeContexts: determineActiveContexts(structure, git, dependencies),
      recentSkills: this.recentSkills(),
    };
  }

  async analyzeStructure(): Promise<FileStructure> {
    const structure: FileStructure = {
      rootDir: this.rootDir,
      sourceDirs: [],
      testDirs: [],
      configFiles: [],
      totalFiles: 0,
    };

    const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = path.join(this.rootDir, entry.name);
      const lowered = entry.name.toLowerCase();

      if (entry.isDirectory()) {
        if (SOURCE_DIR_PATTERNS.some((pattern) => lowered.includes(pattern))) {
          structure.sourceDirs.push(fullPath);
        }
        if (TEST_DIR_PATTERNS.some((pattern) => lowered.includes(pattern))) {
          structure.testDirs.push(fullPath);
        }
      } else if (entry.isFile()) {
        structure.totalFiles++;
        if (CONFIG_EXTENSIONS.includes(path.extname(entry.name))) {
          structure.configFiles.push(fullPath);
        }
      }
    }

    return structure;
  }

  async analyzeGit(): Promise<GitInfo> {
    if (!(await fs.pathExists(path.join(this.rootDir, '.git')))) {
      return emptyGitInfo();
    }

    try {
      const currentBranch = await this.git(['branch', '--show-current']);
      const hasMain = (await this.runGit(['rev-parse', '--verify', 'main'])).exitCode === 0;
      const log = await this.git(['log', '-5', '--pretty=format:%h|%s|%an|%ar']);
      const porcelain = await this.git(['status', '--porcelain']);
      const status = await this.git(['status', '--short']);

      const recentCommits = log
        .split('\n')
        .map((line) => line.split('|'))
        .filter((parts) => parts.length >= 4)
        .map(([hash = '', message = '', author = '', time = '']) => ({ hash, message, author, time }));

      return {
        hasRepo: true,
        currentBranch,
        mainBranch: hasMain ? 'main' : 'master',
        recentCommits,
        uncommittedChanges: porcelain ? porcelain.split('\n').length : 0,
        status,
      };
    } catch {
      // git missing or timed out: the repository exists but nothing is known about it
      return { ...emptyGitInfo(), hasRepo: true };
    }
  }

  async analyzeDependencies(): Promise<DependencyInfo> {
    const packageJson = await this.readPackageJson();
    if (packageJson) {
      return {
        packageManager: 'npm',
        configFile: path.join(this.rootDir, 'package.json'),
        dependencies: packageJson.dependencies ?? {},
        devDependencies: packageJson.devDependencies ?? {},
      };
    }

    const pyprojectPath = path.join(this.rootDir, 'pyproject.toml');
    const pyproject = await readText(pyprojectPath);
    if (pyproject !== null) {
      const dependencies: Record<string, string> = {};
      for (const requirement of parseTomlDependencyList(pyproject)) {
        dependencies[requirementName(requirement)] = requirement;
      }
      return { packageManager: 'uv', configFile: pyprojectPath, dependencies, devDependencies: {} };
    }

    const requirementsPath = path.join(this.rootDir, 'requirements.txt');
    const requirements = await readText(requirementsPath);
    if (requirements !== null) {
      const dependencies: Record<string, string> = {};
      for (const line of requirements.split('\n')) {
        const trimmed = line.trim();
        if (trimmed && !trimmed.startsWith('#')) {
          dependencies[trimmed.split('==')[0]?.trim() ?? trimmed] = trimmed;
        }
      }
      return { packageManager: 'pip', configFile: requirementsPath, dependencies, devDependencies: {} };
    }

    return { packageManager: '', dependencies: {}, devDependencies: {} };
  }

  async detectTestingFramework(): Promise<TestingInfo> {
    const testDirs: string[] = [];
    for (const name of TEST_DIR_PATTERNS) {
      const candidate = path.join(this.rootDir, name);
      if ((await fs.pathExists(candidate)) && (await fs.stat(candidate)).isDirectory()) {
        testDirs.push(candidate);
      }
    }

    const pytestIni = path.join(this.rootDir, 'pytest.ini');
    if (await fs.pathExists(pytestIni)) {
      return { framework: 'pytest', testDirs, configFile: pytestIni };
    }

    const pyprojectPath = path.join(this.rootDir, 'pyproject.toml');
    const pyproject = await readText(pyprojectPath);
    if (pyproject?.includes('[tool.pytest')) {
      return { framework: 'pytest', testDirs, configFile: pyprojectPath };
    }

    const packageJson = await this.readPackageJson();
    const devDependencies = packageJson?.devDependencies ?? {};
    const configFile = path.join(this.rootDir, 'package.json');
    if (Object.hasOwn(devDependencies, 'vitest')) {
      return { framework: 'vitest', testDirs, configFile };
    }
    if (Object.hasOwn(devDependencies, 'jest')) {
      return { framework: 'jest', testDirs, configFile };
    }

    return { framework: '', testDirs };
  }

  private async detectProjectType(dependencies: DependencyInfo): Promise<ProjectType> {
    let hasPython = await fs.pathExists(path.join(this.rootDir, 'pyproject.toml'));
    let hasTypeScript = await fs.pathExists(path.join(this.rootDir, 'tsconfig.json'));
    let hasJavaScript = await fs.pathExists(path.join(this.rootDir, 'package.json'));

    if (['uv', 'pip', 'poetry'].includes(dependencies.packageManager)) {
      hasPython = true;
    }
    if (['npm', 'yarn', 'pnpm'].includes(dependencies.packageManager)) {
      hasJavaScript = true;
      const names = [
        ...Object.keys(dependencies.dependencies),
        ...Object.keys(dependencies.devDependencies),
      ];
      if (names.some((name) => name.toLowerCase().includes('typescript'))) {
        hasTypeScript = true;
      }
    }

    if (hasPython && hasTypeScript) return 'mixed';
    if (hasTypeScript) return 'typescript';
    if (hasJavaScript) return 'javascript';
    if (hasPython) return 'python';
    return 'unknown';
  }

  private async readPackageJson(): Promise<PackageJson | null> {
    try {
      const parsed = packageJsonSchema.safeParse(await fs.readJson(path.join(this.rootDir, 'package.json')));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private runGit(args: string[]) {
    return execa('git', args, { cwd: this.rootDir, timeout: GIT_TIMEOUT_MS, reject: false });
  }

  /**
   * Trimmed stdout of a git command, '' on a non-zero exit.
   * Throws when git could not run at all.
   */
  private async git(args: string[]): Promise<string> {
    const result = await this.runGit(args);
    if (result.timedOut || result.exitCode === undefined) {
      throw new Error(`git ${args.join(' ')} did not complete`);
    }
    return result.exitCode === 0 ? result.stdout.trim() : '';
  }
}

export function determineActiveContexts(
  structure: FileStructure,
  git: GitInfo,
  dependencies: DependencyInfo,
): string[] {
  const contexts: string[] = [];

  if (git.uncommittedChanges > 0) {
    contexts.push('development', 'uncommitted_changes');
  }
  if (git.currentBranch && git.currentBranch !== git.mainBranch) {
    contexts.push('feature_branch');
  }
  if (structure.testDirs.length > 0) {
    contexts.push('testing');
  }
  if (dependencies.configFile) {
    contexts.push('dependencies');
  }

  return contexts;
}

/**
 * Requirement strings of the `dependencies = [...]` array in a pyproject.toml
 */
export function parseTomlDependencyList(toml: string): string[] {
  const block = /^dependencies\s*=\s*\[([\s\S]*?)\]/m.exec(toml);
  if (!block?.[1]) {
    return [];
  }
  return Array.from(block[1].matchAll(/["']([^"']+)["']/g), (match) => match[1] ?? '').filter(Boolean);
}

function requirementName(requirement: string): string {
  return requirement.split(/[<>=!~;\[\s]/)[0] ?? requirement;
}

async function readText(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
