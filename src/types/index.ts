/**
 * Skill Router Type Definitions
 */

// Skill Types
export type ArgumentType = 'string' | 'enum' | 'int' | 'bool' | 'path';

export type InferSource = 'user_query' | 'project_context' | 'git_history' | 'learning';

export const INFER_SOURCES: readonly InferSource[] = [
  'user_query',
  'project_context',
  'git_history',
  'learning',
];

export type ArgumentValue = string | number | boolean;

/** Inferred argument map, keyed by declared argument name */
export type SkillArguments = Record<string, ArgumentValue>;

export interface ArgumentSchema {
  /** snake_case, unique within a skill */
  name: string;
  type: ArgumentType;
  required: boolean;
  description: string;
  default?: ArgumentValue;
  /** Enum values (enum type only) */
  values?: string[];
  /** Inference sources, tried in order */
  inferFrom: InferSource[];
}

export interface GitBranchCheck {
  checkType: 'git_branch';
  /** Branch patterns: an exact name, or a prefix or suffix joined to a "*" segment */
  allowed: string[];
  message?: string;
}

export interface DiskSpaceCheck {
  checkType: 'disk_space';
  minimumMb: number;
  message?: string;
}

export interface NoConflictsCheck {
  checkType: 'no_conflicts';
  files: string[];
  message?: string;
}

export interface UnknownCheck {
  checkType: 'unknown';
  /** The check type as declared */
  name: string;
  params: Record<string, unknown>;
  message?: string;
}

export type SafetyCheckSpec = GitBranchCheck | DiskSpaceCheck | NoConflictsCheck | UnknownCheck;

export interface AutoTriggerConfig {
  enabled: boolean;
  confidenceThreshold: number;
  /** When true the skill never auto-executes */
  confirmBeforeExecution: boolean;
  safetyChecks: SafetyCheckSpec[];
}

export interface IntentMetadata {
  /** Natural-language templates with {param} placeholders */
  primary: string[];
  keywords: string[];
  /** Regex patterns with named groups */
  patterns: string[];
  /** Context tags used for relevance boosting */
  contexts: string[];
}

export interface Skill {
  readonly name: string;
  readonly displayName: string;
  readonly description: string;
  readonly version: string;
  readonly category: string;
  readonly complexity: string;
  readonly intents: Readonly<IntentMetadata>;
  readonly arguments: readonly ArgumentSchema[];
  readonly autoTrigger: Readonly<AutoTriggerConfig>;
  readonly mcpServers: readonly string[];
  readonly personas: readonly string[];
  readonly author: string;
  readonly tags: readonly string[];
  /** Path to SKILL.md, absent for skills built in memory */
  readonly path?: string;
  /** Markdown body, opaque to the router */
  readonly content: string;
}

export type SkillParseResult =
  | { success: true; skill: Skill }
  | { success: false; error: string };

export type SkillLoadErrorType = 'PARSE_ERROR' | 'DUPLICATE_SKILL' | 'IO_ERROR';

export interface SkillLoadError {
  type: SkillLoadErrorType;
  message: string;
  filePath: string;
}

// Project Context Types
export type ProjectType = 'python' | 'typescript' | 'javascript' | 'mixed' | 'unknown';

export interface FileStructure {
  rootDir: string;
  sourceDirs: string[];
  testDirs: string[];
  configFiles: string[];
  totalFiles: number;
}

export interface CommitSummary {
  hash: string;
  message: string;
  author: string;
  time: string;
}

export interface GitInfo {
  hasRepo: boolean;
  currentBranch: string;
  mainBranch: string;
  recentCommits: CommitSummary[];
  uncommittedChanges: number;
  /** Raw `git status --short` output */
  status: string;
}

export interface DependencyInfo {
  packageManager: string;
  configFile?: string;
  dependencies: Record<string, string>;
  devDependencies: Record<string, string>;
}

export interface TestingInfo {
  framework: string;
  testDirs: string[];
  configFile?: string;
}

export interface ProjectContext {
  projectType: ProjectType;
  structure: FileStructure;
  git: GitInfo;
  dependencies: DependencyInfo;
  testing: TestingInfo;
  /** Active context tags for relevance boosting */
  activeContexts: string[];
  /** Recently used skill names */
  recentSkills: string[];
}

/**
 * Produces a fresh project snapshot.
 * Implemented by ContextAnalyzer; tests supply their own.
 */
export interface ContextProvider {
  analyze(): Promise<ProjectContext>;
}

// Matching Types
export type MatchSource = 'keyword' | 'pattern' | 'primary' | 'context';

export interface SkillMatch {
  skill: Skill;
  /** Final confidence, clamped to [0, 1] */
  confidence: number;
  source: MatchSource;
  arguments: SkillArguments;
  /** Explanation trail, append-only */
  explanation: string[];
  /** Confidence before boosting */
  baseConfidence: number;
}

export interface MatchResult {
  query: string;
  /** At most 3 matches, descending confidence */
  matches: SkillMatch[];
  topMatch?: SkillMatch;
  context: ProjectContext;
  elapsedMs: number;
}

// Safety Types
export interface SafetyResult {
  safe: boolean;
  /** Blocking reason when unsafe */
  warning?: string;
  warnings: string[];
  checksPerformed: string[];
}

// Execution Types
export type SkillOutcome = { ok: true; output: string } | { ok: false; error: string };

export interface SkillExecutor {
  execute(skill: Skill, args: SkillArguments, context: ProjectContext): Promise<SkillOutcome>;
}

export interface ExecutionResult {
  query: string;
  executed: boolean;
  success: boolean;
  output: string;
  suggestions: string;
  warning?: string;
  executionTimeMs: number;
  skillUsed?: string;
  argumentsUsed: SkillArguments;
}

// Learning Types
export interface SkillUsage {
  count: number;
  successCount: number;
}

export interface LearningData {
  /** skill name -> usage counters */
  skillUsage: Record<string, SkillUsage>;
  /** "skill.argument" -> value -> frequency */
  argumentPatterns: Record<string, Record<string, number>>;
  /** Most recent first, no duplicates */
  recentSkills: string[];
  /** skill name -> successful queries */
  queryPatterns: Record<string, string[]>;
}

export interface LearningStats {
  totalSkillsTracked: number;
  totalExecutions: number;
  mostUsedSkill: string | null;
  recentSkillsCount: number;
  argumentPatternsCount: number;
}

// Validation Types
export type ValidationSeverity = 'error' | 'warning';

export interface ValidationIssue {
  field: string;
  message: string;
  severity: ValidationSeverity;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  skillName: string;
}
