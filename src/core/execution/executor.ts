import type {
  ProjectContext,
  Skill,
  SkillArguments,
  SkillExecutor,
  SkillOutcome,
} from '../../types/index.js';

export const COMPLETION_LINE = 'Execution completed successfully';

/**
 * Default executor: reports what would run without running skill logic
 */
export class SimulatedSkillExecutor implements SkillExecutor {
  async execute(skill: Skill, args: SkillArguments, _context: ProjectContext): Promise<SkillOutcome> {
    return { ok: true, output: renderSimulatedRun(skill, args) };
  }
}

export function renderSimulatedRun(skill: Skill, args: SkillArguments): string {
  const lines = [`Executing: ${skill.displayName}`, `Description: ${skill.description}`, ''];

  const entries = Object.entries(args);
  if (entries.length > 0) {
    lines.push('Arguments:');
    for (const [name, value] of entries) {
      lines.push(`  - ${name}: ${String(value)}`);
    }
    lines.push('');
  }

  if (skill.mcpServers.length > 0) {
    lines.push(`MCP Servers: ${skill.mcpServers.join(', ')}`);
  }
  if (skill.personas.length > 0) {
    lines.push(`Personas: ${skill.personas.join(', ')}`);
  }

  lines.push('', COMPLETION_LINE);
  return lines.join('\n');
}
