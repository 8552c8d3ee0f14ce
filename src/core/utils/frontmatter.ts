/**
 * Frontmatter Parser
 *
 * Parses YAML frontmatter from Markdown files.
 * Used by the skill loader and the skill validator.
 */

import matter from 'gray-matter';

import { errorMessage } from '../errors/index.js';

const FRONTMATTER_REGEX = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?([\s\S]*)$/;

export class FrontmatterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrontmatterError';
  }
}

/**
 * Check if content has YAML frontmatter
 */
export function hasFrontmatter(content: string): boolean {
  if (!content || !content.startsWith('---')) {
    return false;
  }
  return FRONTMATTER_REGEX.test(content);
}

/**
 * Parse YAML frontmatter from content
 *
 * Content without a frontmatter block yields an empty record.
 * Throws FrontmatterError when the block is not valid YAML or not a mapping.
 */
export function parseFrontmatter(content: string): {
  frontmatter: Record<string, unknown>;
  content: string;
} {
  if (!hasFrontmatter(content)) {
    return { frontmatter: {}, content };
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(content);
  } catch (e) {
    throw new FrontmatterError(`Invalid YAML in frontmatter: ${errorMessage(e)}`);
  }

  const data: unknown = parsed.data;
  if (!isRecord(data)) {
    throw new FrontmatterError('Frontmatter must be a YAML mapping');
  }

  return { frontmatter: data, content: parsed.content };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
