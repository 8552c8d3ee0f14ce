/**
 * Template and pattern compilation shared by the matcher and the inferrer.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;
const ESCAPED_PLACEHOLDER = /\\\{(\w+)\\\}/g;

export function escapeRegExp(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

/**
 * Convert a primary template into a regex.
 *
 * Literal text is escaped, whitespace runs become `\s+` and every
 * `{param}` becomes `(?<param>.+)`. With `onlyParam` set, only that
 * placeholder is captured and the rest become `(?:.+)`.
 *
 * Returns null when the result is not a valid JS regex
 * (for instance a placeholder repeated within one template).
 *
 * @example templateToRegExp('troubleshoot {issue}') // /troubleshoot\s+(?<issue>.+)/
 */
export function templateToRegExp(template: string, onlyParam?: string, flags = ''): RegExp | null {
  const source = escapeRegExp(template)
    .replace(ESCAPED_PLACEHOLDER, (_match, name: string) =>
      onlyParam === undefined || name === onlyParam ? `(?<${name}>.+)` : '(?:.+)',
    )
    .replace(/\s+/g, '\\s+');

  try {
    return new RegExp(source, flags);
  } catch {
    return null;
  }
}

/**
 * Rewrite `(?P<name>...)` groups and `(?P=name)` backreferences to JS syntax
 */
export function normalizePattern(pattern: string): string {
  return pattern.replace(/\(\?P<(\w+)>/g, '(?<$1>').replace(/\(\?P=(\w+)\)/g, '\\k<$1>');
}

/**
 * Compile a declared intent pattern (case-insensitive); null if invalid
 */
export function compilePattern(pattern: string): RegExp | null {
  try {
    return new RegExp(normalizePattern(pattern), 'i');
  } catch {
    return null;
  }
}

/**
 * Named groups that participated in the match
 */
export function namedGroups(match: RegExpExecArray): Record<string, string> {
  const groups: Record<string, string> = {};
  for (const [name, value] of Object.entries(match.groups ?? {})) {
    if (value !== undefined) {
      groups[name] = value;
    }
  }
  return groups;
}
