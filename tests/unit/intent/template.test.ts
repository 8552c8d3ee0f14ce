import { describe, it, expect } from 'vitest';
import {
  compilePattern,
  escapeRegExp,
  namedGroups,
  normalizePattern,
  templateToRegExp,
} from '../../../src/core/intent/template.js';

describe('templateToRegExp', () => {
  it('should turn placeholders into named groups and whitespace into \\s+', () => {
    const regex = templateToRegExp('troubleshoot {issue}');

    expect(regex?.source).toBe('troubleshoot\\s+(?<issue>.+)');
    expect(regex?.exec('troubleshoot   the login bug')?.groups).toEqual({ issue: 'the login bug' });
  });

  it('should escape literal regex characters', () => {
    const regex = templateToRegExp('what is {topic}?');

    expect(regex?.exec('what is caching?')?.groups?.topic).toBe('caching');
    expect(regex?.exec('what is caching!')).toBeNull();
  });

  it('should capture only the requested placeholder', () => {
    const regex = templateToRegExp('deploy {service} to {env}', 'env');

    expect(regex?.exec('deploy api to staging')?.groups).toEqual({ env: 'staging' });
  });

  it('should return null when a placeholder repeats', () => {
    expect(templateToRegExp('{name} and {name}')).toBeNull();
  });
});

describe('pattern helpers', () => {
  it('should rewrite (?P<name>) groups', () => {
    expect(normalizePattern('(?P<file>\\S+) then (?P=file)')).toBe('(?<file>\\S+) then \\k<file>');
  });

  it('should compile case-insensitively and reject invalid patterns', () => {
    expect(compilePattern('FIX (?P<what>\\w+)')?.exec('fix tests')?.groups).toEqual({ what: 'tests' });
    expect(compilePattern('(unclosed')).toBeNull();
  });

  it('should drop groups that did not participate', () => {
    const match = /(?<a>x)|(?<b>y)/.exec('x');
    expect(match && namedGroups(match)).toEqual({ a: 'x' });
  });

  it('should escape every special character', () => {
    expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
  });
});
