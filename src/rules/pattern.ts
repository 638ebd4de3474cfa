import type { PatternStep } from '../types/rule.js';
import { VERSION_PLACEHOLDER } from '../config.js';
import { compileRegex } from './compileRegex.js';
import { globToSource } from './glob.js';

// Captures a dotted-numeric version; anything else still matches but captures nothing.
const VERSION_GROUP = '(?:([0-9]+(?:\\.[0-9]+)*)|[^/]*?)';

export function compileSegment(segment: string): PatternStep {
  if (segment === '.') return { kind: 'stay' };
  if (segment === '..') return { kind: 'up' };
  const parts = segment.split(VERSION_PLACEHOLDER);
  const source = parts.map((part) => globToSource(part)).join(VERSION_GROUP);
  return { kind: 'match', regex: compileRegex(`^${source}$`), capturesVersion: parts.length > 1 };
}

/** Split a rule pattern into comma-separated alternatives of compiled per-level steps. */
export function compilePattern(pattern: string): PatternStep[][] {
  return pattern.split(',').map((alternative) => alternative.split('/').map(compileSegment));
}

/** The first version group that took part in the match, if any. */
export function capturedVersion(match: RegExpExecArray): string | undefined {
  for (let i = 1; i < match.length; i += 1) {
    const group = match[i];
    if (group !== undefined && group !== '') return group;
  }
  return undefined;
}
