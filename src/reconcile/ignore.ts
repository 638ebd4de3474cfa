import type { DirectoryNode } from '../types/node.js';
import { MetaType } from '../types/meta.js';
import { getMeta } from '../collection/meta.js';
import { matchName } from '../rules/glob.js';

export function ignorePatternsOf(dir: DirectoryNode): string[] {
  return [...dir.ignorePatterns, ...getMeta(dir, MetaType.IGNORE).map((record) => record.pattern)];
}

/** True when `name` inside `dir` matches the directory's own patterns or an ignore rule attached to it. */
export function isIgnored(dir: DirectoryNode, name: string): boolean {
  return ignorePatternsOf(dir).some((pattern) => matchName(pattern, name));
}
