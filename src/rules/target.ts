import type { DirectoryNode } from '../types/node.js';
import type { MetaRule } from '../types/rule.js';
import { NodeKind } from '../types/enums.js';

/**
 * Resolve the directory a rule's pattern is evaluated against. A leading "/" starts
 * at the collection root, anything else at the rule file's directory. ".." stops at
 * the root. Returns null when a segment names no child directory.
 */
export function findTarget(rule: MetaRule): DirectoryNode | null {
  const parts = rule.target.trim().split('/');
  let node: DirectoryNode | null;
  if (parts[0] === '') {
    node = rule.source.collection.rootNode;
    parts.shift();
  } else {
    node = rule.source.parent;
  }
  if (!node) return null;

  for (const part of parts) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      node = node.parent ?? node;
      continue;
    }
    const child = node.children.get(part);
    if (!child || child.kind !== NodeKind.DIR) return null;
    node = child;
  }
  return node;
}
