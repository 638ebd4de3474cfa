import type { CollectionNode } from '../types/node.js';
import { NodeKind } from '../types/enums.js';
import { InvariantError } from '../types/error.js';
import { isRoot, prettyPath, refreshPathList } from './node.js';

function detach(node: CollectionNode): void {
  const parent = node.parent;
  if (!parent || parent.children.get(node.name) !== node) {
    throw new InvariantError(`${prettyPath(node)} is not registered with its parent`);
  }
  parent.children.delete(node.name);
}

export function isValidName(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && !name.includes('/');
}

/**
 * Move `node` under `newParent`. Fails for the root, a non-directory parent,
 * a parent inside `node`'s own subtree, or a name already taken in `newParent`.
 */
export function reparent(node: CollectionNode, newParent: CollectionNode): boolean {
  if (newParent.collection !== node.collection) {
    throw new InvariantError('Cannot move a node between collections');
  }
  if (isRoot(node)) return false;
  if (newParent.kind !== NodeKind.DIR) return false;

  for (let cursor: CollectionNode | null = newParent; cursor; cursor = cursor.parent) {
    if (cursor === node) return false;
  }
  if (newParent.children.has(node.name)) return false;

  detach(node);
  node.parent = newParent;
  newParent.children.set(node.name, node);
  refreshPathList(node);
  node.collection.dirty = true;
  return true;
}

export function rename(node: CollectionNode, newName: string): boolean {
  const parent = node.parent;
  if (!parent || isRoot(node)) return false;
  if (!isValidName(newName)) return false;
  if (parent.children.has(newName)) return false;

  detach(node);
  node.name = newName;
  parent.children.set(newName, node);
  refreshPathList(node);
  node.collection.dirty = true;
  return true;
}

/** Detach `node` from the tree. Metadata elsewhere is left as is. */
export function deleteNode(node: CollectionNode): boolean {
  if (isRoot(node) || !node.parent) return false;
  detach(node);
  node.parent = null;
  node.collection.dirty = true;
  return true;
}
