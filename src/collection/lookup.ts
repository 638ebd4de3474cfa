import type { CollectionNode, DirectoryNode } from '../types/node.js';
import { NodeKind } from '../types/enums.js';

export interface NearestNode {
  node: CollectionNode;
  /** Path segments below `node` that are not in the tree. Empty on an exact match. */
  remaining: string[];
}

export function findNearestNode(root: DirectoryNode, pathList: readonly string[]): NearestNode {
  let node: CollectionNode = root;
  let index = 0;
  while (index < pathList.length && node.kind === NodeKind.DIR) {
    const child = node.children.get(pathList[index]);
    if (!child) break;
    node = child;
    index += 1;
  }
  return { node, remaining: pathList.slice(index) };
}

export function findNode(root: DirectoryNode, pathList: readonly string[]): CollectionNode | undefined {
  const { node, remaining } = findNearestNode(root, pathList);
  return remaining.length === 0 ? node : undefined;
}
