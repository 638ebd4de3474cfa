import path from 'node:path';
import type { Collection } from './Collection.js';
import type { CollectionNode, DirectoryNode, FileFields, FileNode, SymlinkNode } from '../types/node.js';
import { NodeKind } from '../types/enums.js';
import { InvariantError } from '../types/error.js';
import { lstatOrNull } from '../utils/fs.js';

export function createRootDirectory(collection: Collection): DirectoryNode {
  return {
    kind: NodeKind.DIR,
    name: '',
    pathList: [],
    parent: null,
    collection,
    meta: new Map(),
    children: new Map(),
    ignorePatterns: []
  };
}

function attach<T extends CollectionNode>(parent: DirectoryNode, node: T): T {
  if (node.name.length === 0) {
    throw new InvariantError(`Only the root directory may be unnamed (under ${prettyPath(parent)})`);
  }
  if (parent.children.has(node.name)) {
    throw new InvariantError(`Duplicate child "${node.name}" under ${prettyPath(parent)}`);
  }
  parent.children.set(node.name, node);
  return node;
}

export function createDirectory(parent: DirectoryNode, name: string): DirectoryNode {
  return attach(parent, {
    kind: NodeKind.DIR,
    name,
    pathList: [...parent.pathList, name],
    parent,
    collection: parent.collection,
    meta: new Map(),
    children: new Map(),
    ignorePatterns: []
  });
}

export function createFile(
  parent: DirectoryNode,
  name: string,
  fields: FileFields = { size: 0, timestamp: 0, checksum: '' }
): FileNode {
  return attach(parent, {
    kind: NodeKind.FILE,
    name,
    pathList: [...parent.pathList, name],
    parent,
    collection: parent.collection,
    meta: new Map(),
    size: fields.size,
    timestamp: fields.timestamp,
    checksum: fields.checksum
  });
}

export function createSymlink(parent: DirectoryNode, name: string, target = ''): SymlinkNode {
  return attach(parent, {
    kind: NodeKind.SYMLINK,
    name,
    pathList: [...parent.pathList, name],
    parent,
    collection: parent.collection,
    meta: new Map(),
    target
  });
}

export function isRoot(node: CollectionNode): boolean {
  return node === node.collection.rootNode;
}

export function prettyPath(node: CollectionNode): string {
  return prettyPathOf(node.pathList);
}

export function prettyPathOf(pathList: readonly string[]): string {
  return `/${pathList.join('/')}`;
}

export function childPrettyPath(parentPretty: string, name: string): string {
  return parentPretty === '/' ? `/${name}` : `${parentPretty}/${name}`;
}

export function fsPath(node: CollectionNode): string {
  return path.join(node.collection.root, ...node.pathList);
}

export function sortedChildren(dir: DirectoryNode): CollectionNode[] {
  return Array.from(dir.children.keys())
    .sort()
    .map((name) => dir.children.get(name))
    .filter((child): child is CollectionNode => child !== undefined);
}

/** Recompute `pathList` from the parent chain, recursively for directories. */
export function refreshPathList(node: CollectionNode): void {
  node.pathList = node.parent ? [...node.parent.pathList, node.name] : [];
  if (node.kind === NodeKind.DIR) {
    for (const child of node.children.values()) refreshPathList(child);
  }
}

/**
 * Existence test against the live filesystem. A symlink to a directory is not a
 * directory and a symlink to a file is not a file.
 */
export async function nodeExists(node: CollectionNode): Promise<boolean> {
  const stat = await lstatOrNull(fsPath(node));
  if (!stat) return false;
  switch (node.kind) {
    case NodeKind.SYMLINK:
      return stat.isSymbolicLink();
    case NodeKind.FILE:
      return stat.isFile();
    case NodeKind.DIR:
      return stat.isDirectory();
  }
}

export function* walkNodes(node: CollectionNode): Generator<CollectionNode> {
  yield node;
  if (node.kind === NodeKind.DIR) {
    for (const child of sortedChildren(node)) yield* walkNodes(child);
  }
}
