import type { Collection } from '../collection/Collection.js';
import type { NodeKind } from './enums.js';
import type { MetaMap } from './meta.js';

interface NodeBase {
  /** Final path segment; empty for the root directory. */
  name: string;
  pathList: string[];
  /** Non-owning back reference; null for the root and for detached nodes. */
  parent: DirectoryNode | null;
  collection: Collection;
  meta: MetaMap;
}

export interface SymlinkNode extends NodeBase {
  kind: NodeKind.SYMLINK;
  target: string;
}

export interface FileNode extends NodeBase {
  kind: NodeKind.FILE;
  size: number;
  /** Whole seconds. */
  timestamp: number;
  /** Lowercase hex digest; empty when never computed. */
  checksum: string;
}

export interface DirectoryNode extends NodeBase {
  kind: NodeKind.DIR;
  children: Map<string, CollectionNode>;
  ignorePatterns: string[];
}

export type CollectionNode = SymlinkNode | FileNode | DirectoryNode;

export interface FileFields {
  size: number;
  timestamp: number;
  checksum: string;
}
