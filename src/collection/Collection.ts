import path from 'node:path';
import type { DirectoryNode } from '../types/node.js';
import { createRootDirectory } from './node.js';

export class Collection {
  /** Absolute filesystem path the tree is rooted at. */
  root: string;
  /** Root as declared in the manifest, relative to the manifest's directory. */
  autoRoot = '.';
  /** Set by mutating operations; read by the save step. */
  dirty = false;
  readonly rootNode: DirectoryNode;

  constructor(root: string = process.cwd()) {
    this.root = path.resolve(root);
    this.rootNode = createRootDirectory(this);
  }

  setRoot(root: string): void {
    this.root = path.resolve(root);
  }

  /**
   * Map an OS path (relative to `cwd`) to a path list under the collection root.
   * Returns null when the path lies outside the root.
   */
  normalize(osPath: string, cwd: string = process.cwd()): string[] | null {
    const relative = path.relative(this.root, path.resolve(cwd, osPath));
    if (path.isAbsolute(relative)) return null;
    const parts: string[] = [];
    for (const part of relative.split(path.sep)) {
      if (part === '..') return null;
      if (part === '' || part === '.') continue;
      parts.push(part);
    }
    return parts;
  }
}
