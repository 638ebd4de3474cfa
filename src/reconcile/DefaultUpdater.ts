import fsp from 'node:fs/promises';
import path from 'node:path';
import type { RunContext } from '../context/RunContext.js';
import type { Collection } from '../collection/Collection.js';
import type { CollectionNode, DirectoryNode, FileNode, SymlinkNode } from '../types/node.js';
import type { StatusSink } from '../types/status.js';
import { NodeKind, StatusCode } from '../types/enums.js';
import { TIMESTAMP_TOLERANCE_SECONDS } from '../config.js';
import {
  createDirectory,
  createFile,
  createSymlink,
  fsPath,
  nodeExists,
  prettyPath,
  prettyPathOf,
  sortedChildren
} from '../collection/node.js';
import { findNearestNode } from '../collection/lookup.js';
import { deleteNode } from '../collection/mutate.js';
import { classifyLive, listSorted } from '../utils/fs.js';
import { md5File, type ChecksumFn } from './checksum.js';
import { timestampDiffers } from './DefaultChecker.js';
import { isIgnored } from './ignore.js';

function createNode(parent: DirectoryNode, name: string, kind: NodeKind): CollectionNode {
  switch (kind) {
    case NodeKind.SYMLINK:
      return createSymlink(parent, name);
    case NodeKind.FILE:
      return createFile(parent, name);
    case NodeKind.DIR:
      return createDirectory(parent, name);
  }
}

export interface UpdateOptions {
  /** Recompute every checksum, even when size and timestamp look current. */
  force?: boolean;
  tolerance?: number;
  checksum?: ChecksumFn;
}

export interface AddOptions {
  /** Create missing intermediate directory nodes. */
  parents?: boolean;
}

/**
 * Brings the tree in line with the filesystem. Checksums are only recomputed when
 * size, timestamp or an empty checksum say the file may have changed.
 */
export class DefaultUpdater {
  private readonly force: boolean;
  private readonly tolerance: number;
  private readonly checksum: ChecksumFn;
  private changed = false;

  constructor(
    private readonly ctx: RunContext,
    private readonly sink: StatusSink,
    options: UpdateOptions = {}
  ) {
    this.force = options.force ?? false;
    this.tolerance = options.tolerance ?? TIMESTAMP_TOLERANCE_SECONDS;
    this.checksum = options.checksum ?? md5File;
  }

  async update(node: CollectionNode): Promise<boolean> {
    if (!(await nodeExists(node))) {
      this.sink.onStatus({ code: StatusCode.MISSING, path: prettyPath(node) });
      return false;
    }
    this.changed = false;
    await this.updateNode(node);
    if (this.changed) node.collection.dirty = true;
    return true;
  }

  /** Insert the entry at `pathList` (and, with `parents`, its missing ancestors) and update it. */
  async add(collection: Collection, pathList: readonly string[], options: AddOptions = {}): Promise<boolean> {
    const where = prettyPathOf(pathList);
    const nearest = findNearestNode(collection.rootNode, pathList);
    if (nearest.remaining.length === 0) {
      this.sink.onError({ code: StatusCode.EXISTS, path: where });
      return false;
    }

    const parent = await this.ensureParents(nearest.node, nearest.remaining.slice(0, -1), options.parents ?? false);
    if (!parent) return false;

    const name = nearest.remaining[nearest.remaining.length - 1];
    const kind = await classifyLive(path.join(fsPath(parent), name));
    if (kind === null) {
      this.sink.onError({ code: StatusCode.NOTEXIST, path: where });
      return false;
    }

    this.changed = false;
    const item = this.insert(parent, name, kind);
    if (item.kind !== NodeKind.DIR || this.ctx.recurse) await this.updateNode(item);
    collection.dirty = true;
    return true;
  }

  private async ensureParents(start: CollectionNode, parts: string[], parents: boolean): Promise<DirectoryNode | null> {
    let node = start;
    for (let index = 0; ; index += 1) {
      const where = prettyPath(node);
      if (node.kind !== NodeKind.DIR) {
        this.sink.onError({ code: StatusCode.NOTDIRECTORY, path: where });
        return null;
      }
      if (!(await nodeExists(node))) {
        this.sink.onError({ code: StatusCode.NOTEXIST, path: where });
        return null;
      }
      if (index === parts.length) return node;
      if (!parents) {
        this.sink.onError({ code: StatusCode.NOPARENTS, path: where });
        return null;
      }

      const name = parts[index];
      const kind = await classifyLive(path.join(fsPath(node), name));
      if (kind !== NodeKind.DIR) {
        this.sink.onError({ code: kind === null ? StatusCode.NOTEXIST : StatusCode.NOTDIRECTORY, path: prettyPathOf([...node.pathList, name]) });
        return null;
      }
      node = this.insert(node, name, NodeKind.DIR);
    }
  }

  private insert(parent: DirectoryNode, name: string, kind: NodeKind): CollectionNode {
    const item = createNode(parent, name, kind);
    this.emit(StatusCode.ADDED, item);
    return item;
  }

  private emit(code: StatusCode, node: CollectionNode): void {
    this.sink.onStatus({ code, path: prettyPath(node) });
    if (code !== StatusCode.PROCESSING) this.changed = true;
  }

  private async updateNode(node: CollectionNode): Promise<void> {
    this.ctx.throwIfAborted();
    switch (node.kind) {
      case NodeKind.SYMLINK:
        return this.updateSymlink(node);
      case NodeKind.FILE:
        return this.updateFile(node);
      case NodeKind.DIR:
        return this.updateDirectory(node);
    }
  }

  private async updateSymlink(node: SymlinkNode): Promise<void> {
    const target = await fsp.readlink(fsPath(node));
    if (target !== node.target) {
      node.target = target;
      this.emit(StatusCode.SYMLINK, node);
    }
  }

  private async updateFile(node: FileNode): Promise<void> {
    const osPath = fsPath(node);
    const stat = await fsp.stat(osPath);
    const suspicious =
      this.force ||
      timestampDiffers(node.timestamp, stat.mtimeMs, this.tolerance) ||
      node.size !== stat.size ||
      node.checksum === '';
    if (!suspicious) return;

    if (this.ctx.verbose()) this.emit(StatusCode.PROCESSING, node);
    node.checksum = await this.checksum(osPath, this.ctx.abortSignal);
    node.timestamp = Math.trunc(stat.mtimeMs / 1000);
    node.size = stat.size;
    this.emit(StatusCode.CHECKSUM, node);
  }

  private async updateDirectory(dir: DirectoryNode): Promise<void> {
    if (this.ctx.verbose()) this.emit(StatusCode.PROCESSING, dir);

    for (const child of sortedChildren(dir)) {
      this.ctx.throwIfAborted();
      if (isIgnored(dir, child.name)) {
        deleteNode(child);
        this.emit(StatusCode.IGNORED, child);
      } else if (!(await nodeExists(child))) {
        deleteNode(child);
        this.emit(StatusCode.DELETED, child);
      }
    }

    const osPath = fsPath(dir);
    for (const name of await listSorted(osPath)) {
      this.ctx.throwIfAborted();
      if (isIgnored(dir, name) || dir.children.has(name)) continue;
      // sockets, fifos and devices are not tracked
      const kind = await classifyLive(path.join(osPath, name));
      if (kind !== null) this.insert(dir, name, kind);
    }

    for (const child of sortedChildren(dir)) {
      if (child.kind === NodeKind.DIR && !this.ctx.recurse) continue;
      await this.updateNode(child);
    }
  }
}
