import fsp from 'node:fs/promises';
import path from 'node:path';
import type { RunContext } from '../context/RunContext.js';
import type { CollectionNode, DirectoryNode, FileNode, SymlinkNode } from '../types/node.js';
import type { StatusSink } from '../types/status.js';
import type { VerifyState } from '../state/VerifyState.js';
import { NodeKind, StatusCode } from '../types/enums.js';
import { TIMESTAMP_TOLERANCE_SECONDS } from '../config.js';
import { childPrettyPath, fsPath, nodeExists, prettyPath, sortedChildren } from '../collection/node.js';
import { isRealDirectory, listSorted } from '../utils/fs.js';
import { md5File, type ChecksumFn } from './checksum.js';
import { isIgnored } from './ignore.js';

export interface CheckOptions {
  /** Recompute checksums (verify). */
  deep?: boolean;
  state?: VerifyState;
  tolerance?: number;
  checksum?: ChecksumFn;
}

export function timestampDiffers(recorded: number, mtimeMs: number, tolerance: number): boolean {
  return Math.abs(recorded - mtimeMs / 1000) > tolerance;
}

/**
 * Read-only diff of the tree against the filesystem. Every finding is reported and
 * the walk continues; the result is true only when nothing drifted.
 */
export class DefaultChecker {
  private readonly deep: boolean;
  private readonly tolerance: number;
  private readonly checksum: ChecksumFn;

  constructor(
    private readonly ctx: RunContext,
    private readonly sink: StatusSink,
    private readonly options: CheckOptions = {}
  ) {
    this.deep = options.deep ?? false;
    this.tolerance = options.tolerance ?? TIMESTAMP_TOLERANCE_SECONDS;
    this.checksum = options.checksum ?? md5File;
  }

  async check(node: CollectionNode): Promise<boolean> {
    if (!(await nodeExists(node))) {
      this.status(StatusCode.MISSING, prettyPath(node));
      return false;
    }
    switch (node.kind) {
      case NodeKind.SYMLINK:
        return this.checkSymlink(node);
      case NodeKind.FILE:
        return this.checkFile(node);
      case NodeKind.DIR:
        return this.checkDirectory(node);
    }
  }

  private status(code: StatusCode, where: string): void {
    this.sink.onStatus({ code, path: where });
  }

  private async checkSymlink(node: SymlinkNode): Promise<boolean> {
    this.ctx.throwIfAborted();
    const target = await fsp.readlink(fsPath(node));
    if (target !== node.target) {
      this.status(StatusCode.SYMLINK, prettyPath(node));
      return false;
    }
    return true;
  }

  private async checkFile(node: FileNode): Promise<boolean> {
    this.ctx.throwIfAborted();
    const where = prettyPath(node);
    const stat = await fsp.stat(fsPath(node));
    let status = true;

    if (timestampDiffers(node.timestamp, stat.mtimeMs, this.tolerance)) {
      this.status(StatusCode.TIMESTAMP, where);
      status = false;
    }
    if (node.size !== stat.size) {
      this.status(StatusCode.SIZE, where);
      status = false;
    }

    if (this.deep) {
      const state = this.options.state;
      const verify = !state?.has(where);
      if (this.ctx.verbose()) this.status(verify ? StatusCode.PROCESSING : StatusCode.SKIPPED, where);
      if (verify) {
        const checksum = await this.checksum(fsPath(node), this.ctx.abortSignal);
        if (checksum !== node.checksum) {
          this.status(StatusCode.CHECKSUM, where);
          status = false;
        } else {
          state?.add(where);
        }
      }
    }
    return status;
  }

  private async checkDirectory(node: DirectoryNode): Promise<boolean> {
    this.ctx.throwIfAborted();
    const where = prettyPath(node);
    if (this.ctx.verbose()) this.status(StatusCode.PROCESSING, where);
    let status = true;

    const children = sortedChildren(node);
    for (const child of children) {
      this.ctx.throwIfAborted();
      if (isIgnored(node, child.name)) this.status(StatusCode.SHOULDIGNORE, prettyPath(child));
      if (!(await nodeExists(child))) {
        this.status(StatusCode.MISSING, prettyPath(child));
        status = false;
        if (child.kind === NodeKind.DIR && this.ctx.recurse) this.reportMissing(child);
      }
    }

    const osPath = fsPath(node);
    for (const name of await listSorted(osPath)) {
      this.ctx.throwIfAborted();
      if (isIgnored(node, name) || node.children.has(name)) continue;
      const childWhere = childPrettyPath(where, name);
      this.status(StatusCode.NEW, childWhere);
      status = false;
      const childOsPath = path.join(osPath, name);
      if (this.ctx.recurse && (await isRealDirectory(childOsPath))) {
        await this.reportNew(childOsPath, childWhere);
      }
    }

    for (const child of children) {
      if (!(await nodeExists(child))) continue;
      let ok = true;
      switch (child.kind) {
        case NodeKind.SYMLINK:
          ok = await this.checkSymlink(child);
          break;
        case NodeKind.FILE:
          ok = await this.checkFile(child);
          break;
        case NodeKind.DIR:
          if (this.ctx.recurse) ok = await this.checkDirectory(child);
          break;
      }
      if (!ok) status = false;
    }
    return status;
  }

  private reportMissing(dir: DirectoryNode): void {
    for (const child of sortedChildren(dir)) {
      this.status(StatusCode.MISSING, prettyPath(child));
      if (child.kind === NodeKind.DIR) this.reportMissing(child);
    }
  }

  /** Everything under an untracked directory is new. */
  private async reportNew(osPath: string, where: string): Promise<void> {
    if (this.ctx.verbose()) this.status(StatusCode.PROCESSING, where);
    for (const name of await listSorted(osPath)) {
      this.ctx.throwIfAborted();
      const childWhere = childPrettyPath(where, name);
      this.status(StatusCode.NEW, childWhere);
      const childOsPath = path.join(osPath, name);
      if (await isRealDirectory(childOsPath)) await this.reportNew(childOsPath, childWhere);
    }
  }
}
