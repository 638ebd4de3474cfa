import type { CollectionNode, DirectoryNode } from '../types/node.js';
import type { StatusSink } from '../types/status.js';
import { MetaType } from '../types/meta.js';
import { NodeKind, StatusCode } from '../types/enums.js';
import { DESCRIPTION_WRAP_WIDTH } from '../config.js';
import { getMeta, hasMeta } from '../collection/meta.js';
import { prettyPath, sortedChildren } from '../collection/node.js';
import { formatDependency } from '../deps/DependencyResolver.js';
import { wrapText } from '../utils/wrap.js';

export interface ExportResult {
  /** `<checksum> *<path relative to the root>` per file with a checksum. */
  md5sums: string[];
  info: string[];
}

export function metaDigest(node: CollectionNode): string[] {
  const lines: string[] = [];
  const provides = getMeta(node, MetaType.PROVIDES).map((r) => (r.version ? `${r.name}:${r.version}` : r.name));
  const depends = getMeta(node, MetaType.DEPENDS).map(formatDependency);
  const tags = Array.from(new Set(getMeta(node, MetaType.TAG).map((r) => r.tag))).sort();
  const description = getMeta(node, MetaType.DESCRIPTION)
    .map((r) => r.description)
    .join('\n');

  if (provides.length > 0) lines.push(`Provides: ${provides.join(', ')}`);
  if (depends.length > 0) lines.push(`Depends: ${depends.join(', ')}`);
  if (tags.length > 0) lines.push(`Tags: ${tags.join(', ')}`);
  const wrapped = wrapText(description, DESCRIPTION_WRAP_WIDTH);
  if (wrapped.length > 0) lines.push('Description:', ...wrapped.map((line) => `  ${line}`));
  return lines;
}

export class Exporter {
  constructor(private readonly sink: StatusSink, private readonly verbose: () => boolean = () => false) {}

  export(root: DirectoryNode): ExportResult {
    const result: ExportResult = { md5sums: [], info: [] };
    this.visit(root, result);
    return result;
  }

  private visit(node: CollectionNode, out: ExportResult): void {
    const where = prettyPath(node);
    switch (node.kind) {
      case NodeKind.DIR:
        if (this.verbose()) this.sink.onStatus({ code: StatusCode.PROCESSING, path: where });
        out.info.push(`Directory: ${where}`);
        break;
      case NodeKind.SYMLINK:
        out.info.push(`Symlink: ${where}`, `Target: ${node.target}`);
        break;
      case NodeKind.FILE:
        out.info.push(`File: ${where}`, `Size: ${node.size}`, `MD5: ${node.checksum}`, `Modified: ${node.timestamp}`);
        if (node.checksum !== '') {
          out.md5sums.push(`${node.checksum} *${where.slice(1)}`);
        } else {
          this.sink.onStatus({ code: StatusCode.MISSINGCHECKSUM, path: where });
        }
        break;
    }
    if (hasMeta(node)) out.info.push(...metaDigest(node));

    if (node.kind === NodeKind.DIR) {
      for (const child of sortedChildren(node)) {
        out.info.push('');
        this.visit(child, out);
      }
    }
  }
}
