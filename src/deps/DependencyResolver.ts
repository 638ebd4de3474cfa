import type { RunContext } from '../context/RunContext.js';
import type { DirectoryNode } from '../types/node.js';
import type { StatusSink } from '../types/status.js';
import { MetaType, type DependsMeta } from '../types/meta.js';
import { StatusCode } from '../types/enums.js';
import { getMeta } from '../collection/meta.js';
import { prettyPath, walkNodes } from '../collection/node.js';
import { versionInRange } from './version.js';

/** Package name to declared versions; null stands for a versionless provide. */
export type ProvidesIndex = Map<string, Set<string | null>>;

export function formatDependency(dep: DependsMeta): string {
  if (dep.maxVersion !== '') return `${dep.name}:${dep.minVersion}:${dep.maxVersion}`;
  if (dep.minVersion !== '') return `${dep.name}:${dep.minVersion}`;
  return dep.name;
}

export function collectProvides(root: DirectoryNode): ProvidesIndex {
  const index: ProvidesIndex = new Map();
  for (const node of walkNodes(root)) {
    for (const record of getMeta(node, MetaType.PROVIDES)) {
      if (record.name === '') continue;
      let versions = index.get(record.name);
      if (!versions) {
        versions = new Set();
        index.set(record.name, versions);
      }
      versions.add(record.version === '' ? null : record.version);
    }
  }
  return index;
}

export function isSatisfied(dep: DependsMeta, index: ProvidesIndex): boolean {
  const versions = index.get(dep.name);
  if (!versions) return false;
  if (dep.minVersion === '' && dep.maxVersion === '') return true;
  for (const version of versions) {
    if (version !== null && versionInRange(version, dep.minVersion, dep.maxVersion)) return true;
  }
  return false;
}

export class DependencyResolver {
  constructor(private readonly ctx: RunContext, private readonly sink: StatusSink) {}

  check(root: DirectoryNode): boolean {
    const index = collectProvides(root);
    let status = true;
    for (const node of walkNodes(root)) {
      this.ctx.throwIfAborted();
      for (const dep of getMeta(node, MetaType.DEPENDS)) {
        if (isSatisfied(dep, index)) continue;
        this.sink.onStatus({ code: StatusCode.DEPENDS, path: prettyPath(node), message: formatDependency(dep) });
        status = false;
      }
    }
    return status;
  }
}
