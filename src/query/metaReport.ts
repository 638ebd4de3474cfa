import type { CollectionNode, DirectoryNode } from '../types/node.js';
import type { StatusSink } from '../types/status.js';
import { MetaType } from '../types/meta.js';
import { StatusCode } from '../types/enums.js';
import { getMeta, metaAttributes } from '../collection/meta.js';
import { prettyPath, walkNodes } from '../collection/node.js';
import { versionInRange } from '../deps/version.js';
import { wrapText } from '../utils/wrap.js';

const REPORT_WRAP_WIDTH = 70;

/** Letters select sections: (a)ll, (d)escription, (t)ags, (p)rovides, d(e)pends, (o)ther. */
export interface MetaReportOptions {
  types?: string;
  /** List the nodes satisfying each dependency. */
  all?: boolean;
}

interface Provider {
  node: CollectionNode;
  version: string;
}

function collectProviders(root: DirectoryNode): Map<string, Provider[]> {
  const providers = new Map<string, Provider[]>();
  for (const node of walkNodes(root)) {
    for (const record of getMeta(node, MetaType.PROVIDES)) {
      if (record.name === '') continue;
      const list = providers.get(record.name) ?? [];
      list.push({ node, version: record.version });
      providers.set(record.name, list);
    }
  }
  return providers;
}

function satisfies(provider: Provider, minVersion: string, maxVersion: string): boolean {
  if (minVersion === '' && maxVersion === '') return true;
  if (provider.version === '') return false;
  return versionInRange(provider.version, minVersion, maxVersion);
}

/** Human-readable listing of the metadata on every node. Reports only; never fails. */
export class MetaReporter {
  constructor(private readonly sink: StatusSink) {}

  report(root: DirectoryNode, options: MetaReportOptions = {}): void {
    const types = (options.types ?? 'a').toLowerCase();
    const wants = (letter: string) => types.includes('a') || types.includes(letter);
    const providers = collectProviders(root);

    for (const node of walkNodes(root)) {
      const emit = (message: string) => this.sink.onStatus({ code: StatusCode.META, path: prettyPath(node), message });
      const section = (title: string, lines: string[]) => {
        if (lines.length === 0) return;
        emit(title);
        for (const line of lines) emit(`    ${line}`);
      };

      if (wants('d')) {
        for (const record of getMeta(node, MetaType.DESCRIPTION)) {
          section('DESCRIPTION', wrapText(record.description, REPORT_WRAP_WIDTH));
        }
      }
      if (wants('t')) {
        section('TAGS', getMeta(node, MetaType.TAG).map((record) => record.tag).filter((tag) => tag !== ''));
      }
      if (wants('p')) {
        section(
          'PROVIDES',
          getMeta(node, MetaType.PROVIDES)
            .filter((record) => record.name !== '')
            .map((record) => (record.version ? `${record.name}:${record.version}` : record.name))
        );
      }
      if (wants('e')) {
        const lines: string[] = [];
        for (const dep of getMeta(node, MetaType.DEPENDS)) {
          if (dep.name === '') continue;
          const matching = (providers.get(dep.name) ?? []).filter((p) => satisfies(p, dep.minVersion, dep.maxVersion));
          let line = dep.name;
          if (dep.minVersion !== '') line += ` >= ${dep.minVersion}`;
          if (dep.maxVersion !== '') line += ` <= ${dep.maxVersion}`;
          if (matching.length === 0) line += ' (NO MATCHING PACKAGES)';
          lines.push(line);
          if (options.all) lines.push(...matching.map((p) => `    ${prettyPath(p.node)}`));
        }
        section('DEPENDS', lines);
      }
      if (wants('o')) {
        section(
          'OTHER',
          getMeta(node)
            .filter((record) => record.type === MetaType.IGNORE || record.type === MetaType.OPAQUE)
            .map((record) => JSON.stringify(metaAttributes(record)))
        );
      }
    }
  }
}
