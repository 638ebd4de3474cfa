import fsp from 'node:fs/promises';
import type { RunContext } from '../context/RunContext.js';
import type { CollectionNode, DirectoryNode } from '../types/node.js';
import type { MetaRule } from '../types/rule.js';
import type { StatusSink } from '../types/status.js';
import { MetaType, type MetaRecord } from '../types/meta.js';
import { NodeKind, StatusCode } from '../types/enums.js';
import { RULE_FILE_EXTENSION, RULE_FILE_NAME, RULE_OPTIONS_SECTION } from '../config.js';
import { fsPath, prettyPath, sortedChildren } from '../collection/node.js';
import { uniqueMeta } from '../collection/meta.js';
import { describeFsError } from '../utils/fs.js';
import { parseRuleFile } from './ruleFile.js';
import { collapseWhitespace, splitValue } from './splitValue.js';

export type ReadText = (osPath: string) => Promise<string>;

export interface RuleLoadResult {
  rules: MetaRule[];
  /** False when any rule file failed to load; rules from the others are still returned. */
  ok: boolean;
}

export function ruleFromSection(
  source: CollectionNode,
  name: string,
  section: Record<string, string>,
  options: Record<string, string>
): MetaRule {
  const meta: MetaRecord[] = [];

  for (const entry of splitValue(section.provides ?? '')) {
    const [packageName, version = ''] = entry.split(':');
    meta.push({ type: MetaType.PROVIDES, name: packageName, version });
  }
  for (const entry of splitValue(section.depends ?? '')) {
    const [packageName, minVersion = '', maxVersion = ''] = entry.split(':');
    meta.push({ type: MetaType.DEPENDS, name: packageName, minVersion, maxVersion });
  }
  for (const tag of splitValue(section.tags ?? '')) {
    meta.push({ type: MetaType.TAG, tag });
  }
  if (section.description !== undefined) {
    meta.push({ type: MetaType.DESCRIPTION, description: collapseWhitespace(section.description) });
  }
  for (const pattern of splitValue(section.ignore ?? '')) {
    meta.push({ type: MetaType.IGNORE, pattern });
  }

  return {
    source,
    name,
    // [*.txt] alone is shorthand for a section with pattern = *.txt
    pattern: section.pattern ?? name,
    target: options.target ?? '.',
    autoName: new Set(splitValue(section.autoname ?? '')),
    meta: uniqueMeta(meta),
    users: []
  };
}

/**
 * Collects rules from every tracked rule file. A directory carrying the rule file
 * name makes every other rule-extension file below it a rule file as well.
 */
export class RuleLoader {
  constructor(
    private readonly ctx: RunContext,
    private readonly sink: StatusSink,
    private readonly readText: ReadText = (osPath) => fsp.readFile(osPath, 'utf8')
  ) {}

  async load(root: DirectoryNode): Promise<RuleLoadResult> {
    const rules: MetaRule[] = [];
    const ok = await this.walk(root, false, rules);
    return { rules, ok };
  }

  private async walk(dir: DirectoryNode, force: boolean, rules: MetaRule[]): Promise<boolean> {
    let status = true;
    for (const child of sortedChildren(dir)) {
      this.ctx.throwIfAborted();
      if (child.name === RULE_FILE_NAME) {
        const loaded = child.kind === NodeKind.DIR
          ? await this.walk(child, true, rules)
          : await this.loadFile(child, rules);
        if (!loaded) status = false;
      } else if (child.kind === NodeKind.DIR) {
        if (!(await this.walk(child, force, rules))) status = false;
      } else if (force && isForcedRuleFile(child.name)) {
        if (!(await this.loadFile(child, rules))) status = false;
      }
    }
    return status;
  }

  private async loadFile(node: CollectionNode, rules: MetaRule[]): Promise<boolean> {
    const where = prettyPath(node);
    if (this.ctx.verbose()) this.sink.onStatus({ code: StatusCode.LOADING, path: where });

    let text: string;
    try {
      text = await this.readText(fsPath(node));
    } catch (err) {
      this.sink.onError({ code: StatusCode.LOADERROR, path: where, message: describeFsError(err) });
      return false;
    }

    const sections = parseRuleFile(text);
    const options = sections.get(RULE_OPTIONS_SECTION);
    if (!options) {
      this.sink.onError({ code: StatusCode.NOTMETAINFO, path: where });
      return false;
    }
    for (const [name, section] of sections) {
      if (name === RULE_OPTIONS_SECTION) continue;
      rules.push(ruleFromSection(node, name, section, options));
    }
    return true;
  }
}

function isForcedRuleFile(name: string): boolean {
  return name.toLowerCase().endsWith(RULE_FILE_EXTENSION) && !name.startsWith('.') && !name.startsWith('~');
}
