import type { RunContext } from '../context/RunContext.js';
import type { CollectionNode, DirectoryNode } from '../types/node.js';
import type { CompiledRule, MetaRule, PatternStep } from '../types/rule.js';
import type { StatusSink } from '../types/status.js';
import { MetaType, type MetaRecord } from '../types/meta.js';
import { NodeKind, StatusCode } from '../types/enums.js';
import { addMeta, clearMeta, metaAttributes } from '../collection/meta.js';
import { prettyPath, sortedChildren, walkNodes } from '../collection/node.js';
import { capturedVersion, compilePattern } from './pattern.js';
import { findTarget } from './target.js';

export function compileRules(rules: MetaRule[]): CompiledRule[] {
  return rules.map((rule) => ({ rule, patterns: compilePattern(rule.pattern) }));
}

export function autoProvides(rule: MetaRule, version: string): MetaRecord[] {
  return Array.from(rule.autoName, (name) => ({ type: MetaType.PROVIDES, name, version }));
}

export function clearAllMeta(root: DirectoryNode): void {
  for (const node of walkNodes(root)) clearMeta(node);
}

/**
 * Binds rules to nodes. Each pattern is walked one segment per directory level, so a
 * glob never matches across a directory boundary and a version captured on the way
 * down feeds the auto-provides of the node finally matched.
 */
export class DefaultRuleApplier {
  constructor(private readonly ctx: RunContext, private readonly sink: StatusSink) {}

  apply(rules: MetaRule[]): boolean {
    let status = true;
    for (const { rule, patterns } of compileRules(rules)) {
      this.ctx.throwIfAborted();
      const target = findTarget(rule);
      if (!target) {
        this.sink.onError({ code: StatusCode.BADTARGET, path: prettyPath(rule.source), message: `${rule.name}: ${rule.target}` });
        status = false;
        continue;
      }
      for (const steps of patterns) {
        this.walk(target, steps, rule, undefined);
      }
    }
    return status;
  }

  private walk(start: DirectoryNode, steps: PatternStep[], rule: MetaRule, version: string | undefined): void {
    if (steps.length === 0) return;

    let node = start;
    let index = 0;
    for (; index < steps.length; index += 1) {
      const step = steps[index];
      if (step.kind === 'match') break;
      if (step.kind === 'up') node = node.parent ?? node;
    }
    if (index === steps.length) {
      this.bind(node, rule, version);
      return;
    }

    const step = steps[index];
    if (step.kind !== 'match') return;
    const rest = steps.slice(index + 1);

    for (const child of sortedChildren(node)) {
      const match = step.regex.exec(child.name);
      if (!match) continue;
      const childVersion = step.capturesVersion ? capturedVersion(match) : version;
      if (rest.length === 0) {
        this.bind(child, rule, childVersion);
      } else if (child.kind === NodeKind.DIR) {
        this.walk(child, rest, rule, childVersion);
      }
    }
  }

  private bind(node: CollectionNode, rule: MetaRule, version: string | undefined): void {
    rule.users.push(node);
    const records = version !== undefined ? [...rule.meta, ...autoProvides(rule, version)] : rule.meta;
    for (const record of records) addMeta(node, record);

    if (this.ctx.verbose()) {
      const where = prettyPath(node);
      this.sink.onStatus({ code: StatusCode.META, path: where, message: `FROM: ${prettyPath(rule.source)}:${rule.name}` });
      for (const record of records) {
        this.sink.onStatus({ code: StatusCode.META, path: where, message: JSON.stringify(metaAttributes(record)) });
      }
    }
  }
}
