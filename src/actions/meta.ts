import type { ActionEnv } from './env.js';
import type { ReadText } from '../rules/RuleLoader.js';
import { StatusCode } from '../types/enums.js';
import { prettyPath } from '../collection/node.js';
import { RuleLoader } from '../rules/RuleLoader.js';
import { DefaultRuleApplier, clearAllMeta } from '../rules/DefaultRuleApplier.js';
import { DependencyResolver } from '../deps/DependencyResolver.js';
import { MetaReporter, type MetaReportOptions } from '../query/metaReport.js';

export interface UpdateMetaOptions {
  readText?: ReadText;
}

/**
 * Rebuild all metadata from the rule files. Nothing is touched when a rule file
 * fails to load.
 */
export async function updateMetaAction(env: ActionEnv, options: UpdateMetaOptions = {}): Promise<boolean> {
  const root = env.collection.rootNode;
  const { rules, ok } = await new RuleLoader(env.ctx, env.sink, options.readText).load(root);
  if (!ok) return false;

  clearAllMeta(root);
  const applied = new DefaultRuleApplier(env.ctx, env.sink).apply(rules);
  env.collection.dirty = true;

  for (const rule of rules) {
    if (rule.users.length === 0) {
      env.sink.onStatus({ code: StatusCode.UNUSEDMETA, path: prettyPath(rule.source), message: rule.name });
    }
  }
  return applied;
}

export function checkMetaAction(env: ActionEnv): boolean {
  return new DependencyResolver(env.ctx, env.sink).check(env.collection.rootNode);
}

export function metaReportAction(env: ActionEnv, options: MetaReportOptions = {}): boolean {
  new MetaReporter(env.sink).report(env.collection.rootNode, options);
  return true;
}
