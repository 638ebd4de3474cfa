import type { CollectionNode } from './node.js';
import type { MetaRecord } from './meta.js';
import type { CompiledRegex } from '../rules/compileRegex.js';

export interface MetaRule {
  /** The rule file node that declared the rule. */
  source: CollectionNode;
  name: string;
  /** Comma-separated alternatives of `/`-delimited glob segments. */
  pattern: string;
  /** `.`/`..`-aware scope root, relative to the rule file's directory or absolute from the collection root. */
  target: string;
  autoName: Set<string>;
  meta: MetaRecord[];
  users: CollectionNode[];
}

export type PatternStep =
  | { kind: 'stay' }
  | { kind: 'up' }
  | { kind: 'match'; regex: CompiledRegex; capturesVersion: boolean };

export interface CompiledRule {
  rule: MetaRule;
  patterns: PatternStep[][];
}
