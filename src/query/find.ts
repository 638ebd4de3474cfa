import type { CollectionNode } from '../types/node.js';
import { MetaType } from '../types/meta.js';
import { getMeta } from '../collection/meta.js';
import { prettyPath, walkNodes } from '../collection/node.js';
import { compileRegex } from '../rules/compileRegex.js';
import { globToRegExp } from '../rules/glob.js';

export interface FindHit {
  node: CollectionNode;
  /** Sorted search terms the node matched; empty for path searches. */
  found: string[];
}

export interface FindTermsOptions {
  /** Require every term instead of any. */
  all?: boolean;
}

export interface FindPathOptions {
  ignoreCase?: boolean;
}

const REGEX_PREFIX = 'r:';

function matchTerms(
  start: CollectionNode,
  terms: string[],
  options: FindTermsOptions,
  found: (node: CollectionNode, wanted: Set<string>) => Set<string>
): FindHit[] {
  const wanted = new Set(terms.map((term) => term.toLowerCase()));
  const hits: FindHit[] = [];
  for (const node of walkNodes(start)) {
    const matched = found(node, wanted);
    const ok = options.all ? matched.size === wanted.size : matched.size > 0;
    if (ok) hits.push({ node, found: Array.from(matched).sort() });
  }
  return hits;
}

/** Nodes carrying any (or all) of the tags, compared case-insensitively. */
export function findTags(start: CollectionNode, tags: string[], options: FindTermsOptions = {}): FindHit[] {
  return matchTerms(start, tags, options, (node, wanted) => {
    const have = new Set(getMeta(node, MetaType.TAG).map((record) => record.tag.toLowerCase()));
    return new Set(Array.from(wanted).filter((tag) => have.has(tag)));
  });
}

/** Nodes whose descriptions contain any (or all) of the substrings, compared case-insensitively. */
export function findDescriptions(start: CollectionNode, terms: string[], options: FindTermsOptions = {}): FindHit[] {
  return matchTerms(start, terms, options, (node, wanted) => {
    const text = getMeta(node, MetaType.DESCRIPTION)
      .map((record) => record.description.toLowerCase())
      .join(' ');
    return new Set(Array.from(wanted).filter((term) => text.includes(term)));
  });
}

/**
 * Nodes whose pretty path matches `pattern`: a glob over the whole path (`*` crosses
 * `/`), or with an `r:` prefix an unanchored regular expression.
 */
export function findPaths(start: CollectionNode, pattern: string, options: FindPathOptions = {}): FindHit[] {
  const flags = options.ignoreCase ? 'i' : '';
  const matcher = pattern.startsWith(REGEX_PREFIX)
    ? compileRegex(pattern.slice(REGEX_PREFIX.length), flags)
    : globToRegExp(pattern, { crossSegments: true, ignoreCase: options.ignoreCase });
  const hits: FindHit[] = [];
  for (const node of walkNodes(start)) {
    if (matcher.test(prettyPath(node))) hits.push({ node, found: [] });
  }
  return hits;
}
