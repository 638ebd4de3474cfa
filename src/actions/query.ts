import fsp from 'node:fs/promises';
import path from 'node:path';
import type { ActionEnv } from './env.js';
import type { FindHit } from '../query/find.js';
import { StatusCode } from '../types/enums.js';
import { MD5SUMS_FILE_NAME, INFO_FILE_NAME } from '../config.js';
import { prettyPath } from '../collection/node.js';
import { Exporter } from '../query/exporter.js';
import { findDescriptions, findPaths, findTags } from '../query/find.js';
import { resolveNode } from './env.js';

export interface FindActionOptions {
  /** Subtree to search; defaults to the working directory. */
  path?: string;
  all?: boolean;
}

export interface FindPathActionOptions {
  path?: string;
  ignoreCase?: boolean;
}

function report(env: ActionEnv, code: StatusCode, hits: FindHit[], withTerms: boolean): boolean {
  for (const hit of hits) {
    env.sink.onStatus({ code, path: prettyPath(hit.node), message: withTerms ? hit.found.join(',') : undefined });
  }
  return hits.length > 0;
}

export function findTagAction(env: ActionEnv, tags: string[], options: FindActionOptions = {}): boolean {
  const node = resolveNode(env, options.path ?? '.');
  if (!node) return false;
  return report(env, StatusCode.FINDTAG, findTags(node, tags, { all: options.all }), true);
}

export function findDescAction(env: ActionEnv, terms: string[], options: FindActionOptions = {}): boolean {
  const node = resolveNode(env, options.path ?? '.');
  if (!node) return false;
  return report(env, StatusCode.FINDDESC, findDescriptions(node, terms, { all: options.all }), true);
}

export function findPathAction(env: ActionEnv, pattern: string, options: FindPathActionOptions = {}): boolean {
  const node = resolveNode(env, options.path ?? '.');
  if (!node) return false;
  let hits: FindHit[];
  try {
    hits = findPaths(node, pattern, { ignoreCase: options.ignoreCase });
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    env.sink.onError({ code: StatusCode.BADPATTERN, path: pattern, message: err.message });
    return false;
  }
  return report(env, StatusCode.FINDPATH, hits, false);
}

/** Write md5sums.txt and info.txt into `exportDir`. */
export async function exportAction(env: ActionEnv, exportDir: string): Promise<boolean> {
  const exporter = new Exporter(env.sink, () => env.ctx.verbose());
  const { md5sums, info } = exporter.export(env.collection.rootNode);
  await fsp.mkdir(exportDir, { recursive: true });
  await fsp.writeFile(path.join(exportDir, MD5SUMS_FILE_NAME), md5sums.map((line) => `${line}\n`).join(''), 'utf8');
  await fsp.writeFile(path.join(exportDir, INFO_FILE_NAME), info.map((line) => `${line}\n`).join(''), 'utf8');
  return true;
}
