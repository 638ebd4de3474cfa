import type { Collection } from '../collection/Collection.js';
import type { RunContext } from '../context/RunContext.js';
import type { CollectionNode } from '../types/node.js';
import type { StatusSink } from '../types/status.js';
import { StatusCode } from '../types/enums.js';
import { findNode } from '../collection/lookup.js';
import { prettyPathOf } from '../collection/node.js';

/** Everything an action needs from the program: the loaded collection and where output goes. */
export interface ActionEnv {
  collection: Collection;
  ctx: RunContext;
  sink: StatusSink;
  /** Directory relative path arguments are resolved against. */
  cwd: string;
}

export function normalizePath(env: ActionEnv, osPath: string): string[] | null {
  const pathList = env.collection.normalize(osPath, env.cwd);
  if (pathList === null) env.sink.onError({ code: StatusCode.BADPATH, path: osPath });
  return pathList;
}

/** Map a path argument to its node, reporting BADPATH or NONODE when that fails. */
export function resolveNode(env: ActionEnv, osPath: string): CollectionNode | null {
  const pathList = normalizePath(env, osPath);
  if (pathList === null) return null;
  const where = prettyPathOf(pathList);
  if (env.ctx.verbose()) env.sink.onStatus({ code: StatusCode.WORKPATH, path: where });

  const node = findNode(env.collection.rootNode, pathList);
  if (!node) {
    env.sink.onError({ code: StatusCode.NONODE, path: where });
    return null;
  }
  return node;
}
