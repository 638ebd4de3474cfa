import type { ActionEnv } from './env.js';
import { StatusCode } from '../types/enums.js';
import { prettyPath } from '../collection/node.js';
import { deleteNode, rename, reparent } from '../collection/mutate.js';
import { resolveNode } from './env.js';

export function moveAction(env: ActionEnv, osPath: string, parentPath: string): boolean {
  const node = resolveNode(env, osPath);
  const parent = resolveNode(env, parentPath);
  if (!node || !parent) return false;

  const from = prettyPath(node);
  if (!reparent(node, parent)) {
    env.sink.onError({ code: StatusCode.NOMOVE, path: from });
    return false;
  }
  env.sink.onStatus({ code: StatusCode.MOVE, path: from, message: prettyPath(node) });
  return true;
}

export function renameAction(env: ActionEnv, osPath: string, newName: string): boolean {
  const node = resolveNode(env, osPath);
  if (!node) return false;

  const from = prettyPath(node);
  if (!rename(node, newName)) {
    env.sink.onError({ code: StatusCode.NORENAME, path: from, message: newName });
    return false;
  }
  env.sink.onStatus({ code: StatusCode.RENAME, path: from, message: prettyPath(node) });
  return true;
}

export function deleteAction(env: ActionEnv, osPath: string): boolean {
  const node = resolveNode(env, osPath);
  if (!node) return false;

  const where = prettyPath(node);
  if (!deleteNode(node)) {
    env.sink.onError({ code: StatusCode.NODELETE, path: where });
    return false;
  }
  env.sink.onStatus({ code: StatusCode.DELETE, path: where });
  return true;
}
