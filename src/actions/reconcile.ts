import type { ActionEnv } from './env.js';
import type { VerifyState } from '../state/VerifyState.js';
import type { ChecksumFn } from '../reconcile/checksum.js';
import { DefaultChecker } from '../reconcile/DefaultChecker.js';
import { DefaultUpdater } from '../reconcile/DefaultUpdater.js';
import { normalizePath, resolveNode } from './env.js';

export interface CheckActionOptions {
  path?: string;
  state?: VerifyState;
  checksum?: ChecksumFn;
}

export interface UpdateActionOptions {
  path?: string;
  force?: boolean;
  checksum?: ChecksumFn;
}

export interface AddActionOptions {
  parents?: boolean;
  checksum?: ChecksumFn;
}

export async function checkAction(env: ActionEnv, options: CheckActionOptions = {}): Promise<boolean> {
  const node = resolveNode(env, options.path ?? '.');
  if (!node) return false;
  return new DefaultChecker(env.ctx, env.sink, { deep: false }).check(node);
}

export async function verifyAction(env: ActionEnv, options: CheckActionOptions = {}): Promise<boolean> {
  const node = resolveNode(env, options.path ?? '.');
  if (!node) return false;
  const checker = new DefaultChecker(env.ctx, env.sink, { deep: true, state: options.state, checksum: options.checksum });
  return checker.check(node);
}

export async function updateAction(env: ActionEnv, options: UpdateActionOptions = {}): Promise<boolean> {
  const node = resolveNode(env, options.path ?? '.');
  if (!node) return false;
  return new DefaultUpdater(env.ctx, env.sink, { force: options.force, checksum: options.checksum }).update(node);
}

export async function addAction(env: ActionEnv, osPath: string, options: AddActionOptions = {}): Promise<boolean> {
  const pathList = normalizePath(env, osPath);
  if (pathList === null) return false;
  const updater = new DefaultUpdater(env.ctx, env.sink, { checksum: options.checksum });
  return updater.add(env.collection, pathList, { parents: options.parents });
}
