import fs from 'node:fs';
import fsp from 'node:fs/promises';
import { NodeKind } from '../types/enums.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function isMissingError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && MISSING_CODES.has(code);
}

export async function lstatOrNull(osPath: string): Promise<fs.Stats | null> {
  try {
    return await fsp.lstat(osPath);
  } catch (err) {
    if (isMissingError(err)) return null;
    throw err;
  }
}

/** Classify a live entry: symlink, then regular file, then directory. Other kinds are not tracked. */
export async function classifyLive(osPath: string): Promise<NodeKind | null> {
  const stat = await lstatOrNull(osPath);
  if (!stat) return null;
  if (stat.isSymbolicLink()) return NodeKind.SYMLINK;
  if (stat.isFile()) return NodeKind.FILE;
  if (stat.isDirectory()) return NodeKind.DIR;
  return null;
}

export async function isRealDirectory(osPath: string): Promise<boolean> {
  const stat = await lstatOrNull(osPath);
  return stat !== null && stat.isDirectory();
}

export async function listSorted(osPath: string): Promise<string[]> {
  const names = await fsp.readdir(osPath);
  return names.sort();
}

export function describeFsError(err: unknown): string {
  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);
  return code && !message.includes(code) ? `${code}: ${message}` : message;
}
