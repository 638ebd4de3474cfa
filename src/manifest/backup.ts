import fsp from 'node:fs/promises';
import path from 'node:path';
import { lstatOrNull } from '../utils/fs.js';

export function backupName(file: string, dir: string, index: number): string {
  return path.join(dir, `${path.basename(file)}.${index}bak`);
}

/**
 * Shift `<name>.1bak … <name>.<count>bak` up by one, dropping the oldest, and copy the
 * current manifest to `.1bak`. The manifest itself stays in place until the new one
 * is renamed over it.
 */
export async function rotateBackups(file: string, dir: string, count: number): Promise<void> {
  if (count <= 0 || !(await lstatOrNull(file))) return;
  await fsp.mkdir(dir, { recursive: true });

  await fsp.rm(backupName(file, dir, count), { force: true });
  for (let index = count - 1; index >= 1; index -= 1) {
    const from = backupName(file, dir, index);
    if (await lstatOrNull(from)) await fsp.rename(from, backupName(file, dir, index + 1));
  }
  await fsp.copyFile(file, backupName(file, dir, 1));
}
