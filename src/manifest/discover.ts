import path from 'node:path';
import { lstatOrNull } from '../utils/fs.js';

export interface FindManifestOptions {
  cwd: string;
  /** Search `cwd` and then each ancestor directory. */
  walk?: boolean;
}

export async function findManifest(name: string, options: FindManifestOptions): Promise<string | null> {
  if (!options.walk) {
    const file = path.resolve(options.cwd, name);
    return (await lstatOrNull(file)) ? file : null;
  }

  let dir = path.resolve(options.cwd);
  for (;;) {
    const file = path.join(dir, name);
    if (await lstatOrNull(file)) return file;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}
