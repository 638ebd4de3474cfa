import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Each test gets its own temp root so files can run in parallel.
export function createTempDir(prefix = 'treeledger-int-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Write `files` (relative path -> content) under `dir`, creating directories as needed. */
export function writeTree(dir: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const file = path.join(dir, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
}

/** Overwrite a file and put its modification time back, so only the content differs. */
export function tamper(file: string, content: string): void {
  const before = fs.statSync(file);
  fs.writeFileSync(file, content);
  fs.utimesSync(file, before.atime, before.mtime);
}

export function shiftMtime(file: string, seconds: number): void {
  const stat = fs.statSync(file);
  const mtime = new Date(stat.mtimeMs + seconds * 1000);
  fs.utimesSync(file, mtime, mtime);
}
