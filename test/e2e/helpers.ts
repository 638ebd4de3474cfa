import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { runCli } from '../../src/cli/program.js';

// --- Filesystem helpers ----------------------------------------------------

// Each E2E test uses its own temp root so tests can run in parallel safely.
export function createTempDir(prefix = 'treeledger-e2e-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, relative: string, content: string): string {
  const file = path.join(dir, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

// --- CLI helpers -----------------------------------------------------------

class Capture extends Writable {
  private readonly chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }

  lines(): string[] {
    return this.text().split('\n').filter((line) => line !== '');
  }
}

export interface CliRun {
  code: number;
  stdout: string[];
  stderr: string[];
}

/** Run one command line in `cwd` and collect its output lines. */
export function run(cwd: string, ...argv: string[]): Promise<CliRun> {
  return runWithSignal(cwd, undefined, ...argv);
}

export async function runWithSignal(cwd: string, signal: AbortSignal | undefined, ...argv: string[]): Promise<CliRun> {
  const stdout = new Capture();
  const stderr = new Capture();
  const code = await runCli(argv, { stdout, stderr, cwd, signal });
  return { code, stdout: stdout.lines(), stderr: stderr.lines() };
}
