#!/usr/bin/env node
import { runCli, EXIT_INTERRUPTED } from './cli/program.js';

const controller = new AbortController();

process.on('SIGINT', () => {
  // a second interrupt does not wait for the walk to notice the first
  if (controller.signal.aborted) process.exit(EXIT_INTERRUPTED);
  controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: process.cwd(),
  signal: controller.signal,
  onContext: (ctx) => {
    // SIGUSR1 belongs to the Node inspector; Windows has neither
    if (process.platform !== 'win32') process.on('SIGUSR2', () => ctx.escalateVerbose());
  }
});
