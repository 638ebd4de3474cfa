import { OperationAbortedError } from '../types/error.js';

export interface RunContextOptions {
  verbose?: boolean;
  recurse?: boolean;
  signal?: AbortSignal;
}

/**
 * Per-run verbosity and cancellation token. Engines poll it at every tree-walk step.
 */
export class RunContext {
  readonly recurse: boolean;
  private readonly verboseFlag: boolean;
  private readonly signal: AbortSignal | undefined;
  private escalated = false;

  constructor(options: RunContextOptions = {}) {
    this.verboseFlag = options.verbose ?? false;
    this.recurse = options.recurse ?? true;
    this.signal = options.signal;
  }

  /** True when verbose output is configured, or once after `escalateVerbose`. */
  verbose(): boolean {
    const result = this.verboseFlag || this.escalated;
    this.escalated = false;
    return result;
  }

  escalateVerbose(): void {
    this.escalated = true;
  }

  get aborted(): boolean {
    return this.signal?.aborted ?? false;
  }

  get abortSignal(): AbortSignal | undefined {
    return this.signal;
  }

  throwIfAborted(): void {
    if (this.aborted) throw new OperationAbortedError();
  }
}
