import type { VerifyState } from '../VerifyState.js';

export class MemoryVerifyState implements VerifyState {
  private readonly verified: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.verified = new Set(initial);
  }

  has(prettyPath: string): boolean {
    return this.verified.has(prettyPath);
  }

  add(prettyPath: string): void {
    this.verified.add(prettyPath);
  }

  close(): void {}

  get size(): number {
    return this.verified.size;
  }
}
