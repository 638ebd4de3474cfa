/** Pretty paths whose checksum already verified clean, kept across interrupted verify runs. */
export interface VerifyState {
  has(prettyPath: string): boolean;
  add(prettyPath: string): void;
  close(): void;
}
