/** A violated tree invariant. Indicates a bug, never bad user input. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export class OperationAbortedError extends Error {
  constructor(message = 'Aborted by interrupt') {
    super(message);
    this.name = 'OperationAbortedError';
  }
}

export class ManifestError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(message);
    this.name = 'ManifestError';
    this.file = file;
  }
}
