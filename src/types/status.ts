import type { StatusCode } from './enums.js';

export interface StatusEvent {
  code: StatusCode;
  path: string;
  message?: string;
}

export interface StatusSink {
  onStatus(event: StatusEvent): void;
  onError(event: StatusEvent): void;
}
