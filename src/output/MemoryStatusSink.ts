import type { StatusCode } from '../types/enums.js';
import type { StatusEvent, StatusSink } from '../types/status.js';

export class MemoryStatusSink implements StatusSink {
  readonly events: StatusEvent[] = [];
  readonly errors: StatusEvent[] = [];

  onStatus(event: StatusEvent): void {
    this.events.push(event);
  }

  onError(event: StatusEvent): void {
    this.errors.push(event);
  }

  /** `CODE:path` for every status event, in emission order. */
  lines(): string[] {
    return this.events.map((event) => `${event.code}:${event.path}`);
  }

  errorLines(): string[] {
    return this.errors.map((event) => `${event.code}:${event.path}`);
  }

  codes(): StatusCode[] {
    return this.events.map((event) => event.code);
  }

  ofCode(code: StatusCode): StatusEvent[] {
    return this.events.filter((event) => event.code === code);
  }

  clear(): void {
    this.events.length = 0;
    this.errors.length = 0;
  }
}
