import type { Writable } from 'node:stream';
import type { StatusEvent, StatusSink } from '../types/status.js';

const DETAIL_INDENT = '    ';

/** Renders `CODE:path` lines to one stream; consecutive events for the same header only add detail lines. */
export class StatusStream {
  private last: string | null = null;

  constructor(private readonly out: Writable) {}

  write(event: StatusEvent): void {
    const header = `${event.code}:${event.path}`;
    if (header !== this.last) {
      this.last = header;
      this.out.write(`${header}\n`);
    }
    if (event.message !== undefined) {
      for (const line of event.message.split('\n')) this.out.write(`${DETAIL_INDENT}> ${line}\n`);
    }
  }
}

export class StatusWriter implements StatusSink {
  private readonly stdout: StatusStream;
  private readonly stderr: StatusStream;

  constructor(stdout: Writable = process.stdout, stderr: Writable = process.stderr) {
    this.stdout = new StatusStream(stdout);
    this.stderr = new StatusStream(stderr);
  }

  onStatus(event: StatusEvent): void {
    this.stdout.write(event);
  }

  onError(event: StatusEvent): void {
    this.stderr.write(event);
  }
}
