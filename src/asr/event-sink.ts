import type { Writable } from 'stream';
import type { ServiceEvent } from './protocol.js';
import type { AsrError } from './errors.js';

/**
 * Writes one JSON line per service event, in the order the session forwards
 * them. Each record is a single write call, so a line is never split or
 * interleaved with another.
 *
 * Service events are written as the payload the service sent. The two client
 * records (`client.error`, `client.cancelled`) close the log of a session that
 * did not end gracefully.
 */
export class EventSink {
  private readonly out: Writable;
  private written = 0;

  constructor(out: Writable) {
    this.out = out;
  }

  /** Number of service event records written. */
  get count(): number {
    return this.written;
  }

  write(event: ServiceEvent): void {
    this.writeLine(event.raw);
    this.written++;
  }

  reportFailure(error: AsrError): void {
    const body: Record<string, unknown> = { kind: error.kind, message: error.message };
    if (error.payload) body.payload = error.payload;
    this.writeLine({ type: 'client.error', error: body });
  }

  reportCancelled(reason: string): void {
    this.writeLine({ type: 'client.cancelled', reason });
  }

  /** Resolves once everything written so far has been handed to the underlying sink. */
  flush(): Promise<void> {
    if (this.out.writableEnded || this.out.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      this.out.write('', () => resolve());
    });
  }

  private writeLine(record: Record<string, unknown>): void {
    if (this.out.destroyed) return;
    this.out.write(`${JSON.stringify(record)}\n`);
  }
}
