import { AsrError } from './errors.js';

export interface AudioChunk {
  readonly sequence: number;
  readonly data: Buffer;
}

export interface FramerOptions {
  chunkBytes: number;
  /** Bytes per sample frame (bytes per sample × channels). */
  frameBytes: number;
  /** First sequence number. */
  sequenceBase?: number;
}

/**
 * Cuts an arbitrary-sized burst stream into fixed-size chunks that never split
 * a sample frame. The remainder is carried between pushes and flushed as a
 * final, possibly shorter chunk at end of input.
 *
 * A remainder that is not a whole number of frames cannot be aligned; the
 * framer reports a FramingError and refuses any further input.
 */
export class AudioFramer {
  private readonly chunkBytes: number;
  private readonly frameBytes: number;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private nextSequence: number;
  private failure: AsrError | null = null;
  private flushed = false;

  constructor(options: FramerOptions) {
    const { chunkBytes, frameBytes } = options;
    if (!Number.isInteger(frameBytes) || frameBytes <= 0) {
      throw new AsrError('ConfigurationError', `frame size must be a positive integer, got ${frameBytes}`);
    }
    if (!Number.isInteger(chunkBytes) || chunkBytes <= 0 || chunkBytes % frameBytes !== 0) {
      throw new AsrError(
        'ConfigurationError',
        `chunk size must be a positive multiple of ${frameBytes} bytes, got ${chunkBytes}`
      );
    }
    this.chunkBytes = chunkBytes;
    this.frameBytes = frameBytes;
    this.nextSequence = options.sequenceBase ?? 0;
  }

  /** Bytes held back waiting for a full chunk. */
  get buffered(): number {
    return this.pendingBytes;
  }

  /** Sequence number the next chunk will carry. */
  get sequence(): number {
    return this.nextSequence;
  }

  push(burst: Buffer): AudioChunk[] {
    this.assertUsable();
    if (burst.length === 0) return [];

    this.pending.push(burst);
    this.pendingBytes += burst.length;
    if (this.pendingBytes < this.chunkBytes) return [];

    const joined = Buffer.concat(this.pending, this.pendingBytes);
    const chunks: AudioChunk[] = [];
    let offset = 0;
    while (joined.length - offset >= this.chunkBytes) {
      chunks.push(this.emit(joined.subarray(offset, offset + this.chunkBytes)));
      offset += this.chunkBytes;
    }

    const rest = joined.subarray(offset);
    this.pending = rest.length > 0 ? [rest] : [];
    this.pendingBytes = rest.length;
    return chunks;
  }

  /** End of input: emit the remainder, if any. */
  flush(): AudioChunk | null {
    this.assertUsable();
    this.flushed = true;
    if (this.pendingBytes === 0) return null;

    if (this.pendingBytes % this.frameBytes !== 0) {
      this.failure = new AsrError(
        'FramingError',
        `input ended with ${this.pendingBytes} trailing bytes, not a whole number of ${this.frameBytes}-byte sample frames`
      );
      this.pending = [];
      this.pendingBytes = 0;
      throw this.failure;
    }

    const rest = Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;
    return this.emit(rest);
  }

  async *frame(source: AsyncIterable<Buffer>): AsyncGenerator<AudioChunk> {
    for await (const burst of source) {
      yield* this.push(burst);
    }
    const last = this.flush();
    if (last) yield last;
  }

  private emit(bytes: Buffer): AudioChunk {
    // Copy: the slice must not alias a buffer the caller may reuse.
    const chunk: AudioChunk = Object.freeze({
      sequence: this.nextSequence++,
      data: Buffer.from(bytes),
    });
    return chunk;
  }

  private assertUsable(): void {
    if (this.failure) throw this.failure;
    if (this.flushed) {
      throw new AsrError('FramingError', 'framer already flushed; input has ended');
    }
  }
}
