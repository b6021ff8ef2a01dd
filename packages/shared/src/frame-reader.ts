/**
 * FrameReader - exact-length reads over a byte stream.
 *
 * Buffers incoming chunks and hands out precisely the number of bytes asked
 * for. The stream closing (or erroring) before a read is satisfied is a
 * FramingError: the single-shot protocol has no way to resume.
 */

import type { Readable } from 'stream';
import { FramingError, errorMessage } from './errors.js';

/** Width of every length and count field on the wire. */
export const LENGTH_FIELD_BYTES = 8;

export const DEFAULT_MAX_FRAME_BYTES = 256 * 1024 * 1024; // 256MB

export interface FrameReaderOptions {
  /** Upper bound for any single length-prefixed segment (default: 256MB) */
  maxFrameBytes?: number;
}

interface PendingRead {
  size: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

export class FrameReader {
  readonly maxFrameBytes: number;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private failure: FramingError | null = null;
  private pending: PendingRead | null = null;

  constructor(
    private readonly stream: Readable,
    options: FrameReaderOptions = {},
  ) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    stream.on('close', this.onEnd);
    stream.on('error', this.onError);
  }

  /**
   * Number of bytes received but not yet consumed.
   */
  remaining(): number {
    return this.buffered;
  }

  /**
   * Read exactly `size` bytes.
   */
  readExact(size: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error('FrameReader supports one read at a time'));
    }
    if (size === 0) {
      return Promise.resolve(Buffer.alloc(0));
    }
    if (this.buffered >= size) {
      return Promise.resolve(this.take(size));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.reject(this.truncated(size));
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { size, resolve, reject };
    });
  }

  /**
   * Read one unsigned 64-bit big-endian integer.
   */
  async readUInt64(): Promise<number> {
    const bytes = await this.readExact(LENGTH_FIELD_BYTES);
    const value = bytes.readBigUInt64BE(0);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FramingError(`Length field out of range: ${value}`);
    }
    return Number(value);
  }

  /**
   * Read a length prefix, enforcing the configured maximum segment size.
   */
  async readLength(): Promise<number> {
    const length = await this.readUInt64();
    if (length > this.maxFrameBytes) {
      throw new FramingError(`Declared length ${length} exceeds limit of ${this.maxFrameBytes} bytes`);
    }
    return length;
  }

  /**
   * Stop listening to the underlying stream.
   */
  detach(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
  }

  private take(size: number): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
    const head = all.subarray(0, size);
    const rest = all.subarray(size);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return head;
  }

  private truncated(size: number): FramingError {
    return new FramingError(`Stream closed after ${this.buffered} of ${size} expected bytes`);
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.buffered >= pending.size) {
      this.pending = null;
      pending.resolve(this.take(pending.size));
    } else if (this.failure) {
      this.pending = null;
      pending.reject(this.failure);
    } else if (this.ended) {
      this.pending = null;
      pending.reject(this.truncated(pending.size));
    }
  }

  private onData = (chunk: Buffer | string): void => {
    const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    this.chunks.push(data);
    this.buffered += data.length;
    this.settle();
  };

  private onEnd = (): void => {
    this.ended = true;
    this.settle();
  };

  private onError = (err: Error): void => {
    this.failure = new FramingError(`Stream error: ${errorMessage(err)}`, { cause: err });
    this.settle();
  };
}
