import type { Readable } from 'node:stream';
import { TerminalClosedError } from '../cli/errors.js';

export interface ByteSource {
  /** Resolves with the next input byte, waiting for one to arrive if needed. */
  readByte(): Promise<number>;
  /** Puts a byte back so the next `readByte` returns it first. */
  unreadByte(byte: number): void;
}

interface PendingRead {
  resolve: (byte: number) => void;
  reject: (error: Error) => void;
}

/**
 * Buffers a terminal input stream so keys can be pulled one byte at a time.
 * Only one read may be outstanding; the picker loop never issues two.
 */
export class StreamByteReader implements ByteSource {
  private readonly queue: number[] = [];
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  constructor(private readonly stream: Readable) {
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    stream.on('error', this.onError);
  }

  readByte(): Promise<number> {
    const next = this.queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    if (this.pending) {
      return Promise.reject(new Error('StreamByteReader does not support concurrent reads'));
    }
    return new Promise<number>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  unreadByte(byte: number): void {
    this.queue.unshift(byte);
  }

  /**
   * Fails the reader from outside, e.g. when the terminal's output side
   * breaks. A waiting read rejects once buffered bytes are used up.
   */
  abort(error: Error): void {
    this.fail(error);
  }

  dispose(): void {
    this.stream.removeListener('data', this.onData);
    this.stream.removeListener('end', this.onEnd);
    this.stream.removeListener('error', this.onError);
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    for (const byte of bytes) this.queue.push(byte);
    this.flush();
  };

  private readonly onEnd = (): void => {
    this.fail(new TerminalClosedError());
  };

  private readonly onError = (error: Error): void => {
    this.fail(error);
  };

  private fail(error: Error): void {
    this.failure ??= error;
    const pending = this.pending;
    if (pending && this.queue.length === 0) {
      this.pending = null;
      pending.reject(this.failure);
    }
  }

  private flush(): void {
    const pending = this.pending;
    if (!pending) return;
    const next = this.queue.shift();
    if (next === undefined) return;
    this.pending = null;
    pending.resolve(next);
  }
}
