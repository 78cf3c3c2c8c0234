// Accumulates incoming chunks and serves fixed-size reads with an optional deadline

import { RconClientError, TimeoutError } from '../errors.js';

interface PendingRead {
  readonly size: number;
  readonly resolve: (bytes: Buffer) => void;
  readonly reject: (error: RconClientError) => void;
  readonly timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Shared read side of the byte streams.
 *
 * Chunks arrive through `push()`; `read(size)` resolves once `size` bytes are
 * buffered. The deadline restarts whenever a chunk arrives, so only silence
 * longer than `readTimeout` fails a read. After `fail()`, buffered bytes are
 * still served, and any read that cannot be satisfied rejects with the failure.
 */
export class ExactReader {
  private buffered: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private failure: RconClientError | null = null;

  /**
   * @param readTimeout - milliseconds, 0 disables the deadline
   */
  constructor(private readonly readTimeout: number) {}

  get failed(): boolean {
    return this.failure !== null;
  }

  push(chunk: Buffer): void {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
    this.pending?.timer?.refresh();
    this.drain();
  }

  /**
   * Mark the source as finished. Only the first failure is kept.
   */
  fail(error: RconClientError): void {
    if (this.failure !== null) {
      return;
    }
    this.failure = error;

    const pending = this.pending;
    if (pending !== null && this.buffered.length < pending.size) {
      this.pending = null;
      if (pending.timer !== null) {
        clearTimeout(pending.timer);
      }
      pending.reject(error);
    }
  }

  read(size: number): Promise<Buffer> {
    if (this.pending !== null) {
      return Promise.reject(new Error('A read is already in progress on this stream'));
    }
    if (this.buffered.length >= size) {
      return Promise.resolve(this.take(size));
    }
    if (this.failure !== null) {
      return Promise.reject(this.failure);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer =
        this.readTimeout > 0
          ? setTimeout(() => {
              this.pending = null;
              reject(new TimeoutError(this.readTimeout));
            }, this.readTimeout)
          : null;
      this.pending = { size, resolve, reject, timer };
    });
  }

  private drain(): void {
    const pending = this.pending;
    if (pending === null || this.buffered.length < pending.size) {
      return;
    }
    this.pending = null;
    if (pending.timer !== null) {
      clearTimeout(pending.timer);
    }
    pending.resolve(this.take(pending.size));
  }

  private take(size: number): Buffer {
    const bytes = this.buffered.subarray(0, size);
    this.buffered = this.buffered.subarray(size);
    return bytes;
  }
}
