/**
 * Body stream fed by a transport as bytes arrive from the network.
 *
 * @module http/push-body-stream
 */

import { BodyStream } from './body-stream.js';
import { BodyStreamError, OperationCancelledError } from '../errors/index.js';

/** Default amount of unread data buffered before the producer is paused (1 MB) */
export const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

export interface PushBodyStreamOptions {
  /** Expected size, usually from Content-Length */
  length?: number;
  /** Buffered bytes at which `push` starts returning `false` */
  highWaterMark?: number;
  /** Called once the reader has drained below the high-water mark after a pause */
  onDrain?: () => void;
  /** Called when the consumer releases the stream before the producer finished */
  onRelease?: () => void;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Producer/consumer queue of body chunks.
 *
 * The producer calls `push` for every chunk, then `end` or `fail`. When
 * `push` returns `false` the producer should stop until `onDrain` fires.
 */
export class PushBodyStream extends BodyStream {
  readonly length: number | undefined;
  private readonly highWaterMark: number;
  private readonly onDrain?: () => void;
  private readonly releaseHook?: () => void;

  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private paused = false;
  private ended = false;
  private failure: Error | undefined;
  private waiter: Waiter | undefined;

  constructor(options: PushBodyStreamOptions = {}) {
    super();
    this.length = options.length;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    this.onDrain = options.onDrain;
    this.releaseHook = options.onRelease;
  }

  /** Whether the producer has finished, successfully or not */
  get isComplete(): boolean {
    return this.ended || this.failure !== undefined;
  }

  /**
   * Queue a chunk. Returns `false` when the producer should pause.
   */
  push(chunk: Uint8Array): boolean {
    if (this.isComplete || this.isReleased) {
      return false;
    }
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      this.wake();
    }
    if (this.buffered >= this.highWaterMark) {
      this.paused = true;
      return false;
    }
    return true;
  }

  /** Mark the end of the body. */
  end(): void {
    if (this.isComplete) {
      return;
    }
    this.ended = true;
    this.wake();
  }

  /**
   * Fail the body. Data queued before the failure is still delivered; the
   * error surfaces on the read that would otherwise wait for more.
   */
  fail(error: Error): void {
    if (this.isComplete) {
      return;
    }
    this.failure = error;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.reject(error);
  }

  protected async onRead(target: Uint8Array, signal?: AbortSignal): Promise<number> {
    while (this.chunks.length === 0) {
      if (this.isReleased) {
        throw new BodyStreamError({ message: 'Body stream has been released', reason: 'RELEASED' });
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        return 0;
      }
      await this.waitForData(signal);
    }

    let written = 0;
    while (written < target.length && this.chunks.length > 0) {
      const head = this.chunks[0];
      const count = Math.min(target.length - written, head.length);
      target.set(head.subarray(0, count), written);
      written += count;
      if (count === head.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = head.subarray(count);
      }
    }

    this.buffered -= written;
    if (this.paused && this.buffered < this.highWaterMark) {
      this.paused = false;
      this.onDrain?.();
    }
    return written;
  }

  protected override onRelease(): void {
    this.chunks = [];
    this.buffered = 0;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.resolve();
    if (!this.isComplete) {
      this.releaseHook?.();
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.resolve();
  }

  private waitForData(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new OperationCancelledError({ operation: 'read' }));
        return;
      }

      const onAbort = (): void => {
        this.waiter = undefined;
        reject(new OperationCancelledError({ operation: 'read' }));
      };

      this.waiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
