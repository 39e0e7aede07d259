/**
 * Single-pass byte sources for HTTP bodies.
 *
 * @module http/body-stream
 */

import { BodyStreamError, OperationCancelledError, throwIfCancelled } from '../errors/index.js';

/** Scratch size used by `readToEnd` and the async iterator */
export const READ_CHUNK_SIZE = 64 * 1024;

/**
 * A body that can be read once, by one reader at a time.
 *
 * Subclasses implement `onRead`; the base class enforces the single-reader
 * contract, cancellation checks and release.
 */
export abstract class BodyStream implements AsyncIterable<Uint8Array> {
  private reading = false;
  private released = false;

  /** Total size in bytes when known up front */
  abstract readonly length: number | undefined;

  /**
   * Produce up to `target.length` bytes into `target`.
   * Resolves with the count written; `0` means the source is exhausted.
   */
  protected abstract onRead(target: Uint8Array, signal?: AbortSignal): Promise<number>;

  /** Free the underlying source. Called at most once. */
  protected onRelease(): void {}

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Read the next bytes into `target`.
   *
   * @returns Number of bytes written, `0` at end of stream
   * @throws {OperationCancelledError} If `signal` has fired
   * @throws {BodyStreamError} On a released stream or a concurrent read
   */
  async read(target: Uint8Array, signal?: AbortSignal): Promise<number> {
    if (this.released) {
      throw new BodyStreamError({ message: 'Body stream has been released', reason: 'RELEASED' });
    }
    if (this.reading) {
      throw new BodyStreamError({
        message: 'Body stream does not support concurrent reads',
        reason: 'CONCURRENT_READ',
      });
    }
    throwIfCancelled(signal, 'read');
    if (target.length === 0) {
      return 0;
    }

    this.reading = true;
    try {
      return await this.onRead(target, signal);
    } finally {
      this.reading = false;
    }
  }

  /**
   * Drain the rest of the stream into one array.
   *
   * A stream already at its end yields an empty array.
   *
   * @throws {OperationCancelledError} If `signal` fires before the end is reached
   */
  async readToEnd(signal?: AbortSignal): Promise<Uint8Array> {
    const scratch = new Uint8Array(READ_CHUNK_SIZE);
    const chunks: Uint8Array[] = [];
    let total = 0;

    for (;;) {
      throwIfCancelled(signal, 'readToEnd');
      const count = await this.read(scratch, signal);
      if (count === 0) {
        break;
      }
      chunks.push(scratch.slice(0, count));
      total += count;
    }

    return concatChunks(chunks, total);
  }

  /**
   * Release the source. Further reads fail; releasing twice is a no-op.
   */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.onRelease();
  }

  /**
   * Iterate the remaining bytes. A consumer that stops early (a `break`, or a
   * destroyed `Readable` wrapping this stream) releases it.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    const scratch = new Uint8Array(READ_CHUNK_SIZE);
    let suspended = false;
    try {
      for (;;) {
        const count = await this.read(scratch);
        if (count === 0) {
          return;
        }
        suspended = true;
        yield scratch.slice(0, count);
        suspended = false;
      }
    } finally {
      if (suspended) {
        this.release();
      }
    }
  }

  /**
   * Wrap in-memory data or an async byte source.
   *
   * @param length - Size hint for iterable sources
   */
  static from(data: Uint8Array | string | AsyncIterable<Uint8Array>, length?: number): BodyStream {
    if (typeof data === 'string') {
      return new MemoryBodyStream(new TextEncoder().encode(data));
    }
    if (data instanceof Uint8Array) {
      return new MemoryBodyStream(data);
    }
    return new IterableBodyStream(data, length);
  }
}

/**
 * Concatenate chunks into one array of `total` bytes.
 */
export function concatChunks(chunks: readonly Uint8Array[], total?: number): Uint8Array {
  const size = total ?? chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Fully buffered body.
 */
export class MemoryBodyStream extends BodyStream {
  readonly length: number;
  private data: Uint8Array;
  private position = 0;

  constructor(data: Uint8Array) {
    super();
    this.data = data;
    this.length = data.length;
  }

  protected async onRead(target: Uint8Array): Promise<number> {
    const count = Math.min(target.length, this.data.length - this.position);
    if (count <= 0) {
      return 0;
    }
    target.set(this.data.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }

  protected override onRelease(): void {
    this.data = new Uint8Array(0);
    this.position = 0;
  }
}

/**
 * Body backed by any async byte source, such as a Node `Readable`.
 *
 * Chunks larger than the caller's buffer are held over for the next read.
 */
export class IterableBodyStream extends BodyStream {
  readonly length: number | undefined;
  private readonly iterator: AsyncIterator<Uint8Array>;
  private pending: Uint8Array = new Uint8Array(0);
  /** Pull left running by a cancelled read; the next read picks up its result */
  private inflight: Promise<IteratorResult<Uint8Array>> | undefined;
  private done = false;
  private closeFailure: unknown;

  constructor(source: AsyncIterable<Uint8Array>, length?: number) {
    super();
    this.iterator = source[Symbol.asyncIterator]();
    this.length = length;
  }

  protected async onRead(target: Uint8Array, signal?: AbortSignal): Promise<number> {
    while (this.pending.length === 0) {
      if (this.done) {
        return 0;
      }
      let next: IteratorResult<Uint8Array>;
      try {
        next = await this.nextChunk(signal);
      } catch (error) {
        if (!(error instanceof OperationCancelledError)) {
          this.inflight = undefined;
        }
        throw error;
      }
      this.inflight = undefined;
      if (next.done) {
        this.done = true;
      } else {
        this.pending = next.value;
      }
    }

    const count = Math.min(target.length, this.pending.length);
    target.set(this.pending.subarray(0, count));
    this.pending = this.pending.subarray(count);
    return count;
  }

  /**
   * Pull the next chunk, settling early with `OperationCancelledError` when
   * `signal` fires. The pull itself keeps running.
   */
  private nextChunk(signal?: AbortSignal): Promise<IteratorResult<Uint8Array>> {
    const pull = this.inflight ?? this.iterator.next();
    this.inflight = pull;
    if (!signal) {
      return pull;
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => reject(new OperationCancelledError({ operation: 'read' }));
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      void pull.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
    });
  }

  /** Error raised by the source while it was being closed on release */
  get closeError(): unknown {
    return this.closeFailure;
  }

  protected override onRelease(): void {
    this.pending = new Uint8Array(0);
    if (!this.done && this.iterator.return) {
      this.done = true;
      this.iterator.return().catch((error: unknown) => {
        this.closeFailure = error;
      });
    }
  }
}
