/**
 * Tests for BodyStream implementations
 */

import { describe, it, expect, vi } from 'vitest';
import { BodyStream, IterableBodyStream, MemoryBodyStream, concatChunks } from '../body-stream.js';
import { PushBodyStream } from '../push-body-stream.js';
import { BodyStreamError, OperationCancelledError } from '../../errors/index.js';

async function* chunks(...parts: number[][]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield new Uint8Array(part);
  }
}

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('MemoryBodyStream', () => {
  it('should report its length', () => {
    expect(new MemoryBodyStream(new Uint8Array([1, 2, 3])).length).toBe(3);
  });

  it('should read incrementally into the caller buffer', async () => {
    const stream = new MemoryBodyStream(new Uint8Array([1, 2, 3, 4, 5]));
    const target = new Uint8Array(2);

    expect(await stream.read(target)).toBe(2);
    expect([...target]).toEqual([1, 2]);
    expect(await stream.read(target)).toBe(2);
    expect([...target]).toEqual([3, 4]);
    expect(await stream.read(target)).toBe(1);
    expect(target[0]).toBe(5);
    expect(await stream.read(target)).toBe(0);
  });

  it('should return 0 for an empty target without consuming data', async () => {
    const stream = new MemoryBodyStream(new Uint8Array([7]));

    expect(await stream.read(new Uint8Array(0))).toBe(0);
    expect([...(await stream.readToEnd())]).toEqual([7]);
  });

  it('should reject reads after release', async () => {
    const stream = new MemoryBodyStream(new Uint8Array([1]));
    stream.release();
    stream.release();

    expect(stream.isReleased).toBe(true);
    await expect(stream.read(new Uint8Array(1))).rejects.toMatchObject({ reason: 'RELEASED' });
  });
});

describe('readToEnd', () => {
  it('should concatenate chunks from the source', async () => {
    const stream = new IterableBodyStream(chunks([1, 2, 3], [4, 5]));

    expect([...(await stream.readToEnd())]).toEqual([1, 2, 3, 4, 5]);
  });

  it('should return an empty result once the stream is exhausted', async () => {
    const stream = new IterableBodyStream(chunks([1, 2, 3], [4, 5]));
    await stream.readToEnd();

    const second = await stream.readToEnd();
    expect(second.length).toBe(0);
  });

  it('should fail with OperationCancelledError when cancelled mid-way', async () => {
    const controller = new AbortController();
    async function* source(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array([1, 2, 3]);
      controller.abort();
      yield new Uint8Array([4, 5]);
    }
    const stream = new IterableBodyStream(source());

    await expect(stream.readToEnd(controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should cancel while the source is stalled', async () => {
    async function* source(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array([1, 2, 3]);
      await new Promise<never>(() => undefined);
    }
    const stream = new IterableBodyStream(source());
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(stream.readToEnd(controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should keep the chunk a cancelled read was waiting for', async () => {
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    async function* source(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array([1, 2, 3]);
      await gate;
      yield new Uint8Array([4, 5]);
    }
    const stream = new IterableBodyStream(source());
    const target = new Uint8Array(8);
    expect(await stream.read(target)).toBe(3);

    const controller = new AbortController();
    const cancelled = stream.read(target, controller.signal);
    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(OperationCancelledError);

    open();
    expect(await stream.read(target)).toBe(2);
    expect([...target.subarray(0, 2)]).toEqual([4, 5]);
    expect(await stream.read(target)).toBe(0);
  });

  it('should fail immediately when the signal has already fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const stream = new MemoryBodyStream(new Uint8Array([1]));

    await expect(stream.readToEnd(controller.signal)).rejects.toMatchObject({ operation: 'readToEnd' });
  });

  it('should propagate source errors unchanged', async () => {
    const failure = new Error('disk on fire');
    async function* source(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array([1]);
      throw failure;
    }
    const stream = new IterableBodyStream(source());

    await expect(stream.readToEnd()).rejects.toBe(failure);
  });
});

describe('IterableBodyStream', () => {
  it('should hold over the part of a chunk that does not fit', async () => {
    const stream = new IterableBodyStream(chunks([1, 2, 3]));
    const target = new Uint8Array(2);

    expect(await stream.read(target)).toBe(2);
    expect([...target]).toEqual([1, 2]);
    expect(await stream.read(target)).toBe(1);
    expect(target[0]).toBe(3);
    expect(await stream.read(target)).toBe(0);
  });

  it('should skip empty chunks', async () => {
    const stream = new IterableBodyStream(chunks([], [9], []));

    expect([...(await stream.readToEnd())]).toEqual([9]);
  });

  it('should close the source on release', async () => {
    let closed = false;
    async function* source(): AsyncGenerator<Uint8Array> {
      try {
        yield new Uint8Array([1]);
        yield new Uint8Array([2]);
      } finally {
        closed = true;
      }
    }
    const stream = new IterableBodyStream(source());
    await stream.read(new Uint8Array(1));

    stream.release();
    await tick();

    expect(closed).toBe(true);
    expect(stream.closeError).toBeUndefined();
  });

  it('should be iterable with for await', async () => {
    const received: number[] = [];
    for await (const chunk of BodyStream.from('hi')) {
      received.push(...chunk);
    }

    expect(received).toEqual([104, 105]);
  });

  it('should release the stream when a for await loop stops early', async () => {
    let closed = false;
    async function* source(): AsyncGenerator<Uint8Array> {
      try {
        yield new Uint8Array([1]);
        yield new Uint8Array([2]);
      } finally {
        closed = true;
      }
    }
    const stream = new IterableBodyStream(source());

    for await (const chunk of stream) {
      expect([...chunk]).toEqual([1]);
      break;
    }
    await tick();

    expect(stream.isReleased).toBe(true);
    expect(closed).toBe(true);
  });
});

describe('BodyStream.from', () => {
  it('should wrap strings as UTF-8', async () => {
    const stream = BodyStream.from('é');

    expect(stream.length).toBe(2);
    expect([...(await stream.readToEnd())]).toEqual([0xc3, 0xa9]);
  });

  it('should pass the length hint to iterable sources', () => {
    expect(BodyStream.from(chunks([1]), 1).length).toBe(1);
    expect(BodyStream.from(chunks([1])).length).toBeUndefined();
  });
});

describe('concatChunks', () => {
  it('should compute the total when not given', () => {
    expect([...concatChunks([new Uint8Array([1]), new Uint8Array([2, 3])])]).toEqual([1, 2, 3]);
  });
});

describe('PushBodyStream', () => {
  it('should deliver pushed data and end', async () => {
    const stream = new PushBodyStream({ length: 3 });
    stream.push(new Uint8Array([1, 2]));
    stream.push(new Uint8Array([3]));
    stream.end();

    expect(stream.length).toBe(3);
    expect([...(await stream.readToEnd())]).toEqual([1, 2, 3]);
  });

  it('should wait for data pushed after the read started', async () => {
    const stream = new PushBodyStream();
    const target = new Uint8Array(4);
    const pending = stream.read(target);

    stream.push(new Uint8Array([5, 6]));

    expect(await pending).toBe(2);
    expect([...target.subarray(0, 2)]).toEqual([5, 6]);
  });

  it('should reject a concurrent read', async () => {
    const stream = new PushBodyStream();
    const first = stream.read(new Uint8Array(1));

    await expect(stream.read(new Uint8Array(1))).rejects.toMatchObject({ reason: 'CONCURRENT_READ' });

    stream.end();
    expect(await first).toBe(0);
  });

  it('should signal backpressure at the high-water mark and drain below it', async () => {
    const onDrain = vi.fn();
    const stream = new PushBodyStream({ highWaterMark: 4, onDrain });

    expect(stream.push(new Uint8Array([1, 2, 3]))).toBe(true);
    expect(stream.push(new Uint8Array([4, 5]))).toBe(false);

    await stream.read(new Uint8Array(4));

    expect(onDrain).toHaveBeenCalledTimes(1);
  });

  it('should deliver queued data before surfacing a failure', async () => {
    const failure = new Error('connection reset');
    const stream = new PushBodyStream();
    stream.push(new Uint8Array([1]));
    stream.fail(failure);

    const target = new Uint8Array(4);
    expect(await stream.read(target)).toBe(1);
    await expect(stream.read(target)).rejects.toBe(failure);
  });

  it('should reject a waiting read when it fails', async () => {
    const failure = new Error('connection reset');
    const stream = new PushBodyStream();
    const pending = stream.read(new Uint8Array(1));

    stream.fail(failure);

    await expect(pending).rejects.toBe(failure);
  });

  it('should cancel a waiting read when the signal fires', async () => {
    const controller = new AbortController();
    const stream = new PushBodyStream();
    const pending = stream.read(new Uint8Array(1), controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should fail a waiting read on release and notify the producer', async () => {
    const onRelease = vi.fn();
    const stream = new PushBodyStream({ onRelease });
    const pending = stream.read(new Uint8Array(1));

    stream.release();

    await expect(pending).rejects.toBeInstanceOf(BodyStreamError);
    expect(onRelease).toHaveBeenCalledTimes(1);
  });

  it('should not notify the producer when released after the end', () => {
    const onRelease = vi.fn();
    const stream = new PushBodyStream({ onRelease });
    stream.end();

    stream.release();

    expect(onRelease).not.toHaveBeenCalled();
  });

  it('should ignore pushes after the end', () => {
    const stream = new PushBodyStream();
    stream.end();

    expect(stream.push(new Uint8Array([1]))).toBe(false);
    expect(stream.isComplete).toBe(true);
  });
});
