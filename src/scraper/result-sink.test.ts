import { describe, expect, it } from 'vitest';
import { ResultSink } from './result-sink.js';
import { flush } from './__fixtures__/fakes.js';

describe('ResultSink', () => {
  it('delivers items in arrival order', async () => {
    const sink = new ResultSink<string>(10);

    await sink.put('a');
    await sink.put('b');

    await expect(sink.take()).resolves.toBe('a');
    await expect(sink.take()).resolves.toBe('b');
  });

  it('suspends producers while the buffer is full', async () => {
    const sink = new ResultSink<number>(2);
    await sink.put(1);
    await sink.put(2);

    let thirdStored = false;
    const third = sink.put(3).then(() => {
      thirdStored = true;
    });

    await flush();
    expect(thirdStored).toBe(false);
    expect(sink.size).toBe(2);

    await expect(sink.take()).resolves.toBe(1);
    await third;

    expect(thirdStored).toBe(true);
    expect(sink.size).toBe(2);
  });

  it('wakes a waiting consumer on put', async () => {
    const sink = new ResultSink<string>(1);

    const taken = sink.take();
    await sink.put('late');

    await expect(taken).resolves.toBe('late');
    expect(sink.size).toBe(0);
  });

  it('ends iteration after close once drained, including suspended puts', async () => {
    const sink = new ResultSink<string>(1);
    await sink.put('first');
    const suspended = sink.put('second');
    sink.close();

    const received: string[] = [];
    for await (const item of sink) {
      received.push(item);
    }

    await suspended;
    expect(received).toEqual(['first', 'second']);
  });

  it('releases a waiting consumer on close', async () => {
    const sink = new ResultSink<string>(1);

    const taken = sink.take();
    sink.close();

    await expect(taken).resolves.toBeUndefined();
  });

  it('rejects puts after close', async () => {
    const sink = new ResultSink<string>(1);
    sink.close();

    expect(sink.closed).toBe(true);
    await expect(sink.put('x')).rejects.toThrow('Cannot put into a closed result sink');
  });

  it('accepts many concurrent producers with a single consumer', async () => {
    const sink = new ResultSink<number>(3);
    const producers = Array.from({ length: 4 }, (_, p) =>
      (async () => {
        for (let i = 0; i < 5; i++) {
          await sink.put(p * 100 + i);
        }
      })()
    );

    const consumer = (async () => {
      const items: number[] = [];
      for await (const item of sink) {
        items.push(item);
      }
      return items;
    })();

    await Promise.all(producers);
    sink.close();
    const items = await consumer;

    expect(items).toHaveLength(20);
    expect([...items].sort((a, b) => a - b)).toEqual([
      0, 1, 2, 3, 4, 100, 101, 102, 103, 104, 200, 201, 202, 203, 204, 300, 301, 302, 303, 304,
    ]);
  });

  it('rejects a capacity below one', () => {
    expect(() => new ResultSink<string>(0)).toThrow('Result sink capacity must be a positive integer');
  });
});
