import { afterEach, describe, expect, it, vi } from 'vitest';
import { chunkArray, mapInBatches, TimeoutError, withTimeout } from '../async.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('withTimeout', () => {
  it('returns the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000)).resolves.toBe('done');
  });

  it('passes the promise through when no timeout is set', async () => {
    await expect(withTimeout(Promise.resolve(3), 0)).resolves.toBe(3);
  });

  it('rejects with TimeoutError carrying the context', async () => {
    vi.useFakeTimers();
    const never = new Promise<string>(() => {});
    const pending = withTimeout(never, 50, { context: 'querying slow_docs' });
    const assertion = expect(pending).rejects.toThrow('Timeout after 50ms: querying slow_docs');

    await vi.advanceTimersByTimeAsync(60);

    await assertion;
  });

  it('exposes the timeout on the error', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 20).catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(25);
    const error = await pending;

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError ? error.timeoutMs : -1).toBe(20);
  });
});

describe('chunkArray', () => {
  it('splits into fixed-size chunks with a short tail', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('treats sizes below one as one', () => {
    expect(chunkArray(['a', 'b'], 0)).toEqual([['a'], ['b']]);
  });
});

describe('mapInBatches', () => {
  it('keeps input order when later items finish first', async () => {
    const delays = [30, 10, 20];
    const result = await mapInBatches(delays, 3, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `${index}:${delay}`;
    });

    expect(result).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never runs more than the concurrency limit at once', async () => {
    let active = 0;
    let peak = 0;

    await mapInBatches([1, 2, 3, 4, 5], 2, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
    });

    expect(peak).toBe(2);
  });
});
