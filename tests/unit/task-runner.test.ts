/**
 * Unit tests for the ordered task runner
 */

import { describe, it, expect } from 'vitest';
import { mapInOrder } from '../../src/lib/task-runner.js';
import { Result, err, ok } from '../../src/lib/result-types.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('mapInOrder', () => {
  it('should keep input order when later tasks finish first', async () => {
    const delays = [30, 10, 20, 0];

    const result = await mapInOrder(
      delays,
      async (delay, index): Promise<Result<string, Error>> => {
        await sleep(delay);
        return ok(`task-${index}`);
      },
      4
    );

    expect(result._unsafeUnwrap()).toEqual(['task-0', 'task-1', 'task-2', 'task-3']);
  });

  it('should never run more than the concurrency limit at once', async () => {
    let running = 0;
    let peak = 0;

    await mapInOrder(
      [1, 2, 3, 4, 5, 6],
      async (item): Promise<Result<number, Error>> => {
        running++;
        peak = Math.max(peak, running);
        await sleep(5);
        running--;
        return ok(item);
      },
      2
    );

    expect(peak).toBe(2);
  });

  it('should stop at the first failure when sequential', async () => {
    const started: number[] = [];

    const result = await mapInOrder(
      [0, 1, 2, 3],
      async (item): Promise<Result<number, Error>> => {
        started.push(item);
        return item === 1 ? err(new Error('second failed')) : ok(item);
      }
    );

    expect(result._unsafeUnwrapErr().message).toBe('second failed');
    expect(started).toEqual([0, 1]);
  });

  it('should return an empty list for no items', async () => {
    const result = await mapInOrder([], async (): Promise<Result<number, Error>> => ok(1));

    expect(result._unsafeUnwrap()).toEqual([]);
  });
});
