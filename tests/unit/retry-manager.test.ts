/**
 * Unit tests for RetryManager
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryManager } from '../../src/lib/RetryManager.js';
import { EmptyResultError, UpstreamUnavailableError, type RagError } from '../../src/lib/errors.js';
import { Result, err, ok } from '../../src/lib/result-types.js';

const fast = { initialDelay: 0, jitter: false };

describe('RetryManager', () => {
  it('should return the first success without retrying', async () => {
    const operation = vi.fn(async (): Promise<Result<string, RagError>> => ok('done'));

    const result = await new RetryManager({ ...fast, maxAttempts: 3 }).retry(operation);

    expect(result._unsafeUnwrap()).toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry retryable errors up to maxAttempts', async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(
      async (attempt: number): Promise<Result<number, RagError>> =>
        err(new UpstreamUnavailableError(`attempt ${attempt} failed`))
    );

    const result = await new RetryManager({ ...fast, maxAttempts: 3, onRetry }).retry(operation);

    expect(result._unsafeUnwrapErr().message).toBe('attempt 3 failed');
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should succeed on a later attempt', async () => {
    const operation = vi.fn(
      async (attempt: number): Promise<Result<number, RagError>> =>
        attempt < 2 ? err(new UpstreamUnavailableError('down')) : ok(attempt)
    );

    const result = await new RetryManager(fast).retry(operation, { maxAttempts: 5 });

    expect(result._unsafeUnwrap()).toBe(2);
  });

  it('should not retry errors that are not retryable', async () => {
    const operation = vi.fn(
      async (): Promise<Result<number, RagError>> => err(new EmptyResultError('nothing'))
    );

    await new RetryManager({ ...fast, maxAttempts: 3 }).retry(operation);

    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should make a single attempt by default', async () => {
    const operation = vi.fn(
      async (): Promise<Result<number, RagError>> => err(new UpstreamUnavailableError('down'))
    );

    await new RetryManager().retry(operation);

    expect(operation).toHaveBeenCalledTimes(1);
  });
});
