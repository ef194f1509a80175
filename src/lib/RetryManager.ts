import { RagError } from './errors.js';
import { Result } from './result-types.js';

/**
 * Options for retry operations
 */
export interface RetryOptions {
  /**
   * Maximum number of attempts, including the first
   * @default 1
   */
  maxAttempts?: number;

  /**
   * Initial delay in milliseconds before first retry
   * @default 500
   */
  initialDelay?: number;

  /**
   * Maximum delay in milliseconds between retries
   * @default 8000
   */
  maxDelay?: number;

  /**
   * Exponential backoff factor
   * @default 2
   */
  backoffFactor?: number;

  /**
   * Whether to add jitter to delays
   * @default true
   */
  jitter?: boolean;

  /**
   * Custom function to determine if error is retryable
   */
  isRetryable?: (error: RagError, attempt: number) => boolean;

  /**
   * Callback for each retry attempt
   */
  onRetry?: (error: RagError, attempt: number, nextDelay: number) => void;
}

/**
 * Retries Result-returning operations with exponential backoff
 *
 * Only errors flagged `retryable` are attempted again; the last Result is
 * returned unchanged once attempts run out.
 */
export class RetryManager {
  private readonly defaultOptions: Required<RetryOptions> = {
    maxAttempts: 1,
    initialDelay: 500,
    maxDelay: 8000,
    backoffFactor: 2,
    jitter: true,
    isRetryable: (error) => error.retryable,
    onRetry: () => {}
  };

  constructor(private readonly globalOptions?: RetryOptions) {}

  /**
   * Executes an operation with retry logic
   * @param operation Receives the 1-based attempt number
   * @param options Override options for this operation
   */
  async retry<T, E extends RagError>(
    operation: (attempt: number) => Promise<Result<T, E>>,
    options?: RetryOptions
  ): Promise<Result<T, E>> {
    const opts = this.mergeOptions(options);
    let attempt = 1;
    let result = await operation(attempt);

    while (result.isErr() && attempt < opts.maxAttempts && opts.isRetryable(result.error, attempt)) {
      const nextDelay = this.calculateDelay(attempt, opts);
      opts.onRetry(result.error, attempt, nextDelay);
      await this.delay(nextDelay);

      attempt++;
      result = await operation(attempt);
    }

    return result;
  }

  /**
   * Calculates the delay for the next retry attempt
   */
  private calculateDelay(attempt: number, options: Required<RetryOptions>): number {
    // Exponential backoff: delay = initialDelay * (backoffFactor ^ (attempt - 1))
    let delay = options.initialDelay * Math.pow(options.backoffFactor, attempt - 1);

    delay = Math.min(delay, options.maxDelay);

    // ±25% jitter
    if (options.jitter) {
      const jitterRange = delay * 0.25;
      const jitter = (Math.random() - 0.5) * 2 * jitterRange;
      delay = Math.max(0, delay + jitter);
    }

    return Math.floor(delay);
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private mergeOptions(options?: RetryOptions): Required<RetryOptions> {
    return {
      ...this.defaultOptions,
      ...this.globalOptions,
      ...options
    };
  }
}
