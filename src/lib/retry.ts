/**
 * Matchflow — Retry Policy
 *
 * Bounded retry with exponential backoff, as an explicit object injected
 * into the code that calls unreliable backends.
 */

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise(resolve => setTimeout(resolve, ms));

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;
  /** Delay before the second attempt */
  baseDelayMs?: number;
  /** Multiplier applied per further attempt */
  factor?: number;
  /** Upper bound for a single delay */
  maxDelayMs?: number;
}

export interface RetryHooks {
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (info: { error: unknown; attempt: number; delayMs: number }) => void;
}

const DEFAULT_OPTIONS: Required<RetryPolicyOptions> = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  factor: 2,
  maxDelayMs: 30000,
};

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly factor: number;
  readonly maxDelayMs: number;

  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions = {}, sleep: Sleep = defaultSleep) {
    const merged = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${merged.maxAttempts}`);
    }
    this.maxAttempts = merged.maxAttempts;
    this.baseDelayMs = Math.max(0, merged.baseDelayMs);
    this.factor = Math.max(1, merged.factor);
    this.maxDelayMs = Math.max(0, merged.maxDelayMs);
    this.sleep = sleep;
  }

  /**
   * Delay after the given failed attempt (1-based).
   */
  delayFor(attempt: number): number {
    const delay = this.baseDelayMs * Math.pow(this.factor, attempt - 1);
    return Math.min(delay, this.maxDelayMs);
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    hooks: RetryHooks = {}
  ): Promise<T> {
    let lastError: unknown = new Error('Retry policy made no attempts');

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;

        const retryable = hooks.shouldRetry?.(error, attempt) ?? true;
        if (!retryable || attempt === this.maxAttempts) {
          break;
        }

        const delayMs = this.delayFor(attempt);
        hooks.onRetry?.({ error, attempt, delayMs });
        await this.sleep(delayMs);
      }
    }

    throw lastError;
  }
}

/**
 * Reject with a timeout error if `promise` has not settled in `timeoutMs`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
