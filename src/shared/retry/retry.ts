export type RetryPolicy = Readonly<{
  maxAttempts: number;      // total tries, including the first one
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitter: boolean;
}>;

export const defaultRetryPolicy: RetryPolicy = Object.freeze({
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  backoffFactor: 2,
  jitter: true
});

export type RetryAttemptContext = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = {
  policy: RetryPolicy;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (ctx: RetryAttemptContext) => void;
  onGiveUp?: (ctx: Omit<RetryAttemptContext, "delayMs">) => void;
  randomFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export const createRetryPolicy = (input: Partial<RetryPolicy> = {}): RetryPolicy => {
  const policy = { ...defaultRetryPolicy, ...input };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`maxAttempts must be an integer >= 1. Received: ${policy.maxAttempts}`);
  }
  if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be >= 0. Received: ${policy.baseDelayMs}`);
  }
  if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < 0) {
    throw new Error(`maxDelayMs must be >= 0. Received: ${policy.maxDelayMs}`);
  }
  if (!Number.isFinite(policy.backoffFactor) || policy.backoffFactor <= 1) {
    throw new Error(`backoffFactor must be > 1. Received: ${policy.backoffFactor}`);
  }
  return Object.freeze(policy);
};

/**
 * Delay before the retry that follows `attempt` (1-based):
 * `min(base * factor^(attempt - 1), max)`, scaled into [0.5, 1.0] when jitter is on.
 */
export const computeBackoffDelay = (
  policy: RetryPolicy,
  attempt: number,
  randomFn: () => number = Math.random
): number => {
  const backoff = Math.min(policy.baseDelayMs * Math.pow(policy.backoffFactor, attempt - 1), policy.maxDelayMs);
  if (!policy.jitter) return backoff;

  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  return backoff * (0.5 + normalizedRandom * 0.5);
};

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { policy, shouldRetry, onRetry, onGiveUp, randomFn = Math.random, sleep: wait = sleep } = opts;
  const { maxAttempts } = policy;

  let lastRetryable: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!shouldRetry(err)) throw err;
      lastRetryable = err;

      if (attempt >= maxAttempts) {
        onGiveUp?.({ attempt, maxAttempts, error: err });
        break;
      }

      const delayMs = computeBackoffDelay(policy, attempt, randomFn);
      onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await wait(delayMs);
    }
  }

  throw lastRetryable;
};
