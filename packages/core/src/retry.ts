import { ConciergeError, isConciergeError } from "@concierge/types";

export interface RetryPolicy {
  /** Attempts after the first one. */
  readonly retries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  baseDelayMs: 250,
  maxDelayMs: 2000,
};

export interface RetryOptions {
  readonly policy?: Partial<RetryPolicy>;
  /** Defaults to `ConciergeError.retryable`; anything else is not retried. */
  readonly shouldRetry?: (err: unknown) => boolean;
  readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  readonly sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Exponential backoff: base, 2·base, 4·base … capped at `maxDelayMs`. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...opts.policy };
  const shouldRetry =
    opts.shouldRetry ?? ((err: unknown) => isConciergeError(err) && err.retryable);
  const wait = opts.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= policy.retries || !shouldRetry(err)) throw err;
      const delayMs = backoffDelay(policy, attempt + 1);
      opts.onRetry?.(err, attempt + 1, delayMs);
      await wait(delayMs);
    }
  }
}

/**
 * Run `work` with an abort signal that fires after `timeoutMs`.
 * Rejects with `onTimeout()` when the timer wins.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = onTimeout();
      // Settle first so the race sees the timeout, not the aborted work.
      reject(err);
      controller.abort(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wall-clock budget shared by every step of one turn.
 */
export class Deadline {
  private readonly expiresAt: number;
  private readonly controller = new AbortController();

  constructor(
    readonly budgetMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + budgetMs;
  }

  /** Aborts with the `TURN_TIMEOUT` error once a `race` loses to the budget. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.remainingMs() === 0;
  }

  /** Reject with `TURN_TIMEOUT` if the budget runs out before `promise` settles. */
  race<T>(promise: Promise<T>): Promise<T> {
    return withTimeout(() => promise, this.remainingMs(), () => {
      const err = this.timeoutError();
      this.controller.abort(err);
      return err;
    });
  }

  private timeoutError(): ConciergeError {
    return new ConciergeError(
      "TURN_TIMEOUT",
      `Turn exceeded its ${this.budgetMs}ms budget`
    );
  }
}
