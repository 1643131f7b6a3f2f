/**
 * Retry policy and pacing gate for structuring calls.
 *
 * The policy owns all waiting: backoff between attempts on one record and
 * the minimum gap between any two calls in the run. Time comes from a
 * Clock so tests can run on a fake one.
 */

import type { RetryConfig } from "@/lib/config";

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early (without throwing) when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms, signal) {
    return new Promise((resolve) => {
      if (ms <= 0 || signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  },
};

export type RetryPolicyConfig = Pick<
  RetryConfig,
  "maxRetries" | "errorDelayMs" | "maxErrorDelayMs" | "rateLimitDelayMs" | "backoff"
>;

export class RetryPolicy {
  private lastCallAt: number | null = null;

  constructor(
    private readonly config: RetryPolicyConfig,
    readonly clock: Clock = systemClock,
  ) {}

  /** Total attempts allowed per record, first call included. */
  get maxAttempts(): number {
    return this.config.maxRetries;
  }

  /**
   * Delay before the next attempt after `failedAttempts` failures (1-based).
   * Exponential doubles from errorDelayMs up to maxErrorDelayMs.
   */
  delayFor(failedAttempts: number): number {
    const { errorDelayMs, maxErrorDelayMs, backoff } = this.config;
    if (backoff === "fixed") return errorDelayMs;
    const exponent = Math.max(0, failedAttempts - 1);
    return Math.min(errorDelayMs * 2 ** exponent, maxErrorDelayMs);
  }

  shouldRetry(failedAttempts: number, retryable: boolean): boolean {
    return retryable && failedAttempts < this.config.maxRetries;
  }

  /** Wait until rateLimitDelayMs has passed since the previous call finished. */
  async pace(signal?: AbortSignal): Promise<void> {
    if (this.lastCallAt === null) return;
    const wait = this.lastCallAt + this.config.rateLimitDelayMs - this.clock.now();
    if (wait > 0) await this.clock.sleep(wait, signal);
  }

  /** Mark the end of a call (success or failure) for the pacing gate. */
  markCall(): void {
    this.lastCallAt = this.clock.now();
  }

  async backoff(failedAttempts: number, signal?: AbortSignal): Promise<number> {
    const delay = this.delayFor(failedAttempts);
    await this.clock.sleep(delay, signal);
    return delay;
  }
}
