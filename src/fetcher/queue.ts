import PQueue from 'p-queue';
import { AdaptiveRateLimiter, type RateLimiterConfig } from './rate-limiter.js';

/**
 * Configuration for the FetchQueue.
 */
export interface FetchQueueConfig extends RateLimiterConfig {
  /** Maximum number of requests in flight at once. */
  concurrency: number;
}

/**
 * p-queue with an adaptive rate limiter in front of every task.
 * All page requests go through one queue per fetcher.
 */
export class FetchQueue {
  private readonly queue: PQueue;
  readonly rateLimiter: AdaptiveRateLimiter;

  constructor(config: FetchQueueConfig) {
    this.queue = new PQueue({ concurrency: config.concurrency });
    this.rateLimiter = new AdaptiveRateLimiter(config);
  }

  /**
   * Schedule `fn`; resolves or rejects with its outcome.
   */
  add<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.add(() => this.rateLimiter.executeWithRateLimit(fn), {
      throwOnTimeout: true,
    });
  }

  /** Drop requests that have not started yet. */
  clear(): void {
    this.queue.clear();
  }
}
