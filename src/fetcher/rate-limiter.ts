import { FetchError } from './errors.js';

/**
 * Configuration for the AdaptiveRateLimiter.
 */
export interface RateLimiterConfig {
  /** Base delay before each request in milliseconds. */
  delay: number;
  /** Retries allowed for a request answered with 5xx. */
  maxRetries: number;
  /** Adjust the delay from server responses; when false the delay is fixed. */
  adaptiveRateLimit: boolean;
}

/** Consecutive successes needed before the delay shrinks. */
const SUCCESS_THRESHOLD = 10;

/** Factor applied to the delay when it shrinks. */
const RECOVERY_MULTIPLIER = 0.8;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isServerError(statusCode: number | undefined): boolean {
  return statusCode !== undefined && statusCode >= 500 && statusCode < 600;
}

/**
 * Rate limiter that paces requests and reacts to how the server answers.
 *
 * - 429: the delay doubles, or becomes the Retry-After value; the error is rethrown
 * - 5xx: retried with exponential backoff, up to `maxRetries` times
 * - ten successes in a row: the delay shrinks by 20%, never below the baseline
 */
export class AdaptiveRateLimiter {
  private readonly baselineDelay: number;
  private currentDelay: number;
  private successStreak = 0;

  constructor(private readonly config: RateLimiterConfig) {
    this.baselineDelay = config.delay;
    this.currentDelay = config.delay;
  }

  /**
   * Wait for the current delay, then run `fn`, retrying server errors.
   */
  async executeWithRateLimit<T>(fn: () => Promise<T>): Promise<T> {
    if (this.currentDelay > 0) {
      await sleep(this.currentDelay);
    }

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await fn();
        this.recordSuccess();
        return result;
      } catch (error) {
        if (!(error instanceof FetchError)) {
          throw error;
        }
        if (error.statusCode === 429) {
          this.recordTooManyRequests(error);
          throw error;
        }
        if (!isServerError(error.statusCode) || attempt >= this.config.maxRetries) {
          throw error;
        }
        this.successStreak = 0;
        await sleep(this.currentDelay * 2 ** (attempt + 1));
      }
    }
  }

  getCurrentDelay(): number {
    return this.currentDelay;
  }

  getBaselineDelay(): number {
    return this.baselineDelay;
  }

  private recordSuccess(): void {
    if (!this.config.adaptiveRateLimit) {
      return;
    }
    this.successStreak++;
    if (this.successStreak >= SUCCESS_THRESHOLD) {
      this.currentDelay = Math.max(
        this.baselineDelay,
        this.currentDelay * RECOVERY_MULTIPLIER,
      );
      this.successStreak = 0;
    }
  }

  private recordTooManyRequests(error: FetchError): void {
    this.successStreak = 0;
    if (!this.config.adaptiveRateLimit) {
      return;
    }

    const retryAfter = error.headers?.['retry-after'];
    const parsed = retryAfter ? parseRetryAfter(retryAfter) : undefined;
    this.currentDelay = parsed ?? this.currentDelay * 2;
  }
}

/**
 * Parse a Retry-After header value, either delta-seconds or an HTTP-date.
 *
 * @returns Delay in milliseconds, or undefined if unparseable
 */
export function parseRetryAfter(value: string): number | undefined {
  const seconds = Number(value);
  if (value.trim() !== '' && Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }
  return Math.max(0, date.getTime() - Date.now());
}
