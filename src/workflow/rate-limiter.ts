import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';

export interface RateLimiterOptions {
  minIntervalSeconds?: number;
  errorWindowSeconds?: number;
  penaltyPerErrorSeconds?: number;
  maxPenaltySeconds?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterStats {
  minIntervalSeconds: number;
  errorCount: number;
  lastErrorTime: number | null;
  lastCallTime: number | null;
  penaltySeconds: number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Spaces calls to the compute provider at least `minIntervalSeconds` apart,
 * plus a penalty while a recorded rate-limit rejection is recent. Waits are
 * serialised: each caller computes its delay from the state the previous
 * caller left behind.
 */
export class RateLimiter {
  readonly minIntervalSeconds: number;
  private readonly errorWindowMs: number;
  private readonly penaltyPerErrorSeconds: number;
  private readonly maxPenaltySeconds: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private lastCallTime: number | null = null;
  private errorCount = 0;
  private lastErrorTime: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalSeconds = options.minIntervalSeconds ?? config.rateLimit.minIntervalSeconds;
    this.errorWindowMs = (options.errorWindowSeconds ?? config.rateLimit.errorWindowSeconds) * 1000;
    this.penaltyPerErrorSeconds = options.penaltyPerErrorSeconds ?? config.rateLimit.penaltyPerErrorSeconds;
    this.maxPenaltySeconds = options.maxPenaltySeconds ?? config.rateLimit.maxPenaltySeconds;
    this.now = options.now || Date.now;
    this.sleep = options.sleep || defaultSleep;
  }

  async waitIfNeeded(): Promise<void> {
    await this.withLock(async () => {
      const currentTime = this.now();
      const extraSeconds = this.penaltyAt(currentTime);

      if (this.lastCallTime === null) {
        logger.debug('[RATE LIMIT] First call, no wait needed');
      } else {
        const elapsedMs = currentTime - this.lastCallTime;
        const requiredMs = (this.minIntervalSeconds + extraSeconds) * 1000;

        if (elapsedMs < requiredMs) {
          const waitMs = requiredMs - elapsedMs;
          if (waitMs > 100) {
            logger.info(
              `[RATE LIMIT] Waiting ${(waitMs / 1000).toFixed(2)}s | ` +
                `Base: ${this.minIntervalSeconds}s, Extra: ${extraSeconds.toFixed(2)}s | ` +
                `Elapsed: ${(elapsedMs / 1000).toFixed(2)}s`
            );
          }
          await this.sleep(waitMs);
        } else {
          logger.debug(
            `[RATE LIMIT] No wait needed | Elapsed: ${(elapsedMs / 1000).toFixed(2)}s >= ` +
              `Required: ${(requiredMs / 1000).toFixed(2)}s`
          );
        }
      }

      this.lastCallTime = this.now();
    });
  }

  /**
   * Called by the boundary layer whenever the provider rejects a call for
   * rate-limiting reasons. The count is never decayed; use `reset()` to clear it.
   */
  recordError(): void {
    this.errorCount++;
    this.lastErrorTime = this.now();

    logger.warn(`[RATE LIMIT ERROR] Count: ${this.errorCount} | Increasing delays between calls`);

    if (this.errorCount > config.rateLimit.severeErrorCount) {
      logger.warn(
        `[RATE LIMIT WARNING] Multiple errors (${this.errorCount}) detected. ` +
          'Consider increasing RATE_LIMIT_INTERVAL_SECONDS.'
      );
    }
  }

  reset(): void {
    this.errorCount = 0;
    this.lastErrorTime = null;
    this.lastCallTime = null;
  }

  /** Extra delay in seconds that a call made at `at` would pay. */
  penaltyAt(at: number = this.now()): number {
    if (this.lastErrorTime === null || at - this.lastErrorTime >= this.errorWindowMs) {
      return 0;
    }
    return Math.min(this.errorCount * this.penaltyPerErrorSeconds, this.maxPenaltySeconds);
  }

  getStats(): RateLimiterStats {
    return {
      minIntervalSeconds: this.minIntervalSeconds,
      errorCount: this.errorCount,
      lastErrorTime: this.lastErrorTime,
      lastCallTime: this.lastCallTime,
      penaltySeconds: this.penaltyAt(),
    };
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

let sharedLimiter: RateLimiter | null = null;

/** Process-wide limiter used when a caller does not inject its own. */
export function getSharedRateLimiter(): RateLimiter {
  if (!sharedLimiter) {
    sharedLimiter = new RateLimiter();
  }
  return sharedLimiter;
}
