import { logger } from "../utils/logger.js";
import type { LLMRateLimitConfig } from "./llmTypes.js";

interface QueuedTask {
  execute: () => Promise<void>;
}

const RATE_WINDOW_MS = 60_000;

/**
 * Runs LLM calls with bounded concurrency, a requests-per-minute sliding
 * window, a per-attempt timeout and exponential backoff on retryable errors.
 */
export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 1,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 4000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 120_000
    };
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        execute: async () => {
          try {
            resolve(await this.executeWithRetry(task));
          } catch (error) {
            reject(error);
          }
        }
      });
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const item = this.queue.shift();
      if (!item) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void item.execute().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeWithRetry<T>(task: () => Promise<T>): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await this.withTimeout(task(), this.config.timeoutMs);
      } catch (error) {
        const shouldRetry = isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
        logger.warn({ err: error, attempt, backoffMs: backoff }, "Retrying LLM request after error");
        await sleep(backoff);
        await this.reserveRetrySlot();
      }
    }
  }

  /** Retries count against the per-minute window like first attempts. */
  private async reserveRetrySlot(): Promise<void> {
    for (;;) {
      this.pruneRequestWindow();
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs <= 0) {
        break;
      }
      logger.debug({ waitMs }, "Retry waiting for the rate window");
      await sleep(waitMs);
    }
    this.requestTimestamps.push(Date.now());
  }

  private withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) {
      return promise;
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`LLM request timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      promise
        .then((value) => {
          clearTimeout(timer);
          resolve(value);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - RATE_WINDOW_MS;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (firstInWindow === undefined) {
      return 0;
    }

    const elapsed = Date.now() - firstInWindow;
    return Math.max(0, RATE_WINDOW_MS - elapsed);
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }
}

export function isRetryableError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }

  if ("status" in error && typeof error.status === "number") {
    return error.status === 429 || error.status >= 500;
  }
  if ("code" in error && typeof error.code === "string") {
    return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(error.code);
  }
  if ("message" in error && typeof error.message === "string") {
    return /timeout|timed out|temporarily unavailable|connection error/i.test(error.message);
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
