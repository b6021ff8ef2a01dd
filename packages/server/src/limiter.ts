/**
 * ConversionLimiter - Semaphore bounding how many conversions run at once.
 *
 * Connections beyond the limit wait in a FIFO queue, optionally with a
 * timeout. Each ConversionServer owns its own limiter.
 */

import { TimeoutError } from '@fileconv/shared';

interface WaitingRequest {
  resolve: () => void;
  reject: (error: Error) => void;
  timeoutId?: NodeJS.Timeout;
}

export interface LimiterStats {
  maxConcurrent: number;
  currentCount: number;
  waitingCount: number;
}

export class ConversionLimiter {
  private readonly maxConcurrent: number;
  private currentCount = 0;
  private waitingQueue: WaitingRequest[] = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  getStats(): LimiterStats {
    return {
      maxConcurrent: this.maxConcurrent,
      currentCount: this.currentCount,
      waitingCount: this.waitingQueue.length,
    };
  }

  private tryAcquire(): boolean {
    if (this.currentCount < this.maxConcurrent) {
      this.currentCount++;
      return true;
    }
    return false;
  }

  /**
   * Acquire a slot, waiting if at limit.
   *
   * @param timeoutMs - Longest wait for a slot; waits indefinitely when absent or 0
   * @throws TimeoutError when no slot frees up in time
   */
  private async acquire(timeoutMs?: number): Promise<void> {
    if (this.tryAcquire()) {
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const request: WaitingRequest = {
        resolve: () => {
          this.currentCount++;
          resolve();
        },
        reject,
      };

      if (timeoutMs !== undefined && timeoutMs > 0) {
        request.timeoutId = setTimeout(() => {
          const index = this.waitingQueue.indexOf(request);
          if (index !== -1) {
            this.waitingQueue.splice(index, 1);
          }
          reject(new TimeoutError(`No conversion slot free within ${timeoutMs}ms`));
        }, timeoutMs);
      }

      this.waitingQueue.push(request);
    });
  }

  /**
   * Release a slot, handing it to the next waiting request.
   */
  private release(): void {
    this.currentCount--;

    const next = this.waitingQueue.shift();
    if (next) {
      if (next.timeoutId) {
        clearTimeout(next.timeoutId);
      }
      // resolve() increments currentCount
      next.resolve();
    }
  }

  /**
   * Run `task` inside a slot.
   */
  async run<T>(task: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Reject all waiting requests. Called during shutdown.
   */
  clearWaiting(error?: Error): void {
    const err = error ?? new Error('ConversionLimiter shutting down');
    for (const request of this.waitingQueue) {
      if (request.timeoutId) {
        clearTimeout(request.timeoutId);
      }
      request.reject(err);
    }
    this.waitingQueue = [];
  }
}
