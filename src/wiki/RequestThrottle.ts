/**
 * Outbound request throttle
 * Fixed window: at most `maxRequests` requests start per `windowMs`;
 * callers beyond that wait for the next window.
 */
import { createChildLogger } from '../core/Logger.js';

const logger = createChildLogger({ service: 'Throttle' });

export interface RequestThrottleConfig {
  maxRequests: number;
  windowMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RequestThrottle {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private count = 0;
  private resetAt = 0;

  constructor(config: RequestThrottleConfig) {
    if (!Number.isInteger(config.maxRequests) || config.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${config.maxRequests}`);
    }
    this.maxRequests = config.maxRequests;
    this.windowMs = config.windowMs ?? 60 * 1000;
  }

  /**
   * Wait for a free slot in the current or a later window
   */
  async acquire(): Promise<void> {
    for (;;) {
      const now = Date.now();
      if (now >= this.resetAt) {
        this.count = 0;
        this.resetAt = now + this.windowMs;
      }

      if (this.count < this.maxRequests) {
        this.count++;
        return;
      }

      const waitMs = this.resetAt - now;
      logger.debug({ waitMs, limit: this.maxRequests }, 'Request limit reached, waiting for next window');
      await sleep(waitMs);
    }
  }

  /**
   * Requests still available in the current window
   */
  remaining(): number {
    if (Date.now() >= this.resetAt) return this.maxRequests;
    return this.maxRequests - this.count;
  }
}
