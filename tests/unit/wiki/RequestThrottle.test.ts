/**
 * RequestThrottle unit tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RequestThrottle } from '../../../src/wiki/RequestThrottle.js';

describe('RequestThrottle', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should let requests through up to the limit', async () => {
    const throttle = new RequestThrottle({ maxRequests: 3, windowMs: 1000 });

    await throttle.acquire();
    await throttle.acquire();

    expect(throttle.remaining()).toBe(1);
  });

  it('should make callers wait for the next window once the limit is reached', async () => {
    const throttle = new RequestThrottle({ maxRequests: 2, windowMs: 1000 });
    await throttle.acquire();
    await throttle.acquire();
    expect(throttle.remaining()).toBe(0);

    let acquired = false;
    const pending = throttle.acquire().then(() => {
      acquired = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(acquired).toBe(true);
    expect(throttle.remaining()).toBe(1);
  });

  it('should report a full window after the window expires', async () => {
    const throttle = new RequestThrottle({ maxRequests: 2, windowMs: 1000 });
    await throttle.acquire();

    vi.advanceTimersByTime(1000);

    expect(throttle.remaining()).toBe(2);
  });

  it('should default to a one minute window', async () => {
    const throttle = new RequestThrottle({ maxRequests: 1 });
    await throttle.acquire();

    vi.advanceTimersByTime(59_999);
    expect(throttle.remaining()).toBe(0);

    vi.advanceTimersByTime(1);
    expect(throttle.remaining()).toBe(1);
  });

  it('should reject a non-positive limit', () => {
    expect(() => new RequestThrottle({ maxRequests: 0 })).toThrow(RangeError);
  });
});
