import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryRateLimitStore, RateLimiter } from '../server/services/rate-limiter';

describe('RateLimiter', () => {
  let clock: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = 1_000_000;
    limiter = new RateLimiter({ maxRequests: 5, windowMs: 60_000, now: () => clock });
  });

  it('should admit five turns in ten seconds and reject the sixth', () => {
    for (let i = 0; i < 5; i++) {
      clock = 1_000_000 + i * 2_000;
      expect(limiter.admit('stu-1')).toBe(true);
    }

    clock = 1_010_000;
    expect(limiter.check('stu-1')).toEqual({ allowed: false, remaining: 0, retryAfterMs: 50_000 });
  });

  it('should admit again 61 seconds after the first turn', () => {
    for (let i = 0; i < 5; i++) {
      clock = 1_000_000 + i * 2_000;
      limiter.admit('stu-1');
    }
    clock = 1_010_000;
    expect(limiter.admit('stu-1')).toBe(false);

    clock = 1_061_000;
    expect(limiter.check('stu-1')).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0, admittedAt: 1_061_000 });
  });

  it('should not record rejected requests', () => {
    for (let i = 0; i < 5; i++) limiter.admit('stu-1');
    for (let i = 0; i < 10; i++) expect(limiter.admit('stu-1')).toBe(false);

    expect(limiter.usage('stu-1')).toBe(5);
    clock += 60_000;
    expect(limiter.usage('stu-1')).toBe(0);
    expect(limiter.admit('stu-1')).toBe(true);
  });

  it('should evict a timestamp exactly one window later', () => {
    limiter.admit('stu-1');
    clock += 59_999;
    expect(limiter.usage('stu-1')).toBe(1);
    clock += 1;
    expect(limiter.usage('stu-1')).toBe(0);
  });

  it('should keep students independent', () => {
    for (let i = 0; i < 5; i++) limiter.admit('stu-1');
    expect(limiter.admit('stu-1')).toBe(false);
    expect(limiter.check('stu-2')).toEqual({ allowed: true, remaining: 4, retryAfterMs: 0, admittedAt: 1_000_000 });
  });

  it('should give back a released slot', () => {
    const store = new InMemoryRateLimitStore();
    limiter = new RateLimiter({ maxRequests: 5, windowMs: 60_000, store, now: () => clock });
    for (let i = 0; i < 4; i++) {
      clock = 1_000_000 + i * 1_000;
      limiter.admit('stu-1');
    }
    clock = 1_004_000;
    const last = limiter.check('stu-1');
    expect(last).toMatchObject({ allowed: true, remaining: 0, admittedAt: 1_004_000 });
    expect(limiter.admit('stu-1')).toBe(false);

    expect(limiter.release('stu-1', 1_004_000)).toBe(true);
    expect(limiter.usage('stu-1')).toBe(4);
    expect(limiter.release('stu-1', 1_004_000)).toBe(false);
    expect(limiter.admit('stu-1')).toBe(true);
  });

  it('should drop a student whose only slot is released', () => {
    const store = new InMemoryRateLimitStore();
    limiter = new RateLimiter({ maxRequests: 5, windowMs: 60_000, store, now: () => clock });
    limiter.admit('stu-1');

    expect(limiter.release('stu-1', clock)).toBe(true);
    expect(store.size).toBe(0);
    expect(limiter.release('stu-9', clock)).toBe(false);
  });

  it('should sweep drained students from the store', () => {
    const store = new InMemoryRateLimitStore();
    limiter = new RateLimiter({ maxRequests: 5, windowMs: 60_000, store, now: () => clock });
    limiter.admit('stu-1');
    clock += 30_000;
    limiter.admit('stu-2');

    clock += 30_000;
    expect(limiter.sweep()).toBe(1);
    expect([...store.keys()]).toEqual(['stu-2']);
  });

  it('should reject invalid limits', () => {
    expect(() => new RateLimiter({ maxRequests: 0, windowMs: 1000 })).toThrow('maxRequests must be at least 1');
    expect(() => new RateLimiter({ maxRequests: 1, windowMs: 0 })).toThrow('windowMs must be positive');
  });
});
