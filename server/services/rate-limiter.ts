/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Per-Student Rate Limiter
 *
 * Sliding-window log: each student keeps the timestamps of admitted requests
 * inside the trailing window. A request is admitted only while fewer than
 * `maxRequests` timestamps remain after eviction.
 *
 * Admission is a single synchronous step (evict, count, record) with no await
 * in between, so concurrent requests for the same student cannot both take
 * the last free slot.
 */

export interface RateLimitStore {
  get(studentId: string): number[] | undefined;
  set(studentId: string, timestamps: number[]): void;
  delete(studentId: string): void;
  keys(): Iterable<string>;
}

export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, number[]>();

  get(studentId: string): number[] | undefined {
    return this.windows.get(studentId);
  }

  set(studentId: string, timestamps: number[]): void {
    this.windows.set(studentId, timestamps);
  }

  delete(studentId: string): void {
    this.windows.delete(studentId);
  }

  keys(): Iterable<string> {
    return Array.from(this.windows.keys());
  }

  get size(): number {
    return this.windows.size;
  }
}

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  store?: RateLimitStore;
  now?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
  /** Timestamp recorded for an admitted request, for `release`. */
  admittedAt?: number;
}

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly store: RateLimitStore;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: RateLimiterOptions) {
    if (options.maxRequests < 1) throw new Error('maxRequests must be at least 1');
    if (options.windowMs < 1) throw new Error('windowMs must be positive');
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.store = options.store ?? new InMemoryRateLimitStore();
    this.now = options.now ?? Date.now;
  }

  admit(studentId: string): boolean {
    return this.check(studentId).allowed;
  }

  /**
   * Admit-and-record. Rejected requests are not recorded, so a student who
   * stops sending regains full capacity one window after their last admit.
   */
  check(studentId: string): RateLimitDecision {
    const now = this.now();
    const live = this.liveTimestamps(studentId, now);

    if (live.length >= this.maxRequests) {
      this.store.set(studentId, live);
      const retryAfterMs = live[0] + this.windowMs - now;
      console.log(`[RateLimiter] 🚦 Limit hit for ${studentId}: ${live.length}/${this.maxRequests} in last ${this.windowMs / 1000}s`);
      return { allowed: false, remaining: 0, retryAfterMs };
    }

    live.push(now);
    this.store.set(studentId, live);
    return { allowed: true, remaining: this.maxRequests - live.length, retryAfterMs: 0, admittedAt: now };
  }

  /** Give back a slot whose request left no state behind. */
  release(studentId: string, admittedAt: number): boolean {
    const timestamps = this.store.get(studentId);
    const index = timestamps ? timestamps.indexOf(admittedAt) : -1;
    if (!timestamps || index === -1) return false;
    timestamps.splice(index, 1);
    if (timestamps.length === 0) this.store.delete(studentId);
    else this.store.set(studentId, timestamps);
    return true;
  }

  /** Current in-window count without recording anything. */
  usage(studentId: string): number {
    return this.liveTimestamps(studentId, this.now()).length;
  }

  /** Drop students whose window has fully drained. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const studentId of this.store.keys()) {
      if (this.liveTimestamps(studentId, now).length === 0) {
        this.store.delete(studentId);
        removed++;
      }
    }
    return removed;
  }

  startSweeper(intervalMs: number = SWEEP_INTERVAL_MS): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        console.log(`[RateLimiter] Swept ${removed} idle student windows`);
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private liveTimestamps(studentId: string, now: number): number[] {
    const timestamps = this.store.get(studentId) ?? [];
    return timestamps.filter((t) => now - t < this.windowMs);
  }
}
