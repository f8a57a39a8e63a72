/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import { EngineError, describeError } from '../errors';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  label?: string;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

// Postgres connection/serialization failures worth another attempt
const TRANSIENT_PG_CODES = new Set(['40001', '40P01', '57P01', '08000', '08003', '08006']);

export function isTransientError(error: unknown): boolean {
  if (error instanceof EngineError) return error.retryable;
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
    if (TRANSIENT_PG_CODES.has(code)) return true;
    const message = error.message.toLowerCase();
    return message.includes('connection terminated') || message.includes('timeout');
  }
  return false;
}

const DEFAULT_OPTIONS = {
  maxRetries: 3,
  initialDelayMs: 200,
  maxDelayMs: 4000,
  label: 'Retry',
  isRetryable: isTransientError,
  sleep: (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)),
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!opts.isRetryable(error)) {
        throw error;
      }

      if (attempt < opts.maxRetries) {
        const jitter = Math.random() * 100;
        const delay = Math.min(
          opts.initialDelayMs * Math.pow(2, attempt - 1) + jitter,
          opts.maxDelayMs
        );

        console.warn(`[${opts.label}] Attempt ${attempt}/${opts.maxRetries} failed: ${describeError(error)}. Retrying in ${Math.round(delay)}ms...`);
        await opts.sleep(delay);
      } else {
        console.error(`[${opts.label}] All ${opts.maxRetries} attempts failed`);
      }
    }
  }

  throw lastError;
}
