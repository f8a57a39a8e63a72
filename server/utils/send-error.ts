/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import type { Response } from 'express';
import { ZodError } from 'zod';
import { EngineError, RateLimitedError, describeError } from '../errors';

export function sendError(res: Response, error: unknown, tag = 'API'): void {
  if (res.headersSent) {
    console.error(`[${tag}] ❌ Error after response was sent:`, describeError(error));
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'validation_error',
      message: 'Invalid request',
      details: error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
    return;
  }

  // Bad window bounds
  if (error instanceof RangeError) {
    res.status(400).json({ error: 'validation_error', message: error.message });
    return;
  }

  if (error instanceof RateLimitedError) {
    res.setHeader('Retry-After', String(Math.ceil(error.retryAfterMs / 1000)));
    res.status(429).json({ accepted: false, reason: 'rate_limited', retry_after_ms: error.retryAfterMs });
    return;
  }

  if (error instanceof EngineError) {
    if (error.httpStatus >= 500) {
      console.error(`[${tag}] ❌ ${error.name}: ${error.message}`);
    }
    res.status(error.httpStatus).json({ error: error.code, message: error.message });
    return;
  }

  console.error(`[${tag}] ❌ Unhandled error:`, error);
  res.status(500).json({ error: 'internal_error', message: 'Internal Server Error' });
}
