/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Engine error taxonomy.
 * Only infrastructure failures (persistence, aggregation) are retryable;
 * auth, authorization and rate limiting are terminal for the triggering call.
 */

export type EngineErrorCode =
  | 'auth_error'
  | 'authorization_error'
  | 'rate_limited'
  | 'classification_degraded'
  | 'persistence_failure'
  | 'aggregation_failure'
  | 'not_found'
  | 'ingest_aborted';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly httpStatus: number;
  readonly retryable: boolean;

  constructor(code: EngineErrorCode, message: string, httpStatus: number, retryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
    this.retryable = retryable;
  }
}

export class AuthError extends EngineError {
  constructor(message = 'Invalid or expired token') {
    super('auth_error', message, 401);
  }
}

export class AuthorizationError extends EngineError {
  constructor(message = 'Insufficient scope') {
    super('authorization_error', message, 403);
  }
}

export class RateLimitedError extends EngineError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super('rate_limited', 'Too many requests, try again after the window elapses', 429);
    this.retryAfterMs = retryAfterMs;
  }
}

export class ClassificationDegraded extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('classification_degraded', message, 500, false, { cause });
  }
}

/** Non-retryable when the store rejected the row itself (constraint, range). */
export class PersistenceFailure extends EngineError {
  constructor(message: string, cause?: unknown, retryable = true) {
    super('persistence_failure', message, retryable ? 503 : 500, retryable, { cause });
  }
}

export class AggregationFailure extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('aggregation_failure', message, 503, true, { cause });
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super('not_found', message, 404);
  }
}

export class IngestAborted extends EngineError {
  constructor() {
    super('ingest_aborted', 'Request aborted before admission', 499);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
