/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import { Router } from 'express';
import { z } from 'zod';
import { INT4_MAX, TURN_ROLES } from '@shared/schema';
import { RateLimitedError } from '../errors';
import { getIdentity } from '../middleware/require-auth';
import type { IngestionPipeline } from '../services/ingestion-pipeline';
import type { ReviewService } from '../services/review-service';
import { sendError } from '../utils/send-error';

const turnBodySchema = z.object({
  session_id: z.string().trim().min(1).max(255),
  role: z.enum(TURN_ROLES).default('student'),
  text: z.string(),
  tokens_est: z.number().int().nonnegative().max(INT4_MAX).optional(),
  response_time_ms: z.number().int().nonnegative().max(INT4_MAX).optional(),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export function createChatRouter(deps: { pipeline: IngestionPipeline; review: ReviewService }): Router {
  const router = Router();

  // POST /api/chat/turns - Ingest one conversation turn for the caller
  router.post('/turns', async (req, res) => {
    try {
      const identity = getIdentity(req);
      const body = turnBodySchema.parse(req.body);

      // Client disconnects before admission cancel the turn
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });

      const result = await deps.pipeline.ingest(identity, {
        sessionId: body.session_id,
        role: body.role,
        text: body.text,
        tokensEst: body.tokens_est,
        responseTimeMs: body.response_time_ms,
      }, { signal: controller.signal });

      if (result.status === 'rate_limited') {
        throw new RateLimitedError(result.retryAfterMs);
      }

      res.status(201).json({ accepted: true, turn_id: result.turn.id, flagged: result.turn.safetyFlagged });
    } catch (error) {
      sendError(res, error, 'Chat');
    }
  });

  // GET /api/chat/history - The caller's own recent turns
  router.get('/history', async (req, res) => {
    try {
      const identity = getIdentity(req);
      const { limit } = historyQuerySchema.parse(req.query);
      const turns = await deps.review.getStudentHistory(identity, identity.studentId, limit);
      res.json({ turns });
    } catch (error) {
      sendError(res, error, 'Chat');
    }
  });

  return router;
}
