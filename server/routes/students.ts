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
import { getIdentity } from '../middleware/require-auth';
import type { ReviewService } from '../services/review-service';
import { sendError } from '../utils/send-error';

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export function createStudentRouter(deps: { review: ReviewService }): Router {
  const router = Router();

  // GET /api/students/:studentId/history - Self or admin
  router.get('/:studentId/history', async (req, res) => {
    try {
      const { limit } = historyQuerySchema.parse(req.query);
      const turns = await deps.review.getStudentHistory(getIdentity(req), req.params.studentId, limit);
      res.json({ student_id: req.params.studentId, turns });
    } catch (error) {
      sendError(res, error, 'Students');
    }
  });

  return router;
}
