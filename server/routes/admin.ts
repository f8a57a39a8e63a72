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
import { INT4_MAX, REVIEW_STATUSES } from '@shared/schema';
import { getIdentity } from '../middleware/require-auth';
import type { AccessGate } from '../services/access-gate';
import { dayWindow, type AnalyticsAggregator } from '../services/analytics-aggregator';
import type { ReviewService } from '../services/review-service';
import { sendError } from '../utils/send-error';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const summaryQuerySchema = z.object({
  start: z.coerce.date().optional(),
  end: z.coerce.date().optional(),
  topic: z.string().trim().min(1).optional(),
  student_id: z.string().trim().min(1).optional(),
  refresh: booleanFlag,
});

const recomputeBodySchema = z.object({
  start: z.coerce.date(),
  end: z.coerce.date(),
  student_id: z.string().trim().min(1).optional(),
});

const flaggedQuerySchema = z.object({
  status: z.enum(REVIEW_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const reviewBodySchema = z.object({
  status: z.enum(REVIEW_STATUSES),
});

const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const flagIdSchema = z.coerce.number().int().positive().max(INT4_MAX);

export interface AdminRouterDeps {
  review: ReviewService;
  aggregator: AnalyticsAggregator;
  accessGate: AccessGate;
  now?: () => Date;
}

export function createAdminRouter(deps: AdminRouterDeps): Router {
  const router = Router();
  const now = deps.now ?? (() => new Date());

  // GET /api/admin/summary - Stored rollups for a window (defaults to the current UTC day)
  router.get('/summary', async (req, res) => {
    try {
      const query = summaryQuerySchema.parse(req.query);
      const today = dayWindow(now());
      const window = { start: query.start ?? today.start, end: query.end ?? today.end };
      const summaries = await deps.review.getSummary(getIdentity(req), window, {
        topic: query.topic,
        studentId: query.student_id,
        refresh: query.refresh,
      });
      res.json({ window_start: window.start.toISOString(), window_end: window.end.toISOString(), summaries });
    } catch (error) {
      sendError(res, error, 'Admin');
    }
  });

  // POST /api/admin/summary/recompute - Force a rollup rebuild
  router.post('/summary/recompute', async (req, res) => {
    try {
      const identity = getIdentity(req);
      deps.accessGate.requireAdmin(identity);
      const body = recomputeBodySchema.parse(req.body);
      const window = { start: body.start, end: body.end };

      const summaries = body.student_id
        ? [await deps.aggregator.recomputeStudent(body.student_id, window)]
        : await deps.aggregator.recompute(window);

      console.log(`[Admin] 📊 Summary recompute requested by ${identity.email ?? identity.studentId}`);
      res.json({ summaries });
    } catch (error) {
      sendError(res, error, 'Admin');
    }
  });

  // GET /api/admin/flagged - Review queue, newest first
  router.get('/flagged', async (req, res) => {
    try {
      const { status, limit } = flaggedQuerySchema.parse(req.query);
      const items = await deps.review.listFlagged(getIdentity(req), status, limit);
      res.json({ items });
    } catch (error) {
      sendError(res, error, 'Admin');
    }
  });

  // PATCH /api/admin/flagged/:id - Record a review decision
  router.patch('/flagged/:id', async (req, res) => {
    try {
      const identity = getIdentity(req);
      const flagId = flagIdSchema.parse(req.params.id);
      const { status } = reviewBodySchema.parse(req.body);
      const item = await deps.review.setFlagReviewStatus(identity, flagId, status, now());
      res.json({ item });
    } catch (error) {
      sendError(res, error, 'Admin');
    }
  });

  router.get('/students', async (req, res) => {
    try {
      const { limit, offset } = pageQuerySchema.parse(req.query);
      const students = await deps.review.listStudents(getIdentity(req), limit, offset);
      res.json({ students, limit, offset });
    } catch (error) {
      sendError(res, error, 'Admin');
    }
  });

  router.get('/conversations', async (req, res) => {
    try {
      const { limit, offset } = pageQuerySchema.parse(req.query);
      const turns = await deps.review.listConversations(getIdentity(req), limit, offset);
      res.json({ turns, limit, offset });
    } catch (error) {
      sendError(res, error, 'Admin');
    }
  });

  router.get('/stats', async (req, res) => {
    try {
      const stats = await deps.review.getPlatformStats(getIdentity(req), now());
      res.json(stats);
    } catch (error) {
      sendError(res, error, 'Admin');
    }
  });

  return router;
}
