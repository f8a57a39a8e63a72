/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Review Service
 * Admin dashboard reads, flag review and per-student history. Every operation
 * is authorized here, not by the caller.
 */

import type { AnalyticsSummary, ConversationTurn, FlaggedItem, ReviewStatus } from '@shared/schema';
import { NotFoundError } from '../errors';
import {
  GLOBAL_GROUPING_KEY,
  studentGroupingKey,
  topicGroupingKey,
  type FlaggedItemDetail,
  type IStorage,
  type StudentOverview,
  type TurnWithStudent,
} from '../storage';
import type { AccessGate, Identity } from './access-gate';
import { assertValidWindow, dayWindow, type AnalyticsAggregator, type TimeWindow } from './analytics-aggregator';

export interface SummaryQuery {
  topic?: string;
  studentId?: string;
  refresh?: boolean;
}

export interface PlatformStats {
  totalStudents: number;
  totalTurns: number;
  activeToday: number;
  activeWeek: number;
  unreviewedFlags: number;
  avgTurnsPerStudent: number;
}

export interface ReviewServiceDeps {
  storage: IStorage;
  accessGate: AccessGate;
  aggregator: AnalyticsAggregator;
}

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export class ReviewService {
  constructor(private readonly deps: ReviewServiceDeps) {}

  async getSummary(identity: Identity, window: TimeWindow, query: SummaryQuery = {}): Promise<AnalyticsSummary[]> {
    this.deps.accessGate.requireAdmin(identity);
    assertValidWindow(window);

    const key = query.studentId
      ? studentGroupingKey(query.studentId)
      : query.topic
        ? topicGroupingKey(query.topic)
        : undefined;

    if (!query.refresh) {
      const stored = await this.deps.storage.getSummaries(window.start, window.end, key);
      if (stored.length > 0) return stored;
      // A window with turns always has its global row; an absent topic row just means no turns
      if (key && key !== GLOBAL_GROUPING_KEY && !query.studentId) {
        const global = await this.deps.storage.getSummaries(window.start, window.end, GLOBAL_GROUPING_KEY);
        if (global.length > 0) return [];
      }
    }

    if (query.studentId) {
      return [await this.deps.aggregator.recomputeStudent(query.studentId, window)];
    }
    const rows = await this.deps.aggregator.recompute(window);
    return key ? rows.filter((row) => row.groupingKey === key) : rows;
  }

  async listFlagged(identity: Identity, status?: ReviewStatus, limit = 50): Promise<FlaggedItemDetail[]> {
    this.deps.accessGate.requireAdmin(identity);
    return this.deps.storage.listFlaggedItems(status, limit);
  }

  async setFlagReviewStatus(
    identity: Identity,
    flagId: number,
    status: ReviewStatus,
    reviewedAt: Date = new Date()
  ): Promise<FlaggedItem> {
    this.deps.accessGate.requireAdmin(identity);
    const reviewer = identity.email ?? identity.studentId;
    const updated = await this.deps.storage.updateFlagReviewStatus(flagId, status, reviewer, reviewedAt);
    if (!updated) {
      throw new NotFoundError(`Flagged item ${flagId} not found`);
    }
    console.log(`[Review] Flag ${flagId} marked ${status} by ${reviewer}`);
    return updated;
  }

  async getStudentHistory(identity: Identity, studentId: string, limit = 50): Promise<ConversationTurn[]> {
    this.deps.accessGate.requireSelfOrAdmin(identity, studentId);
    return this.deps.storage.getStudentTurns(studentId, limit);
  }

  async listStudents(identity: Identity, limit = 50, offset = 0): Promise<StudentOverview[]> {
    this.deps.accessGate.requireAdmin(identity);
    return this.deps.storage.listStudents(limit, offset);
  }

  async listConversations(identity: Identity, limit = 50, offset = 0): Promise<TurnWithStudent[]> {
    this.deps.accessGate.requireAdmin(identity);
    return this.deps.storage.listRecentTurns(limit, offset);
  }

  async getPlatformStats(identity: Identity, now: Date): Promise<PlatformStats> {
    this.deps.accessGate.requireAdmin(identity);
    const today = dayWindow(now);
    const weekStart = new Date(today.end.getTime() - WEEK_MS);
    const counts = await this.deps.storage.getPlatformCounts(today.start, weekStart);

    return {
      ...counts,
      avgTurnsPerStudent: counts.totalStudents === 0
        ? 0
        : Math.round((counts.totalTurns / counts.totalStudents) * 100) / 100,
    };
  }
}
