/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Analytics Aggregator
 * Rebuilds window rollups from the turn log. Summary rows are a cache: each
 * recompute replaces the rows of its exact window and scope, so running it
 * twice over unchanged turns yields the same rows.
 */

import {
  type AnalyticsSummary,
  type ConversationTurn,
  type QuestionType,
  type Sentiment,
} from '@shared/schema';
import { AggregationFailure, describeError } from '../errors';
import {
  GLOBAL_GROUPING_KEY,
  studentGroupingKey,
  topicGroupingKey,
  type IStorage,
  type NewSummary,
  type SummaryScope,
} from '../storage';

export interface TimeWindow {
  start: Date;
  end: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function assertValidWindow(window: TimeWindow): void {
  if (Number.isNaN(window.start.getTime()) || Number.isNaN(window.end.getTime())) {
    throw new RangeError('Window bounds must be valid dates');
  }
  if (window.end.getTime() <= window.start.getTime()) {
    throw new RangeError('Window end must be after window start');
  }
}

/** The UTC calendar day containing `date`. */
export function dayWindow(date: Date): TimeWindow {
  const start = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  return { start, end: new Date(start.getTime() + DAY_MS) };
}

/** `days` whole UTC days ending with the day containing `now`. */
export function trailingWindow(days: number, now: Date): TimeWindow {
  const today = dayWindow(now);
  return { start: new Date(today.end.getTime() - days * DAY_MS), end: today.end };
}

function sortedCounts(values: Iterable<string>): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function computeRollup(turns: ConversationTurn[], window: TimeWindow, groupingKey: string): NewSummary {
  const sessions = new Set(turns.map((turn) => turn.sessionId));
  const activeStudents = new Set(turns.map((turn) => turn.studentId));

  const sentimentCounts: Record<Sentiment, number> = { positive: 0, neutral: 0, negative: 0 };
  const questionTypeCounts: Record<QuestionType, number> = { factual: 0, 'open-ended': 0, other: 0 };
  let flaggedTurns = 0;

  for (const turn of turns) {
    sentimentCounts[turn.sentiment] += 1;
    if (turn.questionType !== null) {
      questionTypeCounts[turn.questionType] += 1;
    }
    if (turn.safetyFlagged) flaggedTurns++;
  }

  return {
    windowStart: window.start,
    windowEnd: window.end,
    groupingKey,
    totalTurns: turns.length,
    totalSessions: sessions.size,
    avgTurnsPerSession: sessions.size === 0 ? 0 : turns.length / sessions.size,
    sentimentCounts,
    questionTypeCounts,
    topicCounts: sortedCounts(turns.map((turn) => turn.topic)),
    uniqueActiveStudents: activeStudents.size,
    flaggedTurns,
  };
}

export class AnalyticsAggregator {
  constructor(private readonly storage: IStorage) {}

  /** Global row plus one row per topic seen in the window. */
  async recompute(window: TimeWindow): Promise<AnalyticsSummary[]> {
    assertValidWindow(window);
    const started = Date.now();
    const turns = await this.snapshot(window);

    const byTopic = new Map<string, ConversationTurn[]>();
    for (const turn of turns) {
      const bucket = byTopic.get(turn.topic);
      if (bucket) bucket.push(turn);
      else byTopic.set(turn.topic, [turn]);
    }

    const rows: NewSummary[] = [computeRollup(turns, window, GLOBAL_GROUPING_KEY)];
    for (const topic of [...byTopic.keys()].sort()) {
      rows.push(computeRollup(byTopic.get(topic) ?? [], window, topicGroupingKey(topic)));
    }

    const saved = await this.replace({ kind: 'window', windowStart: window.start, windowEnd: window.end }, rows);
    console.log(
      `[Analytics] 📊 Recomputed ${window.start.toISOString()} → ${window.end.toISOString()}: ` +
      `${turns.length} turns, ${rows.length} rows in ${Date.now() - started}ms`
    );
    return saved;
  }

  async recomputeStudent(studentId: string, window: TimeWindow): Promise<AnalyticsSummary> {
    assertValidWindow(window);
    const turns = await this.snapshot(window, studentId);
    const row = computeRollup(turns, window, studentGroupingKey(studentId));
    const [saved] = await this.replace(
      { kind: 'student', windowStart: window.start, windowEnd: window.end, studentId },
      [row]
    );
    return saved;
  }

  private async snapshot(window: TimeWindow, studentId?: string): Promise<ConversationTurn[]> {
    try {
      return await this.storage.listTurnsInWindow(window.start, window.end, studentId);
    } catch (error) {
      throw new AggregationFailure(`Failed to read turns for window: ${describeError(error)}`, error);
    }
  }

  private async replace(scope: SummaryScope, rows: NewSummary[]): Promise<AnalyticsSummary[]> {
    try {
      return await this.storage.replaceSummaries(scope, rows);
    } catch (error) {
      throw new AggregationFailure(`Failed to write summaries: ${describeError(error)}`, error);
    }
  }
}
