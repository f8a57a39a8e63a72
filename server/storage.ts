/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import { and, asc, count, countDistinct, desc, eq, gte, like, lt, notInArray, or, sql } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '@shared/schema';
import {
  analyticsSummaries,
  conversationTurns,
  flaggedItems,
  students,
  type AnalyticsSummary,
  type ConversationTurn,
  type FlaggedItem,
  type InsertStudent,
  type ReviewStatus,
  type Student,
} from '@shared/schema';

export type NewTurn = Omit<ConversationTurn, 'id'>;
export type NewFlag = Pick<FlaggedItem, 'flaggedAt' | 'reason' | 'severity'>;
export type NewSummary = Omit<AnalyticsSummary, 'id'>;

export interface RecordTurnInput {
  student: InsertStudent;
  turn: NewTurn;
  flag: NewFlag | null;
}

export interface RecordedTurn {
  student: Student;
  turn: ConversationTurn;
  flag: FlaggedItem | null;
}

export type TurnWithStudent = ConversationTurn & {
  displayName: string | null;
  email: string | null;
};

export type FlaggedItemDetail = FlaggedItem & {
  message: string;
  sessionId: string;
  displayName: string | null;
  email: string | null;
};

export type StudentOverview = Student & {
  totalTurns: number;
  lastTurnAt: Date | null;
};

/** 'window' covers the global row and every per-topic row of one window. */
export type SummaryScope =
  | { kind: 'window'; windowStart: Date; windowEnd: Date }
  | { kind: 'student'; windowStart: Date; windowEnd: Date; studentId: string };

export interface PlatformCounts {
  totalStudents: number;
  totalTurns: number;
  activeToday: number;
  activeWeek: number;
  unreviewedFlags: number;
}

export const GLOBAL_GROUPING_KEY = 'global';
export const topicGroupingKey = (topic: string) => `topic:${topic}`;
export const studentGroupingKey = (studentId: string) => `student:${studentId}`;

export interface IStorage {
  /** Student upsert, turn insert and optional flag insert in one transaction. */
  recordTurn(input: RecordTurnInput): Promise<RecordedTurn>;
  listStudents(limit: number, offset: number): Promise<StudentOverview[]>;
  /** Most recent `limit` turns of a student, returned oldest first. */
  getStudentTurns(studentId: string, limit: number): Promise<ConversationTurn[]>;
  listRecentTurns(limit: number, offset: number): Promise<TurnWithStudent[]>;
  /** Turns with createdAt in [start, end), ordered by id. */
  listTurnsInWindow(start: Date, end: Date, studentId?: string): Promise<ConversationTurn[]>;
  listFlaggedItems(status: ReviewStatus | undefined, limit: number): Promise<FlaggedItemDetail[]>;
  updateFlagReviewStatus(flagId: number, status: ReviewStatus, reviewedBy: string, reviewedAt: Date): Promise<FlaggedItem | undefined>;
  /** Makes the rows of `scope` exactly `rows`, in one transaction. Existing keys keep their ids. */
  replaceSummaries(scope: SummaryScope, rows: NewSummary[]): Promise<AnalyticsSummary[]>;
  getSummaries(windowStart: Date, windowEnd: Date, groupingKey?: string): Promise<AnalyticsSummary[]>;
  getPlatformCounts(dayStart: Date, weekStart: Date): Promise<PlatformCounts>;
}

export type EngineDatabase = NodePgDatabase<typeof schema>;

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: EngineDatabase) {}

  async recordTurn(input: RecordTurnInput): Promise<RecordedTurn> {
    return this.db.transaction(async (tx) => {
      const [student] = await tx
        .insert(students)
        .values({
          ...input.student,
          enrolledAt: input.turn.createdAt,
          lastActiveAt: input.turn.createdAt,
        })
        .onConflictDoUpdate({
          target: students.studentId,
          set: {
            lastActiveAt: sql`greatest(${students.lastActiveAt}, excluded.last_active_at)`,
            displayName: sql`coalesce(${students.displayName}, excluded.display_name)`,
            email: sql`coalesce(${students.email}, excluded.email)`,
          },
        })
        .returning();

      const [turn] = await tx.insert(conversationTurns).values(input.turn).returning();

      let flag: FlaggedItem | null = null;
      if (input.flag) {
        const [inserted] = await tx
          .insert(flaggedItems)
          .values({
            ...input.flag,
            turnId: turn.id,
            studentId: turn.studentId,
            status: 'unreviewed',
          })
          .returning();
        flag = inserted;
      }

      return { student, turn, flag };
    });
  }

  async listStudents(limit: number, offset: number): Promise<StudentOverview[]> {
    const rows = await this.db
      .select({
        student: students,
        totalTurns: count(conversationTurns.id),
        lastTurnAt: sql<Date | null>`max(${conversationTurns.createdAt})`.mapWith(conversationTurns.createdAt),
      })
      .from(students)
      .leftJoin(conversationTurns, eq(conversationTurns.studentId, students.studentId))
      .groupBy(students.studentId)
      .orderBy(desc(students.lastActiveAt), asc(students.studentId))
      .limit(limit)
      .offset(offset);

    return rows.map((row) => ({ ...row.student, totalTurns: row.totalTurns, lastTurnAt: row.lastTurnAt ?? null }));
  }

  async getStudentTurns(studentId: string, limit: number): Promise<ConversationTurn[]> {
    const rows = await this.db
      .select()
      .from(conversationTurns)
      .where(eq(conversationTurns.studentId, studentId))
      .orderBy(desc(conversationTurns.createdAt), desc(conversationTurns.id))
      .limit(limit);
    return rows.reverse();
  }

  async listRecentTurns(limit: number, offset: number): Promise<TurnWithStudent[]> {
    const rows = await this.db
      .select({
        turn: conversationTurns,
        displayName: students.displayName,
        email: students.email,
      })
      .from(conversationTurns)
      .innerJoin(students, eq(students.studentId, conversationTurns.studentId))
      .orderBy(desc(conversationTurns.createdAt), desc(conversationTurns.id))
      .limit(limit)
      .offset(offset);

    return rows.map((row) => ({ ...row.turn, displayName: row.displayName, email: row.email }));
  }

  async listTurnsInWindow(start: Date, end: Date, studentId?: string): Promise<ConversationTurn[]> {
    const inWindow = and(gte(conversationTurns.createdAt, start), lt(conversationTurns.createdAt, end));
    return this.db
      .select()
      .from(conversationTurns)
      .where(studentId ? and(inWindow, eq(conversationTurns.studentId, studentId)) : inWindow)
      .orderBy(asc(conversationTurns.id));
  }

  async listFlaggedItems(status: ReviewStatus | undefined, limit: number): Promise<FlaggedItemDetail[]> {
    const rows = await this.db
      .select({
        flag: flaggedItems,
        message: conversationTurns.message,
        sessionId: conversationTurns.sessionId,
        displayName: students.displayName,
        email: students.email,
      })
      .from(flaggedItems)
      .innerJoin(conversationTurns, eq(conversationTurns.id, flaggedItems.turnId))
      .leftJoin(students, eq(students.studentId, flaggedItems.studentId))
      .where(status ? eq(flaggedItems.status, status) : undefined)
      .orderBy(desc(flaggedItems.flaggedAt), desc(flaggedItems.id))
      .limit(limit);

    return rows.map((row) => ({
      ...row.flag,
      message: row.message,
      sessionId: row.sessionId,
      displayName: row.displayName,
      email: row.email,
    }));
  }

  async updateFlagReviewStatus(
    flagId: number,
    status: ReviewStatus,
    reviewedBy: string,
    reviewedAt: Date
  ): Promise<FlaggedItem | undefined> {
    const [updated] = await this.db
      .update(flaggedItems)
      .set({ status, reviewedBy, reviewedAt })
      .where(eq(flaggedItems.id, flagId))
      .returning();
    return updated;
  }

  async replaceSummaries(scope: SummaryScope, rows: NewSummary[]): Promise<AnalyticsSummary[]> {
    const sameWindow = and(
      eq(analyticsSummaries.windowStart, scope.windowStart),
      eq(analyticsSummaries.windowEnd, scope.windowEnd),
    );
    const inScope = scope.kind === 'window'
      ? or(eq(analyticsSummaries.groupingKey, GLOBAL_GROUPING_KEY), like(analyticsSummaries.groupingKey, 'topic:%'))
      : eq(analyticsSummaries.groupingKey, studentGroupingKey(scope.studentId));
    const keys = rows.map((row) => row.groupingKey);

    // Upsert keeps row ids stable across recomputes; stale keys are removed
    return this.db.transaction(async (tx) => {
      await tx
        .delete(analyticsSummaries)
        .where(and(sameWindow, inScope, keys.length > 0 ? notInArray(analyticsSummaries.groupingKey, keys) : undefined));
      if (rows.length === 0) return [];
      return tx
        .insert(analyticsSummaries)
        .values(rows)
        .onConflictDoUpdate({
          target: [analyticsSummaries.windowStart, analyticsSummaries.windowEnd, analyticsSummaries.groupingKey],
          set: {
            totalTurns: sql`excluded.total_turns`,
            totalSessions: sql`excluded.total_sessions`,
            avgTurnsPerSession: sql`excluded.avg_turns_per_session`,
            sentimentCounts: sql`excluded.sentiment_counts`,
            questionTypeCounts: sql`excluded.question_type_counts`,
            topicCounts: sql`excluded.topic_counts`,
            uniqueActiveStudents: sql`excluded.unique_active_students`,
            flaggedTurns: sql`excluded.flagged_turns`,
          },
        })
        .returning();
    });
  }

  async getSummaries(windowStart: Date, windowEnd: Date, groupingKey?: string): Promise<AnalyticsSummary[]> {
    const sameWindow = and(
      eq(analyticsSummaries.windowStart, windowStart),
      eq(analyticsSummaries.windowEnd, windowEnd),
    );
    return this.db
      .select()
      .from(analyticsSummaries)
      .where(groupingKey ? and(sameWindow, eq(analyticsSummaries.groupingKey, groupingKey)) : sameWindow)
      .orderBy(asc(analyticsSummaries.groupingKey));
  }

  async getPlatformCounts(dayStart: Date, weekStart: Date): Promise<PlatformCounts> {
    const [[studentCount], [turnCount], [today], [week], [unreviewed]] = await Promise.all([
      this.db.select({ value: count() }).from(students),
      this.db.select({ value: count() }).from(conversationTurns),
      this.db
        .select({ value: countDistinct(conversationTurns.studentId) })
        .from(conversationTurns)
        .where(gte(conversationTurns.createdAt, dayStart)),
      this.db
        .select({ value: countDistinct(conversationTurns.studentId) })
        .from(conversationTurns)
        .where(gte(conversationTurns.createdAt, weekStart)),
      this.db.select({ value: count() }).from(flaggedItems).where(eq(flaggedItems.status, 'unreviewed')),
    ]);

    return {
      totalStudents: studentCount.value,
      totalTurns: turnCount.value,
      activeToday: today.value,
      activeWeek: week.value,
      unreviewedFlags: unreviewed.value,
    };
  }
}
