import {
  pgTable,
  text,
  varchar,
  timestamp,
  integer,
  serial,
  boolean,
  doublePrecision,
  jsonb,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const TURN_ROLES = ['student', 'tutor'] as const;
export type TurnRole = typeof TURN_ROLES[number];

export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const;
export type Sentiment = typeof SENTIMENTS[number];

export const QUESTION_TYPES = ['factual', 'open-ended', 'other'] as const;
export type QuestionType = typeof QUESTION_TYPES[number];

export const SAFETY_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;
export type SafetySeverity = typeof SAFETY_SEVERITIES[number];

export const REVIEW_STATUSES = ['unreviewed', 'reviewed-ok', 'reviewed-action-taken'] as const;
export type ReviewStatus = typeof REVIEW_STATUSES[number];

// Students are upserted on first observed turn and never deleted here
export const students = pgTable("students", {
  studentId: varchar("student_id", { length: 255 }).primaryKey(),
  displayName: text("display_name"),
  email: text("email"),
  enrolledAt: timestamp("enrolled_at").notNull().defaultNow(),
  lastActiveAt: timestamp("last_active_at").notNull().defaultNow(),
});

// Append-only conversation log. Labels are written with the row, never later.
export const conversationTurns = pgTable(
  "conversation_turns",
  {
    id: serial("id").primaryKey(),
    studentId: varchar("student_id", { length: 255 }).notNull().references(() => students.studentId),
    sessionId: varchar("session_id", { length: 255 }).notNull(),
    role: text("role").notNull().$type<TurnRole>(),
    message: text("message").notNull(),
    createdAt: timestamp("created_at").notNull().defaultNow(),
    topic: text("topic").notNull(),
    sentiment: text("sentiment").notNull().$type<Sentiment>(),
    questionType: text("question_type").$type<QuestionType>(), // null for tutor turns
    safetyFlagged: boolean("safety_flagged").notNull().default(false),
    safetyReason: text("safety_reason"),
    classificationDegraded: boolean("classification_degraded").notNull().default(false),
    tokensEst: integer("tokens_est"),
    responseTimeMs: integer("response_time_ms"),
  },
  (table) => [
    index("IDX_turns_student_created").on(table.studentId, table.createdAt),
    index("IDX_turns_session").on(table.sessionId),
    index("IDX_turns_created").on(table.createdAt),
  ],
);

export const flaggedItems = pgTable(
  "flagged_items",
  {
    id: serial("id").primaryKey(),
    turnId: integer("turn_id").notNull().references(() => conversationTurns.id),
    studentId: varchar("student_id", { length: 255 }).notNull().references(() => students.studentId),
    flaggedAt: timestamp("flagged_at").notNull().defaultNow(),
    reason: text("reason").notNull(),
    severity: text("severity").notNull().$type<SafetySeverity>(),
    status: text("status").notNull().$type<ReviewStatus>().default('unreviewed'),
    reviewedBy: varchar("reviewed_by", { length: 255 }),
    reviewedAt: timestamp("reviewed_at"),
  },
  (table) => [
    index("IDX_flagged_status_flagged_at").on(table.status, table.flaggedAt),
    uniqueIndex("UQ_flagged_turn").on(table.turnId),
  ],
);

// Cache of rollups; every row is derivable from conversation_turns
export const analyticsSummaries = pgTable(
  "analytics_summaries",
  {
    id: serial("id").primaryKey(),
    windowStart: timestamp("window_start").notNull(),
    windowEnd: timestamp("window_end").notNull(),
    groupingKey: varchar("grouping_key", { length: 320 }).notNull(), // 'global' | 'topic:<t>' | 'student:<id>'
    totalTurns: integer("total_turns").notNull(),
    totalSessions: integer("total_sessions").notNull(),
    avgTurnsPerSession: doublePrecision("avg_turns_per_session").notNull(),
    sentimentCounts: jsonb("sentiment_counts").notNull().$type<Record<Sentiment, number>>(),
    questionTypeCounts: jsonb("question_type_counts").notNull().$type<Record<QuestionType, number>>(),
    topicCounts: jsonb("topic_counts").notNull().$type<Record<string, number>>(),
    uniqueActiveStudents: integer("unique_active_students").notNull(),
    flaggedTurns: integer("flagged_turns").notNull(),
  },
  (table) => [
    uniqueIndex("UQ_summary_window_key").on(table.windowStart, table.windowEnd, table.groupingKey),
  ],
);

// Upper bound of a Postgres integer column
export const INT4_MAX = 2_147_483_647;

// Guards the write path: a turn row must carry complete labels
export const insertConversationTurnSchema = createInsertSchema(conversationTurns, {
  role: z.enum(TURN_ROLES),
  topic: (schema) => schema.topic.min(1),
  sentiment: z.enum(SENTIMENTS),
  questionType: z.enum(QUESTION_TYPES).nullable(),
  tokensEst: z.number().int().min(0).max(INT4_MAX).nullish(),
  responseTimeMs: z.number().int().min(0).max(INT4_MAX).nullish(),
}).omit({
  id: true,
}).refine((turn) => turn.role === 'tutor' || turn.questionType != null, {
  message: 'student turns require a question type',
  path: ['questionType'],
});

export const insertFlaggedItemSchema = createInsertSchema(flaggedItems, {
  severity: z.enum(SAFETY_SEVERITIES),
  status: z.enum(REVIEW_STATUSES),
}).omit({
  id: true,
  turnId: true,
  reviewedBy: true,
  reviewedAt: true,
});

export type Student = typeof students.$inferSelect;
export type InsertStudent = Omit<typeof students.$inferInsert, 'enrolledAt' | 'lastActiveAt'>;
export type ConversationTurn = typeof conversationTurns.$inferSelect;
export type FlaggedItem = typeof flaggedItems.$inferSelect;
export type AnalyticsSummary = typeof analyticsSummaries.$inferSelect;
