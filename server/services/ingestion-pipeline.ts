/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Ingestion Pipeline
 *
 * received → rate_checked → classified → moderation_checked → persisted
 *                  └→ rejected (rate limit exceeded)
 *
 * A turn is visible to readers only after `persisted`. The turn, its flag and
 * the student upsert are written in one transaction, so a flag never exists
 * without its turn and no turn exists without labels. An admitted turn that
 * fails before that transaction commits gives its rate-limit slot back.
 */

import {
  insertConversationTurnSchema,
  insertFlaggedItemSchema,
  type ConversationTurn,
  type FlaggedItem,
  type SafetySeverity,
  type TurnRole,
} from '@shared/schema';
import { IngestAborted, PersistenceFailure, describeError } from '../errors';
import { isTransientError, withRetry, type RetryOptions } from '../utils/retry';
import type { IStorage, NewFlag, NewTurn, RecordTurnInput, RecordedTurn } from '../storage';
import type { Identity } from './access-gate';
import type { AlertHook, SafetyAlert } from './alert-service';
import { classifyTurn, type Labels, type TurnClassifier } from './classifier';
import { severityAtLeast, type ModerationFilter, type SafetyReason, type SafetySignal } from './moderation-filter';
import type { RateLimiter } from './rate-limiter';

export type IngestStage =
  | 'received'
  | 'rate_checked'
  | 'classified'
  | 'moderation_checked'
  | 'persisted'
  | 'rejected';

export interface TurnInput {
  sessionId: string;
  role: TurnRole;
  text: string;
  tokensEst?: number | null;
  responseTimeMs?: number | null;
}

export type IngestResult =
  | {
      status: 'persisted';
      turn: ConversationTurn;
      flag: FlaggedItem | null;
      labels: Labels;
      safety: SafetySignal;
    }
  | {
      status: 'rate_limited';
      retryAfterMs: number;
    };

export interface StageEvent {
  stage: IngestStage;
  studentId: string;
  sessionId: string;
}

export interface IngestionPipelineDeps {
  storage: IStorage;
  rateLimiter: RateLimiter;
  classifier: TurnClassifier;
  moderation: ModerationFilter;
  classificationTimeoutMs: number;
  alertHook?: AlertHook;
  alertMinSeverity?: SafetySeverity;
  alertTimeoutMs?: number;
  persistRetry?: RetryOptions;
  onStage?: (event: StageEvent) => void;
  now?: () => number;
}

const EXCERPT_LENGTH = 200;
const DEFAULT_ALERT_TIMEOUT_MS = 5000;

export class IngestionPipeline {
  private readonly deps: IngestionPipelineDeps;
  private readonly now: () => number;

  constructor(deps: IngestionPipelineDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  async ingest(identity: Identity, input: TurnInput, options: { signal?: AbortSignal } = {}): Promise<IngestResult> {
    const { studentId } = identity;
    const advance = (stage: IngestStage) => this.deps.onStage?.({ stage, studentId, sessionId: input.sessionId });

    advance('received');
    // Cancellation is honoured only before a rate-limit slot is taken
    if (options.signal?.aborted) {
      throw new IngestAborted();
    }

    const decision = this.deps.rateLimiter.check(studentId);
    advance('rate_checked');
    if (!decision.allowed) {
      advance('rejected');
      return { status: 'rate_limited', retryAfterMs: decision.retryAfterMs };
    }

    let outcome: { labels: Labels; safety: SafetySignal; recorded: RecordedTurn };
    try {
      outcome = await this.classifyAndPersist(identity, input, advance);
    } catch (error) {
      if (decision.admittedAt !== undefined) {
        this.deps.rateLimiter.release(studentId, decision.admittedAt);
      }
      throw error;
    }
    const { labels, safety, recorded } = outcome;
    advance('persisted');

    console.log(
      `[Ingest] ✅ Turn ${recorded.turn.id} (${input.role}) for ${studentId}: topic=${labels.topic} ` +
      `sentiment=${labels.sentiment}${recorded.flag ? ` flag=${recorded.flag.reason}` : ''}`
    );

    if (recorded.flag && safety.flagged) {
      await this.notify(recorded.flag, recorded.turn, safety.reason);
    }

    return { status: 'persisted', turn: recorded.turn, flag: recorded.flag, labels, safety };
  }

  private async classifyAndPersist(
    identity: Identity,
    input: TurnInput,
    advance: (stage: IngestStage) => void
  ): Promise<{ labels: Labels; safety: SafetySignal; recorded: RecordedTurn }> {
    const { studentId } = identity;
    const { labels, degraded } = await classifyTurn(
      this.deps.classifier,
      input.text,
      input.role,
      this.deps.classificationTimeoutMs
    );
    advance('classified');

    const safety = this.deps.moderation.evaluate(input.text);
    advance('moderation_checked');

    const createdAt = new Date(this.now());
    const turn: NewTurn = {
      studentId,
      sessionId: input.sessionId,
      role: input.role,
      message: input.text,
      createdAt,
      topic: labels.topic,
      sentiment: labels.sentiment,
      questionType: labels.questionType,
      safetyFlagged: safety.flagged,
      safetyReason: safety.reason,
      classificationDegraded: degraded,
      tokensEst: input.tokensEst ?? null,
      responseTimeMs: input.responseTimeMs ?? null,
    };
    insertConversationTurnSchema.parse(turn);

    let flag: NewFlag | null = null;
    if (safety.flagged) {
      flag = { flaggedAt: createdAt, reason: safety.reason, severity: safety.severity };
      insertFlaggedItemSchema.parse({ ...flag, studentId, status: 'unreviewed' });
    }

    const recorded = await this.persist({
      student: { studentId, displayName: identity.name, email: identity.email },
      turn,
      flag,
    });
    return { labels, safety, recorded };
  }

  private async persist(input: RecordTurnInput): Promise<RecordedTurn> {
    return withRetry(async () => {
      try {
        return await this.deps.storage.recordTurn(input);
      } catch (error) {
        throw new PersistenceFailure(`Failed to persist turn: ${describeError(error)}`, error, isTransientError(error));
      }
    }, { label: 'Ingest', ...this.deps.persistRetry });
  }

  private async notify(flag: FlaggedItem, turn: ConversationTurn, reason: SafetyReason): Promise<void> {
    const hook = this.deps.alertHook;
    if (!hook || !severityAtLeast(flag.severity, this.deps.alertMinSeverity ?? 'high')) return;

    const alert: SafetyAlert = {
      flagId: flag.id,
      turnId: turn.id,
      studentId: turn.studentId,
      sessionId: turn.sessionId,
      reason,
      severity: flag.severity,
      excerpt: turn.message.substring(0, EXCERPT_LENGTH),
      flaggedAt: flag.flaggedAt,
    };
    const timeoutMs = this.deps.alertTimeoutMs ?? DEFAULT_ALERT_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`alert hook exceeded ${timeoutMs}ms`)), timeoutMs);
      });
      await Promise.race([Promise.resolve().then(() => hook(alert)), timeout]);
    } catch (error) {
      console.error(`[Ingest] ❌ Alert hook failed for flag ${flag.id}:`, describeError(error));
    } finally {
      clearTimeout(timer);
    }
  }
}
