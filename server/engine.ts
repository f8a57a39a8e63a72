/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import type { EngineConfig } from './config/engine-config';
import type { IStorage } from './storage';
import { AccessGate } from './services/access-gate';
import { combineAlertHooks, consoleAlertHook, createEmailAlertHook, type AlertHook } from './services/alert-service';
import { AnalyticsAggregator } from './services/analytics-aggregator';
import { KeywordTurnClassifier, type TurnClassifier } from './services/classifier';
import { IngestionPipeline, type StageEvent } from './services/ingestion-pipeline';
import { ModerationFilter } from './services/moderation-filter';
import { RateLimiter } from './services/rate-limiter';
import { ReviewService } from './services/review-service';

export interface Engine {
  storage: IStorage;
  accessGate: AccessGate;
  rateLimiter: RateLimiter;
  classifier: TurnClassifier;
  moderation: ModerationFilter;
  pipeline: IngestionPipeline;
  aggregator: AnalyticsAggregator;
  review: ReviewService;
}

export interface EngineOverrides {
  classifier?: TurnClassifier;
  alertHook?: AlertHook;
  onStage?: (event: StageEvent) => void;
  now?: () => number;
}

function buildAlertHook(config: EngineConfig): AlertHook {
  const { emailTo, resendApiKey, fromEmail } = config.alerts;
  if (!emailTo || !resendApiKey) {
    console.log('[Alert] Email alerts not configured - logging alerts only');
    return consoleAlertHook;
  }
  return combineAlertHooks(consoleAlertHook, createEmailAlertHook({ apiKey: resendApiKey, from: fromEmail, to: emailTo }));
}

export function createEngine(config: EngineConfig, storage: IStorage, overrides: EngineOverrides = {}): Engine {
  const now = overrides.now ?? Date.now;

  const accessGate = new AccessGate({
    secret: config.auth.jwtSecret,
    adminEmails: config.auth.adminEmails,
    now,
  });
  const rateLimiter = new RateLimiter({
    maxRequests: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowMs,
    now,
  });
  const classifier = overrides.classifier ?? new KeywordTurnClassifier({
    confidenceThreshold: config.classification.topicConfidenceThreshold,
  });
  const moderation = new ModerationFilter({ maxMessageLength: config.moderation.maxMessageLength });
  const aggregator = new AnalyticsAggregator(storage);

  const pipeline = new IngestionPipeline({
    storage,
    rateLimiter,
    classifier,
    moderation,
    classificationTimeoutMs: config.classification.timeoutMs,
    alertHook: overrides.alertHook ?? buildAlertHook(config),
    alertMinSeverity: config.moderation.alertMinSeverity,
    alertTimeoutMs: config.alerts.timeoutMs,
    onStage: overrides.onStage,
    now,
  });

  const review = new ReviewService({ storage, accessGate, aggregator });

  return { storage, accessGate, rateLimiter, classifier, moderation, pipeline, aggregator, review };
}
