/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import { z } from 'zod';
import { SAFETY_SEVERITIES } from '@shared/schema';

const commaList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0),
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().optional(),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET must be set'),
  ADMIN_EMAILS: commaList,
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(5),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  TOPIC_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  CLASSIFICATION_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
  MAX_MESSAGE_LENGTH: z.coerce.number().int().positive().default(2000),
  ALERT_MIN_SEVERITY: z.enum(SAFETY_SEVERITIES).default('high'),
  ALERT_EMAIL_TO: z.string().email().optional().or(z.literal('').transform(() => undefined)),
  RESEND_API_KEY: z.string().optional(),
  RESEND_FROM_EMAIL: z.string().default('alerts@localhost'),
  ALERT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ANALYTICS_CRON: z.string().default('*/15 * * * *'),
});

export type EngineEnv = z.infer<typeof envSchema>;

export interface EngineConfig {
  env: EngineEnv['NODE_ENV'];
  port: number;
  databaseUrl?: string;
  auth: {
    jwtSecret: string;
    adminEmails: string[];
  };
  rateLimit: {
    maxRequests: number;
    windowMs: number;
  };
  classification: {
    topicConfidenceThreshold: number;
    timeoutMs: number;
  };
  moderation: {
    maxMessageLength: number;
    alertMinSeverity: EngineEnv['ALERT_MIN_SEVERITY'];
  };
  alerts: {
    emailTo?: string;
    resendApiKey?: string;
    fromEmail: string;
    timeoutMs: number;
  };
  analyticsCron: string;
}

export function loadEngineConfig(source: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    console.error('[Config] ❌ Invalid environment:', issues.join('; '));
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const env = result.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    auth: {
      jwtSecret: env.JWT_SECRET,
      adminEmails: env.ADMIN_EMAILS,
    },
    rateLimit: {
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
      windowMs: env.RATE_LIMIT_WINDOW_SECONDS * 1000,
    },
    classification: {
      topicConfidenceThreshold: env.TOPIC_CONFIDENCE_THRESHOLD,
      timeoutMs: env.CLASSIFICATION_TIMEOUT_MS,
    },
    moderation: {
      maxMessageLength: env.MAX_MESSAGE_LENGTH,
      alertMinSeverity: env.ALERT_MIN_SEVERITY,
    },
    alerts: {
      emailTo: env.ALERT_EMAIL_TO,
      resendApiKey: env.RESEND_API_KEY,
      fromEmail: env.RESEND_FROM_EMAIL,
      timeoutMs: env.ALERT_TIMEOUT_MS,
    },
    analyticsCron: env.ANALYTICS_CRON,
  };
}
