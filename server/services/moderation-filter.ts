/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Moderation Filter
 * Ordered safety rules; the first rule that matches decides reason and severity.
 * Uses word-boundary matching so words like "class" or "assignment" never
 * trip the profanity list.
 */

import { z } from 'zod';
import { SAFETY_SEVERITIES, type SafetySeverity } from '@shared/schema';
import moderationRulesFile from '../config/moderation-rules.json';

export const SAFETY_REASONS = [
  'self_harm',
  'violence',
  'hate_speech',
  'sexual_content',
  'harassment',
  'personal_data',
  'drugs',
  'academic_dishonesty',
  'profanity',
  'message_too_long',
  'off_topic',
  'spam',
] as const;
export type SafetyReason = typeof SAFETY_REASONS[number];

export type SafetySignal =
  | { flagged: false; reason: null; severity: 'none' }
  | { flagged: true; reason: SafetyReason; severity: SafetySeverity };

export const NOT_FLAGGED: SafetySignal = { flagged: false, reason: null, severity: 'none' };

const SEVERITY_RANK: Record<SafetySeverity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function severityAtLeast(severity: SafetySeverity, minimum: SafetySeverity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minimum];
}

const rulesFileSchema = z.object({
  version: z.string(),
  patternRules: z.array(z.object({
    code: z.enum(SAFETY_REASONS),
    severity: z.enum(SAFETY_SEVERITIES),
    patterns: z.array(z.string()),
  })),
  profanity: z.array(z.string()),
  offTopic: z.array(z.string()),
});

export interface SafetyRule {
  code: SafetyReason;
  severity: SafetySeverity;
  matches(text: string, normalized: string): boolean;
}

function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'").trim();
}

function patternRule(code: SafetyReason, severity: SafetySeverity, patterns: string[]): SafetyRule {
  const compiled = patterns.map((pattern) => new RegExp(pattern));
  return {
    code,
    severity,
    matches: (_text, normalized) => compiled.some((re) => re.test(normalized)),
  };
}

function profanityRule(words: string[], minDistinct: number): SafetyRule {
  const vocabulary = new Set(words);
  return {
    code: 'profanity',
    severity: 'medium',
    matches: (_text, normalized) => {
      const found = new Set((normalized.match(/[a-z]+/g) ?? []).filter((word) => vocabulary.has(word)));
      return found.size >= minDistinct;
    },
  };
}

function lengthRule(maxLength: number): SafetyRule {
  return {
    code: 'message_too_long',
    severity: 'medium',
    matches: (text) => text.length > maxLength,
  };
}

const spamRule: SafetyRule = {
  code: 'spam',
  severity: 'low',
  matches: (text, normalized) => {
    if (/(.)\1{4,}/.test(text)) return true;
    if ((text.match(/\?/g) ?? []).length > 5) return true;
    if (text.length > 10 && /[A-Z]/.test(text) && text === text.toUpperCase()) return true;
    const words = normalized.split(/\s+/).filter(Boolean);
    return normalized.length > 20 && new Set(words).size < 3;
  },
};

export interface ModerationFilterOptions {
  maxMessageLength?: number;
  /** Replaces the built-in rule list entirely. Order is priority. */
  rules?: SafetyRule[];
}

export function buildDefaultRules(maxMessageLength: number): SafetyRule[] {
  const file = rulesFileSchema.parse(moderationRulesFile);
  const byCode = new Map(file.patternRules.map((rule) => [rule.code, rule]));
  const fromFile = (code: SafetyReason): SafetyRule[] => {
    const rule = byCode.get(code);
    return rule ? [patternRule(rule.code, rule.severity, rule.patterns)] : [];
  };

  return [
    ...fromFile('self_harm'),
    ...fromFile('violence'),
    ...fromFile('hate_speech'),
    ...fromFile('sexual_content'),
    ...fromFile('harassment'),
    ...fromFile('personal_data'),
    ...fromFile('drugs'),
    ...fromFile('academic_dishonesty'),
    profanityRule(file.profanity, 2),
    lengthRule(maxMessageLength),
    patternRule('off_topic', 'medium', file.offTopic),
    spamRule,
  ];
}

export class ModerationFilter {
  private readonly rules: SafetyRule[];

  constructor(options: ModerationFilterOptions = {}) {
    this.rules = options.rules ?? buildDefaultRules(options.maxMessageLength ?? 2000);
  }

  evaluate(text: string): SafetySignal {
    const normalized = normalizeText(text);
    if (normalized.length < 2) return NOT_FLAGGED;

    for (const rule of this.rules) {
      if (rule.matches(text, normalized)) {
        console.log(`[Moderation] ❌ ${rule.code} (${rule.severity}) in: ${text.substring(0, 80)}`);
        return { flagged: true, reason: rule.code, severity: rule.severity };
      }
    }
    return NOT_FLAGGED;
  }
}
