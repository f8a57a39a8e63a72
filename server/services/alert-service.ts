/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import { Resend } from 'resend';
import type { SafetySeverity } from '@shared/schema';
import type { SafetyReason } from './moderation-filter';

export interface SafetyAlert {
  flagId: number;
  turnId: number;
  studentId: string;
  sessionId: string;
  reason: SafetyReason;
  severity: SafetySeverity;
  excerpt: string;
  flaggedAt: Date;
}

/**
 * Notification sink for high-severity flags. The engine awaits it once per
 * flag and does not retry; delivery guarantees belong to the sink.
 */
export type AlertHook = (alert: SafetyAlert) => void | Promise<void>;

export const consoleAlertHook: AlertHook = (alert) => {
  console.error(
    `[Alert] 🚨 ${alert.severity.toUpperCase()} ${alert.reason} for student ${alert.studentId} ` +
    `(flag ${alert.flagId}, turn ${alert.turnId}): ${alert.excerpt}`
  );
};

export interface EmailAlertOptions {
  apiKey: string;
  from: string;
  to: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderAlertEmail(alert: SafetyAlert): { subject: string; html: string; text: string } {
  const subject = `URGENT: Safety alert (${alert.reason}) - student ${alert.studentId}`;
  const text = [
    `A ${alert.severity} safety concern was flagged for review.`,
    `Student: ${alert.studentId}`,
    `Session: ${alert.sessionId}`,
    `Reason: ${alert.reason}`,
    `Flag ID: ${alert.flagId}`,
    `Flagged at: ${alert.flaggedAt.toISOString()}`,
    `Message: ${alert.excerpt}`,
  ].join('\n');
  const html = `
    <h2>Safety alert: ${escapeHtml(alert.reason)}</h2>
    <p>A <strong>${escapeHtml(alert.severity)}</strong> safety concern was flagged for review.</p>
    <ul>
      <li>Student: ${escapeHtml(alert.studentId)}</li>
      <li>Session: ${escapeHtml(alert.sessionId)}</li>
      <li>Flag ID: ${alert.flagId}</li>
      <li>Flagged at: ${alert.flaggedAt.toISOString()}</li>
    </ul>
    <blockquote>${escapeHtml(alert.excerpt)}</blockquote>
  `;
  return { subject, html, text };
}

export function createEmailAlertHook(options: EmailAlertOptions): AlertHook {
  const resend = new Resend(options.apiKey);

  return async (alert) => {
    const { subject, html, text } = renderAlertEmail(alert);
    const { error } = await resend.emails.send({
      from: options.from,
      to: options.to,
      subject,
      html,
      text,
    });
    if (error) {
      throw new Error(`Resend rejected alert email: ${error.message}`);
    }
    console.log(`[Alert] Email sent to ${options.to} for flag ${alert.flagId}`);
  };
}

/** Fans out to several sinks; one failing sink does not stop the others. */
export function combineAlertHooks(...hooks: AlertHook[]): AlertHook {
  return async (alert) => {
    const results = await Promise.allSettled(hooks.map(async (hook) => hook(alert)));
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failures.length > 0) {
      throw new AggregateError(failures.map((f) => f.reason), `${failures.length} alert sink(s) failed`);
    }
  };
}
