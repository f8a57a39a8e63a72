/**
 * Analytics Rollup Job
 * Recomputes the current and previous UTC day so late turns near midnight
 * land in yesterday's rows too.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { AnalyticsSummary } from '@shared/schema';
import { dayWindow, type AnalyticsAggregator } from '../services/analytics-aggregator';
import { withRetry, type RetryOptions } from '../utils/retry';

const DAY_MS = 24 * 60 * 60 * 1000;

export async function runAnalyticsRollup(
  aggregator: AnalyticsAggregator,
  now: Date,
  retry: RetryOptions = {}
): Promise<AnalyticsSummary[]> {
  const today = dayWindow(now);
  const yesterday = dayWindow(new Date(today.start.getTime() - DAY_MS));

  const rows: AnalyticsSummary[] = [];
  for (const window of [yesterday, today]) {
    rows.push(...await withRetry(() => aggregator.recompute(window), { label: 'AnalyticsRollup', ...retry }));
  }
  return rows;
}

export function startAnalyticsRollupJob(aggregator: AnalyticsAggregator, schedule: string): ScheduledTask {
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid ANALYTICS_CRON expression: ${schedule}`);
  }
  console.log(`[AnalyticsRollup] Starting rollup scheduler (${schedule} UTC)`);

  return cron.schedule(schedule, async () => {
    console.log('[AnalyticsRollup] Running rollup job...');
    try {
      const rows = await runAnalyticsRollup(aggregator, new Date());
      console.log(`[AnalyticsRollup] ✅ Wrote ${rows.length} summary rows`);
    } catch (error) {
      console.error('[AnalyticsRollup] Job failed:', error);
    }
  }, {
    timezone: 'UTC'
  });
}
