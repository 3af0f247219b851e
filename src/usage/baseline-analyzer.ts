import type { UsageBaseline, UsageSample } from "../contracts.js";
import { MAX_DAILY_GOAL_MS, MIN_DAILY_GOAL_MS } from "../config/config.js";
import { rankApps, type UsageSampler } from "./usage-sampler.js";

const HOUR_MS = 3_600_000;
const DEFAULT_AVERAGE_MS = 2 * HOUR_MS;
const REDUCTION_FACTOR = 0.8;
const TOP_APP_LIMIT = 5;
const MAX_DAYS = 90;

export function startOfLocalDay(nowMs: number): number {
  const date = new Date(nowMs);
  date.setHours(0, 0, 0, 0);
  return date.getTime();
}

/** Local calendar days ending at "yesterday", oldest first. */
export function previousDayWindows(days: number, nowMs: number): Array<{ start: number; end: number }> {
  const count = Math.max(1, Math.min(MAX_DAYS, Math.floor(days)));
  const windows: Array<{ start: number; end: number }> = [];
  for (let offset = count; offset >= 1; offset -= 1) {
    const start = new Date(startOfLocalDay(nowMs));
    start.setDate(start.getDate() - offset);
    const end = new Date(start.getTime());
    end.setDate(end.getDate() + 1);
    windows.push({ start: start.getTime(), end: end.getTime() });
  }
  return windows;
}

export function summarizeDays(dailySamples: ReadonlyArray<readonly UsageSample[]>): UsageBaseline {
  const dailyTotals = dailySamples.map((samples) =>
    samples.reduce((total, sample) => total + sample.foregroundDurationMs, 0),
  );
  const nonZero = dailyTotals.filter((total) => total > 0);
  const averageDailyUsageMs =
    nonZero.length > 0 ? nonZero.reduce((sum, total) => sum + total, 0) / nonZero.length : DEFAULT_AVERAGE_MS;
  return {
    averageDailyUsageMs: Math.round(averageDailyUsageMs),
    peakDailyUsageMs: dailyTotals.length > 0 ? Math.max(...dailyTotals) : 0,
    daysAnalyzed: nonZero.length,
    topApps: rankApps(dailySamples.flat(), TOP_APP_LIMIT),
  };
}

export function suggestedLimitFor(baseline: UsageBaseline): number {
  const target = Math.round(baseline.averageDailyUsageMs * REDUCTION_FACTOR);
  return Math.max(MIN_DAILY_GOAL_MS, Math.min(MAX_DAILY_GOAL_MS, target));
}

export class BaselineAnalyzer {
  constructor(private readonly sampler: UsageSampler) {}

  async analyzeBaseline(days: number, nowMs = Date.now()): Promise<UsageBaseline> {
    const perDay: UsageSample[][] = [];
    for (const window of previousDayWindows(days, nowMs)) {
      perDay.push(await this.sampler.samples(window.start, window.end));
    }
    return summarizeDays(perDay);
  }

  async suggestedDailyLimit(days: number, nowMs = Date.now()): Promise<number> {
    return suggestedLimitFor(await this.analyzeBaseline(days, nowMs));
  }
}
