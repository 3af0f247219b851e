import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AppCategory, InterventionAction, Severity } from "../contracts.js";
import { APP_CATEGORIES } from "../contracts.js";
import { isMissingFile } from "../infra/trace.js";

export type QuietHoursConfig = {
  enabled: boolean;
  /** Local wall-clock time, "HH:MM". */
  start: string;
  end: string;
};

export type ActionOverrides = {
  bySeverity: Partial<Record<Severity, InterventionAction>>;
  byCategory: Partial<Record<AppCategory, InterventionAction>>;
};

export type MonitorConfig = {
  detectionIntervalMs: number;
  enforcementIntervalMs: number;
  cooldownMs: number;
  deviceWindowMs: number;
  deviceThresholdMs: number;
  dailyGoalMs: number;
  endlessScrollMs: number;
  warningLeadMs: number;
  gracePeriodMs: number;
  maxCloseAttempts: number;
  maxNegotiationRounds: number;
  historyTurns: number;
  snoozeMs: number;
  oracleMinIntervalMs: number;
  oracleMaxCallsPerHour: number;
  /** Finished agreements and intervention records older than this are pruned. */
  retentionMs: number;
  watchedCategories: AppCategory[];
  quietHours: QuietHoursConfig;
  actionOverrides: ActionOverrides;
};

export type MonitorConfigOverrides = Partial<Omit<MonitorConfig, "quietHours" | "actionOverrides">> & {
  quietHours?: Partial<QuietHoursConfig>;
  actionOverrides?: Partial<ActionOverrides>;
};

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export const MIN_DAILY_GOAL_MS = HOUR_MS;
export const MAX_DAILY_GOAL_MS = 8 * HOUR_MS;

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  detectionIntervalMs: 2_000,
  enforcementIntervalMs: 1_000,
  cooldownMs: 60_000,
  deviceWindowMs: 60 * MINUTE_MS,
  deviceThresholdMs: 48 * MINUTE_MS,
  dailyGoalMs: 2 * HOUR_MS,
  endlessScrollMs: 5 * MINUTE_MS,
  warningLeadMs: 60_000,
  gracePeriodMs: 30_000,
  maxCloseAttempts: 3,
  maxNegotiationRounds: 3,
  historyTurns: 10,
  snoozeMs: 5 * MINUTE_MS,
  oracleMinIntervalMs: 1_000,
  oracleMaxCallsPerHour: 100,
  retentionMs: 30 * DAY_MS,
  watchedCategories: ["SOCIAL_MEDIA", "GAMES", "ADULT_CONTENT", "ENTERTAINMENT", "BROWSER", "SHOPPING", "NEWS"],
  quietHours: { enabled: false, start: "23:00", end: "07:00" },
  actionOverrides: { bySeverity: {}, byCategory: {} },
};

const ACTIONS: readonly InterventionAction[] = ["BLOCK", "NEGOTIATE", "ALERT"];
const SEVERITIES: readonly Severity[] = ["LOW", "MEDIUM", "HIGH"];
const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.round(value)));
}

function resolveClock(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed && CLOCK_PATTERN.test(trimmed) ? trimmed : fallback;
}

export function clampDailyGoal(value: number): number {
  return clampInt(value, DEFAULT_MONITOR_CONFIG.dailyGoalMs, MIN_DAILY_GOAL_MS, MAX_DAILY_GOAL_MS);
}

export function resolveMonitorConfig(overrides: MonitorConfigOverrides = {}): MonitorConfig {
  const base = DEFAULT_MONITOR_CONFIG;
  const deviceWindowMs = clampInt(overrides.deviceWindowMs, base.deviceWindowMs, MINUTE_MS, 24 * HOUR_MS);
  return {
    detectionIntervalMs: clampInt(overrides.detectionIntervalMs, base.detectionIntervalMs, 250, 10 * MINUTE_MS),
    enforcementIntervalMs: clampInt(overrides.enforcementIntervalMs, base.enforcementIntervalMs, 250, MINUTE_MS),
    cooldownMs: clampInt(overrides.cooldownMs, base.cooldownMs, 0, 24 * HOUR_MS),
    deviceWindowMs,
    deviceThresholdMs: clampInt(overrides.deviceThresholdMs, base.deviceThresholdMs, 1_000, deviceWindowMs),
    dailyGoalMs: clampDailyGoal(overrides.dailyGoalMs ?? base.dailyGoalMs),
    endlessScrollMs: clampInt(overrides.endlessScrollMs, base.endlessScrollMs, 1_000, 24 * HOUR_MS),
    warningLeadMs: clampInt(overrides.warningLeadMs, base.warningLeadMs, 0, HOUR_MS),
    gracePeriodMs: clampInt(overrides.gracePeriodMs, base.gracePeriodMs, 0, HOUR_MS),
    maxCloseAttempts: clampInt(overrides.maxCloseAttempts, base.maxCloseAttempts, 1, 10),
    maxNegotiationRounds: clampInt(overrides.maxNegotiationRounds, base.maxNegotiationRounds, 1, 10),
    historyTurns: clampInt(overrides.historyTurns, base.historyTurns, 2, 100),
    snoozeMs: clampInt(overrides.snoozeMs, base.snoozeMs, 0, 24 * HOUR_MS),
    oracleMinIntervalMs: clampInt(overrides.oracleMinIntervalMs, base.oracleMinIntervalMs, 0, MINUTE_MS),
    oracleMaxCallsPerHour: clampInt(overrides.oracleMaxCallsPerHour, base.oracleMaxCallsPerHour, 1, 10_000),
    retentionMs: clampInt(overrides.retentionMs, base.retentionMs, DAY_MS, 365 * DAY_MS),
    watchedCategories: overrides.watchedCategories
      ? overrides.watchedCategories.filter((category) => APP_CATEGORIES.includes(category))
      : [...base.watchedCategories],
    quietHours: {
      enabled: overrides.quietHours?.enabled ?? base.quietHours.enabled,
      start: resolveClock(overrides.quietHours?.start, base.quietHours.start),
      end: resolveClock(overrides.quietHours?.end, base.quietHours.end),
    },
    actionOverrides: {
      bySeverity: { ...overrides.actionOverrides?.bySeverity },
      byCategory: { ...overrides.actionOverrides?.byCategory },
    },
  };
}

export function resolveStateDir(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (override?.trim()) {
    return path.resolve(override.trim());
  }
  if (env.SCREENPACT_STATE_DIR?.trim()) {
    return path.resolve(env.SCREENPACT_STATE_DIR.trim());
  }
  return path.join(os.homedir(), ".screenpact");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readNumber(raw: Record<string, unknown>, key: keyof MonitorConfig): number | undefined {
  const value = raw[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function isAction(value: unknown): value is InterventionAction {
  return typeof value === "string" && ACTIONS.some((action) => action === value);
}

function isCategory(value: string): value is AppCategory {
  return APP_CATEGORIES.some((category) => category === value);
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

function parseActionOverrides(raw: unknown): Partial<ActionOverrides> | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const bySeverity: Partial<Record<Severity, InterventionAction>> = {};
  const byCategory: Partial<Record<AppCategory, InterventionAction>> = {};
  if (isRecord(raw.bySeverity)) {
    for (const [key, value] of Object.entries(raw.bySeverity)) {
      if (isSeverity(key) && isAction(value)) {
        bySeverity[key] = value;
      }
    }
  }
  if (isRecord(raw.byCategory)) {
    for (const [key, value] of Object.entries(raw.byCategory)) {
      if (isCategory(key) && isAction(value)) {
        byCategory[key] = value;
      }
    }
  }
  return { bySeverity, byCategory };
}

/** Converts a parsed `config.json` document into overrides, dropping fields of the wrong type. */
export function parseMonitorConfigOverrides(raw: unknown): MonitorConfigOverrides {
  if (!isRecord(raw)) {
    throw new Error("config.json must contain a JSON object");
  }
  const overrides: MonitorConfigOverrides = {};
  const numericKeys = [
    "detectionIntervalMs",
    "enforcementIntervalMs",
    "cooldownMs",
    "deviceWindowMs",
    "deviceThresholdMs",
    "dailyGoalMs",
    "endlessScrollMs",
    "warningLeadMs",
    "gracePeriodMs",
    "maxCloseAttempts",
    "maxNegotiationRounds",
    "historyTurns",
    "snoozeMs",
    "oracleMinIntervalMs",
    "oracleMaxCallsPerHour",
    "retentionMs",
  ] as const;
  for (const key of numericKeys) {
    const value = readNumber(raw, key);
    if (value !== undefined) {
      overrides[key] = value;
    }
  }
  if (Array.isArray(raw.watchedCategories)) {
    overrides.watchedCategories = raw.watchedCategories.filter(
      (entry): entry is AppCategory => typeof entry === "string" && isCategory(entry),
    );
  }
  if (isRecord(raw.quietHours)) {
    const quiet = raw.quietHours;
    overrides.quietHours = {
      enabled: typeof quiet.enabled === "boolean" ? quiet.enabled : undefined,
      start: typeof quiet.start === "string" ? quiet.start : undefined,
      end: typeof quiet.end === "string" ? quiet.end : undefined,
    };
  }
  const actionOverrides = parseActionOverrides(raw.actionOverrides);
  if (actionOverrides) {
    overrides.actionOverrides = actionOverrides;
  }
  return overrides;
}

export async function loadMonitorConfig(
  stateDir: string,
  overrides: MonitorConfigOverrides = {},
): Promise<MonitorConfig> {
  const filePath = path.join(stateDir, "config.json");
  let fileOverrides: MonitorConfigOverrides = {};
  try {
    const raw = await fs.readFile(filePath, "utf-8");
    fileOverrides = parseMonitorConfigOverrides(JSON.parse(raw));
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new Error(`Invalid monitor config at ${filePath}`, { cause: error });
    }
  }
  return resolveMonitorConfig({
    ...fileOverrides,
    ...overrides,
    quietHours: { ...fileOverrides.quietHours, ...overrides.quietHours },
    actionOverrides: {
      bySeverity: { ...fileOverrides.actionOverrides?.bySeverity, ...overrides.actionOverrides?.bySeverity },
      byCategory: { ...fileOverrides.actionOverrides?.byCategory, ...overrides.actionOverrides?.byCategory },
    },
  });
}

function clockToMinutes(value: string): number {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) {
    return 0;
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

/** True when local time falls inside the quiet window; windows may wrap past midnight. */
export function isWithinQuietHours(quietHours: QuietHoursConfig, nowMs: number): boolean {
  if (!quietHours.enabled) {
    return false;
  }
  const start = clockToMinutes(quietHours.start);
  const end = clockToMinutes(quietHours.end);
  if (start === end) {
    return false;
  }
  const date = new Date(nowMs);
  const minutes = date.getHours() * 60 + date.getMinutes();
  if (start < end) {
    return minutes >= start && minutes < end;
  }
  return minutes >= start || minutes < end;
}
