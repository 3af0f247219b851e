import type { AppCategory, AppUsageInfo, DetectionEvent, DetectionKind, Severity } from "../contracts.js";
import type { CategoryClassifier } from "../categories/category-classifier.js";
import { formatDuration } from "../negotiation/duration-parser.js";
import { startOfLocalDay } from "../usage/baseline-analyzer.js";
import type { UsageSampler } from "../usage/usage-sampler.js";

export type DetectorLimits = {
  deviceWindowMs: number;
  deviceThresholdMs: number;
  dailyGoalMs: number;
  endlessScrollMs: number;
  watchedCategories: readonly AppCategory[];
};

export type DetectorTick =
  | { status: "inactive"; events: []; foreground: null }
  | { status: "active"; events: DetectionEvent[]; foreground: AppUsageInfo | null; pending: DetectionKind[] };

type Stint = {
  appIdentifier: string;
  since: number;
  reported: boolean;
};

type DeviceCandidate = {
  kind: "continuous-use" | "daily-goal";
  observedMs: number;
  message: string;
};

/**
 * Turns samples into discrete events. A foreground stint yields at most one
 * per-app event; each device-wide breach yields one event and re-arms once
 * usage drops back below its threshold. A per-app event in the same tick
 * holds device events back until a later tick.
 */
export class Detector {
  private stint: Stint | null = null;
  private readonly deviceReported = new Set<DeviceCandidate["kind"]>();

  constructor(
    private readonly sampler: UsageSampler,
    private readonly classifier: CategoryClassifier,
    private readonly limits: DetectorLimits,
  ) {}

  setDailyGoal(dailyGoalMs: number): void {
    this.limits.dailyGoalMs = dailyGoalMs;
  }

  get dailyGoalMs(): number {
    return this.limits.dailyGoalMs;
  }

  /** Forgets the current stint and device latches, e.g. after monitoring stops. */
  reset(): void {
    this.stint = null;
    this.deviceReported.clear();
  }

  async tick(now: number): Promise<DetectorTick> {
    if (!(await this.sampler.hasPermission())) {
      this.reset();
      return { status: "inactive", events: [], foreground: null };
    }

    const foreground = await this.sampler.currentForegroundApp();
    const appEvent = foreground ? await this.checkForeground(foreground, now) : this.clearStint();
    const deviceCandidates = await this.checkDevice(now);

    if (appEvent) {
      return { status: "active", events: [appEvent], foreground, pending: deviceCandidates.map((entry) => entry.kind) };
    }
    const [first, ...rest] = deviceCandidates;
    if (!first) {
      return { status: "active", events: [], foreground, pending: [] };
    }
    this.deviceReported.add(first.kind);
    const category = foreground ? await this.classifier.categorize(foreground.appIdentifier) : "UNKNOWN";
    return {
      status: "active",
      events: [
        {
          kind: first.kind,
          subjectAppIdentifier: null,
          subjectName: "device",
          category,
          observedDurationMs: first.observedMs,
          severity: "MEDIUM",
          message: first.message,
          detectedAt: now,
        },
      ],
      foreground,
      pending: rest.map((entry) => entry.kind),
    };
  }

  private clearStint(): null {
    this.stint = null;
    return null;
  }

  private async checkForeground(app: AppUsageInfo, now: number): Promise<DetectionEvent | null> {
    if (!this.stint || this.stint.appIdentifier !== app.appIdentifier) {
      this.stint = { appIdentifier: app.appIdentifier, since: now, reported: false };
    }
    const stint = this.stint;
    if (stint.reported) {
      return null;
    }
    const continuousMs = now - stint.since;
    const category = await this.classifier.categorize(app.appIdentifier);
    const base = {
      subjectAppIdentifier: app.appIdentifier,
      subjectName: app.appName,
      category,
      observedDurationMs: continuousMs,
      detectedAt: now,
    };

    let event: DetectionEvent | null = null;
    if (await this.classifier.isBlocked(app.appIdentifier)) {
      event = { ...base, kind: "blocked-app", severity: "HIGH", message: `${app.appName} is blocked.` };
    } else if (category === "ADULT_CONTENT") {
      event = { ...base, kind: "adult-content", severity: "HIGH", message: `${app.appName} is adult content.` };
    } else if (this.limits.watchedCategories.includes(category)) {
      const threshold = await this.classifier.threshold(app.appIdentifier);
      if (threshold !== null && continuousMs >= threshold) {
        const severity: Severity = continuousMs >= this.limits.endlessScrollMs ? "MEDIUM" : "LOW";
        event = {
          ...base,
          kind: "app-threshold",
          severity,
          message: `${app.appName} has been open for ${formatDuration(continuousMs)} (limit ${formatDuration(threshold)}).`,
        };
      }
    }
    if (event) {
      stint.reported = true;
    }
    return event;
  }

  private async checkDevice(now: number): Promise<DeviceCandidate[]> {
    const candidates: DeviceCandidate[] = [];

    const recentMs = await this.sampler.sampleWindow(now - this.limits.deviceWindowMs, now);
    if (recentMs < this.limits.deviceThresholdMs) {
      this.deviceReported.delete("continuous-use");
    } else if (!this.deviceReported.has("continuous-use")) {
      candidates.push({
        kind: "continuous-use",
        observedMs: recentMs,
        message: `${formatDuration(recentMs)} of screen time in the last ${formatDuration(this.limits.deviceWindowMs)}.`,
      });
    }

    const todayMs = await this.sampler.sampleWindow(startOfLocalDay(now), now);
    if (todayMs < this.limits.dailyGoalMs) {
      this.deviceReported.delete("daily-goal");
    } else if (!this.deviceReported.has("daily-goal")) {
      candidates.push({
        kind: "daily-goal",
        observedMs: todayMs,
        message: `${formatDuration(todayMs)} of screen time today passed the ${formatDuration(this.limits.dailyGoalMs)} goal.`,
      });
    }
    return candidates;
  }
}
