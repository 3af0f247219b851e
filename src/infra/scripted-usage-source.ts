import type { AppUsageInfo, UsageSample } from "../contracts.js";
import { PermissionDeniedError } from "../errors.js";
import type { UsageSource } from "../orchestrator/ports.js";

/**
 * In-process usage source driven by explicit calls. Backs the CLI and the
 * tests; a host integration implements `UsageSource` against the platform API.
 */
export class ScriptedUsageSource implements UsageSource {
  permission: boolean | "throw" = true;
  private foreground: AppUsageInfo | null = null;
  private readonly recorded: UsageSample[] = [];

  setForeground(app: { appIdentifier: string; appName?: string } | null, nowMs = Date.now()): void {
    this.foreground = app
      ? {
          appIdentifier: app.appIdentifier,
          appName: app.appName ?? app.appIdentifier,
          lastTimeUsed: nowMs,
          totalTimeInForegroundMs: 0,
        }
      : null;
  }

  record(appIdentifier: string, windowStart: number, windowEnd: number): void {
    this.recorded.push({
      appIdentifier,
      windowStart,
      windowEnd,
      foregroundDurationMs: Math.max(0, windowEnd - windowStart),
    });
  }

  async hasPermission(): Promise<boolean> {
    if (this.permission === "throw") {
      throw new PermissionDeniedError();
    }
    return this.permission;
  }

  async currentForegroundApp(): Promise<AppUsageInfo | null> {
    this.assertReadable();
    return this.foreground ? { ...this.foreground } : null;
  }

  async queryUsage(start: number, end: number): Promise<UsageSample[]> {
    this.assertReadable();
    const rows: UsageSample[] = [];
    for (const sample of this.recorded) {
      const overlapStart = Math.max(start, sample.windowStart);
      const overlapEnd = Math.min(end, sample.windowEnd);
      if (overlapEnd <= overlapStart) {
        continue;
      }
      const span = sample.windowEnd - sample.windowStart;
      const share = span > 0 ? (overlapEnd - overlapStart) / span : 1;
      rows.push({
        appIdentifier: sample.appIdentifier,
        windowStart: overlapStart,
        windowEnd: overlapEnd,
        foregroundDurationMs: Math.round(sample.foregroundDurationMs * share),
      });
    }
    return rows;
  }

  private assertReadable(): void {
    if (this.permission !== true) {
      throw new PermissionDeniedError();
    }
  }
}
