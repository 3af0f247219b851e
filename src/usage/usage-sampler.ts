import type { AppUsageInfo, AppUsageTotal, UsageSample } from "../contracts.js";
import { PermissionDeniedError } from "../errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../infra/logger.js";
import type { UsageSource } from "../orchestrator/ports.js";

/**
 * Read-only view over the host usage source. A missing permission, or a
 * source that throws `PermissionDeniedError`, yields zero/empty results
 * instead of an error, so callers cannot tell "no data" from "no usage" and
 * must consult `hasPermission()` first.
 */
export class UsageSampler {
  private readonly log: SubsystemLogger;

  constructor(
    private readonly source: UsageSource,
    logger?: SubsystemLogger,
  ) {
    this.log = logger ?? createSubsystemLogger("usage");
  }

  async hasPermission(): Promise<boolean> {
    try {
      return await this.source.hasPermission();
    } catch (error) {
      if (error instanceof PermissionDeniedError) {
        return false;
      }
      throw error;
    }
  }

  async samples(start: number, end: number): Promise<UsageSample[]> {
    if (end <= start) {
      return [];
    }
    return this.guarded(`samples ${start}-${end}`, [], async () => {
      const rows = await this.source.queryUsage(start, end);
      return rows.filter((row) => Number.isFinite(row.foregroundDurationMs) && row.foregroundDurationMs > 0);
    });
  }

  async sampleWindow(start: number, end: number): Promise<number> {
    const rows = await this.samples(start, end);
    return rows.reduce((total, row) => total + row.foregroundDurationMs, 0);
  }

  async currentForegroundApp(): Promise<AppUsageInfo | null> {
    return this.guarded("foreground app", null, () => this.source.currentForegroundApp());
  }

  async topApps(start: number, end: number, limit: number): Promise<AppUsageTotal[]> {
    return rankApps(await this.samples(start, end), limit);
  }

  private async guarded<T>(label: string, empty: T, query: () => Promise<T>): Promise<T> {
    if (!(await this.hasPermission())) {
      this.log.debug(`${label}: usage permission missing, returning empty result`);
      return empty;
    }
    try {
      return await query();
    } catch (error) {
      if (error instanceof PermissionDeniedError) {
        this.log.warn(`${label}: ${error.message}`);
        return empty;
      }
      throw error;
    }
  }
}

export function rankApps(samples: readonly UsageSample[], limit: number): AppUsageTotal[] {
  const totals = new Map<string, number>();
  for (const sample of samples) {
    totals.set(sample.appIdentifier, (totals.get(sample.appIdentifier) ?? 0) + sample.foregroundDurationMs);
  }
  return [...totals.entries()]
    .map(([appIdentifier, totalMs]) => ({ appIdentifier, totalMs }))
    .sort((a, b) => b.totalMs - a.totalMs || a.appIdentifier.localeCompare(b.appIdentifier))
    .slice(0, Math.max(0, Math.floor(limit)));
}
