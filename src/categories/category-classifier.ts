import fs from "node:fs";
import type { AppCategory, CategoryMapping } from "../contracts.js";
import { APP_CATEGORIES } from "../contracts.js";
import { createSubsystemLogger, type SubsystemLogger } from "../infra/logger.js";
import type { CategoryStore } from "../orchestrator/ports.js";

export type CatalogEntry = {
  appIdentifier: string;
  category: AppCategory;
};

export type SeedResult = {
  inserted: number;
  updated: number;
  skipped: number;
};

const MINUTE_MS = 60_000;

/** Default per-category limits; `null` means the category is never limited. */
export const CATEGORY_THRESHOLDS_MS: Record<AppCategory, number | null> = {
  SOCIAL_MEDIA: 30 * MINUTE_MS,
  GAMES: 45 * MINUTE_MS,
  ADULT_CONTENT: 5 * MINUTE_MS,
  ENTERTAINMENT: 60 * MINUTE_MS,
  PRODUCTIVITY: null,
  COMMUNICATION: null,
  SHOPPING: 30 * MINUTE_MS,
  NEWS: 30 * MINUTE_MS,
  BROWSER: 45 * MINUTE_MS,
  OTHER: 60 * MINUTE_MS,
  UNKNOWN: 60 * MINUTE_MS,
};

function isCategory(value: unknown): value is AppCategory {
  return APP_CATEGORIES.some((category) => category === value);
}

export function parseCatalog(raw: unknown): CatalogEntry[] {
  if (!raw || typeof raw !== "object" || !("apps" in raw) || !Array.isArray(raw.apps)) {
    throw new Error("App catalog must be an object with an apps array");
  }
  const entries = new Map<string, CatalogEntry>();
  for (const entry of raw.apps) {
    if (!entry || typeof entry !== "object") {
      continue;
    }
    const appIdentifier: unknown = "appIdentifier" in entry ? entry.appIdentifier : undefined;
    const category: unknown = "category" in entry ? entry.category : undefined;
    if (typeof appIdentifier === "string" && appIdentifier.trim() && isCategory(category)) {
      entries.set(appIdentifier, { appIdentifier, category });
    }
  }
  return [...entries.values()];
}

let bundledCatalog: CatalogEntry[] | undefined;

export function loadBundledCatalog(): CatalogEntry[] {
  bundledCatalog ??= parseCatalog(JSON.parse(fs.readFileSync(new URL("./app-catalog.json", import.meta.url), "utf-8")));
  return bundledCatalog;
}

export class CategoryClassifier {
  private readonly store: CategoryStore;
  private readonly catalog: Map<string, AppCategory>;
  private readonly log: SubsystemLogger;

  constructor(params: { store: CategoryStore; catalog?: CatalogEntry[]; logger?: SubsystemLogger }) {
    this.store = params.store;
    this.catalog = new Map(
      (params.catalog ?? loadBundledCatalog()).map((entry) => [entry.appIdentifier, entry.category]),
    );
    this.log = params.logger ?? createSubsystemLogger("categories");
  }

  /** Stored mapping first, then the bundled catalog, then UNKNOWN. */
  async categorize(appIdentifier: string): Promise<AppCategory> {
    const mapping = await this.store.get(appIdentifier);
    return mapping?.category ?? this.catalog.get(appIdentifier) ?? "UNKNOWN";
  }

  /** Limit in milliseconds, or `null` when the app is never limited. */
  async threshold(appIdentifier: string): Promise<number | null> {
    const mapping = await this.store.get(appIdentifier);
    if (mapping?.customThresholdMs !== undefined) {
      return mapping.customThresholdMs;
    }
    const category = mapping?.category ?? this.catalog.get(appIdentifier) ?? "UNKNOWN";
    return CATEGORY_THRESHOLDS_MS[category];
  }

  async isBlocked(appIdentifier: string): Promise<boolean> {
    return (await this.store.get(appIdentifier))?.isBlocked ?? false;
  }

  async getMapping(appIdentifier: string): Promise<CategoryMapping | undefined> {
    return this.store.get(appIdentifier);
  }

  async listByCategory(category: AppCategory): Promise<CategoryMapping[]> {
    return this.store.listByCategory(category);
  }

  async setBlocked(appIdentifier: string, blocked: boolean): Promise<CategoryMapping> {
    const mapping = { ...(await this.mappingOrDefault(appIdentifier)), isBlocked: blocked };
    await this.store.upsert(mapping);
    this.log.info(`${appIdentifier} ${blocked ? "blocked" : "unblocked"}`);
    return mapping;
  }

  async setCustomThreshold(appIdentifier: string, thresholdMs: number | null): Promise<CategoryMapping> {
    const current = await this.mappingOrDefault(appIdentifier);
    const mapping: CategoryMapping = {
      appIdentifier,
      category: current.category,
      isBlocked: current.isBlocked,
      addedBy: current.addedBy,
    };
    if (thresholdMs !== null && Number.isFinite(thresholdMs) && thresholdMs > 0) {
      mapping.customThresholdMs = Math.round(thresholdMs);
    }
    await this.store.upsert(mapping);
    return mapping;
  }

  async userCategorize(appIdentifier: string, category: AppCategory): Promise<CategoryMapping> {
    const existing = await this.store.get(appIdentifier);
    const mapping: CategoryMapping = {
      ...existing,
      appIdentifier,
      category,
      isBlocked: existing?.isBlocked ?? false,
      addedBy: "USER",
    };
    await this.store.upsert(mapping);
    return mapping;
  }

  /**
   * Inserts the catalog. USER rows are never touched; SYSTEM rows change only
   * when their category differs and keep their block flag and custom limit.
   */
  async seed(): Promise<SeedResult> {
    const existing = new Map((await this.store.list()).map((row) => [row.appIdentifier, row]));
    const writes: CategoryMapping[] = [];
    const result: SeedResult = { inserted: 0, updated: 0, skipped: 0 };

    for (const [appIdentifier, category] of this.catalog) {
      const row = existing.get(appIdentifier);
      if (!row) {
        writes.push({ appIdentifier, category, isBlocked: false, addedBy: "SYSTEM" });
        result.inserted += 1;
      } else if (row.addedBy === "SYSTEM" && row.category !== category) {
        writes.push({ ...row, category });
        result.updated += 1;
      } else {
        result.skipped += 1;
      }
    }

    if (writes.length > 0) {
      await this.store.upsertMany(writes);
    }
    this.log.info(`seeded catalog: ${result.inserted} inserted, ${result.updated} updated, ${result.skipped} skipped`);
    return result;
  }

  private async mappingOrDefault(appIdentifier: string): Promise<CategoryMapping> {
    return (
      (await this.store.get(appIdentifier)) ?? {
        appIdentifier,
        category: this.catalog.get(appIdentifier) ?? "UNKNOWN",
        isBlocked: false,
        addedBy: "SYSTEM",
      }
    );
  }
}
