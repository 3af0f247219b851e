import fs from "node:fs/promises";
import path from "node:path";
import type {
  Agreement,
  AgreementExtension,
  AgreementStatus,
  AppCategory,
  CategoryMapping,
} from "../contracts.js";
import { APP_CATEGORIES } from "../contracts.js";
import { KeyedLock } from "./keyed-lock.js";
import { InMemoryAgreementStore, InMemoryCategoryStore } from "./memory-stores.js";
import { isMissingFile } from "./trace.js";

type CategoryFile = { version: 1; updatedAt: number; mappings: CategoryMapping[] };
type AgreementFile = { version: 1; updatedAt: number; agreements: Agreement[] };

const fileLock = new KeyedLock();

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function finiteOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function toCategory(value: unknown): AppCategory {
  return APP_CATEGORIES.find((category) => category === value) ?? "UNKNOWN";
}

function toStatus(value: unknown): AgreementStatus | undefined {
  return value === "ACTIVE" || value === "COMPLETED" || value === "VIOLATED" ? value : undefined;
}

export function normalizeCategoryMapping(raw: unknown): CategoryMapping | undefined {
  if (!isRecord(raw) || typeof raw.appIdentifier !== "string" || !raw.appIdentifier.trim()) {
    return undefined;
  }
  const mapping: CategoryMapping = {
    appIdentifier: raw.appIdentifier,
    category: toCategory(raw.category),
    isBlocked: raw.isBlocked === true,
    addedBy: raw.addedBy === "USER" ? "USER" : "SYSTEM",
  };
  const threshold = finiteOrNull(raw.customThresholdMs);
  if (threshold !== null && threshold > 0) {
    mapping.customThresholdMs = threshold;
  }
  return mapping;
}

function normalizeExtension(raw: unknown): AgreementExtension | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const at = finiteOrNull(raw.at);
  const previousExpiresAt = finiteOrNull(raw.previousExpiresAt);
  const newExpiresAt = finiteOrNull(raw.newExpiresAt);
  const addedMs = finiteOrNull(raw.addedMs);
  if (at === null || previousExpiresAt === null || newExpiresAt === null || addedMs === null) {
    return undefined;
  }
  return {
    at,
    previousExpiresAt,
    newExpiresAt,
    addedMs,
    conversationId: typeof raw.conversationId === "string" ? raw.conversationId : "",
  };
}

export function normalizeAgreement(raw: unknown): Agreement | undefined {
  if (!isRecord(raw) || typeof raw.id !== "string") {
    return undefined;
  }
  const createdAt = finiteOrNull(raw.createdAt);
  const expiresAt = finiteOrNull(raw.expiresAt);
  const status = toStatus(raw.status);
  if (createdAt === null || expiresAt === null || !status) {
    return undefined;
  }
  const appIdentifier = typeof raw.appIdentifier === "string" ? raw.appIdentifier : null;
  const extensions = Array.isArray(raw.extensions)
    ? raw.extensions.flatMap((entry) => normalizeExtension(entry) ?? [])
    : [];
  return {
    id: raw.id,
    appIdentifier,
    appName: typeof raw.appName === "string" ? raw.appName : (appIdentifier ?? "device"),
    appCategory: toCategory(raw.appCategory),
    agreedDurationMs: expiresAt - createdAt,
    createdAt,
    expiresAt,
    status,
    violatedAt: finiteOrNull(raw.violatedAt),
    completedAt: finiteOrNull(raw.completedAt),
    originatingConversationId:
      typeof raw.originatingConversationId === "string" ? raw.originatingConversationId : "",
    extensions,
  };
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const raw = await fs.readFile(filePath, "utf-8");
    return JSON.parse(raw);
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
}

async function writeJsonFile(filePath: string, payload: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
  await fs.rename(tmpPath, filePath);
}

/**
 * Applies an in-memory change and writes it out. A failed write restores the
 * rows so memory never runs ahead of the file.
 */
async function commitRows<K, V, T>(
  rows: Map<K, V>,
  apply: () => Promise<T>,
  persist: () => Promise<void>,
  changed: (result: T) => boolean = () => true,
): Promise<T> {
  const snapshot = new Map(rows);
  const result = await apply();
  if (!changed(result)) {
    return result;
  }
  try {
    await persist();
  } catch (error) {
    rows.clear();
    for (const [key, value] of snapshot) {
      rows.set(key, value);
    }
    throw error;
  }
  return result;
}

/** Category mappings persisted to `categories.json` in the state directory. */
export class JsonFileCategoryStore extends InMemoryCategoryStore {
  private loaded: Promise<void> | undefined;

  constructor(private readonly filePath: string) {
    super();
  }

  static inStateDir(stateDir: string): JsonFileCategoryStore {
    return new JsonFileCategoryStore(path.join(stateDir, "categories.json"));
  }

  private ensureLoaded(): Promise<void> {
    this.loaded ??= (async () => {
      const raw = await readJsonFile(this.filePath);
      const entries = isRecord(raw) && Array.isArray(raw.mappings) ? raw.mappings : [];
      for (const entry of entries) {
        const mapping = normalizeCategoryMapping(entry);
        if (mapping) {
          this.rows.set(mapping.appIdentifier, mapping);
        }
      }
    })();
    return this.loaded;
  }

  private async persist(): Promise<void> {
    const payload: CategoryFile = { version: 1, updatedAt: Date.now(), mappings: [...this.rows.values()] };
    await writeJsonFile(this.filePath, payload);
  }

  override async get(appIdentifier: string): Promise<CategoryMapping | undefined> {
    await this.ensureLoaded();
    return super.get(appIdentifier);
  }

  override async listByCategory(category: AppCategory): Promise<CategoryMapping[]> {
    await this.ensureLoaded();
    return super.listByCategory(category);
  }

  override async list(): Promise<CategoryMapping[]> {
    await this.ensureLoaded();
    return super.list();
  }

  override async upsert(mapping: CategoryMapping): Promise<void> {
    await fileLock.run(this.filePath, async () => {
      await this.ensureLoaded();
      await commitRows(this.rows, () => super.upsert(mapping), () => this.persist());
    });
  }

  override async upsertMany(mappings: CategoryMapping[]): Promise<void> {
    await fileLock.run(this.filePath, async () => {
      await this.ensureLoaded();
      await commitRows(this.rows, () => super.upsertMany(mappings), () => this.persist());
    });
  }
}

/** Agreements persisted to `agreements.json` in the state directory. */
export class JsonFileAgreementStore extends InMemoryAgreementStore {
  private loaded: Promise<void> | undefined;

  constructor(private readonly filePath: string) {
    super();
  }

  static inStateDir(stateDir: string): JsonFileAgreementStore {
    return new JsonFileAgreementStore(path.join(stateDir, "agreements.json"));
  }

  private ensureLoaded(): Promise<void> {
    this.loaded ??= (async () => {
      const raw = await readJsonFile(this.filePath);
      const entries = isRecord(raw) && Array.isArray(raw.agreements) ? raw.agreements : [];
      for (const entry of entries) {
        const agreement = normalizeAgreement(entry);
        if (agreement) {
          this.rows.set(agreement.id, agreement);
        }
      }
    })();
    return this.loaded;
  }

  private async persist(): Promise<void> {
    const payload: AgreementFile = { version: 1, updatedAt: Date.now(), agreements: [...this.rows.values()] };
    await writeJsonFile(this.filePath, payload);
  }

  override async get(id: string): Promise<Agreement | undefined> {
    await this.ensureLoaded();
    return super.get(id);
  }

  override async listByStatus(status: AgreementStatus): Promise<Agreement[]> {
    await this.ensureLoaded();
    return super.listByStatus(status);
  }

  override async list(): Promise<Agreement[]> {
    await this.ensureLoaded();
    return super.list();
  }

  override async upsert(agreement: Agreement): Promise<void> {
    await fileLock.run(this.filePath, async () => {
      await this.ensureLoaded();
      await commitRows(this.rows, () => super.upsert(agreement), () => this.persist());
    });
  }

  override async deleteOlderThan(cutoff: number): Promise<number> {
    return fileLock.run(this.filePath, async () => {
      await this.ensureLoaded();
      return commitRows(
        this.rows,
        () => super.deleteOlderThan(cutoff),
        () => this.persist(),
        (removed) => removed > 0,
      );
    });
  }
}
