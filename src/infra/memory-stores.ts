import type { Agreement, AgreementStatus, AppCategory, CategoryMapping } from "../contracts.js";
import type { AgreementStore, CategoryStore } from "../orchestrator/ports.js";

export function terminalTimestamp(agreement: Agreement): number | null {
  return agreement.completedAt ?? agreement.violatedAt;
}

export function cloneAgreement(agreement: Agreement): Agreement {
  return { ...agreement, extensions: agreement.extensions.map((entry) => ({ ...entry })) };
}

export class InMemoryCategoryStore implements CategoryStore {
  protected readonly rows = new Map<string, CategoryMapping>();

  constructor(initial: CategoryMapping[] = []) {
    for (const mapping of initial) {
      this.rows.set(mapping.appIdentifier, { ...mapping });
    }
  }

  async get(appIdentifier: string): Promise<CategoryMapping | undefined> {
    const row = this.rows.get(appIdentifier);
    return row ? { ...row } : undefined;
  }

  async listByCategory(category: AppCategory): Promise<CategoryMapping[]> {
    return [...this.rows.values()].filter((row) => row.category === category).map((row) => ({ ...row }));
  }

  async list(): Promise<CategoryMapping[]> {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  async upsert(mapping: CategoryMapping): Promise<void> {
    this.rows.set(mapping.appIdentifier, { ...mapping });
  }

  async upsertMany(mappings: CategoryMapping[]): Promise<void> {
    for (const mapping of mappings) {
      this.rows.set(mapping.appIdentifier, { ...mapping });
    }
  }
}

export class InMemoryAgreementStore implements AgreementStore {
  protected readonly rows = new Map<string, Agreement>();

  constructor(initial: Agreement[] = []) {
    for (const agreement of initial) {
      this.rows.set(agreement.id, cloneAgreement(agreement));
    }
  }

  async get(id: string): Promise<Agreement | undefined> {
    const row = this.rows.get(id);
    return row ? cloneAgreement(row) : undefined;
  }

  async listByStatus(status: AgreementStatus): Promise<Agreement[]> {
    return [...this.rows.values()].filter((row) => row.status === status).map(cloneAgreement);
  }

  async list(): Promise<Agreement[]> {
    return [...this.rows.values()].map(cloneAgreement);
  }

  async upsert(agreement: Agreement): Promise<void> {
    this.rows.set(agreement.id, cloneAgreement(agreement));
  }

  async deleteOlderThan(cutoff: number): Promise<number> {
    let removed = 0;
    for (const [id, row] of this.rows) {
      const finishedAt = terminalTimestamp(row);
      if (row.status !== "ACTIVE" && finishedAt !== null && finishedAt < cutoff) {
        this.rows.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
