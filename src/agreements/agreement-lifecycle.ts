import crypto from "node:crypto";
import type { Agreement, AgreementStatus, AppCategory } from "../contracts.js";
import { InvalidTransitionError, fail, ok, type Result } from "../errors.js";
import { KeyedLock } from "../infra/keyed-lock.js";
import { createSubsystemLogger, type SubsystemLogger } from "../infra/logger.js";
import type { AgreementStore } from "../orchestrator/ports.js";

export type AgreementSubject = {
  appIdentifier: string | null;
  appName: string;
  category: AppCategory;
};

/**
 * Owns agreement records. Writes for one agreement id are serialized; the
 * only status edges are ACTIVE to COMPLETED and ACTIVE to VIOLATED.
 */
export class AgreementLifecycle {
  private readonly lock = new KeyedLock();
  private readonly store: AgreementStore;
  private readonly nowMs: () => number;
  private readonly createId: () => string;
  private readonly log: SubsystemLogger;

  constructor(params: {
    store: AgreementStore;
    nowMs?: () => number;
    createId?: () => string;
    logger?: SubsystemLogger;
  }) {
    this.store = params.store;
    this.nowMs = params.nowMs ?? Date.now;
    this.createId = params.createId ?? (() => `agr-${crypto.randomUUID()}`);
    this.log = params.logger ?? createSubsystemLogger("agreements");
  }

  async create(params: { subject: AgreementSubject; durationMs: number; conversationId: string }): Promise<Agreement> {
    const now = this.nowMs();
    const durationMs = Math.max(1, Math.round(params.durationMs));
    const agreement: Agreement = {
      id: this.createId(),
      appIdentifier: params.subject.appIdentifier,
      appName: params.subject.appName,
      appCategory: params.subject.category,
      agreedDurationMs: durationMs,
      createdAt: now,
      expiresAt: now + durationMs,
      status: "ACTIVE",
      violatedAt: null,
      completedAt: null,
      originatingConversationId: params.conversationId,
      extensions: [],
    };
    await this.lock.run(agreement.id, () => this.store.upsert(agreement));
    this.log.info(`agreement ${agreement.id} for ${agreement.appName}: ${durationMs}ms, expires ${agreement.expiresAt}`);
    return agreement;
  }

  /** Pushes the deadline of an ACTIVE agreement out by `addedMs`, counted from now if it already passed. */
  async extend(id: string, addedMs: number, conversationId: string): Promise<Result<Agreement>> {
    return this.mutate(id, "EXTENDED", undefined, (agreement, now) => {
      const added = Math.max(1, Math.round(addedMs));
      const previousExpiresAt = agreement.expiresAt;
      const newExpiresAt = Math.max(previousExpiresAt, now) + added;
      agreement.extensions.push({ at: now, previousExpiresAt, newExpiresAt, addedMs: added, conversationId });
      agreement.expiresAt = newExpiresAt;
      agreement.agreedDurationMs = newExpiresAt - agreement.createdAt;
      this.log.info(`agreement ${id} extended: ${previousExpiresAt} -> ${newExpiresAt}`);
    });
  }

  /** `expectedExpiresAt` rejects the change if an extension moved the deadline in the meantime. */
  async complete(id: string, expectedExpiresAt?: number): Promise<Result<Agreement>> {
    return this.mutate(id, "COMPLETED", expectedExpiresAt, (agreement, now) => {
      agreement.status = "COMPLETED";
      agreement.completedAt = now;
    });
  }

  async violate(id: string, expectedExpiresAt?: number): Promise<Result<Agreement>> {
    return this.mutate(id, "VIOLATED", expectedExpiresAt, (agreement, now) => {
      agreement.status = "VIOLATED";
      agreement.violatedAt = now;
    });
  }

  async get(id: string): Promise<Agreement | undefined> {
    return this.store.get(id);
  }

  async active(): Promise<Agreement[]> {
    return (await this.store.listByStatus("ACTIVE")).sort((a, b) => a.expiresAt - b.expiresAt);
  }

  async recent(limit: number): Promise<Agreement[]> {
    return (await this.store.list()).sort((a, b) => a.createdAt - b.createdAt).slice(-Math.max(0, limit));
  }

  async prune(cutoff: number): Promise<number> {
    const removed = await this.store.deleteOlderThan(cutoff);
    if (removed > 0) {
      this.log.info(`pruned ${removed} finished agreements`);
    }
    return removed;
  }

  private async mutate(
    id: string,
    target: AgreementStatus | "EXTENDED",
    expectedExpiresAt: number | undefined,
    apply: (agreement: Agreement, now: number) => void,
  ): Promise<Result<Agreement>> {
    return this.lock.run(id, async () => {
      const agreement = await this.store.get(id);
      const stale = expectedExpiresAt !== undefined && agreement?.expiresAt !== expectedExpiresAt;
      if (!agreement || agreement.status !== "ACTIVE" || stale) {
        const from = agreement?.status === "ACTIVE" && stale ? "ACTIVE (deadline moved)" : (agreement?.status ?? "MISSING");
        const error = new InvalidTransitionError(id, from, target);
        this.log.warn(error.message);
        return fail<Agreement>(error);
      }
      apply(agreement, this.nowMs());
      await this.store.upsert(agreement);
      return ok(agreement);
    });
  }
}
