import type { InterventionOutcome, InterventionRecord, Severity } from "../contracts.js";

export type LedgerAttempt =
  | { fired: true; record: InterventionRecord }
  | { fired: false; remainingMs: number };

/**
 * Intervention history and per-channel cooldown clock. All methods are
 * synchronous, so a check-and-record is one critical section even when
 * detection ticks overlap.
 */
export class InterventionLedger {
  private readonly records: InterventionRecord[] = [];
  private readonly lastByChannel = new Map<string, number>();

  tryRecord(params: {
    channel: string;
    severity: Severity;
    now: number;
    cooldownMs: number;
    createRecord: () => InterventionRecord;
  }): LedgerAttempt {
    const last = this.lastByChannel.get(params.channel);
    if (last !== undefined && params.severity !== "HIGH" && params.now - last < params.cooldownMs) {
      return { fired: false, remainingMs: params.cooldownMs - (params.now - last) };
    }
    const record = params.createRecord();
    this.records.push(record);
    this.lastByChannel.set(params.channel, params.now);
    return { fired: true, record: { ...record } };
  }

  /** Restarts the channel cooldown without adding a record. */
  rearm(channel: string, now: number): void {
    this.lastByChannel.set(channel, Math.max(now, this.lastByChannel.get(channel) ?? now));
  }

  /** Settles a negotiating record once; returns false for any other record. */
  settle(id: string, outcome: Extract<InterventionOutcome, "agreed" | "rejected" | "superseded">): boolean {
    const record = this.records.find((entry) => entry.id === id);
    if (!record || record.outcome !== "negotiating") {
      return false;
    }
    record.outcome = outcome;
    return true;
  }

  lastInterventionAt(channel: string): number | undefined {
    return this.lastByChannel.get(channel);
  }

  history(): InterventionRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  get size(): number {
    return this.records.length;
  }

  /** Drops records older than `cutoff`; cooldown clocks are kept. */
  prune(cutoff: number): number {
    const before = this.records.length;
    const kept = this.records.filter((record) => record.timestamp >= cutoff);
    this.records.splice(0, this.records.length, ...kept);
    return before - kept.length;
  }
}
