import type { Agreement, AppUsageInfo } from "../contracts.js";
import { EnforcementActionFailedError, describeError } from "../errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../infra/logger.js";
import { formatDuration } from "../negotiation/duration-parser.js";
import type { AgreementNoticeKind, PresentationSink, SubjectControl } from "../orchestrator/ports.js";
import type { UsageSampler } from "../usage/usage-sampler.js";
import type { AgreementLifecycle } from "./agreement-lifecycle.js";

export type EnforcementTimings = {
  warningLeadMs: number;
  gracePeriodMs: number;
  maxCloseAttempts: number;
};

export type EnforcementReport = {
  warned: string[];
  graceStarted: string[];
  completed: string[];
  violated: string[];
  closeFailures: string[];
};

type PendingClose = {
  identifier: string;
  attempts: number;
};

function emptyReport(): EnforcementReport {
  return { warned: [], graceStarted: [], completed: [], violated: [], closeFailures: [] };
}

function subjectInFront(agreement: Agreement, foreground: AppUsageInfo | null): boolean {
  if (!foreground) {
    return false;
  }
  return agreement.appIdentifier === null || agreement.appIdentifier === foreground.appIdentifier;
}

/**
 * Drives ACTIVE agreements through warning, expiry, grace period and
 * completion or violation. A device-wide agreement treats whatever app is in
 * front as its subject.
 */
export class AgreementEnforcer {
  private readonly warnedFor = new Map<string, number>();
  private readonly graceStartedAt = new Map<string, number>();
  private readonly pendingCloses = new Map<string, PendingClose>();
  private resumedAt: number | undefined;
  private readonly lifecycle: AgreementLifecycle;
  private readonly sampler: UsageSampler;
  private readonly control: SubjectControl;
  private readonly presentation: PresentationSink;
  private readonly timings: () => EnforcementTimings;
  private readonly onViolation: (agreement: Agreement, now: number) => void;
  private readonly log: SubsystemLogger;

  constructor(params: {
    lifecycle: AgreementLifecycle;
    sampler: UsageSampler;
    control: SubjectControl;
    presentation: PresentationSink;
    timings: () => EnforcementTimings;
    onViolation?: (agreement: Agreement, now: number) => void;
    logger?: SubsystemLogger;
  }) {
    this.lifecycle = params.lifecycle;
    this.sampler = params.sampler;
    this.control = params.control;
    this.presentation = params.presentation;
    this.timings = params.timings;
    this.onViolation = params.onViolation ?? (() => {});
    this.log = params.logger ?? createSubsystemLogger("enforcer");
  }

  /**
   * Drops in-memory warning and grace bookkeeping; agreements themselves are
   * untouched. Grace periods for agreements that expired before the next tick
   * are measured from that tick.
   */
  reset(): void {
    this.warnedFor.clear();
    this.graceStartedAt.clear();
    this.resumedAt = undefined;
  }

  graceStartedFor(agreementId: string): number | undefined {
    return this.graceStartedAt.get(agreementId);
  }

  async tick(now: number): Promise<EnforcementReport> {
    const report = emptyReport();
    const timings = this.timings();
    const resumedAt = (this.resumedAt ??= now);
    await this.retryPendingCloses(timings, report);

    const active = await this.lifecycle.active();
    if (active.length === 0) {
      return report;
    }
    const permitted = await this.sampler.hasPermission();
    const foreground = permitted ? await this.sampler.currentForegroundApp() : null;
    if (!permitted) {
      this.resumedAt = undefined;
    }

    for (const agreement of active) {
      const remainingMs = agreement.expiresAt - now;
      if (remainingMs > 0) {
        this.graceStartedAt.delete(agreement.id);
        if (remainingMs <= timings.warningLeadMs && this.warnedFor.get(agreement.id) !== agreement.expiresAt) {
          this.warnedFor.set(agreement.id, agreement.expiresAt);
          report.warned.push(agreement.id);
          await this.notify("warning", agreement, `${formatDuration(remainingMs)} left on ${agreement.appName}.`);
        }
        continue;
      }
      if (!permitted) {
        this.log.debug(`agreement ${agreement.id} expired but usage permission is missing; holding`);
        continue;
      }

      if (!subjectInFront(agreement, foreground)) {
        const result = await this.lifecycle.complete(agreement.id, agreement.expiresAt);
        if (result.ok) {
          this.forget(agreement.id);
          report.completed.push(agreement.id);
          await this.notify("completed", result.value, `You kept your agreement for ${agreement.appName}.`);
        }
        continue;
      }

      let graceStart = this.graceStartedAt.get(agreement.id);
      if (graceStart === undefined) {
        graceStart = Math.max(agreement.expiresAt, resumedAt);
        this.graceStartedAt.set(agreement.id, graceStart);
        report.graceStarted.push(agreement.id);
        await this.notify(
          "times-up",
          agreement,
          `Time's up for ${agreement.appName}. It closes in ${formatDuration(graceStart + timings.gracePeriodMs - now)}.`,
        );
      }
      if (now - graceStart < timings.gracePeriodMs) {
        continue;
      }

      const result = await this.lifecycle.violate(agreement.id, agreement.expiresAt);
      if (!result.ok) {
        continue;
      }
      this.forget(agreement.id);
      report.violated.push(agreement.id);
      const identifier = agreement.appIdentifier ?? foreground?.appIdentifier;
      if (identifier) {
        await this.attemptClose(agreement.id, { identifier, attempts: 0 }, timings, report);
      }
      this.onViolation(result.value, now);
      await this.notify("violated", result.value, `${agreement.appName} was closed: the agreed time ran out.`);
    }
    return report;
  }

  private forget(agreementId: string): void {
    this.warnedFor.delete(agreementId);
    this.graceStartedAt.delete(agreementId);
  }

  private async retryPendingCloses(timings: EnforcementTimings, report: EnforcementReport): Promise<void> {
    for (const [agreementId, pending] of [...this.pendingCloses]) {
      await this.attemptClose(agreementId, pending, timings, report);
    }
  }

  private async attemptClose(
    agreementId: string,
    pending: PendingClose,
    timings: EnforcementTimings,
    report: EnforcementReport,
  ): Promise<void> {
    const attempts = pending.attempts + 1;
    let failure: EnforcementActionFailedError | undefined;
    try {
      const outcome = await this.control.closeSubject(pending.identifier);
      if (!outcome.ok) {
        failure = new EnforcementActionFailedError(pending.identifier, outcome.detail ?? "close refused");
      }
    } catch (error) {
      failure = new EnforcementActionFailedError(pending.identifier, describeError(error), error);
    }

    if (!failure) {
      this.pendingCloses.delete(agreementId);
      this.log.info(`closed ${pending.identifier} for agreement ${agreementId}`);
      return;
    }
    report.closeFailures.push(agreementId);
    if (attempts >= timings.maxCloseAttempts) {
      this.pendingCloses.delete(agreementId);
      this.log.error(`giving up on agreement ${agreementId} after ${attempts} attempts`, failure);
      return;
    }
    this.pendingCloses.set(agreementId, { identifier: pending.identifier, attempts });
    this.log.warn(`${failure.message} (attempt ${attempts}/${timings.maxCloseAttempts})`);
  }

  private async notify(kind: AgreementNoticeKind, agreement: Agreement, message: string): Promise<void> {
    try {
      await this.presentation.notify({ kind, agreement, message });
    } catch (error) {
      this.log.warn(`${kind} notice for ${agreement.id} not delivered: ${describeError(error)}`);
    }
  }
}
