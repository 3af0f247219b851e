import type {
  DetectionEvent,
  InterventionAction,
  InterventionDecision,
  InterventionOutcome,
  Severity,
} from "../contracts.js";
import type { ActionOverrides } from "../config/config.js";
import { describeError } from "../errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../infra/logger.js";
import { createTraceId, type TraceSink } from "../infra/trace.js";
import type { InterventionLedger } from "./intervention-ledger.js";

const DEFAULT_ACTIONS: Record<Severity, InterventionAction> = {
  HIGH: "BLOCK",
  MEDIUM: "NEGOTIATE",
  LOW: "ALERT",
};

const INITIAL_OUTCOME: Record<InterventionAction, InterventionOutcome> = {
  BLOCK: "blocked",
  NEGOTIATE: "negotiating",
  ALERT: "alerted",
};

export function channelFor(appIdentifier: string | null): string {
  return appIdentifier ? `app:${appIdentifier}` : "device";
}

export function selectAction(event: DetectionEvent, overrides: ActionOverrides): InterventionAction {
  return (
    overrides.byCategory[event.category] ?? overrides.bySeverity[event.severity] ?? DEFAULT_ACTIONS[event.severity]
  );
}

export class InterventionTrigger {
  private readonly ledger: InterventionLedger;
  private readonly traceSink?: TraceSink;
  private readonly settings: () => { cooldownMs: number; actionOverrides: ActionOverrides };
  private readonly log: SubsystemLogger;

  constructor(params: {
    ledger: InterventionLedger;
    settings: () => { cooldownMs: number; actionOverrides: ActionOverrides };
    traceSink?: TraceSink;
    logger?: SubsystemLogger;
  }) {
    this.ledger = params.ledger;
    this.settings = params.settings;
    this.traceSink = params.traceSink;
    this.log = params.logger ?? createSubsystemLogger("trigger");
  }

  /**
   * Applies the channel cooldown (bypassed by HIGH severity) and records the
   * intervention when it fires. Every decision is traced.
   */
  async evaluate(event: DetectionEvent, now: number): Promise<InterventionDecision> {
    const { cooldownMs, actionOverrides } = this.settings();
    const channel = channelFor(event.subjectAppIdentifier);
    const action = selectAction(event, actionOverrides);
    const traceId = createTraceId({
      channel,
      kind: event.kind,
      severity: event.severity,
      observedDurationMs: event.observedDurationMs,
      detectedAt: event.detectedAt,
      action,
      now,
    });

    const attempt = this.ledger.tryRecord({
      channel,
      severity: event.severity,
      now,
      cooldownMs,
      createRecord: () => ({
        id: `iv-${this.ledger.size + 1}-${traceId.slice(0, 8)}`,
        timestamp: now,
        channel,
        subject: event.subjectAppIdentifier,
        severity: event.severity,
        action,
        outcome: INITIAL_OUTCOME[action],
        traceId,
      }),
    });

    const decision: InterventionDecision = attempt.fired
      ? {
          shouldIntervene: true,
          reason: `${event.kind} on ${channel}: ${event.message}`,
          action,
          record: attempt.record,
          traceId,
        }
      : {
          shouldIntervene: false,
          reason: `cooldown active on ${channel} for another ${attempt.remainingMs}ms`,
          traceId,
        };

    if (attempt.fired) {
      this.log.info(`${action} ${channel} (${event.kind}, ${event.severity})`);
    } else {
      this.log.debug(decision.reason);
    }
    await this.trace({
      traceId,
      at: now,
      channel,
      kind: event.kind,
      severity: event.severity,
      action,
      fired: attempt.fired,
      reason: decision.reason,
    });
    return decision;
  }

  private async trace(entry: { traceId: string } & Record<string, unknown>): Promise<void> {
    if (!this.traceSink) {
      return;
    }
    try {
      await this.traceSink.append(entry);
    } catch (error) {
      this.log.warn(`trace ${entry.traceId} not written: ${describeError(error)}`);
    }
  }
}
