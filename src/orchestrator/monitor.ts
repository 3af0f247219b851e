import path from "node:path";
import { AgreementEnforcer, type EnforcementReport } from "../agreements/agreement-enforcer.js";
import { AgreementLifecycle } from "../agreements/agreement-lifecycle.js";
import { timerState, type TimerState } from "../agreements/agreement-timer.js";
import { CategoryClassifier, type CatalogEntry } from "../categories/category-classifier.js";
import {
  clampDailyGoal,
  isWithinQuietHours,
  loadMonitorConfig,
  resolveMonitorConfig,
  resolveStateDir,
  type MonitorConfig,
  type MonitorConfigOverrides,
} from "../config/config.js";
import type {
  Agreement,
  AppUsageInfo,
  DetectionEvent,
  InterventionDecision,
  InterventionRecord,
} from "../contracts.js";
import { Detector } from "../detection/detector.js";
import { InterventionLedger } from "../detection/intervention-ledger.js";
import { InterventionTrigger, channelFor } from "../detection/intervention-trigger.js";
import {
  EnforcementActionFailedError,
  InvalidTransitionError,
  describeError,
  fail,
  ok,
  type Result,
} from "../errors.js";
import { JsonFileAgreementStore, JsonFileCategoryStore } from "../infra/json-stores.js";
import { createSubsystemLogger, type SubsystemLogger } from "../infra/logger.js";
import { createJsonlTraceSink } from "../infra/trace.js";
import { formatDuration } from "../negotiation/duration-parser.js";
import { NegotiationEngine, type NegotiationSession, type TurnOutcome } from "../negotiation/negotiation-engine.js";
import { RateLimitedOracle } from "../negotiation/oracle-rate-limit.js";
import type { PromptContext } from "../negotiation/prompt-builder.js";
import { BaselineAnalyzer, startOfLocalDay } from "../usage/baseline-analyzer.js";
import { UsageSampler } from "../usage/usage-sampler.js";
import type {
  AgreementNoticeKind,
  AgreementStore,
  CategoryStore,
  DialogueOracle,
  PresentationSink,
  SubjectControl,
  TraceSink,
  UsageSource,
} from "./ports.js";

const BASELINE_DAYS = 7;
const PROMPT_TOP_APPS = 5;
const RECENT_AGREEMENTS = 3;
const PRUNE_INTERVAL_MS = 60 * 60_000;

export type MonitorDeps = {
  usageSource: UsageSource;
  oracle: DialogueOracle;
  presentation: PresentationSink;
  control: SubjectControl;
  categoryStore: CategoryStore;
  agreementStore: AgreementStore;
  traceSink?: TraceSink;
  config?: MonitorConfig;
  catalog?: CatalogEntry[];
  nowMs?: () => number;
  createId?: () => string;
  logger?: SubsystemLogger;
};

export type DetectionTickStatus = "active" | "inactive" | "snoozed" | "quiet-hours";

export type DetectionTickReport = {
  status: DetectionTickStatus;
  events: DetectionEvent[];
  decisions: InterventionDecision[];
};

export type MonitorStatus = {
  monitoring: "active" | "inactive" | "stopped";
  permission: boolean;
  foreground: AppUsageInfo | null;
  snoozedUntil: number | null;
  quietHours: boolean;
  dailyGoalMs: number;
  activeAgreements: number;
  openSessions: number;
};

export type PruneReport = {
  agreements: number;
  interventions: number;
};

export type ActiveAgreementView = {
  agreement: Agreement;
  timer: TimerState;
};

export type ReplyOutcome = TurnOutcome & {
  /** Set when the turn created or extended an agreement. */
  agreement?: Agreement;
};

/**
 * Wires the usage, detection, negotiation and agreement components together
 * and owns the detection and enforcement loops.
 */
export class Monitor {
  readonly classifier: CategoryClassifier;
  readonly ledger = new InterventionLedger();
  private readonly config: MonitorConfig;
  private readonly sampler: UsageSampler;
  private readonly baseline: BaselineAnalyzer;
  private readonly detector: Detector;
  private readonly trigger: InterventionTrigger;
  private readonly engine: NegotiationEngine;
  private readonly lifecycle: AgreementLifecycle;
  private readonly enforcer: AgreementEnforcer;
  private readonly presentation: PresentationSink;
  private readonly control: SubjectControl;
  private readonly nowMs: () => number;
  private readonly log: SubsystemLogger;
  private timers: NodeJS.Timeout[] = [];
  private snoozedUntil: number | null = null;
  private lastPrunedAt: number | null = null;

  constructor(deps: MonitorDeps) {
    this.config = { ...(deps.config ?? resolveMonitorConfig()) };
    this.nowMs = deps.nowMs ?? Date.now;
    this.log = deps.logger ?? createSubsystemLogger("monitor");
    this.presentation = deps.presentation;
    this.control = deps.control;
    this.sampler = new UsageSampler(deps.usageSource);
    this.baseline = new BaselineAnalyzer(this.sampler);
    this.classifier = new CategoryClassifier({ store: deps.categoryStore, catalog: deps.catalog });
    this.detector = new Detector(this.sampler, this.classifier, {
      deviceWindowMs: this.config.deviceWindowMs,
      deviceThresholdMs: this.config.deviceThresholdMs,
      dailyGoalMs: this.config.dailyGoalMs,
      endlessScrollMs: this.config.endlessScrollMs,
      watchedCategories: this.config.watchedCategories,
    });
    this.trigger = new InterventionTrigger({
      ledger: this.ledger,
      traceSink: deps.traceSink,
      settings: () => ({ cooldownMs: this.config.cooldownMs, actionOverrides: this.config.actionOverrides }),
    });
    this.engine = new NegotiationEngine({
      oracle: new RateLimitedOracle(deps.oracle, {
        minIntervalMs: this.config.oracleMinIntervalMs,
        maxCallsPerHour: this.config.oracleMaxCallsPerHour,
        nowMs: this.nowMs,
      }),
      contextFor: (session) => this.promptContext(session),
      maxRounds: this.config.maxNegotiationRounds,
      historyTurns: this.config.historyTurns,
      nowMs: this.nowMs,
      createId: deps.createId,
    });
    this.lifecycle = new AgreementLifecycle({ store: deps.agreementStore, nowMs: this.nowMs });
    this.enforcer = new AgreementEnforcer({
      lifecycle: this.lifecycle,
      sampler: this.sampler,
      control: this.control,
      presentation: this.presentation,
      timings: () => ({
        warningLeadMs: this.config.warningLeadMs,
        gracePeriodMs: this.config.gracePeriodMs,
        maxCloseAttempts: this.config.maxCloseAttempts,
      }),
      onViolation: (agreement, now) => this.ledger.rearm(channelFor(agreement.appIdentifier), now),
    });
  }

  get running(): boolean {
    return this.timers.length > 0;
  }

  get settings(): Readonly<MonitorConfig> {
    return this.config;
  }

  /**
   * One detection pass: sample, detect, gate by cooldown and act on what
   * fires. Below HIGH severity, a channel with an ACTIVE agreement is left to
   * the enforcer.
   */
  async onTick(now = this.nowMs()): Promise<DetectionTickReport> {
    if (this.snoozedUntil !== null && now < this.snoozedUntil) {
      return { status: "snoozed", events: [], decisions: [] };
    }
    this.snoozedUntil = null;
    if (isWithinQuietHours(this.config.quietHours, now)) {
      return { status: "quiet-hours", events: [], decisions: [] };
    }

    const tick = await this.detector.tick(now);
    if (tick.status === "inactive") {
      return { status: "inactive", events: [], decisions: [] };
    }
    const covered = new Set((await this.lifecycle.active()).map((agreement) => channelFor(agreement.appIdentifier)));
    const decisions: InterventionDecision[] = [];
    for (const event of tick.events) {
      const channel = channelFor(event.subjectAppIdentifier);
      if (event.severity !== "HIGH" && covered.has(channel)) {
        this.log.debug(`${event.kind} on ${channel} covered by an active agreement`);
        continue;
      }
      const decision = await this.trigger.evaluate(event, now);
      decisions.push(decision);
      if (decision.shouldIntervene) {
        await this.intervene(decision, event, tick.foreground);
      }
    }
    return { status: "active", events: tick.events, decisions };
  }

  /** Runs one enforcement pass, pruning old history at most once an hour. */
  async onEnforcementTick(now = this.nowMs()): Promise<EnforcementReport> {
    const report = await this.enforcer.tick(now);
    if (this.lastPrunedAt === null || now - this.lastPrunedAt >= PRUNE_INTERVAL_MS) {
      await this.prune(now);
    }
    return report;
  }

  /** Drops finished agreements and intervention records older than the retention window. */
  async prune(now = this.nowMs()): Promise<PruneReport> {
    this.lastPrunedAt = now;
    const cutoff = now - this.config.retentionMs;
    const interventions = this.ledger.prune(cutoff);
    const agreements = await this.lifecycle.prune(cutoff);
    if (interventions > 0) {
      this.log.info(`pruned ${interventions} intervention records`);
    }
    return { agreements, interventions };
  }

  /**
   * Feeds a user reply into an open negotiation. Reaching an agreement creates
   * it, or extends the agreement an extension session was opened for.
   */
  async submitUserReply(sessionId: string, text: string): Promise<Result<ReplyOutcome>> {
    const result = await this.engine.submitUserReply(sessionId, text);
    if (!result.ok) {
      return result;
    }
    const outcome = result.value;
    const { purpose } = outcome.session;

    if (outcome.state.kind === "rejected") {
      if (purpose.kind === "intervention" && purpose.interventionId) {
        this.ledger.settle(purpose.interventionId, "rejected");
      }
      return ok(outcome);
    }
    if (outcome.state.kind !== "agreement-reached") {
      return ok(outcome);
    }

    const durationMs = outcome.state.durationMs;
    if (purpose.kind === "extension") {
      const extended = await this.lifecycle.extend(purpose.agreementId, durationMs, sessionId);
      if (!extended.ok) {
        return fail(extended.error);
      }
      await this.notify("extended", extended.value, `Added ${formatDuration(durationMs)} on ${extended.value.appName}.`);
      return ok({ ...outcome, agreement: extended.value });
    }

    const { subject } = outcome.session;
    const agreement = await this.lifecycle.create({
      subject: { appIdentifier: subject.appIdentifier, appName: subject.appName, category: subject.category },
      durationMs,
      conversationId: sessionId,
    });
    if (purpose.interventionId) {
      this.ledger.settle(purpose.interventionId, "agreed");
    }
    await this.notify("created", agreement, `Deal: ${formatDuration(durationMs)} on ${agreement.appName}.`);
    return ok({ ...outcome, agreement });
  }

  /** Opens, or continues, an extension negotiation for an ACTIVE agreement. */
  async requestExtension(agreementId: string, text: string): Promise<Result<ReplyOutcome>> {
    const agreement = await this.lifecycle.get(agreementId);
    if (!agreement || agreement.status !== "ACTIVE") {
      return fail(new InvalidTransitionError(agreementId, agreement?.status ?? "MISSING", "EXTENDED"));
    }
    const channel = channelFor(agreement.appIdentifier);
    const existing = this.engine.findByChannel(channel);
    if (existing?.purpose.kind === "extension" && existing.purpose.agreementId === agreementId) {
      return this.submitUserReply(existing.id, text);
    }

    const started = this.engine.startSession({
      subject: {
        channel,
        appIdentifier: agreement.appIdentifier,
        appName: agreement.appName,
        category: agreement.appCategory,
      },
      purpose: { kind: "extension", reason: `Extension requested for ${agreement.appName}.`, agreementId },
    });
    if (!started.ok) {
      return started;
    }
    const reply = await this.submitUserReply(started.value.id, text);
    if (!reply.ok) {
      this.engine.cancelSession(started.value.id);
    }
    return reply;
  }

  /** Opens an intervention negotiation outside the detection loop. */
  async startNegotiation(params: {
    appIdentifier: string | null;
    appName?: string;
    reason: string;
  }): Promise<Result<NegotiationSession>> {
    const category = params.appIdentifier ? await this.classifier.categorize(params.appIdentifier) : "UNKNOWN";
    return this.engine.startSession({
      subject: {
        channel: channelFor(params.appIdentifier),
        appIdentifier: params.appIdentifier,
        appName: params.appName ?? params.appIdentifier ?? "device",
        category,
      },
      purpose: { kind: "intervention", reason: params.reason },
    });
  }

  getSession(sessionId: string): NegotiationSession | undefined {
    return this.engine.getSession(sessionId);
  }

  async getActiveAgreements(now = this.nowMs()): Promise<ActiveAgreementView[]> {
    return (await this.lifecycle.active()).map((agreement) => ({ agreement, timer: timerState(agreement, now) }));
  }

  getInterventionHistory(): InterventionRecord[] {
    return this.ledger.history();
  }

  async status(now = this.nowMs()): Promise<MonitorStatus> {
    const permission = await this.sampler.hasPermission();
    const snoozed = this.snoozedUntil !== null && now < this.snoozedUntil;
    return {
      monitoring: !permission ? "inactive" : this.running ? "active" : "stopped",
      permission,
      foreground: permission ? await this.sampler.currentForegroundApp() : null,
      snoozedUntil: snoozed ? this.snoozedUntil : null,
      quietHours: isWithinQuietHours(this.config.quietHours, now),
      dailyGoalMs: this.detector.dailyGoalMs,
      activeAgreements: (await this.lifecycle.active()).length,
      openSessions: this.engine.activeSessions().length,
    };
  }

  /** Pauses detection; enforcement of existing agreements keeps running. */
  snooze(durationMs = this.config.snoozeMs, now = this.nowMs()): number {
    this.snoozedUntil = now + Math.max(0, durationMs);
    this.log.info(`detection snoozed for ${formatDuration(durationMs)}`);
    return this.snoozedUntil;
  }

  /** Sets the daily goal from recent history. Returns the goal now in effect. */
  async calibrateDailyGoal(now = this.nowMs()): Promise<number> {
    const suggested = clampDailyGoal(await this.baseline.suggestedDailyLimit(BASELINE_DAYS, now));
    this.config.dailyGoalMs = suggested;
    this.detector.setDailyGoal(suggested);
    this.log.info(`daily goal calibrated to ${formatDuration(suggested)}`);
    return suggested;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.timers = [
      this.schedule("detection", this.config.detectionIntervalMs, () => this.onTick()),
      this.schedule("enforcement", this.config.enforcementIntervalMs, () => this.onEnforcementTick()),
    ];
    this.log.info(
      `monitoring started (detection every ${this.config.detectionIntervalMs}ms, enforcement every ${this.config.enforcementIntervalMs}ms)`,
    );
  }

  /**
   * Cancels both loops. Agreements stay as they are; one that expires while
   * stopped gets its grace period from the first enforcement tick after restart.
   */
  stop(): void {
    if (!this.running) {
      return;
    }
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
    this.detector.reset();
    this.enforcer.reset();
    this.log.info("monitoring stopped");
  }

  private schedule(label: string, intervalMs: number, tick: () => Promise<unknown>): NodeJS.Timeout {
    let inFlight = false;
    const timer = setInterval(() => {
      if (inFlight) {
        this.log.debug(`${label} tick skipped: previous tick still running`);
        return;
      }
      inFlight = true;
      tick()
        .catch((error: unknown) => {
          this.log.error(`${label} tick failed`, error);
        })
        .finally(() => {
          inFlight = false;
        });
    }, intervalMs);
    timer.unref?.();
    return timer;
  }

  private async intervene(
    decision: InterventionDecision,
    event: DetectionEvent,
    foreground: AppUsageInfo | null,
  ): Promise<void> {
    switch (decision.action) {
      case "BLOCK": {
        await this.present({ action: "BLOCK", message: event.message, event });
        const identifier = event.subjectAppIdentifier ?? foreground?.appIdentifier;
        if (identifier) {
          await this.closeSubject(identifier);
        }
        return;
      }
      case "NEGOTIATE": {
        const started = this.engine.startSession({
          subject: {
            channel: channelFor(event.subjectAppIdentifier),
            appIdentifier: event.subjectAppIdentifier,
            appName: event.subjectName,
            category: event.category,
          },
          purpose: { kind: "intervention", reason: event.message, interventionId: decision.record?.id },
        });
        if (!started.ok) {
          if (decision.record) {
            this.ledger.settle(decision.record.id, "superseded");
          }
          this.log.info(`negotiation not opened: ${started.error.message}`);
          return;
        }
        const opening = started.value.history[0]?.text ?? event.message;
        await this.present({ action: "NEGOTIATE", message: opening, event, sessionId: started.value.id });
        return;
      }
      case "ALERT":
        await this.present({ action: "ALERT", message: event.message, event });
        return;
      default:
        return;
    }
  }

  private async closeSubject(identifier: string): Promise<void> {
    try {
      const outcome = await this.control.closeSubject(identifier);
      if (!outcome.ok) {
        this.log.warn(new EnforcementActionFailedError(identifier, outcome.detail ?? "close refused").message);
      }
    } catch (error) {
      this.log.warn(new EnforcementActionFailedError(identifier, describeError(error), error).message);
    }
  }

  private async present(presentation: Parameters<PresentationSink["presentIntervention"]>[0]): Promise<void> {
    try {
      await this.presentation.presentIntervention(presentation);
    } catch (error) {
      this.log.warn(`${presentation.action} not presented: ${describeError(error)}`);
    }
  }

  private async notify(kind: AgreementNoticeKind, agreement: Agreement, message: string): Promise<void> {
    try {
      await this.presentation.notify({ kind, agreement, message });
    } catch (error) {
      this.log.warn(`${kind} notice for ${agreement.id} not delivered: ${describeError(error)}`);
    }
  }

  private async promptContext(session: NegotiationSession): Promise<PromptContext> {
    const now = this.nowMs();
    const dayStart = startOfLocalDay(now);
    this.log.debug(`building prompt context for ${session.subject.channel}`);
    return {
      todayScreenTimeMs: await this.sampler.sampleWindow(dayStart, now),
      dailyGoalMs: this.detector.dailyGoalMs,
      topApps: await this.sampler.topApps(dayStart, now, PROMPT_TOP_APPS),
      recentAgreements: await this.lifecycle.recent(RECENT_AGREEMENTS),
    };
  }
}

export type StateDirMonitorOptions = Omit<MonitorDeps, "categoryStore" | "agreementStore" | "traceSink" | "config"> & {
  stateDir?: string;
  overrides?: MonitorConfigOverrides;
};

/**
 * Builds a monitor persisting to the state directory: `config.json`,
 * `categories.json`, `agreements.json` and `interventions.jsonl`. Seeds the
 * bundled category catalog.
 */
export async function openMonitor(options: StateDirMonitorOptions): Promise<{ monitor: Monitor; stateDir: string }> {
  const { stateDir: override, overrides, ...deps } = options;
  const stateDir = resolveStateDir(override);
  const config = await loadMonitorConfig(stateDir, overrides);
  const monitor = new Monitor({
    ...deps,
    config,
    categoryStore: JsonFileCategoryStore.inStateDir(stateDir),
    agreementStore: JsonFileAgreementStore.inStateDir(stateDir),
    traceSink: createJsonlTraceSink(path.join(stateDir, "interventions.jsonl")),
  });
  await monitor.classifier.seed();
  return { monitor, stateDir };
}
