export * from "./orchestrator/index.js";
export * from "./contracts.js";
export * from "./errors.js";
export {
  DEFAULT_MONITOR_CONFIG,
  isWithinQuietHours,
  loadMonitorConfig,
  resolveMonitorConfig,
  resolveStateDir,
  type ActionOverrides,
  type MonitorConfig,
  type MonitorConfigOverrides,
  type QuietHoursConfig,
} from "./config/config.js";
export { AgreementEnforcer, type EnforcementReport, type EnforcementTimings } from "./agreements/agreement-enforcer.js";
export { AgreementLifecycle, type AgreementSubject } from "./agreements/agreement-lifecycle.js";
export { formatCountdown, timerColor, timerState, type TimerState } from "./agreements/agreement-timer.js";
export { CategoryClassifier, CATEGORY_THRESHOLDS_MS, type CatalogEntry, type SeedResult } from "./categories/category-classifier.js";
export { Detector, type DetectorLimits, type DetectorTick } from "./detection/detector.js";
export { InterventionLedger } from "./detection/intervention-ledger.js";
export { InterventionTrigger, channelFor, selectAction } from "./detection/intervention-trigger.js";
export { createGeminiOracle, DEFAULT_GEMINI_MODEL, type GeminiOracleOptions } from "./infra/gemini-oracle.js";
export { JsonFileAgreementStore, JsonFileCategoryStore } from "./infra/json-stores.js";
export { createSubsystemLogger, setLogSink, type LogLevel, type SubsystemLogger } from "./infra/logger.js";
export { InMemoryAgreementStore, InMemoryCategoryStore } from "./infra/memory-stores.js";
export { ScriptedUsageSource } from "./infra/scripted-usage-source.js";
export { createJsonlTraceSink, createMemoryTraceSink, readTraceEntries } from "./infra/trace.js";
export { formatDuration, parseDuration, requireDuration } from "./negotiation/duration-parser.js";
export { NegotiationEngine, type NegotiationSession, type TurnOutcome } from "./negotiation/negotiation-engine.js";
export { interpretReply, transition, type NegotiationEffect, type NegotiationState } from "./negotiation/negotiation-state.js";
export { RateLimitedOracle } from "./negotiation/oracle-rate-limit.js";
export { buildSystemPrompt, openingLine, type NegotiationPurpose, type NegotiationSubject } from "./negotiation/prompt-builder.js";
export { createTemplateOracle } from "./negotiation/template-oracle.js";
export { BaselineAnalyzer } from "./usage/baseline-analyzer.js";
export { UsageSampler } from "./usage/usage-sampler.js";
