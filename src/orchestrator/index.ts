export {
  Monitor,
  openMonitor,
  type ActiveAgreementView,
  type DetectionTickReport,
  type DetectionTickStatus,
  type MonitorDeps,
  type MonitorStatus,
  type PruneReport,
  type ReplyOutcome,
  type StateDirMonitorOptions,
} from "./monitor.js";
export type {
  AgreementNotice,
  AgreementNoticeKind,
  AgreementStore,
  CategoryStore,
  DialogueOracle,
  InterventionPresentation,
  OracleRequest,
  OracleTurn,
  PresentationSink,
  SubjectControl,
  TraceEntry,
  TraceSink,
  UsageSource,
} from "./ports.js";
