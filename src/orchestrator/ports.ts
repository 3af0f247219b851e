import type {
  Agreement,
  AgreementStatus,
  AppCategory,
  AppUsageInfo,
  CategoryMapping,
  DetectionEvent,
  InterventionAction,
  TranscriptMessage,
  UsageSample,
} from "../contracts.js";

export type { TraceEntry, TraceSink } from "../infra/trace.js";

/** Host usage-accounting facility. May throw `PermissionDeniedError`. */
export type UsageSource = {
  queryUsage(start: number, end: number): Promise<UsageSample[]>;
  currentForegroundApp(): Promise<AppUsageInfo | null>;
  hasPermission(): Promise<boolean>;
};

/** Structured summary of the turn the prompt describes, for oracles that do not read prose. */
export type OracleTurn = {
  effect: "ask-duration" | "confirm" | "counter" | "finalize" | "close";
  durationMs: number | null;
  roundCount: number;
  maxRounds: number;
  subjectName: string;
};

export type OracleRequest = {
  systemPrompt: string;
  history: TranscriptMessage[];
  message: string;
  turn?: OracleTurn;
};

export type DialogueOracle = {
  send(request: OracleRequest): Promise<string>;
};

export type InterventionPresentation = {
  action: InterventionAction;
  message: string;
  event: DetectionEvent;
  sessionId?: string;
};

export type AgreementNoticeKind = "created" | "extended" | "warning" | "times-up" | "completed" | "violated";

export type AgreementNotice = {
  kind: AgreementNoticeKind;
  agreement: Agreement;
  message: string;
};

export type PresentationSink = {
  presentIntervention(presentation: InterventionPresentation): Promise<void>;
  notify(notice: AgreementNotice): Promise<void>;
};

export type SubjectControl = {
  closeSubject(identifier: string): Promise<{ ok: boolean; detail?: string }>;
};

export type CategoryStore = {
  get(appIdentifier: string): Promise<CategoryMapping | undefined>;
  listByCategory(category: AppCategory): Promise<CategoryMapping[]>;
  list(): Promise<CategoryMapping[]>;
  upsert(mapping: CategoryMapping): Promise<void>;
  upsertMany(mappings: CategoryMapping[]): Promise<void>;
};

export type AgreementStore = {
  get(id: string): Promise<Agreement | undefined>;
  listByStatus(status: AgreementStatus): Promise<Agreement[]>;
  list(): Promise<Agreement[]>;
  upsert(agreement: Agreement): Promise<void>;
  /** Removes terminal agreements whose terminal timestamp is before `cutoff`. Returns the number removed. */
  deleteOlderThan(cutoff: number): Promise<number>;
};
