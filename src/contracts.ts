export type UsageSample = Readonly<{
  appIdentifier: string;
  windowStart: number;
  windowEnd: number;
  foregroundDurationMs: number;
}>;

export type AppUsageInfo = {
  appIdentifier: string;
  appName: string;
  lastTimeUsed: number;
  totalTimeInForegroundMs: number;
};

export const APP_CATEGORIES = [
  "SOCIAL_MEDIA",
  "GAMES",
  "ADULT_CONTENT",
  "ENTERTAINMENT",
  "PRODUCTIVITY",
  "COMMUNICATION",
  "SHOPPING",
  "NEWS",
  "BROWSER",
  "OTHER",
  "UNKNOWN",
] as const;

export type AppCategory = (typeof APP_CATEGORIES)[number];

export type MappingAuthority = "SYSTEM" | "USER";

export type CategoryMapping = {
  appIdentifier: string;
  category: AppCategory;
  isBlocked: boolean;
  customThresholdMs?: number;
  addedBy: MappingAuthority;
};

export type AppUsageTotal = {
  appIdentifier: string;
  totalMs: number;
};

export type UsageBaseline = {
  averageDailyUsageMs: number;
  peakDailyUsageMs: number;
  daysAnalyzed: number;
  topApps: AppUsageTotal[];
};

export type Severity = "LOW" | "MEDIUM" | "HIGH";

export type DetectionKind = "blocked-app" | "adult-content" | "app-threshold" | "continuous-use" | "daily-goal";

export type DetectionEvent = {
  kind: DetectionKind;
  subjectAppIdentifier: string | null;
  subjectName: string;
  category: AppCategory;
  observedDurationMs: number;
  severity: Severity;
  message: string;
  detectedAt: number;
};

export type InterventionAction = "BLOCK" | "NEGOTIATE" | "ALERT";

export type InterventionOutcome = "blocked" | "alerted" | "negotiating" | "agreed" | "rejected" | "superseded";

export type InterventionRecord = {
  id: string;
  timestamp: number;
  channel: string;
  subject: string | null;
  severity: Severity;
  action: InterventionAction;
  outcome: InterventionOutcome;
  traceId: string;
};

export type InterventionDecision = {
  shouldIntervene: boolean;
  reason: string;
  action?: InterventionAction;
  record?: InterventionRecord;
  traceId: string;
};

export type AgreementStatus = "ACTIVE" | "COMPLETED" | "VIOLATED";

export type AgreementExtension = {
  at: number;
  previousExpiresAt: number;
  newExpiresAt: number;
  addedMs: number;
  conversationId: string;
};

export type Agreement = {
  id: string;
  appIdentifier: string | null;
  appName: string;
  appCategory: AppCategory;
  agreedDurationMs: number;
  createdAt: number;
  expiresAt: number;
  status: AgreementStatus;
  violatedAt: number | null;
  completedAt: number | null;
  originatingConversationId: string;
  extensions: AgreementExtension[];
};

export type TimerColor = "GREEN" | "YELLOW" | "RED";

export type TranscriptMessage = {
  role: "user" | "assistant";
  text: string;
  timestamp?: number;
};
