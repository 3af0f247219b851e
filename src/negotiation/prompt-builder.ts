import type { Agreement, AppCategory, AppUsageTotal } from "../contracts.js";
import type { OracleTurn } from "../orchestrator/ports.js";
import { formatDuration } from "./duration-parser.js";

export type NegotiationSubject = {
  /** Cooldown channel: `app:<id>` or `device`. */
  channel: string;
  appIdentifier: string | null;
  appName: string;
  category: AppCategory;
};

export type NegotiationPurpose =
  | { kind: "intervention"; reason: string; interventionId?: string }
  | { kind: "extension"; reason: string; agreementId: string };

export type PromptContext = {
  todayScreenTimeMs: number;
  dailyGoalMs: number;
  topApps: AppUsageTotal[];
  recentAgreements: Agreement[];
};

export const EMPTY_PROMPT_CONTEXT: PromptContext = {
  todayScreenTimeMs: 0,
  dailyGoalMs: 0,
  topApps: [],
  recentAgreements: [],
};

const RECENT_AGREEMENT_LIMIT = 3;

function formatCategory(category: AppCategory): string {
  return category.toLowerCase().replace(/_/g, " ");
}

function describeAgreement(agreement: Agreement): string {
  const outcome = agreement.status.toLowerCase();
  return `${agreement.appName}: ${formatDuration(agreement.agreedDurationMs)} (${outcome})`;
}

function describeTurn(turn: OracleTurn): string {
  const duration = turn.durationMs === null ? "" : formatDuration(turn.durationMs);
  switch (turn.effect) {
    case "ask-duration":
      return "Ask how much more time they want. Suggest something between 5 and 30 minutes.";
    case "confirm":
      return `They asked for ${duration}. Ask them to confirm it, or offer a little less if that seems long.`;
    case "counter":
      return `They now want ${duration} (round ${turn.roundCount} of ${turn.maxRounds}). Push back gently or accept; the last offer becomes binding after round ${turn.maxRounds}.`;
    case "finalize":
      return `Agreement reached: ${duration}. Confirm it in one sentence and say the timer has started.`;
    case "close":
      return "They chose to stop now. Acknowledge it warmly in one sentence.";
  }
}

export function buildSystemPrompt(params: {
  subject: NegotiationSubject;
  purpose: NegotiationPurpose;
  context: PromptContext;
  turn: OracleTurn;
}): string {
  const { subject, purpose, context, turn } = params;
  const lines = [
    "You are a firm but friendly screen-time coach negotiating a short, bounded extension of use.",
    "Keep every reply under 100 words. Never lecture. Never agree to more than 30 minutes on your own initiative.",
    "",
    "Context:",
    `- Current app: ${subject.appName} (${formatCategory(subject.category)})`,
    `- Why we are talking: ${purpose.reason}`,
    `- Screen time today: ${formatDuration(context.todayScreenTimeMs)}${
      context.dailyGoalMs > 0 ? ` of a ${formatDuration(context.dailyGoalMs)} goal` : ""
    }`,
  ];
  if (purpose.kind === "extension") {
    lines.push("- They are asking to extend an agreement that is about to run out.");
  }
  if (context.topApps.length > 0) {
    lines.push(
      `- Top apps today: ${context.topApps
        .map((entry) => `${entry.appIdentifier} ${formatDuration(entry.totalMs)}`)
        .join(", ")}`,
    );
  }
  const recent = context.recentAgreements.slice(-RECENT_AGREEMENT_LIMIT);
  if (recent.length > 0) {
    lines.push(`- Recent agreements: ${recent.map(describeAgreement).join("; ")}`);
  }
  lines.push("", `Next step: ${describeTurn(turn)}`);
  return lines.join("\n");
}

export function openingLine(subject: NegotiationSubject, purpose: NegotiationPurpose): string {
  if (purpose.kind === "extension") {
    return `Your time on ${subject.appName} is almost up. How much longer do you need?`;
  }
  return `${purpose.reason} How much more time do you need on ${subject.appName}?`;
}
