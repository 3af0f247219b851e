import { NoMatchError } from "../errors.js";

const SECOND_MS = 1_000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;

type NumericRule = { pattern: RegExp; unitMs: number };
type PhraseRule = { pattern: RegExp; durationMs: number };

const NUMERIC_RULES: NumericRule[] = [
  { pattern: /(\d+(?:\.\d+)?)\s*(?:more\s+)?(?:hours?|hrs?)\b/i, unitMs: HOUR_MS },
  { pattern: /(\d+(?:\.\d+)?)\s*(?:more\s+)?(?:minutes?|mins?)\b/i, unitMs: MINUTE_MS },
  { pattern: /(\d+(?:\.\d+)?)\s*(?:more\s+)?(?:seconds?|secs?)\b/i, unitMs: SECOND_MS },
];

const PHRASE_RULES: PhraseRule[] = [
  { pattern: /\bhalf\s+(?:an?\s+)?hour\b/i, durationMs: 30 * MINUTE_MS },
  { pattern: /\b(?:a\s+)?couple(?:\s+of)?\s+(?:minutes?|mins?)\b/i, durationMs: 2 * MINUTE_MS },
  { pattern: /\b(?:a\s+)?few\s+(?:minutes?|mins?)\b/i, durationMs: 3 * MINUTE_MS },
  { pattern: /\b(?:a\s+)?bit(?:\s+longer)?\b/i, durationMs: 2 * MINUTE_MS },
  { pattern: /\b(?:a\s+)?little(?:\s+more)?(?:\s+time)?\b/i, durationMs: 2 * MINUTE_MS },
  { pattern: /\bquick(?:ly)?\b/i, durationMs: MINUTE_MS },
];

/**
 * Extracts a duration from free text. Explicit hours, minutes and seconds are
 * tried first, then colloquial phrases. Returns `null` when nothing matches;
 * a zero duration is never produced.
 */
export function parseDuration(text: string): number | null {
  const input = text.trim();
  if (!input) {
    return null;
  }
  for (const rule of NUMERIC_RULES) {
    const match = rule.pattern.exec(input);
    const value = match?.[1] ? Number.parseFloat(match[1]) : Number.NaN;
    if (Number.isFinite(value) && value > 0) {
      return Math.round(value * rule.unitMs);
    }
  }
  for (const rule of PHRASE_RULES) {
    if (rule.pattern.test(input)) {
      return rule.durationMs;
    }
  }
  return null;
}

export function requireDuration(text: string): number {
  const durationMs = parseDuration(text);
  if (durationMs === null) {
    throw new NoMatchError(text);
  }
  return durationMs;
}

/** "1h 5m", "12m 30s", "45s". */
export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.max(0, Math.round(durationMs / SECOND_MS));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }
  if (minutes > 0) {
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }
  return `${seconds}s`;
}
