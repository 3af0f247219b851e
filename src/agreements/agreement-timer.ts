import type { Agreement, TimerColor } from "../contracts.js";

export type TimerState = {
  remainingMs: number;
  color: TimerColor;
  progressPercent: number;
  /** "Xm Ys", rounded up to the next whole second. */
  formatted: string;
  expired: boolean;
};

export const GREEN_THRESHOLD_MS = 5 * 60_000;
export const YELLOW_THRESHOLD_MS = 2 * 60_000;

export function timerColor(remainingMs: number): TimerColor {
  if (remainingMs >= GREEN_THRESHOLD_MS) {
    return "GREEN";
  }
  return remainingMs >= YELLOW_THRESHOLD_MS ? "YELLOW" : "RED";
}

export function formatCountdown(remainingMs: number): string {
  const totalSeconds = Math.max(0, Math.ceil(remainingMs / 1000));
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

export function timerState(agreement: Agreement, now: number): TimerState {
  const remainingMs = Math.max(0, agreement.expiresAt - now);
  const spanMs = agreement.expiresAt - agreement.createdAt;
  const progress = spanMs > 0 ? ((now - agreement.createdAt) / spanMs) * 100 : 100;
  return {
    remainingMs,
    color: timerColor(remainingMs),
    progressPercent: Math.max(0, Math.min(100, progress)),
    formatted: formatCountdown(remainingMs),
    expired: remainingMs === 0,
  };
}
