import { parseDuration } from "./duration-parser.js";

export type NegotiationState =
  | { kind: "initial" }
  | { kind: "proposed-time"; durationMs: number }
  | { kind: "negotiating"; durationMs: number; roundCount: number }
  | { kind: "agreement-reached"; durationMs: number }
  | { kind: "rejected" };

export type NegotiationInput = {
  durationMs: number | null;
  affirmative: boolean;
  decline: boolean;
};

/** What the engine should say next. */
export type NegotiationEffect = "ask-duration" | "confirm" | "counter" | "finalize" | "close";

export type TransitionResult = {
  state: NegotiationState;
  effect: NegotiationEffect;
};

export const DEFAULT_MAX_ROUNDS = 3;

const QUIT_PATTERN = /\b(?:no|fine|okay|ok|alright)\b.*\b(?:stop|quit|done|close)\b/i;
const WILL_QUIT_PATTERN = /\b(?:i'?ll|i will|let me|i'?m going to|gonna)\s+(?:stop|quit|close|put it down)\b/i;
const BARE_NO_PATTERN = /^\s*(?:no|nope|nah|never mind|i'?m done)\s*[.!]*\s*$/i;
const AFFIRMATIVE_PATTERN = /\b(?:okay|ok|yes|yep|yeah|sure|fine|deal|alright|agreed?|accept)\b/i;
const NEGATED_PATTERN = /\b(?:not|don'?t|no)\s+(?:okay|ok|sure|fine|a deal|agreed?|accept)\b/i;

export function interpretReply(text: string): NegotiationInput {
  if (QUIT_PATTERN.test(text) || WILL_QUIT_PATTERN.test(text) || BARE_NO_PATTERN.test(text)) {
    return { durationMs: null, affirmative: false, decline: true };
  }
  return {
    durationMs: parseDuration(text),
    affirmative: AFFIRMATIVE_PATTERN.test(text) && !NEGATED_PATTERN.test(text),
    decline: false,
  };
}

export function isTerminal(state: NegotiationState): boolean {
  return state.kind === "agreement-reached" || state.kind === "rejected";
}

const REJECTED: TransitionResult = { state: { kind: "rejected" }, effect: "close" };

function reached(durationMs: number): TransitionResult {
  return { state: { kind: "agreement-reached", durationMs }, effect: "finalize" };
}

/** Pure transition; the caller performs any I/O the returned effect implies. */
export function transition(
  state: NegotiationState,
  input: NegotiationInput,
  options: { maxRounds?: number } = {},
): TransitionResult {
  const maxRounds = Math.max(1, options.maxRounds ?? DEFAULT_MAX_ROUNDS);

  switch (state.kind) {
    case "agreement-reached":
      return { state, effect: "finalize" };
    case "rejected":
      return { state, effect: "close" };
    case "initial":
      if (input.decline) {
        return REJECTED;
      }
      if (input.durationMs !== null) {
        return { state: { kind: "proposed-time", durationMs: input.durationMs }, effect: "confirm" };
      }
      return { state, effect: "ask-duration" };
    case "proposed-time":
      if (input.decline) {
        return REJECTED;
      }
      if (input.durationMs !== null && input.durationMs !== state.durationMs) {
        return {
          state: { kind: "negotiating", durationMs: input.durationMs, roundCount: 1 },
          effect: "counter",
        };
      }
      if (input.affirmative || input.durationMs === state.durationMs) {
        return reached(state.durationMs);
      }
      return { state, effect: "confirm" };
    case "negotiating": {
      if (input.decline) {
        return REJECTED;
      }
      const nextRound = state.roundCount + 1;
      if (input.durationMs !== null && input.durationMs !== state.durationMs) {
        return nextRound >= maxRounds
          ? reached(input.durationMs)
          : {
              state: { kind: "negotiating", durationMs: input.durationMs, roundCount: nextRound },
              effect: "counter",
            };
      }
      if (input.affirmative || input.durationMs === state.durationMs) {
        return reached(state.durationMs);
      }
      return nextRound >= maxRounds
        ? reached(state.durationMs)
        : {
            state: { kind: "negotiating", durationMs: state.durationMs, roundCount: nextRound },
            effect: "counter",
          };
    }
  }
}

export function describeState(state: NegotiationState): string {
  switch (state.kind) {
    case "initial":
      return "initial";
    case "proposed-time":
      return `proposed-time(${state.durationMs})`;
    case "negotiating":
      return `negotiating(${state.durationMs}, round ${state.roundCount})`;
    case "agreement-reached":
      return `agreement-reached(${state.durationMs})`;
    case "rejected":
      return "rejected";
  }
}
