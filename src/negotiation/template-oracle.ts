import type { DialogueOracle, OracleRequest } from "../orchestrator/ports.js";
import { formatDuration } from "./duration-parser.js";

/** Offline oracle that answers from fixed phrasing keyed on the turn summary. */
export function createTemplateOracle(): DialogueOracle {
  return {
    async send(request: OracleRequest): Promise<string> {
      const turn = request.turn;
      if (!turn) {
        return "How much more time do you need?";
      }
      const duration = turn.durationMs === null ? "" : formatDuration(turn.durationMs);
      switch (turn.effect) {
        case "ask-duration":
          return `How much more time do you need on ${turn.subjectName}? Something like 10 minutes?`;
        case "confirm":
          return `${duration} more on ${turn.subjectName}. Deal?`;
        case "counter":
          return turn.roundCount + 1 >= turn.maxRounds
            ? `${duration} then. Your next answer settles it.`
            : `${duration} is more than I hoped. Can you make it shorter?`;
        case "finalize":
          return `Deal: ${duration} on ${turn.subjectName}. The timer starts now.`;
        case "close":
          return `Good call. Enjoy the break from ${turn.subjectName}.`;
      }
    },
  };
}
