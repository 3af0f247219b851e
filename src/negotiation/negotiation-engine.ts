import crypto from "node:crypto";
import type { TranscriptMessage } from "../contracts.js";
import {
  OracleUnavailableError,
  ScreenpactError,
  SessionConflictError,
  SessionNotFoundError,
  describeError,
  fail,
  ok,
  type Result,
} from "../errors.js";
import { KeyedLock } from "../infra/keyed-lock.js";
import { createSubsystemLogger, type SubsystemLogger } from "../infra/logger.js";
import type { DialogueOracle, OracleTurn } from "../orchestrator/ports.js";
import {
  DEFAULT_MAX_ROUNDS,
  describeState,
  interpretReply,
  isTerminal,
  transition,
  type NegotiationEffect,
  type NegotiationState,
} from "./negotiation-state.js";
import {
  EMPTY_PROMPT_CONTEXT,
  buildSystemPrompt,
  openingLine,
  type NegotiationPurpose,
  type NegotiationSubject,
  type PromptContext,
} from "./prompt-builder.js";

export type NegotiationSession = {
  id: string;
  subject: NegotiationSubject;
  purpose: NegotiationPurpose;
  state: NegotiationState;
  history: TranscriptMessage[];
  startedAt: number;
  updatedAt: number;
};

export type TurnOutcome = {
  sessionId: string;
  reply: string;
  effect: NegotiationEffect;
  state: NegotiationState;
  terminal: boolean;
  session: NegotiationSession;
};

export type NegotiationEngineOptions = {
  oracle: DialogueOracle;
  contextFor?: (session: NegotiationSession) => Promise<PromptContext>;
  maxRounds?: number;
  historyTurns?: number;
  nowMs?: () => number;
  createId?: () => string;
  logger?: SubsystemLogger;
};

const DEFAULT_HISTORY_TURNS = 10;

function cloneSession(session: NegotiationSession): NegotiationSession {
  return { ...session, history: session.history.map((entry) => ({ ...entry })) };
}

/**
 * Runs one negotiation per subject channel. Each user reply is interpreted,
 * pushed through the pure state machine and voiced by the dialogue oracle;
 * nothing is committed unless the oracle answers.
 */
export class NegotiationEngine {
  private readonly sessions = new Map<string, NegotiationSession>();
  private readonly lock = new KeyedLock();
  private readonly oracle: DialogueOracle;
  private readonly contextFor: (session: NegotiationSession) => Promise<PromptContext>;
  private readonly maxRounds: number;
  private readonly historyTurns: number;
  private readonly nowMs: () => number;
  private readonly createId: () => string;
  private readonly log: SubsystemLogger;

  constructor(options: NegotiationEngineOptions) {
    this.oracle = options.oracle;
    this.contextFor = options.contextFor ?? (async () => EMPTY_PROMPT_CONTEXT);
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.historyTurns = Math.max(2, options.historyTurns ?? DEFAULT_HISTORY_TURNS);
    this.nowMs = options.nowMs ?? Date.now;
    this.createId = options.createId ?? (() => `neg-${crypto.randomUUID()}`);
    this.log = options.logger ?? createSubsystemLogger("negotiation");
  }

  startSession(params: { subject: NegotiationSubject; purpose: NegotiationPurpose }): Result<NegotiationSession> {
    const existing = this.findByChannel(params.subject.channel);
    if (existing) {
      return fail(new SessionConflictError(params.subject.channel, existing.id));
    }
    const now = this.nowMs();
    const session: NegotiationSession = {
      id: this.createId(),
      subject: { ...params.subject },
      purpose: params.purpose,
      state: { kind: "initial" },
      history: [{ role: "assistant", text: openingLine(params.subject, params.purpose), timestamp: now }],
      startedAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.id, session);
    this.log.info(`session ${session.id} started for ${session.subject.channel} (${params.purpose.kind})`);
    return ok(cloneSession(session));
  }

  async submitUserReply(sessionId: string, text: string): Promise<Result<TurnOutcome>> {
    return this.lock.run(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session) {
        return fail<TurnOutcome>(new SessionNotFoundError(sessionId));
      }

      const next = transition(session.state, interpretReply(text), { maxRounds: this.maxRounds });
      const turn: OracleTurn = {
        effect: next.effect,
        durationMs: "durationMs" in next.state ? next.state.durationMs : null,
        roundCount: next.state.kind === "negotiating" ? next.state.roundCount : 0,
        maxRounds: this.maxRounds,
        subjectName: session.subject.appName,
      };

      let reply: string;
      try {
        const context = await this.contextFor(cloneSession(session));
        reply = await this.oracle.send({
          systemPrompt: buildSystemPrompt({ subject: session.subject, purpose: session.purpose, context, turn }),
          history: session.history.slice(-this.historyTurns).map((entry) => ({ ...entry })),
          message: text,
          turn,
        });
      } catch (error) {
        const failure =
          error instanceof ScreenpactError
            ? error
            : new OracleUnavailableError(`Dialogue oracle failed: ${describeError(error)}`, error);
        this.log.warn(`session ${sessionId} turn not committed: ${failure.message}`);
        return fail<TurnOutcome>(failure);
      }

      const now = this.nowMs();
      session.history.push({ role: "user", text, timestamp: now }, { role: "assistant", text: reply, timestamp: now });
      if (session.history.length > this.historyTurns) {
        session.history.splice(0, session.history.length - this.historyTurns);
      }
      const previous = describeState(session.state);
      session.state = next.state;
      session.updatedAt = now;
      const terminal = isTerminal(next.state);
      if (terminal) {
        this.sessions.delete(sessionId);
      }
      this.log.debug(`session ${sessionId}: ${previous} -> ${describeState(next.state)} (${next.effect})`);

      return ok({
        sessionId,
        reply,
        effect: next.effect,
        state: next.state,
        terminal,
        session: cloneSession(session),
      });
    });
  }

  getSession(sessionId: string): NegotiationSession | undefined {
    const session = this.sessions.get(sessionId);
    return session ? cloneSession(session) : undefined;
  }

  findByChannel(channel: string): NegotiationSession | undefined {
    for (const session of this.sessions.values()) {
      if (session.subject.channel === channel) {
        return cloneSession(session);
      }
    }
    return undefined;
  }

  cancelSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.log.info(`session ${sessionId} cancelled`);
    }
    return removed;
  }

  activeSessions(): NegotiationSession[] {
    return [...this.sessions.values()].map(cloneSession);
  }
}
