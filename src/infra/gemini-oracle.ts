import { GoogleGenAI } from "@google/genai";
import { OracleUnavailableError, RateLimitedError, describeError } from "../errors.js";
import type { DialogueOracle, OracleRequest } from "../orchestrator/ports.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

const DEFAULT_RETRY_AFTER_MS = 60_000;

type GeminiContent = { role: "user" | "model"; parts: Array<{ text: string }> };

/** The slice of the GenAI client the oracle uses; tests pass a fake. */
export type GeminiChatClient = {
  chats: {
    create(params: {
      model: string;
      history?: GeminiContent[];
      config?: { systemInstruction?: string; temperature?: number; maxOutputTokens?: number };
    }): {
      sendMessage(params: { message: string }): Promise<{ text?: string }>;
    };
  };
};

export type GeminiOracleOptions = {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  client?: GeminiChatClient;
};

function errorStatus(error: unknown): number | undefined {
  if (error && typeof error === "object" && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function createGeminiOracle(options: GeminiOracleOptions = {}): DialogueOracle {
  const apiKey = options.apiKey ?? process.env.GEMINI_API_KEY ?? "";
  if (!options.client && !apiKey.trim()) {
    throw new Error("GEMINI_API_KEY is required for the Gemini dialogue oracle");
  }
  const client: GeminiChatClient = options.client ?? new GoogleGenAI({ apiKey });
  const model = options.model ?? DEFAULT_GEMINI_MODEL;

  return {
    async send(request: OracleRequest): Promise<string> {
      const history: GeminiContent[] = request.history.map((entry) => ({
        role: entry.role === "assistant" ? "model" : "user",
        parts: [{ text: entry.text }],
      }));
      let text: string | undefined;
      try {
        const chat = client.chats.create({
          model,
          history,
          config: {
            systemInstruction: request.systemPrompt,
            temperature: options.temperature ?? 0.7,
            maxOutputTokens: options.maxOutputTokens ?? 300,
          },
        });
        const response = await chat.sendMessage({ message: request.message });
        text = response.text;
      } catch (error) {
        if (errorStatus(error) === 429) {
          throw new RateLimitedError("Gemini rate limit exceeded", DEFAULT_RETRY_AFTER_MS, error);
        }
        throw new OracleUnavailableError(`Gemini request failed: ${describeError(error)}`, error);
      }
      const reply = text?.trim();
      if (!reply) {
        throw new OracleUnavailableError("Gemini returned an empty reply");
      }
      return reply;
    },
  };
}
