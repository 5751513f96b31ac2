import { generateText } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { JsonDocumentSchema } from "@callreplay/shared";
import type {
  CompletionRequest,
  InvocationResult,
  LLMInvokerConfig,
  StructuredReply,
  TextGenerator,
} from "./types.js";

export const JSON_SYSTEM_INSTRUCTION =
  "You are a helpful assistant that always responds with valid JSON. Respond ONLY with the JSON object, no markdown fences.";

const REPLY_EXCERPT_CHARS = 200;

const DEFAULT_CONFIG = {
  model: "gpt-4o-mini",
  temperature: 0.2,
  maxOutputTokens: 2000,
  maxAttempts: 3,
  retryDelayMs: 0,
} as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Default generator backed by the AI SDK. SDK-level retries are disabled so
 * that the invoker's own attempt budget is the only one in play.
 */
export function createOpenAIGenerator(model: string, apiKey?: string): TextGenerator {
  const provider = createOpenAI(apiKey ? { apiKey } : {});
  return async (request: CompletionRequest) => {
    const { text } = await generateText({
      model: provider(model),
      system: request.system,
      prompt: request.prompt,
      temperature: request.temperature,
      maxOutputTokens: request.maxOutputTokens,
      maxRetries: 0,
    });
    return text;
  };
}

/** Parse a reply as a JSON object. Returns null for anything else. */
export function parseStructuredReply(reply: string): StructuredReply | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(reply.trim());
  } catch {
    return null;
  }
  const result = JsonDocumentSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

type AttemptFailure =
  | { kind: "parse"; reply: string }
  | { kind: "transport"; message: string };

/**
 * Calls the completion endpoint with a bounded attempt budget. Transport
 * failures and unparsable replies are retried alike.
 */
export class LLMInvoker {
  readonly model: string;
  readonly temperature: number;
  readonly maxOutputTokens: number;
  readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly generate: TextGenerator;

  constructor(config: LLMInvokerConfig = {}) {
    this.model = config.model ?? DEFAULT_CONFIG.model;
    this.temperature = config.temperature ?? DEFAULT_CONFIG.temperature;
    this.maxOutputTokens = config.maxOutputTokens ?? DEFAULT_CONFIG.maxOutputTokens;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_CONFIG.maxAttempts);
    this.retryDelayMs = Math.max(0, config.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs);
    this.generate = config.generate ?? createOpenAIGenerator(this.model, config.apiKey);
  }

  async invoke(prompt: string): Promise<InvocationResult> {
    let lastFailure: AttemptFailure = { kind: "transport", message: "no attempt made" };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (attempt > 1 && this.retryDelayMs > 0) {
        await sleep(this.retryDelayMs);
      }

      let reply: string;
      try {
        reply = await this.generate({
          system: JSON_SYSTEM_INSTRUCTION,
          prompt,
          temperature: this.temperature,
          maxOutputTokens: this.maxOutputTokens,
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[llm] call failed on attempt ${attempt}: ${message}`);
        lastFailure = { kind: "transport", message };
        continue;
      }

      const data = parseStructuredReply(reply);
      if (data) {
        return { ok: true, data, attempts: attempt };
      }
      console.warn(`[llm] invalid JSON response on attempt ${attempt}`);
      lastFailure = { kind: "parse", reply: reply.trim() };
    }

    return {
      ok: false,
      error:
        lastFailure.kind === "parse"
          ? `Failed to parse JSON response: ${lastFailure.reply.slice(0, REPLY_EXCERPT_CHARS)}...`
          : `LLM call failed after ${this.maxAttempts} attempts: ${lastFailure.message}`,
      attempts: this.maxAttempts,
    };
  }
}
