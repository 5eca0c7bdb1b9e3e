// src/ai/llmClient.ts

import OpenAI, { APIConnectionTimeoutError, APIConnectionError, APIError } from "openai";
import type { HintStage, StageErrorKind } from "../types/hints";
import { getLLMConfig } from "../config/hintConfig";

export type LLMErrorKind = Exclude<StageErrorKind, "empty_output">;

export class LLMCallError extends Error {
  constructor(
    public readonly kind: LLMErrorKind,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "LLMCallError";
  }
}

export type LLMComplete = (prompt: string, stage: HintStage) => Promise<string>;

let client: OpenAI | null = null;

function getClient(): OpenAI {
  if (!client) {
    const config = getLLMConfig();
    if (!config.apiKey) {
      throw new LLMCallError("not_configured", "OPENAI_API_KEY is not set");
    }
    client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }
  return client;
}

// Test hook: forget the cached client so new env settings take effect.
export function resetLLMClient(): void {
  client = null;
}

const STAGE_DEFAULTS: Record<HintStage, { temperature: number; maxOutputTokens: number }> = {
  attempt_evaluation: { temperature: 0.3, maxOutputTokens: 400 },
  hint_generation: { temperature: 0.7, maxOutputTokens: 300 },
  hint_evaluation: { temperature: 0.2, maxOutputTokens: 200 },
  auto_trigger: { temperature: 0.4, maxOutputTokens: 200 },
};

const SYSTEM_PROMPT = `You are a patient programming tutor.
You guide learners toward a solution without writing it for them.
Follow the response format in the prompt exactly.`;

export function toLLMCallError(err: unknown): LLMCallError {
  if (err instanceof LLMCallError) return err;
  if (err instanceof APIConnectionTimeoutError) return new LLMCallError("timeout", err.message);
  if (err instanceof APIConnectionError) return new LLMCallError("transport", err.message);
  if (err instanceof APIError) {
    return new LLMCallError("api", err.message, typeof err.status === "number" ? err.status : undefined);
  }
  return new LLMCallError("transport", err instanceof Error ? err.message : String(err));
}

// Single round-trip, no retries. Failures reject with LLMCallError.
export const completeHintPrompt: LLMComplete = async (prompt, stage) => {
  const defaults = STAGE_DEFAULTS[stage];
  try {
    const response = await getClient().responses.create({
      model: getLLMConfig().model,
      input: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      temperature: defaults.temperature,
      max_output_tokens: defaults.maxOutputTokens,
    });
    return response.output_text || "";
  } catch (err) {
    throw toLLMCallError(err);
  }
};
