// src/config/hintConfig.ts

import type { HintPolicyConfig } from "../types/hints";

export const DEFAULT_HINT_POLICY: HintPolicyConfig = Object.freeze({
  failureThreshold: 3,
  stuckTimeoutSeconds: 300,
  maxHintLevel: 5,
});

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_LLM_TIMEOUT_MS = 30_000;

function readPositiveInt(name: string, fallback: number): number {
  const raw = String(process.env[name] ?? "").trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) return fallback;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}

function readString(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

export function getHintPolicyConfig(): HintPolicyConfig {
  return {
    failureThreshold: readPositiveInt("FAILURE_THRESHOLD", DEFAULT_HINT_POLICY.failureThreshold),
    stuckTimeoutSeconds: readPositiveInt("STUCK_TIMEOUT_SECONDS", DEFAULT_HINT_POLICY.stuckTimeoutSeconds),
    maxHintLevel: readPositiveInt("MAX_HINT_LEVEL", DEFAULT_HINT_POLICY.maxHintLevel),
  };
}

export type LLMConfig = {
  apiKey?: string;
  baseURL?: string;
  model: string;
  timeoutMs: number;
};

export function getLLMConfig(): LLMConfig {
  return {
    apiKey: readString("OPENAI_API_KEY"),
    baseURL: readString("OPENAI_BASE_URL"),
    model: readString("HINT_MODEL") ?? DEFAULT_MODEL,
    timeoutMs: readPositiveInt("LLM_TIMEOUT_MS", DEFAULT_LLM_TIMEOUT_MS),
  };
}
