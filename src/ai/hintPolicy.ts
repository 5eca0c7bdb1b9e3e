// src/ai/hintPolicy.ts

import type { AttemptEvaluation, HintDecision, HintPolicyConfig, HintType } from "../types/hints";
import { DEFAULT_HINT_POLICY } from "../config/hintConfig";

export type EscalationRule =
  | "repeated_failures"
  | "stuck"
  | "edge_cases"
  | "complexity"
  | "logic"
  | "unchanged";

export type HintPolicyInput = {
  currentLevel: number;
  failedAttempts: number;
  elapsedSeconds: number;
  attemptEvaluation: Pick<AttemptEvaluation, "reason" | "edgeCases">;
};

const LEVEL_TYPES: Record<number, HintType> = {
  1: "conceptual",
  2: "approach",
  3: "implementation",
  4: "debug",
  5: "debug",
};

export function clampHintLevel(level: number, maxLevel: number): number {
  const n = Number.isFinite(level) ? Math.trunc(level) : 1;
  return Math.min(Math.max(n, 1), Math.max(1, maxLevel));
}

function reasonMentions(evaluation: HintPolicyInput["attemptEvaluation"], word: string): boolean {
  return String(evaluation.reason ?? "").toLowerCase().includes(word);
}

function hasEdgeCases(evaluation: HintPolicyInput["attemptEvaluation"]): boolean {
  return Array.isArray(evaluation.edgeCases) && evaluation.edgeCases.length > 0;
}

// First matching rule wins; rules never combine.
export function selectEscalationRule(
  input: HintPolicyInput,
  config: HintPolicyConfig = DEFAULT_HINT_POLICY
): EscalationRule {
  if (input.failedAttempts >= config.failureThreshold) return "repeated_failures";
  if (input.elapsedSeconds > config.stuckTimeoutSeconds) return "stuck";
  if (hasEdgeCases(input.attemptEvaluation)) return "edge_cases";
  if (reasonMentions(input.attemptEvaluation, "complexity")) return "complexity";
  if (reasonMentions(input.attemptEvaluation, "logic")) return "logic";
  return "unchanged";
}

export function nextHintLevel(
  input: HintPolicyInput,
  config: HintPolicyConfig = DEFAULT_HINT_POLICY
): number {
  const current = clampHintLevel(input.currentLevel, config.maxHintLevel);
  const rule = selectEscalationRule(input, config);

  let level: number;
  switch (rule) {
    case "repeated_failures":
    case "stuck":
      level = Math.min(current + 1, config.maxHintLevel);
      break;
    case "edge_cases":
      level = Math.max(3, current);
      break;
    case "complexity":
      level = Math.max(2, current);
      break;
    case "logic":
      // Kept as a max against 1, which never changes a valid level.
      level = Math.max(1, current);
      break;
    default:
      level = current;
  }

  return clampHintLevel(level, config.maxHintLevel);
}

export function hintTypeFor(
  level: number,
  evaluation: HintPolicyInput["attemptEvaluation"]
): HintType {
  if (hasEdgeCases(evaluation) || reasonMentions(evaluation, "error")) return "debug";
  if (reasonMentions(evaluation, "complexity")) return "approach";
  return LEVEL_TYPES[level] ?? "conceptual";
}

export function decideLevelAndType(
  input: HintPolicyInput,
  config: HintPolicyConfig = DEFAULT_HINT_POLICY
): HintDecision {
  const level = nextHintLevel(input, config);
  return { level, type: hintTypeFor(level, input.attemptEvaluation) };
}
