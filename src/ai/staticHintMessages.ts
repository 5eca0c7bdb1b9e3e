// src/ai/staticHintMessages.ts

import type { AttemptEvaluation, HintScores, HintType } from "../types/hints";
import { freezeEvaluation } from "./responseParser";

export function getFallbackHint(type: HintType): string {
  switch (type) {
    case "approach":
      return "Sketch the steps your solution needs before writing code, then check which step your code skips.";
    case "implementation":
      return "Walk through your code line by line with a small input and compare each value with what you expect.";
    case "debug":
      return "Run your code on the smallest input you can think of, including an empty one, and find the first line where it goes wrong.";
    default:
      return "Consider breaking the problem down into smaller steps.";
  }
}

export const FALLBACK_ATTEMPT_EVALUATION: AttemptEvaluation = freezeEvaluation({
  success: false,
  reason: "evaluation failed",
  complexity: "unknown",
  edgeCases: [],
  codeQuality: "unknown",
  suggestions: ["Check your implementation"],
});

export const FALLBACK_HINT_SCORES: Readonly<HintScores> = Object.freeze({
  safety_score: 0.8,
  helpfulness_score: 0.7,
  quality_score: 0.8,
  progress_alignment_score: 0.7,
  pedagogical_value_score: 0.8,
});
