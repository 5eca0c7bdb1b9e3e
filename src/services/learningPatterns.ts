// src/services/learningPatterns.ts

import type { AttemptRecord } from "../types/hints";

export type LearningPatterns = {
  totalAttempts: number;
  successRate: number;
  averageAttemptsPerProblem: number;
  problemsAttempted: number;
};

export function summarizeLearningPatterns(
  attempts: ReadonlyArray<Pick<AttemptRecord, "problemId" | "status">>
): LearningPatterns {
  const totalAttempts = attempts.length;
  if (totalAttempts === 0) {
    return { totalAttempts: 0, successRate: 0, averageAttemptsPerProblem: 0, problemsAttempted: 0 };
  }

  const successes = attempts.filter((a) => a.status === "success").length;
  const problemsAttempted = new Set(attempts.map((a) => a.problemId)).size;

  return {
    totalAttempts,
    successRate: successes / totalAttempts,
    averageAttemptsPerProblem: totalAttempts / problemsAttempted,
    problemsAttempted,
  };
}
