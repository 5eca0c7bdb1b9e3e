// src/services/similarityContext.ts

import type { Problem, SimilarityContext } from "../types/hints";
import type { SimilarityIndex } from "./similarityIndex";

export type LearnerHistory = {
  listAttemptedProblems: (userId: string, excludeProblemId: string) => Promise<Problem[]>;
  latestSuccessfulCode: (userId: string, problemId: string) => Promise<string | null>;
  failedAttemptReasons: (userId: string, problemId: string, limit: number) => Promise<string[]>;
};

export const SIMILAR_PROBLEM_LIMIT = 3;
export const FAILED_ATTEMPTS_PER_PROBLEM = 5;
export const MAX_ERROR_PATTERNS = 8;

export function dedupePatterns(patterns: readonly string[], cap = MAX_ERROR_PATTERNS): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of patterns) {
    const p = typeof raw === "string" ? raw.trim() : "";
    if (!p || seen.has(p)) continue;
    seen.add(p);
    out.push(p);
    if (out.length >= cap) break;
  }
  return out;
}

/**
 * Retrieval step for augmented hints. Only problems this learner has attempted
 * are candidates, so "similar" means similar within their own history.
 * Returns null when there is nothing to compare against.
 */
export async function buildSimilarityContext(
  userId: string,
  problem: Problem,
  history: LearnerHistory,
  index: SimilarityIndex
): Promise<SimilarityContext | null> {
  const pool = await history.listAttemptedProblems(userId, problem.problemId);
  if (pool.length === 0) return null;

  const similarProblems = index.topKSimilar(problem, pool, SIMILAR_PROBLEM_LIMIT);
  if (similarProblems.length === 0) return null;

  const priorSolutions: Record<string, string> = {};
  const reasons: string[] = [];

  for (const { problem: similar } of similarProblems) {
    const code = await history.latestSuccessfulCode(userId, similar.problemId);
    if (code) priorSolutions[similar.title] = code;

    reasons.push(...(await history.failedAttemptReasons(userId, similar.problemId, FAILED_ATTEMPTS_PER_PROBLEM)));
  }

  return {
    similarProblems,
    priorSolutions,
    errorPatterns: dedupePatterns(reasons),
  };
}
