// src/services/hintRuntime.ts

import { getHintPolicyConfig } from "../config/hintConfig";
import { completeHintPrompt } from "../ai/llmClient";
import { ProgressTracker } from "../state/progressTracker";
import * as store from "../storage/hintStore";
import { HintOrchestrator } from "./hintOrchestrator";
import { SimilarityIndex } from "./similarityIndex";
import { buildSimilarityContext } from "./similarityContext";
import { describeError, logEvent } from "../utils/logger";

let similarityIndex: SimilarityIndex | null = null;
let orchestrator: HintOrchestrator | null = null;
let tracker: ProgressTracker | null = null;

export function getSimilarityIndex(): SimilarityIndex {
  if (!similarityIndex) similarityIndex = new SimilarityIndex();
  return similarityIndex;
}

export function getHintOrchestrator(): HintOrchestrator {
  if (!orchestrator) {
    const index = getSimilarityIndex();
    orchestrator = new HintOrchestrator({
      complete: completeHintPrompt,
      policy: getHintPolicyConfig(),
      contextProvider: async (request) =>
        buildSimilarityContext(
          request.userId,
          {
            problemId: request.problemId,
            title: request.problemTitle ?? "",
            description: request.problemDescription,
            difficulty: request.problemDifficulty ?? "medium",
          },
          store,
          index
        ),
    });
  }
  return orchestrator;
}

export function getProgressTracker(): ProgressTracker {
  if (!tracker) tracker = new ProgressTracker(store, getHintPolicyConfig().maxHintLevel);
  return tracker;
}

export function refreshSimilarityIndex(): Promise<number> {
  return getSimilarityIndex().rebuildFrom(store.listAllProblems);
}

// Index refresh after a problem write; a failure leaves the old index serving reads.
export async function refreshSimilarityIndexLogged(requestId?: string): Promise<void> {
  try {
    await refreshSimilarityIndex();
  } catch (err) {
    logEvent("warn", "similarity_refresh_failed", { requestId, error: describeError(err) });
  }
}
