// src/services/hintOrchestrator.ts

import type {
  AttemptEvaluation,
  AutoTriggerContext,
  AutoTriggerDecision,
  Degradation,
  HintDecision,
  HintPolicyConfig,
  HintRequest,
  HintResult,
  HintStage,
  SimilarityContext,
  StageResult,
} from "../types/hints";
import { DEFAULT_HINT_POLICY } from "../config/hintConfig";
import { isHintRagEnabled } from "../config/featureFlags";
import { toLLMCallError, type LLMComplete } from "../ai/llmClient";
import { parseAttemptEvaluation, parseHintScores, parseTriggerDecision } from "../ai/responseParser";
import { clampHintLevel, decideLevelAndType, hintTypeFor } from "../ai/hintPolicy";
import {
  buildAttemptEvaluationPrompt,
  buildAutoTriggerPrompt,
  buildHintEvaluationPrompt,
  buildHintGenerationPrompt,
  buildSimilarityPromptSections,
} from "../ai/hintPrompts";
import { FALLBACK_ATTEMPT_EVALUATION, FALLBACK_HINT_SCORES, getFallbackHint } from "../ai/staticHintMessages";
import { describeError, jsonLogger, type HintLogger } from "../utils/logger";

export const MAX_PREVIOUS_HINTS = 5;

export type SimilarityContextProvider = (request: HintRequest) => Promise<SimilarityContext | null>;

export type HintOrchestratorDeps = {
  complete: LLMComplete;
  policy?: HintPolicyConfig;
  contextProvider?: SimilarityContextProvider;
  ragEnabled?: () => boolean;
  logger?: HintLogger;
};

function snapshotRequest(request: HintRequest): HintRequest {
  return {
    ...request,
    previousHints: request.previousHints.filter((h) => typeof h === "string").slice(0, MAX_PREVIOUS_HINTS),
  };
}

function isDuplicate(hint: string, previousHints: readonly string[]): boolean {
  const last = previousHints[0];
  return typeof last === "string" && last.trim() === hint.trim();
}

/**
 * Runs one hint request through attempt evaluation, level/type decision,
 * generation (with a single regeneration on a duplicate) and hint evaluation.
 *
 * Model failures never escape: each stage reports a StageResult and the
 * sequencer substitutes that stage's static fallback, listing it in
 * `degradations`. Nothing is persisted here.
 */
export class HintOrchestrator {
  private readonly complete: LLMComplete;
  private readonly policy: HintPolicyConfig;
  private readonly contextProvider?: SimilarityContextProvider;
  private readonly ragEnabled: () => boolean;
  private readonly logger: HintLogger;

  constructor(deps: HintOrchestratorDeps) {
    this.complete = deps.complete;
    this.policy = deps.policy ?? DEFAULT_HINT_POLICY;
    this.contextProvider = deps.contextProvider;
    this.ragEnabled = deps.ragEnabled ?? isHintRagEnabled;
    this.logger = deps.logger ?? jsonLogger;
  }

  private async runStage(stage: HintStage, prompt: string): Promise<StageResult<string>> {
    try {
      return { ok: true, value: await this.complete(prompt, stage) };
    } catch (err) {
      const failure = toLLMCallError(err);
      this.logger.warn("hint_stage_failed", { stage, kind: failure.kind, error: describeError(failure) });
      return { ok: false, error: failure.kind, detail: failure.message };
    }
  }

  async evaluateAttempt(problemDescription: string, userCode: string): Promise<StageResult<AttemptEvaluation>> {
    const result = await this.runStage(
      "attempt_evaluation",
      buildAttemptEvaluationPrompt(problemDescription, userCode)
    );
    return result.ok ? { ok: true, value: parseAttemptEvaluation(result.value) } : result;
  }

  private async generationPrompt(request: HintRequest, decision: HintDecision): Promise<string> {
    const input = { ...request, decision };
    if (!this.contextProvider || !this.ragEnabled()) return buildHintGenerationPrompt(input);

    let context: SimilarityContext | null;
    try {
      context = await this.contextProvider(request);
    } catch (err) {
      this.logger.warn("similarity_context_failed", {
        userId: request.userId,
        problemId: request.problemId,
        error: describeError(err),
      });
      return buildHintGenerationPrompt(input);
    }

    return buildHintGenerationPrompt(input, context ? buildSimilarityPromptSections(context) : null);
  }

  private async generateHint(prompt: string): Promise<StageResult<string>> {
    const result = await this.runStage("hint_generation", prompt);
    if (!result.ok) return result;

    const text = result.value.trim();
    if (!text) {
      this.logger.warn("hint_stage_failed", { stage: "hint_generation", kind: "empty_output" });
      return { ok: false, error: "empty_output", detail: "model returned an empty hint" };
    }
    return { ok: true, value: text };
  }

  private degradedResult(request: HintRequest, error: Degradation["error"]): HintResult {
    const level = clampHintLevel(request.currentHintLevel, this.policy.maxHintLevel);
    const type = hintTypeFor(level, FALLBACK_ATTEMPT_EVALUATION);
    return {
      hintText: getFallbackHint(type),
      level,
      type,
      attemptEvaluation: FALLBACK_ATTEMPT_EVALUATION,
      hintScores: { ...FALLBACK_HINT_SCORES },
      degradations: [
        { stage: "attempt_evaluation", error },
        { stage: "hint_generation", error: "skipped" },
        { stage: "hint_evaluation", error: "skipped" },
      ],
    };
  }

  async process(incoming: HintRequest): Promise<HintResult> {
    const request = snapshotRequest(incoming);

    const evaluated =
      request.attemptEvaluation ?? (await this.evaluateAttempt(request.problemDescription, request.userCode));
    if (!evaluated.ok) return this.degradedResult(request, evaluated.error);
    const attemptEvaluation = evaluated.value;

    const decision = decideLevelAndType(
      {
        currentLevel: request.currentHintLevel,
        failedAttempts: request.failedAttemptsCount,
        elapsedSeconds: request.elapsedSeconds,
        attemptEvaluation,
      },
      this.policy
    );

    const degradations: Degradation[] = [];
    const prompt = await this.generationPrompt(request, decision);

    let hintText: string;
    const generated = await this.generateHint(prompt);
    if (!generated.ok) {
      degradations.push({ stage: "hint_generation", error: generated.error });
      hintText = getFallbackHint(decision.type);
    } else {
      hintText = generated.value;
      if (isDuplicate(hintText, request.previousHints)) {
        this.logger.info("duplicate_hint_regenerating", { userId: request.userId, problemId: request.problemId });
        const retry = await this.generateHint(prompt);
        if (!retry.ok) {
          degradations.push({ stage: "hint_generation", error: retry.error });
        } else {
          hintText = retry.value;
          if (isDuplicate(hintText, request.previousHints)) {
            this.logger.warn("duplicate_hint_accepted", { userId: request.userId, problemId: request.problemId });
          }
        }
      }
    }

    const scored = await this.runStage(
      "hint_evaluation",
      buildHintEvaluationPrompt({ ...request, hintText })
    );
    let hintScores = { ...FALLBACK_HINT_SCORES };
    if (scored.ok) hintScores = parseHintScores(scored.value);
    else degradations.push({ stage: "hint_evaluation", error: scored.error });

    return {
      hintText,
      level: decision.level,
      type: decision.type,
      attemptEvaluation,
      hintScores,
      degradations,
    };
  }

  fallbackTrigger(context: AutoTriggerContext): AutoTriggerDecision {
    const struggling = context.failedAttemptsCount >= this.policy.failureThreshold;
    const current = clampHintLevel(context.currentHintLevel, this.policy.maxHintLevel);
    return {
      shouldTrigger: struggling,
      reason: struggling ? "multiple failed attempts" : "user making progress",
      hintType: struggling ? "debug" : "conceptual",
      hintLevel: Math.min(current + 1, this.policy.maxHintLevel),
      source: "fallback",
    };
  }

  async checkAutoTrigger(incoming: AutoTriggerContext): Promise<AutoTriggerDecision> {
    const context = { ...incoming };
    const result = await this.runStage("auto_trigger", buildAutoTriggerPrompt(context));
    if (!result.ok) return this.fallbackTrigger(context);
    return { ...parseTriggerDecision(result.value, this.policy.maxHintLevel), source: "ai" };
  }
}
