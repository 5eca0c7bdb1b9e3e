// src/services/__tests__/hintOrchestrator.test.ts

import { describe, it, expect, vi } from "vitest";
import { HintOrchestrator, type HintOrchestratorDeps } from "../hintOrchestrator";
import { LLMCallError } from "../../ai/llmClient";
import { FALLBACK_ATTEMPT_EVALUATION, FALLBACK_HINT_SCORES, getFallbackHint } from "../../ai/staticHintMessages";
import type { HintRequest, HintStage, SimilarityContext } from "../../types/hints";

const EVAL_TEXT = [
  "success: false",
  "reason: logic does not handle the loop end",
  "complexity: O(n)",
  "edge_cases:",
  "code_quality: ok",
  "suggestions: check bounds",
].join("\n");

const SCORES_TEXT = [
  "safety_score: 0.9",
  "helpfulness_score: 0.8",
  "quality_score: 0.7",
  "progress_alignment_score: 0.6",
  "pedagogical_value_score: 0.5",
].join("\n");

const HINT = "Check where your loop stops.";

type Reply = string | Error;

function scripted(replies: Partial<Record<HintStage, Reply[]>>) {
  const calls: Array<{ prompt: string; stage: HintStage }> = [];
  const complete = vi.fn(async (prompt: string, stage: HintStage) => {
    calls.push({ prompt, stage });
    const next = replies[stage]?.shift();
    if (next === undefined) throw new LLMCallError("transport", `no reply for ${stage}`);
    if (next instanceof Error) throw next;
    return next;
  });
  return { complete, calls };
}

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function request(overrides: Partial<HintRequest> = {}): HintRequest {
  return {
    userId: "u1",
    problemId: "p1",
    problemDescription: "Sum the numbers in an array",
    userCode: "for i in range(len(a) + 1): s += a[i]",
    attemptsCount: 2,
    failedAttemptsCount: 1,
    currentHintLevel: 2,
    elapsedSeconds: 30,
    previousHints: [],
    ...overrides,
  };
}

function orchestrator(complete: HintOrchestratorDeps["complete"], extra: Partial<HintOrchestratorDeps> = {}) {
  const logger = makeLogger();
  const o = new HintOrchestrator({ complete, logger, ragEnabled: () => false, ...extra });
  return { o, logger };
}

const generationCalls = (calls: Array<{ prompt: string; stage: HintStage }>) => calls.filter((c) => c.stage === "hint_generation");

describe("HintOrchestrator.process", () => {
  it("runs the three model stages in order", async () => {
    const { complete, calls } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [`  ${HINT}\n`],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o } = orchestrator(complete);

    const result = await o.process(request());

    expect(calls.map((c) => c.stage)).toEqual(["attempt_evaluation", "hint_generation", "hint_evaluation"]);
    expect(result).toEqual({
      hintText: HINT,
      level: 2,
      type: "approach",
      attemptEvaluation: {
        success: false,
        reason: "logic does not handle the loop end",
        complexity: "O(n)",
        edgeCases: [],
        codeQuality: "ok",
        suggestions: ["check bounds"],
      },
      hintScores: {
        safety_score: 0.9,
        helpfulness_score: 0.8,
        quality_score: 0.7,
        progress_alignment_score: 0.6,
        pedagogical_value_score: 0.5,
      },
      degradations: [],
    });
  });

  it("escalates from level 2 to 3 after three failures", async () => {
    const { complete } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [HINT],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o } = orchestrator(complete);

    const result = await o.process(request({ failedAttemptsCount: 3 }));

    expect(result.level).toBe(3);
    expect(result.type).toBe("implementation");
  });

  it("regenerates once when the hint repeats the last one", async () => {
    const { complete, calls } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [`  ${HINT} `, "Try the smallest input first."],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o, logger } = orchestrator(complete);

    const result = await o.process(request({ previousHints: [HINT] }));

    expect(result.hintText).toBe("Try the smallest input first.");
    expect(generationCalls(calls)).toHaveLength(2);
    expect(generationCalls(calls)[1].prompt).toBe(generationCalls(calls)[0].prompt);
    expect(logger.info).toHaveBeenCalledWith("duplicate_hint_regenerating", { userId: "u1", problemId: "p1" });
  });

  it("accepts a second duplicate instead of looping", async () => {
    const { complete, calls } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [HINT, HINT],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o, logger } = orchestrator(complete);

    const result = await o.process(request({ previousHints: [HINT] }));

    expect(result.hintText).toBe(HINT);
    expect(generationCalls(calls)).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith("duplicate_hint_accepted", { userId: "u1", problemId: "p1" });
    expect(result.degradations).toEqual([]);
  });

  it("only compares against the most recent hint", async () => {
    const { complete, calls } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [HINT],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o } = orchestrator(complete);

    await o.process(request({ previousHints: ["Something else.", HINT] }));

    expect(generationCalls(calls)).toHaveLength(1);
  });

  it("returns the fixed degraded result when the attempt cannot be evaluated", async () => {
    const { complete, calls } = scripted({ attempt_evaluation: [new LLMCallError("timeout", "slow")] });
    const { o } = orchestrator(complete);

    const result = await o.process(request());

    expect(calls).toHaveLength(1);
    expect(result).toEqual({
      hintText: getFallbackHint("approach"),
      level: 2,
      type: "approach",
      attemptEvaluation: FALLBACK_ATTEMPT_EVALUATION,
      hintScores: FALLBACK_HINT_SCORES,
      degradations: [
        { stage: "attempt_evaluation", error: "timeout" },
        { stage: "hint_generation", error: "skipped" },
        { stage: "hint_evaluation", error: "skipped" },
      ],
    });
  });

  it("reuses an evaluation the caller already has", async () => {
    const { complete, calls } = scripted({ hint_generation: [HINT], hint_evaluation: [SCORES_TEXT] });
    const { o } = orchestrator(complete);

    const result = await o.process(
      request({
        attemptEvaluation: {
          ok: true,
          value: { ...FALLBACK_ATTEMPT_EVALUATION, reason: "error on empty input", edgeCases: ["empty"] },
        },
      })
    );

    expect(calls.map((c) => c.stage)).toEqual(["hint_generation", "hint_evaluation"]);
    expect(result.level).toBe(3);
    expect(result.type).toBe("debug");
  });

  it("degrades without calling the model when the caller's evaluation failed", async () => {
    const { complete } = scripted({});
    const { o } = orchestrator(complete);

    const result = await o.process(
      request({ currentHintLevel: 4, attemptEvaluation: { ok: false, error: "api", detail: "500" } })
    );

    expect(complete).not.toHaveBeenCalled();
    expect(result.level).toBe(4);
    expect(result.type).toBe("debug");
    expect(result.hintText).toBe(getFallbackHint("debug"));
  });

  it("falls back to the static hint when generation fails and skips the duplicate check", async () => {
    const staticHint = getFallbackHint("approach");
    const { complete, calls } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [new LLMCallError("transport", "reset")],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o } = orchestrator(complete);

    const result = await o.process(request({ previousHints: [staticHint] }));

    expect(result.hintText).toBe(staticHint);
    expect(generationCalls(calls)).toHaveLength(1);
    expect(result.degradations).toEqual([{ stage: "hint_generation", error: "transport" }]);
    expect(result.hintScores.safety_score).toBe(0.9);
  });

  it("treats a blank generation as empty output", async () => {
    const { complete } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [" \n  "],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o } = orchestrator(complete);

    const result = await o.process(request());

    expect(result.hintText).toBe(getFallbackHint("approach"));
    expect(result.degradations).toEqual([{ stage: "hint_generation", error: "empty_output" }]);
  });

  it("uses fallback scores when the hint cannot be evaluated", async () => {
    const { complete } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [HINT],
      hint_evaluation: [new LLMCallError("api", "bad gateway", 502)],
    });
    const { o, logger } = orchestrator(complete);

    const result = await o.process(request());

    expect(result.hintText).toBe(HINT);
    expect(result.hintScores).toEqual(FALLBACK_HINT_SCORES);
    expect(result.degradations).toEqual([{ stage: "hint_evaluation", error: "api" }]);
    expect(logger.warn).toHaveBeenCalledWith("hint_stage_failed", {
      stage: "hint_evaluation",
      kind: "api",
      error: "bad gateway",
    });
  });

  it("passes at most five previous hints and leaves the input untouched", async () => {
    const { complete, calls } = scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [HINT],
      hint_evaluation: [SCORES_TEXT],
    });
    const { o } = orchestrator(complete);
    const previousHints = ["h1", "h2", "h3", "h4", "h5", "h6", "h7"];

    await o.process(request({ previousHints }));

    const lines = generationCalls(calls)[0].prompt.split("\n");
    expect(lines).toContain("5. h5");
    expect(lines).not.toContain("6. h6");
    expect(previousHints).toHaveLength(7);
  });
});

describe("HintOrchestrator similarity-augmented prompts", () => {
  const context: SimilarityContext = {
    similarProblems: [
      { problem: { problemId: "p2", title: "Max of Array", description: "Find the max.", difficulty: "easy" }, score: 0.7 },
    ],
    priorSolutions: { "Max of Array": "return max(a)" },
    errorPatterns: ["off by one"],
  };

  function replies() {
    return scripted({
      attempt_evaluation: [EVAL_TEXT],
      hint_generation: [HINT],
      hint_evaluation: [SCORES_TEXT],
    });
  }

  it("adds the learner's history when enabled", async () => {
    const { complete, calls } = replies();
    const contextProvider = vi.fn(async () => context);
    const { o } = orchestrator(complete, { contextProvider, ragEnabled: () => true });

    await o.process(request());

    const lines = generationCalls(calls)[0].prompt.split("\n");
    expect(lines).toContain("1. Max of Array (easy): Find the max.");
    expect(lines).toContain("- off by one");
    expect(contextProvider).toHaveBeenCalledTimes(1);
  });

  it("does not ask for history when disabled", async () => {
    const { complete, calls } = replies();
    const contextProvider = vi.fn(async () => context);
    const { o } = orchestrator(complete, { contextProvider, ragEnabled: () => false });

    await o.process(request());

    expect(contextProvider).not.toHaveBeenCalled();
    expect(generationCalls(calls)[0].prompt.split("\n")).not.toContain("- off by one");
  });

  it("falls back to the basic prompt when history lookup fails", async () => {
    const { complete, calls } = replies();
    const { o, logger } = orchestrator(complete, {
      contextProvider: async () => Promise.reject(new Error("db down")),
      ragEnabled: () => true,
    });

    const result = await o.process(request());

    expect(result.hintText).toBe(HINT);
    expect(generationCalls(calls)[0].prompt.split("\n")).not.toContain(
      "Similar problems from this learner's history:"
    );
    expect(logger.warn).toHaveBeenCalledWith("similarity_context_failed", {
      userId: "u1",
      problemId: "p1",
      error: "db down",
    });
  });

  it("uses the basic prompt when there is no history", async () => {
    const { complete, calls } = replies();
    const { o } = orchestrator(complete, { contextProvider: async () => null, ragEnabled: () => true });

    await o.process(request());

    expect(generationCalls(calls)[0].prompt.split("\n")).not.toContain(
      "Similar problems from this learner's history:"
    );
  });
});

describe("HintOrchestrator.evaluateAttempt", () => {
  it("parses the evaluation or reports the failure", async () => {
    const ok = orchestrator(scripted({ attempt_evaluation: ["success: true\nreason: fine"] }).complete).o;
    expect(await ok.evaluateAttempt("d", "c")).toEqual({
      ok: true,
      value: { success: true, reason: "fine", complexity: "", edgeCases: [], codeQuality: "", suggestions: [] },
    });

    const failing = orchestrator(
      scripted({ attempt_evaluation: [new LLMCallError("not_configured", "OPENAI_API_KEY is not set")] }).complete
    ).o;
    expect(await failing.evaluateAttempt("d", "c")).toEqual({
      ok: false,
      error: "not_configured",
      detail: "OPENAI_API_KEY is not set",
    });
  });
});

describe("HintOrchestrator.checkAutoTrigger", () => {
  const ctx = {
    problemDescription: "Sum the numbers in an array",
    userCode: "s = 0",
    attemptsCount: 4,
    failedAttemptsCount: 3,
    currentHintLevel: 2,
    elapsedSeconds: 120,
  };

  it("returns the model's decision", async () => {
    const { complete } = scripted({
      auto_trigger: ["decision: yes\nreason: stuck for a while\nhint_type: approach\nhint_level: 3"],
    });
    const { o } = orchestrator(complete);

    expect(await o.checkAutoTrigger(ctx)).toEqual({
      shouldTrigger: true,
      reason: "stuck for a while",
      hintType: "approach",
      hintLevel: 3,
      source: "ai",
    });
  });

  it("triggers on repeated failures when the model is unavailable", async () => {
    const { complete } = scripted({});
    const { o } = orchestrator(complete);

    expect(await o.checkAutoTrigger(ctx)).toEqual({
      shouldTrigger: true,
      reason: "multiple failed attempts",
      hintType: "debug",
      hintLevel: 3,
      source: "fallback",
    });
  });

  it("holds back when the learner is progressing", async () => {
    const { complete } = scripted({});
    const { o } = orchestrator(complete);

    expect(await o.checkAutoTrigger({ ...ctx, failedAttemptsCount: 1, currentHintLevel: 5 })).toEqual({
      shouldTrigger: false,
      reason: "user making progress",
      hintType: "conceptual",
      hintLevel: 5,
      source: "fallback",
    });
  });
});
