// src/services/__tests__/learningPatterns.test.ts

import { describe, it, expect } from "vitest";
import { summarizeLearningPatterns } from "../learningPatterns";

describe("summarizeLearningPatterns", () => {
  it("returns zeros when there are no attempts", () => {
    expect(summarizeLearningPatterns([])).toEqual({
      totalAttempts: 0,
      successRate: 0,
      averageAttemptsPerProblem: 0,
      problemsAttempted: 0,
    });
  });

  it("summarises attempts across problems", () => {
    const patterns = summarizeLearningPatterns([
      { problemId: "p1", status: "failed" },
      { problemId: "p1", status: "success" },
      { problemId: "p2", status: "failed" },
      { problemId: "p1", status: "failed" },
    ]);
    expect(patterns).toEqual({
      totalAttempts: 4,
      successRate: 0.25,
      averageAttemptsPerProblem: 2,
      problemsAttempted: 2,
    });
  });
});
