// src/ai/__tests__/responseParser.test.ts

import { describe, it, expect } from "vitest";
import {
  parseAttemptEvaluation,
  parseHintScores,
  parseScoreBlock,
  parseTriggerDecision,
  parseUnitScore,
  toHintType,
} from "../responseParser";

describe("parseAttemptEvaluation", () => {
  it("reads every known field", () => {
    const text = [
      "success: false",
      "reason: Off-by-one error in loop bound",
      "complexity: O(n) time, O(1) space",
      "edge_cases: empty array, single element,  ",
      "code_quality: readable",
      "suggestions: check the loop end, add a test",
    ].join("\n");

    const e = parseAttemptEvaluation(text);

    expect(e).toEqual({
      success: false,
      reason: "Off-by-one error in loop bound",
      complexity: "O(n) time, O(1) space",
      edgeCases: ["empty array", "single element"],
      codeQuality: "readable",
      suggestions: ["check the loop end", "add a test"],
    });
  });

  it("normalises keys: case, padding and inner spaces", () => {
    const e = parseAttemptEvaluation("  SUCCESS : True\r\nEdge Cases: null input\nCode Quality: ok");
    expect(e.success).toBe(true);
    expect(e.edgeCases).toEqual(["null input"]);
    expect(e.codeQuality).toBe("ok");
  });

  it("splits on the first colon only", () => {
    const e = parseAttemptEvaluation("reason: fails at index: 3");
    expect(e.reason).toBe("fails at index: 3");
  });

  it("only accepts the word true as success", () => {
    expect(parseAttemptEvaluation("success: yes").success).toBe(false);
    expect(parseAttemptEvaluation("success: TRUE").success).toBe(true);
  });

  it("returns defaults for garbage and non-string input", () => {
    const empty = {
      success: false,
      reason: "",
      complexity: "",
      edgeCases: [],
      codeQuality: "",
      suggestions: [],
    };
    expect(parseAttemptEvaluation("no structure here\n:\nfoo")).toEqual(empty);
    expect(parseAttemptEvaluation(undefined)).toEqual(empty);
  });

  it("returns a frozen value", () => {
    const e = parseAttemptEvaluation("edge_cases: a");
    expect(Object.isFrozen(e)).toBe(true);
    expect(Object.isFrozen(e.edgeCases)).toBe(true);
  });
});

describe("parseUnitScore", () => {
  it("accepts floats in [0, 1]", () => {
    expect(parseUnitScore("0.85")).toBe(0.85);
    expect(parseUnitScore("1")).toBe(1);
    expect(parseUnitScore(".5")).toBe(0.5);
  });

  it("rejects out-of-range and non-numeric values", () => {
    expect(parseUnitScore("1.2")).toBeNull();
    expect(parseUnitScore("-0.1")).toBeNull();
    expect(parseUnitScore("high")).toBeNull();
    expect(parseUnitScore("0.8/1")).toBeNull();
    expect(parseUnitScore("")).toBeNull();
  });
});

describe("parseHintScores", () => {
  it("fills missing and invalid scores with 0", () => {
    const scores = parseHintScores(
      ["safety_score: 0.9", "helpfulness_score: great", "quality_score: 1.5", "progress alignment score: 0.6"].join(
        "\n"
      )
    );
    expect(scores).toEqual({
      safety_score: 0.9,
      helpfulness_score: 0,
      quality_score: 0,
      progress_alignment_score: 0.6,
      pedagogical_value_score: 0,
    });
  });

  it("ignores keys outside the defaults", () => {
    const out = parseScoreBlock("a: 0.5\nb: 0.7", { a: 0.1 });
    expect(out).toEqual({ a: 0.5 });
  });
});

describe("parseTriggerDecision", () => {
  it("reads a full decision", () => {
    const d = parseTriggerDecision("decision: Yes, offer one\nreason: stuck on loop\nhint_type: Debug\nhint_level: 4");
    expect(d).toEqual({ shouldTrigger: true, reason: "stuck on loop", hintType: "debug", hintLevel: 4 });
  });

  it("uses defaults when fields are missing or invalid", () => {
    expect(parseTriggerDecision("")).toEqual({
      shouldTrigger: false,
      reason: "",
      hintType: "conceptual",
      hintLevel: 1,
    });
    const d = parseTriggerDecision("decision: no\nhint_type: magic\nhint_level: 9");
    expect(d.hintType).toBe("conceptual");
    expect(d.hintLevel).toBe(1);
  });

  it("accepts true as a positive decision and rejects fractional levels", () => {
    const d = parseTriggerDecision("decision: true\nhint_level: 2.5");
    expect(d.shouldTrigger).toBe(true);
    expect(d.hintLevel).toBe(1);
  });

  it("reads a decision wrapped in markdown emphasis", () => {
    expect(parseTriggerDecision("decision: **Yes**\nhint_level: 2")).toMatchObject({ shouldTrigger: true, hintLevel: 2 });
    expect(parseTriggerDecision("decision: _yes_").shouldTrigger).toBe(true);
    expect(parseTriggerDecision("decision: **No**").shouldTrigger).toBe(false);
  });

  it("bounds the level by the configured maximum", () => {
    expect(parseTriggerDecision("hint_level: 4", 3).hintLevel).toBe(1);
    expect(parseTriggerDecision("hint_level: 3", 3).hintLevel).toBe(3);
  });
});

describe("toHintType", () => {
  it("maps known types and rejects the rest", () => {
    expect(toHintType(" Approach ")).toBe("approach");
    expect(toHintType("hint")).toBeNull();
    expect(toHintType(3)).toBeNull();
  });
});
