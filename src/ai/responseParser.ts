// src/ai/responseParser.ts
//
// Model replies come back as loose "key: value" lines. These parsers never throw:
// unknown keys and malformed lines are skipped, and missing fields get defaults.

import { HINT_TYPES, type AttemptEvaluation, type HintScores, type HintType } from "../types/hints";

type KeyValueLine = { key: string; value: string };

function normalizeKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, "_");
}

function* scanKeyValueLines(text: unknown): Generator<KeyValueLine> {
  const raw = typeof text === "string" ? text : "";
  for (const line of raw.split(/\r?\n/)) {
    const idx = line.indexOf(":");
    if (idx < 0) continue;
    const key = normalizeKey(line.slice(0, idx));
    if (!key) continue;
    yield { key, value: line.slice(idx + 1).trim() };
  }
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseUnitScore(value: string): number | null {
  const t = value.trim();
  if (!FLOAT_PATTERN.test(t)) return null;
  const n = Number(t);
  if (!Number.isFinite(n) || n < 0 || n > 1) return null;
  return n;
}

export function parseAttemptEvaluation(text: unknown): AttemptEvaluation {
  let success = false;
  let reason = "";
  let complexity = "";
  let edgeCases: string[] = [];
  let codeQuality = "";
  let suggestions: string[] = [];

  for (const { key, value } of scanKeyValueLines(text)) {
    switch (key) {
      case "success":
        success = value.toLowerCase() === "true";
        break;
      case "reason":
        reason = value;
        break;
      case "complexity":
        complexity = value;
        break;
      case "edge_cases":
        edgeCases = splitList(value);
        break;
      case "code_quality":
        codeQuality = value;
        break;
      case "suggestions":
        suggestions = splitList(value);
        break;
    }
  }

  return freezeEvaluation({ success, reason, complexity, edgeCases, codeQuality, suggestions });
}

export function freezeEvaluation(e: AttemptEvaluation): AttemptEvaluation {
  return Object.freeze({
    ...e,
    edgeCases: Object.freeze([...e.edgeCases]),
    suggestions: Object.freeze([...e.suggestions]),
  });
}

/**
 * Reads every key of `defaults` from the reply. A value is kept only if it
 * parses as a number in [0, 1]; anything else leaves the default in place.
 */
export function parseScoreBlock<T extends Record<string, number>>(text: unknown, defaults: T): T {
  const found: Record<string, number> = {};
  for (const { key, value } of scanKeyValueLines(text)) {
    if (!Object.prototype.hasOwnProperty.call(defaults, key)) continue;
    const score = parseUnitScore(value);
    if (score !== null) found[key] = score;
  }
  return { ...defaults, ...found };
}

export const EMPTY_HINT_SCORES: Readonly<HintScores> = Object.freeze({
  safety_score: 0,
  helpfulness_score: 0,
  quality_score: 0,
  progress_alignment_score: 0,
  pedagogical_value_score: 0,
});

export function parseHintScores(text: unknown): HintScores {
  return parseScoreBlock(text, { ...EMPTY_HINT_SCORES });
}

export function toHintType(value: unknown): HintType | null {
  if (typeof value !== "string") return null;
  const t = value.trim().toLowerCase();
  return HINT_TYPES.find((type) => type === t) ?? null;
}

export type TriggerDecisionFields = {
  shouldTrigger: boolean;
  reason: string;
  hintType: HintType;
  hintLevel: number;
};

export function parseTriggerDecision(text: unknown, maxHintLevel = 5): TriggerDecisionFields {
  let shouldTrigger = false;
  let reason = "";
  let hintType: HintType = "conceptual";
  let hintLevel = 1;

  for (const { key, value } of scanKeyValueLines(text)) {
    switch (key) {
      case "decision": {
        // models often bold the answer: **Yes**
        const v = value.replace(/[*_`]/g, "").trim().toLowerCase();
        shouldTrigger = v.startsWith("yes") || v === "true";
        break;
      }
      case "reason":
        reason = value;
        break;
      case "hint_type":
        hintType = toHintType(value) ?? hintType;
        break;
      case "hint_level": {
        const t = value.trim();
        const n = /^\d+$/.test(t) ? Number(t) : NaN;
        if (Number.isInteger(n) && n >= 1 && n <= maxHintLevel) hintLevel = n;
        break;
      }
    }
  }

  return { shouldTrigger, reason, hintType, hintLevel };
}
