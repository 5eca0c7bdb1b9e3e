// src/validation/hintRequestValidator.ts

import type { AttemptStatus, Difficulty, Problem } from "../types/hints";

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export type HintRequestBody = {
  userId: string;
  problemId: string;
  userCode: string;
  problemData: Omit<Problem, "problemId"> | null;
};

export type AutoTriggerBody = {
  userId: string;
  problemId: string;
  userCode: string;
  lastAttemptStatus: AttemptStatus | null;
  lastAttemptError: string | null;
  testCasesPassed: number | null;
  totalTestCases: number | null;
};

export type FeedbackBody = {
  userId: string;
  rating: number;
  feedbackText: string | null;
};

const MAX_ID_LENGTH = 128;
const MAX_CODE_LENGTH = 50_000;
const MAX_FEEDBACK_LENGTH = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function toDifficulty(value: unknown): Difficulty | null {
  return value === "easy" || value === "medium" || value === "hard" ? value : null;
}

function readId(body: Record<string, unknown>, key: string, errors: string[]): string {
  const v = body[key];
  if (!isNonEmptyString(v)) {
    errors.push(`${key} is required`);
    return "";
  }
  const t = v.trim();
  if (t.length > MAX_ID_LENGTH) errors.push(`${key} is too long`);
  return t;
}

function readCode(body: Record<string, unknown>, errors: string[]): string {
  const v = body.userCode;
  if (!isNonEmptyString(v)) {
    errors.push("userCode is required");
    return "";
  }
  if (v.length > MAX_CODE_LENGTH) errors.push("userCode is too long");
  return v;
}

function optionalCount(body: Record<string, unknown>, key: string, errors: string[]): number | null {
  const v = body[key];
  if (v === undefined || v === null) return null;
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    errors.push(`${key} must be a non-negative integer`);
    return null;
  }
  return v;
}

export function validateProblemData(input: unknown, errors: string[]): Omit<Problem, "problemId"> | null {
  if (!isRecord(input)) {
    errors.push("problemData must be an object");
    return null;
  }
  if (!isNonEmptyString(input.title)) errors.push("problemData.title is required");
  if (!isNonEmptyString(input.description)) errors.push("problemData.description is required");

  let difficulty: Difficulty = "medium";
  if (input.difficulty !== undefined) {
    const d = toDifficulty(input.difficulty);
    if (d) difficulty = d;
    else errors.push("problemData.difficulty must be easy, medium or hard");
  }

  if (!isNonEmptyString(input.title) || !isNonEmptyString(input.description)) return null;
  return { title: input.title.trim(), description: input.description.trim(), difficulty };
}

export function validateHintRequestBody(body: unknown): ValidationResult<HintRequestBody> {
  if (!isRecord(body)) return { ok: false, errors: ["body must be an object"] };

  const errors: string[] = [];
  const userId = readId(body, "userId", errors);
  const problemId = readId(body, "problemId", errors);
  const userCode = readCode(body, errors);
  const problemData =
    body.problemData === undefined || body.problemData === null ? null : validateProblemData(body.problemData, errors);

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: { userId, problemId, userCode, problemData } };
}

export function validateAutoTriggerBody(body: unknown): ValidationResult<AutoTriggerBody> {
  if (!isRecord(body)) return { ok: false, errors: ["body must be an object"] };

  const errors: string[] = [];
  const userId = readId(body, "userId", errors);
  const problemId = readId(body, "problemId", errors);
  const userCode = readCode(body, errors);

  let lastAttemptStatus: AttemptStatus | null = null;
  const status = body.lastAttemptStatus;
  if (status === "success" || status === "failed") lastAttemptStatus = status;
  else if (status !== undefined && status !== null) errors.push("lastAttemptStatus must be success or failed");

  let lastAttemptError: string | null = null;
  if (typeof body.lastAttemptError === "string") lastAttemptError = body.lastAttemptError.trim() || null;
  else if (body.lastAttemptError !== undefined && body.lastAttemptError !== null) {
    errors.push("lastAttemptError must be a string");
  }

  const testCasesPassed = optionalCount(body, "testCasesPassed", errors);
  const totalTestCases = optionalCount(body, "totalTestCases", errors);
  if (testCasesPassed !== null && totalTestCases !== null && testCasesPassed > totalTestCases) {
    errors.push("testCasesPassed cannot exceed totalTestCases");
  }

  if (errors.length > 0) return { ok: false, errors };
  return {
    ok: true,
    value: { userId, problemId, userCode, lastAttemptStatus, lastAttemptError, testCasesPassed, totalTestCases },
  };
}

export function validateProblemBody(body: unknown): ValidationResult<Problem> {
  if (!isRecord(body)) return { ok: false, errors: ["body must be an object"] };

  const errors: string[] = [];
  const problemId = readId(body, "problemId", errors);
  const data = validateProblemData(body, errors);

  if (errors.length > 0 || !data) return { ok: false, errors: errors.map((e) => e.replace(/^problemData\./, "")) };
  return { ok: true, value: { problemId, ...data } };
}

export function validateFeedbackBody(body: unknown): ValidationResult<FeedbackBody> {
  if (!isRecord(body)) return { ok: false, errors: ["body must be an object"] };

  const errors: string[] = [];
  const userId = readId(body, "userId", errors);

  const rating = body.rating;
  if (typeof rating !== "number" || !Number.isInteger(rating) || rating < 1 || rating > 5) {
    errors.push("rating must be an integer from 1 to 5");
  }

  let feedbackText: string | null = null;
  if (typeof body.feedbackText === "string") {
    feedbackText = body.feedbackText.trim() || null;
    if (feedbackText && feedbackText.length > MAX_FEEDBACK_LENGTH) errors.push("feedbackText is too long");
  } else if (body.feedbackText !== undefined && body.feedbackText !== null) {
    errors.push("feedbackText must be a string");
  }

  if (errors.length > 0 || typeof rating !== "number") return { ok: false, errors };
  return { ok: true, value: { userId, rating, feedbackText } };
}
