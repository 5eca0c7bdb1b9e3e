// src/storage/hintStore.ts

import crypto from "crypto";
import type {
  AttemptEvaluation,
  AttemptRecord,
  AttemptStatus,
  HintScores,
  HintType,
  Problem,
  ProgressState,
} from "../types/hints";
import { ProblemModel, type ProblemDoc } from "../state/problemState";
import { HintProgressModel } from "../state/progressState";
import { AttemptModel, type AttemptDoc } from "../state/attemptState";
import { HintDeliveryModel, HintEvaluationModel, HintModel } from "../state/hintState";
import { freezeEvaluation } from "../ai/responseParser";

function toProblem(doc: ProblemDoc): Problem {
  return {
    problemId: doc.problemId,
    title: doc.title,
    description: doc.description,
    difficulty: doc.difficulty,
  };
}

function toProgress(doc: ProgressState): ProgressState {
  return {
    userId: doc.userId,
    problemId: doc.problemId,
    attemptsCount: doc.attemptsCount,
    failedAttemptsCount: doc.failedAttemptsCount,
    currentHintLevel: doc.currentHintLevel,
    lastActivityTimestamp: new Date(doc.lastActivityTimestamp),
  };
}

function toAttempt(doc: AttemptDoc): AttemptRecord {
  return {
    attemptId: doc.attemptId,
    userId: doc.userId,
    problemId: doc.problemId,
    code: doc.code,
    status: doc.status,
    evaluation: doc.evaluation ? freezeEvaluation(doc.evaluation) : null,
    createdAt: new Date(doc.createdAt),
  };
}

// ---- problems ----

export async function findProblem(problemId: string): Promise<Problem | null> {
  const doc = await ProblemModel.findOne({ problemId }).lean();
  return doc ? toProblem(doc) : null;
}

export async function createProblem(problem: Problem): Promise<Problem> {
  const doc = await ProblemModel.create(problem);
  return toProblem(doc);
}

export async function listAllProblems(): Promise<Problem[]> {
  const docs = await ProblemModel.find().sort({ createdAt: 1 }).lean();
  return docs.map(toProblem);
}

// ---- progress ----

export async function fetchProgress(userId: string, problemId: string): Promise<ProgressState | null> {
  const doc = await HintProgressModel.findOne({ userId, problemId }).lean();
  return doc ? toProgress(doc) : null;
}

export async function createProgress(state: ProgressState): Promise<ProgressState> {
  const doc = await HintProgressModel.create(state);
  return toProgress(doc);
}

export async function saveProgress(state: ProgressState): Promise<void> {
  await HintProgressModel.updateOne(
    { userId: state.userId, problemId: state.problemId },
    {
      $set: {
        attemptsCount: state.attemptsCount,
        failedAttemptsCount: state.failedAttemptsCount,
        currentHintLevel: state.currentHintLevel,
        lastActivityTimestamp: state.lastActivityTimestamp,
      },
    },
    { upsert: true }
  );
}

export async function listUserProgress(userId: string): Promise<ProgressState[]> {
  const docs = await HintProgressModel.find({ userId }).sort({ lastActivityTimestamp: -1 }).lean();
  return docs.map(toProgress);
}

// ---- attempts ----

export async function appendAttempt(args: {
  userId: string;
  problemId: string;
  code: string;
  status: AttemptStatus;
  evaluation: AttemptEvaluation | null;
}): Promise<AttemptRecord> {
  const doc = await AttemptModel.create({
    attemptId: crypto.randomUUID(),
    userId: args.userId,
    problemId: args.problemId,
    code: args.code,
    status: args.status,
    evaluation: args.evaluation
      ? {
          ...args.evaluation,
          edgeCases: [...args.evaluation.edgeCases],
          suggestions: [...args.evaluation.suggestions],
        }
      : null,
    createdAt: new Date(),
  });
  return toAttempt(doc);
}

export async function listUserAttempts(userId: string): Promise<AttemptRecord[]> {
  const docs = await AttemptModel.find({ userId }).sort({ createdAt: -1 }).lean();
  return docs.map(toAttempt);
}

// ---- learner history (similarity context) ----

// Problems the learner attempted besides this one, in the order of their first attempt.
export async function listAttemptedProblems(userId: string, excludeProblemId: string): Promise<Problem[]> {
  const rows = await AttemptModel.aggregate<{ _id: string }>([
    { $match: { userId, problemId: { $ne: excludeProblemId } } },
    { $group: { _id: "$problemId", firstAttemptAt: { $min: "$createdAt" } } },
    { $sort: { firstAttemptAt: 1, _id: 1 } },
  ]);
  const others = rows.map((r) => r._id);
  if (others.length === 0) return [];

  const docs = await ProblemModel.find({ problemId: { $in: others } }).lean();
  const byId = new Map(docs.map((d) => [d.problemId, toProblem(d)]));
  return others.flatMap((id) => byId.get(id) ?? []);
}

export async function latestSuccessfulCode(userId: string, problemId: string): Promise<string | null> {
  const doc = await AttemptModel.findOne({ userId, problemId, status: "success" })
    .sort({ createdAt: -1 })
    .lean();
  return doc ? doc.code : null;
}

export async function failedAttemptReasons(userId: string, problemId: string, limit: number): Promise<string[]> {
  const docs = await AttemptModel.find({ userId, problemId, status: "failed", evaluation: { $ne: null } })
    .sort({ createdAt: -1 })
    .limit(limit)
    .lean();
  return docs.flatMap((d) => (d.evaluation && d.evaluation.reason ? [d.evaluation.reason] : []));
}

// ---- hints ----

export async function saveHint(args: {
  problemId: string;
  content: string;
  level: number;
  type: HintType;
}): Promise<string> {
  const hintId = crypto.randomUUID();
  await HintModel.create({ hintId, ...args });
  return hintId;
}

export async function recordDelivery(args: {
  hintId: string;
  userId: string;
  problemId: string;
  attemptId: string | null;
  isAutoTriggered: boolean;
}): Promise<void> {
  await HintDeliveryModel.create({ deliveryId: crypto.randomUUID(), deliveredAt: new Date(), ...args });
}

// Rates the latest delivery of the hint to this learner; false when there is none.
export async function recordFeedback(args: {
  hintId: string;
  userId: string;
  rating: number;
  feedbackText: string | null;
}): Promise<boolean> {
  const doc = await HintDeliveryModel.findOneAndUpdate(
    { hintId: args.hintId, userId: args.userId },
    { $set: { rating: args.rating, feedbackText: args.feedbackText, feedbackAt: new Date() } },
    { sort: { deliveredAt: -1 }, new: true }
  ).lean();
  return doc !== null;
}

export async function saveHintEvaluation(hintId: string, scores: HintScores, degraded: boolean): Promise<void> {
  await HintEvaluationModel.create({ hintId, ...scores, degraded });
}

// Hint texts delivered to this learner on this problem, most recent first.
export async function listRecentHints(userId: string, problemId: string, limit = 5): Promise<string[]> {
  const deliveries = await HintDeliveryModel.find({ userId, problemId })
    .sort({ deliveredAt: -1 })
    .limit(limit)
    .lean();
  if (deliveries.length === 0) return [];

  const hints = await HintModel.find({ hintId: { $in: deliveries.map((d) => d.hintId) } }).lean();
  const byId = new Map(hints.map((h) => [h.hintId, h.content]));
  return deliveries.flatMap((d) => byId.get(d.hintId) ?? []);
}
