// src/controllers/hintController.ts

import type { Request, Response } from "express";
import { sendError } from "../http/sendError";
import { logEvent, logServerError } from "../utils/logger";
import {
  validateAutoTriggerBody,
  validateFeedbackBody,
  validateHintRequestBody,
} from "../validation/hintRequestValidator";
import {
  appendAttempt,
  createProblem,
  findProblem,
  listRecentHints,
  recordDelivery,
  recordFeedback,
  saveHint,
  saveHintEvaluation,
  saveProgress,
} from "../storage/hintStore";
import { getHintOrchestrator, getProgressTracker, refreshSimilarityIndexLogged } from "../services/hintRuntime";
import { MAX_PREVIOUS_HINTS } from "../services/hintOrchestrator";
import { elapsedSecondsSince } from "../state/progressTracker";
import { getHintPolicyConfig } from "../config/hintConfig";

// POST /hints/request
export const requestHint = async (req: Request, res: Response) => {
  const parsed = validateHintRequestBody(req.body);
  if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

  const { userId, problemId, userCode, problemData } = parsed.value;
  const requestId: string | undefined = res.locals?.requestId;

  try {
    let problem = await findProblem(problemId);
    if (!problem) {
      if (!problemData) return sendError(res, 404, "Problem not found", "NOT_FOUND");
      problem = await createProblem({ problemId, ...problemData });
      await refreshSimilarityIndexLogged(requestId);
    }

    const tracker = getProgressTracker();
    const orchestrator = getHintOrchestrator();

    let progress = await tracker.getOrCreate(userId, problemId);

    const evaluation = await orchestrator.evaluateAttempt(problem.description, userCode);
    const succeeded = evaluation.ok && evaluation.value.success;
    const attempt = await appendAttempt({
      userId,
      problemId,
      code: userCode,
      status: succeeded ? "success" : "failed",
      evaluation: evaluation.ok ? evaluation.value : null,
    });

    progress = tracker.recordAttempt(progress, succeeded);
    const now = new Date();
    // judged on the idle time before this request
    const isStuck = tracker.isStuck(progress, now, getHintPolicyConfig());
    const touched = tracker.touch(progress, now);
    progress = touched.state;

    const previousHints = await listRecentHints(userId, problemId, MAX_PREVIOUS_HINTS);

    const result = await orchestrator.process({
      userId,
      problemId,
      problemDescription: problem.description,
      problemTitle: problem.title,
      problemDifficulty: problem.difficulty,
      userCode,
      attemptsCount: progress.attemptsCount,
      failedAttemptsCount: progress.failedAttemptsCount,
      currentHintLevel: progress.currentHintLevel,
      elapsedSeconds: touched.elapsedSeconds,
      previousHints,
      attemptEvaluation: evaluation,
    });

    progress = tracker.applyHintLevel(progress, result.level);
    await saveProgress(progress);

    const hintId = await saveHint({ problemId, content: result.hintText, level: result.level, type: result.type });
    await recordDelivery({ hintId, userId, problemId, attemptId: attempt.attemptId, isAutoTriggered: false });
    await saveHintEvaluation(
      hintId,
      result.hintScores,
      result.degradations.some((d) => d.stage === "hint_evaluation")
    );

    const degraded = result.degradations.length > 0;
    if (degraded) {
      logEvent("warn", "hint_degraded", { requestId, hintId, degradations: result.degradations });
    }

    return res.status(200).json({
      hintId,
      hintContent: result.hintText,
      hintLevel: result.level,
      hintType: result.type,
      attemptEvaluation: result.attemptEvaluation,
      hintEvaluation: result.hintScores,
      userProgress: { ...progress, isStuck },
      degraded,
    });
  } catch (err) {
    logServerError("requestHint", err, requestId);
    return sendError(res, 500, "Failed to generate hint", "SERVER_ERROR");
  }
};

// POST /hints/auto-trigger
export const checkAutoTrigger = async (req: Request, res: Response) => {
  const parsed = validateAutoTriggerBody(req.body);
  if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

  const { userId, problemId, userCode, ...lastAttempt } = parsed.value;

  try {
    const problem = await findProblem(problemId);
    if (!problem) return sendError(res, 404, "Problem not found", "NOT_FOUND");

    // Asking whether to hint is not learner activity, so the timestamp stays put.
    const progress = await getProgressTracker().getOrCreate(userId, problemId);

    const decision = await getHintOrchestrator().checkAutoTrigger({
      problemDescription: problem.description,
      userCode,
      attemptsCount: progress.attemptsCount,
      failedAttemptsCount: progress.failedAttemptsCount,
      currentHintLevel: progress.currentHintLevel,
      elapsedSeconds: elapsedSecondsSince(progress.lastActivityTimestamp, new Date()),
      ...lastAttempt,
    });

    return res.status(200).json(decision);
  } catch (err) {
    logServerError("checkAutoTrigger", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to check auto-trigger", "SERVER_ERROR");
  }
};

// POST /hints/:hintId/feedback
export const submitHintFeedback = async (req: Request, res: Response) => {
  const parsed = validateFeedbackBody(req.body);
  if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

  const { hintId } = req.params;
  const { userId, rating, feedbackText } = parsed.value;
  const requestId: string | undefined = res.locals?.requestId;

  try {
    const found = await recordFeedback({ hintId, userId, rating, feedbackText });
    if (!found) return sendError(res, 404, "Hint delivery not found", "NOT_FOUND");

    logEvent("info", "hint_feedback_recorded", { requestId, hintId, rating });
    return res.status(200).json({ message: "Feedback recorded", hintId, rating });
  } catch (err) {
    logServerError("submitHintFeedback", err, requestId);
    return sendError(res, 500, "Failed to record feedback", "SERVER_ERROR");
  }
};
