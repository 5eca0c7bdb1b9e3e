// src/controllers/progressController.ts

import type { Request, Response } from "express";
import { sendError } from "../http/sendError";
import { logServerError } from "../utils/logger";
import { fetchProgress, listUserAttempts, listUserProgress, saveProgress } from "../storage/hintStore";
import { summarizeLearningPatterns } from "../services/learningPatterns";
import { getProgressTracker } from "../services/hintRuntime";
import { getHintPolicyConfig } from "../config/hintConfig";
import type { ProgressState } from "../types/hints";

function withStuckFlag(state: ProgressState, now: Date): ProgressState & { isStuck: boolean } {
  return { ...state, isStuck: getProgressTracker().isStuck(state, now, getHintPolicyConfig()) };
}

// GET /progress/:userId
export const getUserProgress = async (req: Request, res: Response) => {
  const { userId } = req.params;

  try {
    const now = new Date();
    const progress = await listUserProgress(userId);
    return res.status(200).json({ progress: progress.map((p) => withStuckFlag(p, now)) });
  } catch (err) {
    logServerError("getUserProgress", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to fetch progress", "SERVER_ERROR");
  }
};

// GET /progress/:userId/patterns
export const getLearningPatterns = async (req: Request, res: Response) => {
  const { userId } = req.params;

  try {
    const patterns = summarizeLearningPatterns(await listUserAttempts(userId));
    return res.status(200).json({ patterns });
  } catch (err) {
    logServerError("getLearningPatterns", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to fetch learning patterns", "SERVER_ERROR");
  }
};

// GET /progress/:userId/:problemId
export const getProblemProgress = async (req: Request, res: Response) => {
  const { userId, problemId } = req.params;

  try {
    const progress = await fetchProgress(userId, problemId);
    if (!progress) return sendError(res, 404, "No progress found", "NOT_FOUND");

    return res.status(200).json({ progress: withStuckFlag(progress, new Date()) });
  } catch (err) {
    logServerError("getProblemProgress", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to fetch problem progress", "SERVER_ERROR");
  }
};

// POST /progress/:userId/:problemId/reset
export const resetProblemProgress = async (req: Request, res: Response) => {
  const { userId, problemId } = req.params;

  try {
    const existing = await fetchProgress(userId, problemId);
    if (!existing) return sendError(res, 404, "No progress found", "NOT_FOUND");

    const progress = getProgressTracker().resetHintLevel(existing);
    await saveProgress(progress);
    return res.status(200).json({ progress: withStuckFlag(progress, new Date()) });
  } catch (err) {
    logServerError("resetProblemProgress", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to reset progress", "SERVER_ERROR");
  }
};
