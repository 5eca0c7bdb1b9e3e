// src/controllers/problemController.ts

import type { Request, Response } from "express";
import { sendError } from "../http/sendError";
import { logServerError } from "../utils/logger";
import { validateProblemBody } from "../validation/hintRequestValidator";
import { createProblem, findProblem, listAllProblems } from "../storage/hintStore";
import { refreshSimilarityIndexLogged } from "../services/hintRuntime";

// POST /problems
export const createProblemHandler = async (req: Request, res: Response) => {
  const parsed = validateProblemBody(req.body);
  if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

  try {
    if (await findProblem(parsed.value.problemId)) {
      return sendError(res, 409, "Problem already exists", "CONFLICT");
    }
    const problem = await createProblem(parsed.value);
    await refreshSimilarityIndexLogged(res.locals?.requestId);
    return res.status(201).json({ problem });
  } catch (err) {
    logServerError("createProblem", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to create problem", "SERVER_ERROR");
  }
};

// GET /problems
export const listProblems = async (_req: Request, res: Response) => {
  try {
    const problems = await listAllProblems();
    return res.status(200).json({ problems });
  } catch (err) {
    logServerError("listProblems", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to fetch problems", "SERVER_ERROR");
  }
};

// GET /problems/:problemId
export const getProblem = async (req: Request, res: Response) => {
  const { problemId } = req.params;

  try {
    const problem = await findProblem(problemId);
    if (!problem) return sendError(res, 404, "Problem not found", "NOT_FOUND");
    return res.status(200).json({ problem });
  } catch (err) {
    logServerError("getProblem", err, res.locals?.requestId);
    return sendError(res, 500, "Failed to fetch problem", "SERVER_ERROR");
  }
};
