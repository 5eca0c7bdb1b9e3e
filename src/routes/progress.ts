// src/routes/progress.ts

import { Router } from "express";
import {
  getLearningPatterns,
  getProblemProgress,
  getUserProgress,
  resetProblemProgress,
} from "../controllers/progressController";

const router = Router();

router.get("/:userId", getUserProgress);
// before /:userId/:problemId, which would otherwise swallow it
router.get("/:userId/patterns", getLearningPatterns);
router.get("/:userId/:problemId", getProblemProgress);
router.post("/:userId/:problemId/reset", resetProblemProgress);

export default router;
