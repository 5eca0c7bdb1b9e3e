// src/routes/problems.ts

import { Router } from "express";
import { createProblemHandler, getProblem, listProblems } from "../controllers/problemController";

const router = Router();

router.get("/", listProblems);
router.post("/", createProblemHandler);
router.get("/:problemId", getProblem);

export default router;
