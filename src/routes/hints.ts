// src/routes/hints.ts

import { Router } from "express";
import { checkAutoTrigger, requestHint, submitHintFeedback } from "../controllers/hintController";

const router = Router();

router.post("/request", requestHint);
router.post("/auto-trigger", checkAutoTrigger);
router.post("/:hintId/feedback", submitHintFeedback);

export default router;
