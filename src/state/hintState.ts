// src/state/hintState.ts

import mongoose from "mongoose";
import type { HintScores, HintType } from "../types/hints";

export type HintDoc = {
  hintId: string;
  problemId: string;
  content: string;
  level: number;
  type: HintType;
};

export type HintDeliveryDoc = {
  deliveryId: string;
  hintId: string;
  userId: string;
  problemId: string;
  attemptId: string | null;
  isAutoTriggered: boolean;
  deliveredAt: Date;
  rating: number | null;
  feedbackText: string | null;
  feedbackAt: Date | null;
};

export type HintEvaluationDoc = HintScores & {
  hintId: string;
  degraded: boolean;
};

const HintSchema = new mongoose.Schema<HintDoc>(
  {
    hintId: { type: String, required: true, unique: true },
    problemId: { type: String, required: true },
    content: { type: String, required: true },
    level: { type: Number, required: true, min: 1 },
    type: { type: String, enum: ["conceptual", "approach", "implementation", "debug"], required: true },
  },
  { timestamps: true }
);

const HintDeliverySchema = new mongoose.Schema<HintDeliveryDoc>({
  deliveryId: { type: String, required: true, unique: true },
  hintId: { type: String, required: true },
  userId: { type: String, required: true },
  problemId: { type: String, required: true },
  attemptId: { type: String, default: null },
  isAutoTriggered: { type: Boolean, default: false },
  deliveredAt: { type: Date, default: Date.now },
  // learner feedback, set after delivery
  rating: { type: Number, min: 1, max: 5, default: null },
  feedbackText: { type: String, default: null },
  feedbackAt: { type: Date, default: null },
});

HintDeliverySchema.index({ userId: 1, problemId: 1, deliveredAt: -1 });
HintDeliverySchema.index({ hintId: 1, userId: 1 });

const score = { type: Number, required: true, min: 0, max: 1 };

const HintEvaluationSchema = new mongoose.Schema<HintEvaluationDoc>(
  {
    hintId: { type: String, required: true, unique: true },
    safety_score: score,
    helpfulness_score: score,
    quality_score: score,
    progress_alignment_score: score,
    pedagogical_value_score: score,
    // fallback scores, not a model judgement
    degraded: { type: Boolean, default: false },
  },
  { timestamps: true }
);

export const HintModel: mongoose.Model<HintDoc> =
  mongoose.models.Hint || mongoose.model<HintDoc>("Hint", HintSchema);

export const HintDeliveryModel: mongoose.Model<HintDeliveryDoc> =
  mongoose.models.HintDelivery || mongoose.model<HintDeliveryDoc>("HintDelivery", HintDeliverySchema);

export const HintEvaluationModel: mongoose.Model<HintEvaluationDoc> =
  mongoose.models.HintEvaluation || mongoose.model<HintEvaluationDoc>("HintEvaluation", HintEvaluationSchema);
