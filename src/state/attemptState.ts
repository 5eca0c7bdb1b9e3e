// src/state/attemptState.ts

import mongoose from "mongoose";
import type { AttemptStatus } from "../types/hints";

export type StoredEvaluation = {
  success: boolean;
  reason: string;
  complexity: string;
  edgeCases: string[];
  codeQuality: string;
  suggestions: string[];
};

export type AttemptDoc = {
  attemptId: string;
  userId: string;
  problemId: string;
  code: string;
  status: AttemptStatus;
  evaluation: StoredEvaluation | null;
  createdAt: Date;
};

const EvaluationSchema = new mongoose.Schema<StoredEvaluation>(
  {
    success: { type: Boolean, required: true },
    reason: { type: String, default: "" },
    complexity: { type: String, default: "" },
    edgeCases: { type: [String], default: [] },
    codeQuality: { type: String, default: "" },
    suggestions: { type: [String], default: [] },
  },
  { _id: false }
);

const AttemptSchema = new mongoose.Schema<AttemptDoc>({
  attemptId: { type: String, required: true, unique: true },
  userId: { type: String, required: true },
  problemId: { type: String, required: true },
  code: { type: String, required: true },
  status: { type: String, enum: ["success", "failed"], required: true },
  // null when the attempt could not be evaluated
  evaluation: { type: EvaluationSchema, default: null },
  createdAt: { type: Date, default: Date.now },
});

AttemptSchema.index({ userId: 1, problemId: 1, createdAt: -1 });

export const AttemptModel: mongoose.Model<AttemptDoc> =
  mongoose.models.Attempt || mongoose.model<AttemptDoc>("Attempt", AttemptSchema);
