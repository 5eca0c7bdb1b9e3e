// src/state/progressState.ts

import mongoose from "mongoose";
import type { ProgressState } from "../types/hints";

const ProgressSchema = new mongoose.Schema<ProgressState>(
  {
    userId: { type: String, required: true },
    problemId: { type: String, required: true },

    attemptsCount: { type: Number, default: 0, min: 0 },
    failedAttemptsCount: { type: Number, default: 0, min: 0 },
    currentHintLevel: { type: Number, default: 1, min: 1 },

    lastActivityTimestamp: { type: Date, default: Date.now },
  },
  { timestamps: true }
);

ProgressSchema.index({ userId: 1, problemId: 1 }, { unique: true });

export const HintProgressModel: mongoose.Model<ProgressState> =
  mongoose.models.HintProgress || mongoose.model<ProgressState>("HintProgress", ProgressSchema);
