// src/state/problemState.ts

import mongoose from "mongoose";
import type { Difficulty } from "../types/hints";

export type ProblemDoc = {
  problemId: string;
  title: string;
  description: string;
  difficulty: Difficulty;
};

const ProblemSchema = new mongoose.Schema<ProblemDoc>(
  {
    problemId: { type: String, required: true, unique: true },
    title: { type: String, required: true },
    description: { type: String, required: true },
    difficulty: { type: String, enum: ["easy", "medium", "hard"], required: true },
  },
  { timestamps: true }
);

export const ProblemModel: mongoose.Model<ProblemDoc> =
  mongoose.models.Problem || mongoose.model<ProblemDoc>("Problem", ProblemSchema);
