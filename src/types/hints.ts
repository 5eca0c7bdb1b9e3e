// src/types/hints.ts

export const HINT_TYPES = ["conceptual", "approach", "implementation", "debug"] as const;

export type HintType = (typeof HINT_TYPES)[number];

export type Difficulty = "easy" | "medium" | "hard";

export type AttemptStatus = "success" | "failed";

export type Problem = {
  problemId: string;
  title: string;
  description: string;
  difficulty: Difficulty;
};

export type ProgressState = {
  userId: string;
  problemId: string;
  attemptsCount: number;
  failedAttemptsCount: number;
  currentHintLevel: number;
  lastActivityTimestamp: Date;
};

export type AttemptEvaluation = Readonly<{
  success: boolean;
  reason: string;
  complexity: string;
  edgeCases: readonly string[];
  codeQuality: string;
  suggestions: readonly string[];
}>;

export type HintDecision = {
  level: number;
  type: HintType;
};

export type HintScores = {
  safety_score: number;
  helpfulness_score: number;
  quality_score: number;
  progress_alignment_score: number;
  pedagogical_value_score: number;
};

export type SimilarProblem = {
  problem: Problem;
  score: number;
};

export type SimilarityContext = {
  similarProblems: SimilarProblem[]; // sorted by score, highest first
  priorSolutions: Record<string, string>; // problem title -> code
  errorPatterns: string[];
};

export type HintStage = "attempt_evaluation" | "hint_generation" | "hint_evaluation" | "auto_trigger";

export type StageErrorKind = "not_configured" | "timeout" | "transport" | "api" | "empty_output";

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StageErrorKind; detail: string };

export type Degradation = {
  stage: HintStage;
  error: StageErrorKind | "skipped";
};

export type HintRequest = {
  userId: string;
  problemId: string;
  problemDescription: string;
  // Title and difficulty feed the similarity lookup when known.
  problemTitle?: string;
  problemDifficulty?: Difficulty;
  userCode: string;
  attemptsCount: number;
  failedAttemptsCount: number;
  currentHintLevel: number;
  elapsedSeconds: number;
  previousHints: string[]; // most recent first
  // Accepted for parity with stored requests; the pipeline decides the type itself.
  hintType?: HintType;
  // Outcome of an evaluation the caller already ran for this attempt; skips the evaluation call.
  attemptEvaluation?: StageResult<AttemptEvaluation>;
};

export type HintResult = {
  hintText: string;
  level: number;
  type: HintType;
  attemptEvaluation: AttemptEvaluation;
  hintScores: HintScores;
  degradations: Degradation[];
};

export type AutoTriggerContext = {
  problemDescription: string;
  userCode: string;
  attemptsCount: number;
  failedAttemptsCount: number;
  currentHintLevel: number;
  elapsedSeconds: number;
  lastAttemptStatus?: AttemptStatus | null;
  lastAttemptError?: string | null;
  testCasesPassed?: number | null;
  totalTestCases?: number | null;
};

export type AutoTriggerDecision = {
  shouldTrigger: boolean;
  reason: string;
  hintType: HintType;
  hintLevel: number;
  source: "ai" | "fallback";
};

export type AttemptRecord = {
  attemptId: string;
  userId: string;
  problemId: string;
  code: string;
  status: AttemptStatus;
  evaluation: AttemptEvaluation | null;
  createdAt: Date;
};

export type HintPolicyConfig = {
  failureThreshold: number;
  stuckTimeoutSeconds: number;
  maxHintLevel: number;
};
