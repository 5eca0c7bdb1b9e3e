// src/ai/hintPrompts.ts

import type { AutoTriggerContext, HintDecision, SimilarityContext } from "../types/hints";

export type ProgressFields = {
  attemptsCount: number;
  failedAttemptsCount: number;
  currentHintLevel: number;
  elapsedSeconds: number;
};

export type HintPromptInput = ProgressFields & {
  problemDescription: string;
  userCode: string;
  previousHints: readonly string[];
  decision: HintDecision;
};

export type SimilarityPromptSections = {
  similarProblems: string;
  priorSolutions: string;
  errorPatterns: string;
};

const SIMILAR_DESCRIPTION_CHARS = 200;
const PRIOR_SOLUTION_CHARS = 300;

function cut(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function progressBlock(p: ProgressFields): string {
  return [
    "Learner progress:",
    `- Total attempts: ${p.attemptsCount}`,
    `- Failed attempts: ${p.failedAttemptsCount}`,
    `- Current hint level: ${p.currentHintLevel}`,
    `- Seconds since last activity: ${Math.round(p.elapsedSeconds)}`,
  ].join("\n");
}

function previousHintsBlock(hints: readonly string[]): string {
  if (hints.length === 0) return "Previous hints: none";
  return ["Previous hints (most recent first):", ...hints.map((h, i) => `${i + 1}. ${h.trim()}`)].join("\n");
}

export function buildAttemptEvaluationPrompt(problemDescription: string, userCode: string): string {
  return [
    `Problem description: ${problemDescription}`,
    "",
    "Learner code:",
    userCode,
    "",
    "Decide whether this code solves the problem. Consider logic, edge cases, time and space complexity, and code quality.",
    "",
    "Respond with exactly these lines:",
    "success: [true/false]",
    "reason: [one-sentence explanation]",
    "complexity: [time and space complexity]",
    "edge_cases: [comma-separated edge cases the code misses, empty if none]",
    "code_quality: [short assessment]",
    "suggestions: [comma-separated improvements]",
  ].join("\n");
}

export function buildSimilarityPromptSections(context: SimilarityContext): SimilarityPromptSections {
  const similarProblems =
    context.similarProblems.length === 0
      ? "No similar problems found in the learner's history."
      : context.similarProblems
          .map(
            ({ problem }, i) =>
              `${i + 1}. ${problem.title} (${problem.difficulty}): ${cut(problem.description, SIMILAR_DESCRIPTION_CHARS)}`
          )
          .join("\n");

  const solutions = Object.entries(context.priorSolutions);
  const priorSolutions =
    solutions.length === 0
      ? "No previous solutions for similar problems."
      : solutions
          .map(([title, code]) => `Problem: ${title}\nSolution: ${cut(code, PRIOR_SOLUTION_CHARS)}`)
          .join("\n\n");

  const errorPatterns =
    context.errorPatterns.length === 0
      ? "No recurring mistakes identified."
      : ["Mistakes this learner made on similar problems:", ...context.errorPatterns.map((p) => `- ${p}`)].join(
          "\n"
        );

  return { similarProblems, priorSolutions, errorPatterns };
}

function generationRules(decision: HintDecision, withHistory: boolean): string {
  return [
    "Write ONE hint that:",
    "- does not give away the solution or write the code for the learner",
    `- fits hint level ${decision.level} of 5 (1 = conceptual nudge, 5 = pinpoint the bug) and hint type "${decision.type}"`,
    "- builds on the previous hints instead of repeating them",
    "- refers to the learner's current code",
    ...(withHistory ? ["- uses what the learner did on similar problems, including their recurring mistakes"] : []),
    "",
    "Return only the hint text.",
  ].join("\n");
}

export function buildHintGenerationPrompt(
  input: HintPromptInput,
  sections?: SimilarityPromptSections | null
): string {
  const parts = [
    `Problem description: ${input.problemDescription}`,
    "",
    "Learner code:",
    input.userCode,
    "",
    progressBlock(input),
    "",
    previousHintsBlock(input.previousHints),
    "",
    `Hint level: ${input.decision.level}`,
    `Hint type: ${input.decision.type}`,
    "",
  ];

  if (sections) {
    parts.push(
      "Similar problems from this learner's history:",
      sections.similarProblems,
      "",
      "Learner's previous solutions:",
      sections.priorSolutions,
      "",
      sections.errorPatterns,
      ""
    );
  }

  parts.push(generationRules(input.decision, Boolean(sections)));
  return parts.join("\n");
}

export function buildHintEvaluationPrompt(
  input: ProgressFields & {
    problemDescription: string;
    userCode: string;
    previousHints: readonly string[];
    hintText: string;
  }
): string {
  return [
    `Problem description: ${input.problemDescription}`,
    "",
    "Learner code:",
    input.userCode,
    "",
    progressBlock(input),
    "",
    previousHintsBlock(input.previousHints),
    "",
    "Hint to evaluate:",
    input.hintText,
    "",
    "Score the hint from 0 to 1 on each line (0 = useless, 1 = ideal):",
    "safety_score: [does it avoid revealing the solution]",
    "helpfulness_score: [score]",
    "quality_score: [score]",
    "progress_alignment_score: [does it match where the learner is]",
    "pedagogical_value_score: [score]",
  ].join("\n");
}

export function buildAutoTriggerPrompt(ctx: AutoTriggerContext): string {
  const passed =
    typeof ctx.testCasesPassed === "number" && typeof ctx.totalTestCases === "number"
      ? `${ctx.testCasesPassed}/${ctx.totalTestCases}`
      : "unknown";

  return [
    `Problem description: ${ctx.problemDescription}`,
    "",
    "Learner code:",
    ctx.userCode,
    "",
    progressBlock(ctx),
    "",
    "Last attempt:",
    `- Status: ${ctx.lastAttemptStatus ?? "unknown"}`,
    `- Error message: ${ctx.lastAttemptError ?? "none"}`,
    `- Test cases passed: ${passed}`,
    "",
    "Decide whether to offer a hint now, without being asked. Weigh inactivity, failed attempts, error patterns and test failures.",
    "",
    "Respond with exactly these lines:",
    "decision: [yes/no]",
    "reason: [short reason]",
    "hint_type: [conceptual/approach/implementation/debug]",
    "hint_level: [1-5]",
  ].join("\n");
}
