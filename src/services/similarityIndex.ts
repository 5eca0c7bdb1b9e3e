// src/services/similarityIndex.ts

import type { Problem, SimilarProblem } from "../types/hints";
import { jsonLogger, describeError, type HintLogger } from "../utils/logger";
import { TfidfVectorizer, cosineSimilarity, type Vectorizer } from "./tfidfVectorizer";

export class EmbeddingError extends Error {
  constructor(
    public readonly problemId: string,
    message: string
  ) {
    super(message);
    this.name = "EmbeddingError";
  }
}

export type SimilarityIndexOptions = {
  vectorizer?: Vectorizer;
  logger?: HintLogger;
};

export function preprocessProblemText(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, " ")
    .replace(/[^\p{L}\p{N}_\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

function problemText(problem: Problem): string {
  const title = typeof problem.title === "string" ? problem.title : "";
  const description = typeof problem.description === "string" ? problem.description : "";
  const body = preprocessProblemText(`${title} ${description}`);
  if (!body) {
    throw new EmbeddingError(problem.problemId, `Problem ${problem.problemId} has no indexable text`);
  }
  const difficulty = typeof problem.difficulty === "string" ? problem.difficulty : "";
  return preprocessProblemText(`${body} ${difficulty}`);
}

/**
 * Embedding cache plus personalised similarity ranking.
 *
 * The vocabulary is fitted once, on the first problem embedded, and stays frozen
 * until `rebuild` refits it on a whole corpus. Embeddings are cached by problemId
 * for the life of the instance.
 */
export class SimilarityIndex {
  private readonly embeddings = new Map<string, number[]>();
  private readonly vectorizer: Vectorizer;
  private readonly logger: HintLogger;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(opts: SimilarityIndexOptions = {}) {
    this.vectorizer = opts.vectorizer ?? new TfidfVectorizer();
    this.logger = opts.logger ?? jsonLogger;
  }

  has(problemId: string): boolean {
    return this.embeddings.has(problemId);
  }

  embed(problem: Problem): number[] {
    const cached = this.embeddings.get(problem.problemId);
    if (cached) return cached;

    const text = problemText(problem);
    let vector: number[];
    try {
      if (!this.vectorizer.isFitted) this.vectorizer.fit([text]);
      vector = this.vectorizer.transform(text);
    } catch (err) {
      throw new EmbeddingError(problem.problemId, describeError(err));
    }

    this.embeddings.set(problem.problemId, vector);
    return vector;
  }

  topKSimilar(target: Problem, candidatePool: readonly Problem[], k = 3): SimilarProblem[] {
    if (k <= 0 || candidatePool.length === 0) return [];

    const targetVector = this.embed(target);
    const scored: SimilarProblem[] = [];

    for (const candidate of candidatePool) {
      if (candidate.problemId === target.problemId) continue;
      try {
        const score = cosineSimilarity(targetVector, this.embed(candidate));
        scored.push({ problem: candidate, score: Math.min(1, Math.max(0, score)) });
      } catch (err) {
        this.logger.warn("similarity_candidate_skipped", {
          problemId: candidate.problemId,
          error: describeError(err),
        });
      }
    }

    // Array.prototype.sort is stable, so equal scores keep pool order.
    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }

  /**
   * Drops every cached embedding, refits the vocabulary on `problems` and
   * re-embeds them. Problems that cannot be embedded are logged and left out.
   */
  rebuild(problems: readonly Problem[]): number {
    this.embeddings.clear();

    const texts: Array<{ problem: Problem; text: string }> = [];
    for (const problem of problems) {
      try {
        texts.push({ problem, text: problemText(problem) });
      } catch (err) {
        this.logger.warn("similarity_rebuild_skipped", {
          problemId: problem.problemId,
          error: describeError(err),
        });
      }
    }
    if (texts.length === 0) return 0;

    this.vectorizer.fit(texts.map((t) => t.text));
    for (const { problem, text } of texts) {
      this.embeddings.set(problem.problemId, this.vectorizer.transform(text));
    }

    this.logger.info("similarity_index_rebuilt", { problems: this.embeddings.size });
    return this.embeddings.size;
  }

  // Rebuilds queue behind each other so two loaders never interleave their writes.
  rebuildFrom(loader: () => Promise<readonly Problem[]>): Promise<number> {
    const run = this.writeQueue.then(async () => this.rebuild(await loader()));
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
