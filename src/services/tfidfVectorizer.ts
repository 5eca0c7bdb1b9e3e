// src/services/tfidfVectorizer.ts

import stopWordList from "../data/stopWords.json";

export type Vectorizer = {
  readonly isFitted: boolean;
  fit: (documents: string[]) => void;
  transform: (document: string) => number[];
};

export class EmptyVocabularyError extends Error {
  constructor() {
    super("No indexable terms to build a vocabulary from");
    this.name = "EmptyVocabularyError";
  }
}

export type TfidfOptions = {
  maxFeatures?: number;
  maxNgram?: number;
  stopWords?: ReadonlySet<string>;
};

const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

// Tokens are runs of two or more letters, digits or underscores.
const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Term-frequency / inverse-document-frequency vectors over a frozen vocabulary.
 *
 * `fit` picks up to `maxFeatures` n-grams by corpus frequency and computes a
 * smoothed idf, `ln((1 + n) / (1 + df)) + 1`. `transform` never grows the
 * vocabulary: unseen terms are ignored. Vectors are L2-normalised, so the dot
 * product of two of them is their cosine similarity.
 */
export class TfidfVectorizer implements Vectorizer {
  private vocabulary = new Map<string, number>();
  private idf: number[] = [];
  private readonly maxFeatures: number;
  private readonly maxNgram: number;
  private readonly stopWords: ReadonlySet<string>;

  constructor(opts: TfidfOptions = {}) {
    this.maxFeatures = opts.maxFeatures ?? 1000;
    this.maxNgram = Math.max(1, opts.maxNgram ?? 2);
    this.stopWords = opts.stopWords ?? ENGLISH_STOP_WORDS;
  }

  get isFitted(): boolean {
    return this.vocabulary.size > 0;
  }

  get vocabularySize(): number {
    return this.vocabulary.size;
  }

  analyze(document: string): string[] {
    const tokens = (document.toLowerCase().match(TOKEN_PATTERN) ?? []).filter(
      (t) => !this.stopWords.has(t)
    );

    const terms: string[] = [];
    for (let n = 1; n <= this.maxNgram; n++) {
      for (let i = 0; i + n <= tokens.length; i++) {
        terms.push(tokens.slice(i, i + n).join(" "));
      }
    }
    return terms;
  }

  fit(documents: string[]): void {
    const totals = new Map<string, number>();
    const docFreq = new Map<string, number>();

    for (const doc of documents) {
      const terms = this.analyze(doc);
      for (const term of terms) totals.set(term, (totals.get(term) ?? 0) + 1);
      for (const term of new Set(terms)) docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }

    if (totals.size === 0) throw new EmptyVocabularyError();

    const kept = [...totals.entries()]
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .slice(0, this.maxFeatures)
      .map(([term]) => term)
      .sort();

    const n = documents.length;
    this.vocabulary = new Map(kept.map((term, idx) => [term, idx]));
    this.idf = kept.map((term) => Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1);
  }

  transform(document: string): number[] {
    const vector = new Array<number>(this.vocabulary.size).fill(0);
    for (const term of this.analyze(document)) {
      const idx = this.vocabulary.get(term);
      if (idx !== undefined) vector[idx] += 1;
    }

    for (let i = 0; i < vector.length; i++) vector[i] *= this.idf[i] ?? 0;
    return l2Normalize(vector);
  }
}

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) return vector;
  return vector.map((v) => v / norm);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
  }
  for (const v of a) normA += v * v;
  for (const v of b) normB += v * v;
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
