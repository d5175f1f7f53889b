import type { DocId, ScoreVector, Term, TermCounts } from "./types.js";

/**
 * Turns per-document term counts into weighted, comparable vectors.
 *
 * Phase 1 is smoothed TF-IDF with L2 normalization.
 */
export interface Vectorizer {
  termFrequencies(counts: TermCounts): ScoreVector;
  inverseDocumentFrequencies(corpus: Map<DocId, TermCounts>): Map<Term, number>;
  weigh(tf: ScoreVector, idf: Map<Term, number>): ScoreVector;
  l2Normalize(vector: ScoreVector): ScoreVector;

  vectorize(corpus: Map<DocId, TermCounts>): Map<DocId, ScoreVector>;
}
