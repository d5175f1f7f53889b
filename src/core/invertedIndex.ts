import type { DocId, ScoreVector, Term } from "./types.js";
import type { ExactScore } from "./score.js";

export interface ScoredDoc {
  score: ExactScore;
  docId: DocId;
}

/** Score-ordered documents for one term. */
export interface RankedDocs {
  size(): number;
  /** Up to `n` entries, highest score first. Does not consume the entries. */
  top(n: number): ScoredDoc[];
}

export interface PostingsList {
  term: Term;
  docs: RankedDocs;
}

export interface IndexStats {
  docCount: number;
  termCount: number;
}

/**
 * Read side of the inverted index: term -> score-ordered documents.
 *
 * Contract notes:
 * - read-only once built, safe to share between queries
 * - `withPrefix` enumerates terms without a full vocabulary scan
 */
export interface InvertedIndex {
  getPostings(term: Term): PostingsList | undefined;
  hasTerm(term: Term): boolean;
  withPrefix(prefix: string): Iterable<PostingsList>;

  getStats(): IndexStats;
}

/** Write side, used once while building. */
export interface InvertedIndexBuilder extends InvertedIndex {
  addDocument(docId: DocId, scores: ScoreVector): void;
  seal(): void;
}
