/** Shared core types used by module contracts. */

import type { ExactScore } from "./score.js";

export type DocId = string;
export type Term = string;

/** A token produced by a tokenizer, already normalized. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
}

/** Raw occurrence count per term for one document. */
export type TermCounts = Map<Term, number>;

/** Real-valued weight per term for one document (tf, tf-idf, normalized tf-idf). */
export type ScoreVector = Map<Term, number>;

/** Minimal document representation used by indexing pipeline. */
export interface DocumentInput {
  id: DocId;
  text: string;
}

export interface RankedMatch {
  docId: DocId;
  /** the indexed term that matched the query prefix */
  term: Term;
  score: ExactScore;
}
