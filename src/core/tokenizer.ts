import type { Term, TermCounts, Token } from "./types.js";

/**
 * Turns text into a stream of normalized tokens.
 *
 * Contract notes:
 * - should be deterministic for given input
 * - `normalize` must be idempotent and is shared with query handling
 */
export interface Tokenizer {
  tokenize(text: string): Iterable<Token>;
  normalize(word: string): Term;
  countTerms(text: string): TermCounts;
}
