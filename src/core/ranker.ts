import type { RankedMatch } from "./types.js";
import type { InvertedIndex } from "./invertedIndex.js";

export interface RankOptions {
  /** Documents taken from each matching term. */
  perTermLimit?: number;
  /** Cap on the final ranked list. */
  resultLimit?: number;
}

/**
 * Ranks indexed documents for a single-term prefix query.
 */
export interface Ranker {
  rank(rawQuery: string, index: InvertedIndex, options?: RankOptions): RankedMatch[];
}
