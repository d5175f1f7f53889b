import type { RankedMatch } from "../types.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { RankOptions, Ranker } from "../ranker.js";
import type { Tokenizer } from "../tokenizer.js";

export const DEFAULT_PER_TERM_LIMIT = 9;
export const DEFAULT_RESULT_LIMIT = 100;

/**
 * Prefix ranker:
 * - normalizes the query the way documents were normalized
 * - gathers the best `perTermLimit` docs of every term sharing the prefix
 * - sorts by (exact term match, score) ascending, then reverses the whole list,
 *   so exact-term hits come first and each group reads highest score first
 */
export class PrefixRanker implements Ranker {
  constructor(private readonly tokenizer: Tokenizer) {}

  rank(rawQuery: string, index: InvertedIndex, options?: RankOptions): RankedMatch[] {
    const perTermLimit = options?.perTermLimit ?? DEFAULT_PER_TERM_LIMIT;
    const resultLimit = options?.resultLimit ?? DEFAULT_RESULT_LIMIT;
    const needle = this.tokenizer.normalize(rawQuery);

    const candidates: RankedMatch[] = [];
    for (const { term, docs } of index.withPrefix(needle)) {
      for (const { docId, score } of docs.top(perTermLimit)) {
        candidates.push({ docId, term, score });
      }
    }

    candidates.sort((a, b) => {
      const aExact = a.term === needle;
      const bExact = b.term === needle;
      if (aExact && !bExact) return 1;
      if (!aExact && bExact) return -1;
      return a.score.compare(b.score);
    });
    candidates.reverse();

    return candidates.slice(0, resultLimit);
  }
}
