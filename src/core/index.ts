export type { DocId, Term, Token, TermCounts, ScoreVector, DocumentInput, RankedMatch } from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { Trie, TriePrefixResult } from "./trie.js";
export type { InvertedIndex, InvertedIndexBuilder, PostingsList, RankedDocs, ScoredDoc, IndexStats } from "./invertedIndex.js";
export type { Ranker, RankOptions } from "./ranker.js";
export type { Vectorizer } from "./vectorizer.js";
export { ExactScore } from "./score.js";
export * from "./impl/index.js";
