export { PunctuationTokenizer, DEFAULT_PUNCTUATION } from "./punctuationTokenizer.js";
export { TfIdfVectorizer, idf } from "./tfidfVectorizer.js";
export { OrderedScoreMap, type ScoreCollisionPolicy } from "./orderedScoreMap.js";
export { MemoryTrie } from "./memoryTrie.js";
export { MemoryInvertedIndex, buildIndex, type MemoryInvertedIndexOptions } from "./memoryInvertedIndex.js";
export { PrefixRanker, DEFAULT_PER_TERM_LIMIT, DEFAULT_RESULT_LIMIT } from "./prefixRanker.js";
export { MemorySearchEngine, type EngineDeps, type SearchOutcome } from "./memorySearchEngine.js";
