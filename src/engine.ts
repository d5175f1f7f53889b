import {
  MemoryInvertedIndex,
  MemorySearchEngine,
  PrefixRanker,
  PunctuationTokenizer,
  TfIdfVectorizer,
  DEFAULT_PUNCTUATION,
  type ScoreCollisionPolicy,
} from "./core/impl/index.js";
import type { RankOptions } from "./core/ranker.js";

export interface EngineOptions extends RankOptions {
  punctuation?: ReadonlySet<string>;
  onScoreCollision?: ScoreCollisionPolicy;
}

export function createInMemoryEngine(options: EngineOptions = {}): MemorySearchEngine {
  const tokenizer = new PunctuationTokenizer(options.punctuation ?? DEFAULT_PUNCTUATION);
  const vectorizer = new TfIdfVectorizer();
  const index = new MemoryInvertedIndex({ onScoreCollision: options.onScoreCollision });
  const ranker = new PrefixRanker(tokenizer);

  return new MemorySearchEngine(
    { tokenizer, vectorizer, index, ranker },
    { perTermLimit: options.perTermLimit, resultLimit: options.resultLimit },
  );
}
