import type { DocumentInput, DocId, RankedMatch, TermCounts } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { IndexStats, InvertedIndexBuilder } from "../invertedIndex.js";
import type { RankOptions, Ranker } from "../ranker.js";
import type { Vectorizer } from "../vectorizer.js";
import { SearchError } from "../../errors.js";

export type SearchOutcome =
  | { status: "matched"; results: RankedMatch[] }
  | { status: "no-matches" };

export interface EngineDeps {
  tokenizer: Tokenizer;
  vectorizer: Vectorizer;
  index: InvertedIndexBuilder;
  ranker: Ranker;
}

export class MemorySearchEngine {
  private built = false;

  constructor(
    private readonly deps: EngineDeps,
    private readonly rankOptions: RankOptions = {},
  ) {}

  /** Builds the index from the whole corpus. Runs once; later documents are rejected. */
  indexCorpus(docs: Iterable<DocumentInput>): IndexStats {
    if (this.built) {
      throw new SearchError({ code: "INDEX_SEALED", detail: "corpus already indexed" });
    }

    const counts = new Map<DocId, TermCounts>();
    for (const doc of docs) {
      counts.set(doc.id, this.deps.tokenizer.countTerms(doc.text));
    }

    const vectors = this.deps.vectorizer.vectorize(counts);
    for (const [docId, scores] of vectors) {
      this.deps.index.addDocument(docId, scores);
    }
    this.deps.index.seal();
    this.built = true;

    return this.deps.index.getStats();
  }

  search(rawQuery: string): SearchOutcome {
    const results = this.deps.ranker.rank(rawQuery, this.deps.index, this.rankOptions);
    return results.length ? { status: "matched", results } : { status: "no-matches" };
  }

  getStats(): IndexStats {
    return this.deps.index.getStats();
  }
}
