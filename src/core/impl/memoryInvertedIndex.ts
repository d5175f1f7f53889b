import type { DocId, ScoreVector, Term } from "../types.js";
import type { IndexStats, InvertedIndexBuilder, PostingsList } from "../invertedIndex.js";
import { ExactScore } from "../score.js";
import { SearchError } from "../../errors.js";
import { MemoryTrie } from "./memoryTrie.js";
import { OrderedScoreMap, type ScoreCollisionPolicy } from "./orderedScoreMap.js";

export interface MemoryInvertedIndexOptions {
  onScoreCollision?: ScoreCollisionPolicy;
}

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - trie over term bytes -> OrderedScoreMap (exact score -> docId)
 *
 * Documents are added once, then `seal()` freezes it for querying.
 */
export class MemoryInvertedIndex implements InvertedIndexBuilder {
  private readonly terms = new MemoryTrie<OrderedScoreMap>();
  private readonly docs = new Set<DocId>();
  private readonly onScoreCollision: ScoreCollisionPolicy;
  private sealed = false;

  constructor(options: MemoryInvertedIndexOptions = {}) {
    this.onScoreCollision = options.onScoreCollision ?? "replace";
  }

  addDocument(docId: DocId, scores: ScoreVector): void {
    if (this.sealed) {
      throw new SearchError({ code: "INDEX_SEALED", detail: `cannot add ${docId} after the index was built` });
    }
    this.docs.add(docId);

    for (const [term, score] of scores) {
      let ranked = this.terms.get(term);
      if (!ranked) {
        ranked = new OrderedScoreMap(this.onScoreCollision);
        this.terms.insert(term, ranked);
      }
      ranked.set(ExactScore.fromNumber(score), docId);
    }
  }

  seal(): void {
    for (const { value } of this.terms.withPrefix("")) value.compact();
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  getPostings(term: Term): PostingsList | undefined {
    const docs = this.terms.get(term);
    return docs ? { term, docs } : undefined;
  }

  hasTerm(term: Term): boolean {
    const m = this.terms.get(term);
    return !!m && m.size() > 0;
  }

  *withPrefix(prefix: string): Iterable<PostingsList> {
    for (const { term, value } of this.terms.withPrefix(prefix)) {
      yield { term, docs: value };
    }
  }

  getStats(): IndexStats {
    return { docCount: this.docs.size, termCount: this.terms.size() };
  }
}

/** Adds every document vector, in iteration order, and seals the result. */
export function buildIndex(
  vectors: Map<DocId, ScoreVector>,
  options: MemoryInvertedIndexOptions = {},
): MemoryInvertedIndex {
  const index = new MemoryInvertedIndex(options);
  for (const [docId, scores] of vectors) index.addDocument(docId, scores);
  index.seal();
  return index;
}
