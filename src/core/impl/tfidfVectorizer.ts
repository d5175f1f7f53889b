import type { DocId, ScoreVector, Term, TermCounts } from "../types.js";
import type { Vectorizer } from "../vectorizer.js";

/** Smoothed idf: ln((N + 1) / (df + 1)) + 1, never zero, 1 for a term found in every document. */
export function idf(docCount: number, df: number): number {
  return Math.log((docCount + 1) / (df + 1)) + 1;
}

/**
 * TF-IDF vectorizer:
 * - tf is count / total tokens of the document
 * - idf counts presence only, over every document (empty ones included)
 * - each document vector is scaled to unit L2 length
 *
 * Empty documents produce empty vectors; a zero-length vector is left as-is, so no NaN
 * ever reaches the index.
 */
export class TfIdfVectorizer implements Vectorizer {
  termFrequencies(counts: TermCounts): ScoreVector {
    let total = 0;
    for (const c of counts.values()) if (c > 0) total += c;

    const tf: ScoreVector = new Map();
    if (total === 0) return tf;

    for (const [term, c] of counts) {
      if (c > 0) tf.set(term, c / total);
    }
    return tf;
  }

  inverseDocumentFrequencies(corpus: Map<DocId, TermCounts>): Map<Term, number> {
    const df = new Map<Term, number>();
    for (const counts of corpus.values()) {
      for (const [term, c] of counts) {
        if (c > 0) df.set(term, (df.get(term) ?? 0) + 1);
      }
    }

    const docCount = corpus.size;
    const weights = new Map<Term, number>();
    for (const [term, n] of df) weights.set(term, idf(docCount, n));
    return weights;
  }

  weigh(tf: ScoreVector, idfByTerm: Map<Term, number>): ScoreVector {
    const out: ScoreVector = new Map();
    for (const [term, f] of tf) {
      out.set(term, f * (idfByTerm.get(term) ?? 0));
    }
    return out;
  }

  l2Normalize(vector: ScoreVector): ScoreVector {
    let sumSq = 0;
    for (const v of vector.values()) sumSq += v * v;
    const norm = Math.sqrt(sumSq);
    if (norm === 0) return new Map(vector);

    const out: ScoreVector = new Map();
    for (const [term, v] of vector) out.set(term, v / norm);
    return out;
  }

  vectorize(corpus: Map<DocId, TermCounts>): Map<DocId, ScoreVector> {
    const idfByTerm = this.inverseDocumentFrequencies(corpus);

    const vectors = new Map<DocId, ScoreVector>();
    for (const [docId, counts] of corpus) {
      const tf = this.termFrequencies(counts);
      vectors.set(docId, this.l2Normalize(this.weigh(tf, idfByTerm)));
    }
    return vectors;
  }
}
