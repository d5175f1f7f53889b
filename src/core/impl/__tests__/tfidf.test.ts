import { describe, expect, it } from "vitest";
import { TfIdfVectorizer, idf } from "../tfidfVectorizer.js";
import type { DocId, TermCounts } from "../../types.js";

function corpus(docs: Record<DocId, Record<string, number>>): Map<DocId, TermCounts> {
  return new Map(Object.entries(docs).map(([id, counts]) => [id, new Map(Object.entries(counts))]));
}

function sumOfSquares(v: Map<string, number>): number {
  let s = 0;
  for (const x of v.values()) s += x * x;
  return s;
}

describe("TfIdfVectorizer", () => {
  const vec = new TfIdfVectorizer();

  it("computes term frequency as count / total", () => {
    const tf = vec.termFrequencies(new Map([["apple", 2], ["banana", 1]]));
    expect(tf.get("apple")).toBeCloseTo(2 / 3, 12);
    expect(tf.get("banana")).toBeCloseTo(1 / 3, 12);
  });

  it("maps an empty document to an empty tf vector", () => {
    expect(vec.termFrequencies(new Map()).size).toBe(0);
    expect(vec.termFrequencies(new Map([["ghost", 0]])).size).toBe(0);
  });

  it("uses smoothed idf", () => {
    expect(idf(2, 2)).toBe(1);
    expect(idf(2, 1)).toBe(Math.log(3 / 2) + 1);
    expect(idf(0, 0)).toBe(1);
  });

  it("gives weight exactly 1 to a term present in every document", () => {
    const weights = vec.inverseDocumentFrequencies(
      corpus({ a: { common: 3, x: 1 }, b: { common: 1 }, c: { common: 7, y: 2 } }),
    );
    expect(weights.get("common")).toBe(1);
    expect(weights.get("x")).toBe(Math.log(4 / 2) + 1);
  });

  it("counts empty documents in N", () => {
    const weights = vec.inverseDocumentFrequencies(corpus({ a: { word: 1 }, empty: {} }));
    expect(weights.get("word")).toBe(Math.log(3 / 2) + 1);
  });

  it("weighs unknown terms as zero", () => {
    const out = vec.weigh(new Map([["known", 0.5], ["unknown", 0.5]]), new Map([["known", 2]]));
    expect(out.get("known")).toBe(1);
    expect(out.get("unknown")).toBe(0);
  });

  it("scales to unit L2 length", () => {
    const out = vec.l2Normalize(new Map([["a", 3], ["b", 4]]));
    expect(out.get("a")).toBeCloseTo(0.6, 12);
    expect(out.get("b")).toBeCloseTo(0.8, 12);
  });

  it("leaves zero-length vectors untouched", () => {
    expect(vec.l2Normalize(new Map()).size).toBe(0);
    const zero = vec.l2Normalize(new Map([["a", 0]]));
    expect(zero.get("a")).toBe(0);
  });

  it("vectorizes a corpus into unit vectors", () => {
    const vectors = vec.vectorize(corpus({ doc1: { apple: 2, banana: 1 }, doc2: { banana: 1, cherry: 1 } }));

    const doc1 = vectors.get("doc1");
    const doc2 = vectors.get("doc2");
    expect(doc1?.get("apple")).toBeCloseTo(0.9421556246632359, 10);
    expect(doc1?.get("banana")).toBeCloseTo(0.3351757433279261, 10);
    expect(doc2?.get("banana")).toBeCloseTo(0.5797386715376657, 10);
    expect(doc2?.get("cherry")).toBeCloseTo(0.8148024746671689, 10);

    for (const id of ["doc1", "doc2"]) {
      expect(sumOfSquares(vectors.get(id) ?? new Map())).toBeCloseTo(1, 12);
    }
  });

  it("gives empty documents an empty vector", () => {
    const vectors = vec.vectorize(corpus({ doc1: { apple: 1 }, empty: {} }));
    expect(vectors.get("empty")?.size).toBe(0);
    expect(vectors.get("doc1")?.get("apple")).toBeCloseTo(1, 15);
  });
});
