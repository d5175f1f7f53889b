import type { Term } from "./types.js";

export interface TriePrefixResult<V> {
  term: Term;
  value: V;
}

/**
 * Prefix trie keyed by the UTF-8 bytes of each term.
 */
export interface Trie<V> {
  insert(term: Term, value: V): void;
  get(term: Term): V | undefined;
  has(term: Term): boolean;
  size(): number;

  /** Yields every entry whose key starts with `prefix` (the prefix itself included), in byte order. */
  withPrefix(prefix: string): Iterable<TriePrefixResult<V>>;
}
