import type { Term } from "../types.js";
import type { Trie, TriePrefixResult } from "../trie.js";

type Node<V> = {
  children: Map<number, Node<V>>;
  entry?: TriePrefixResult<V>;
};

function makeNode<V>(): Node<V> {
  return { children: new Map() };
}

function bytesOf(s: string): Uint8Array {
  return Buffer.from(s, "utf8");
}

/**
 * Byte-level trie: one edge per UTF-8 byte of the key, so prefixes are byte prefixes.
 */
export class MemoryTrie<V> implements Trie<V> {
  private readonly root: Node<V> = makeNode<V>();
  private count = 0;

  insert(term: Term, value: V): void {
    let cur = this.root;
    for (const b of bytesOf(term)) {
      let next = cur.children.get(b);
      if (!next) {
        next = makeNode<V>();
        cur.children.set(b, next);
      }
      cur = next;
    }

    if (!cur.entry) this.count++;
    cur.entry = { term, value };
  }

  get(term: Term): V | undefined {
    return this.find(bytesOf(term))?.entry?.value;
  }

  has(term: Term): boolean {
    return this.find(bytesOf(term))?.entry !== undefined;
  }

  size(): number {
    return this.count;
  }

  *withPrefix(prefix: string): Iterable<TriePrefixResult<V>> {
    const start = this.find(bytesOf(prefix));
    if (!start) return;

    // depth-first, children pushed in descending byte order so pop() yields ascending keys
    const stack: Node<V>[] = [start];
    let node = stack.pop();
    while (node) {
      if (node.entry) yield node.entry;

      const keys = Array.from(node.children.keys()).sort((a, b) => b - a);
      for (const k of keys) {
        const child = node.children.get(k);
        if (child) stack.push(child);
      }
      node = stack.pop();
    }
  }

  private find(bytes: Uint8Array): Node<V> | undefined {
    let cur: Node<V> | undefined = this.root;
    for (const b of bytes) {
      cur = cur.children.get(b);
      if (!cur) return undefined;
    }
    return cur;
  }
}
