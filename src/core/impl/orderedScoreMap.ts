import type { DocId } from "../types.js";
import type { RankedDocs, ScoredDoc } from "../invertedIndex.js";
import type { ExactScore } from "../score.js";

/**
 * What happens when a second document arrives with a score equal to an existing key.
 * - replace: the later document takes the key (one entry per distinct score)
 * - retain: both are kept, equal scores ordered by docId
 */
export type ScoreCollisionPolicy = "replace" | "retain";

function compareDocIds(a: DocId, b: DocId): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Score -> docId mapping kept sorted ascending by exact score.
 *
 * Inserts are appended; the first read after any insert (or `compact()`, which the index
 * calls when sealed) sorts once and applies the collision policy. Reads walk from the
 * maximum end.
 */
export class OrderedScoreMap implements RankedDocs {
  private entries: ScoredDoc[] = [];
  private dirty = false;

  constructor(private readonly onCollision: ScoreCollisionPolicy = "replace") {}

  set(score: ExactScore, docId: DocId): void {
    this.entries.push({ score, docId });
    this.dirty = true;
  }

  /** Sorts pending inserts and drops the entries the collision policy discards. */
  compact(): void {
    if (!this.dirty) return;
    this.dirty = false;

    // Array.prototype.sort is stable: equal scores stay in insertion order
    const sorted =
      this.onCollision === "replace"
        ? this.entries.sort((a, b) => a.score.compare(b.score))
        : this.entries.sort((a, b) => a.score.compare(b.score) || compareDocIds(a.docId, b.docId));

    const out: ScoredDoc[] = [];
    for (const e of sorted) {
      const prev = out[out.length - 1];
      if (prev && prev.score.equals(e.score)) {
        if (this.onCollision === "replace") {
          out[out.length - 1] = e;
          continue;
        }
        if (prev.docId === e.docId) continue;
      }
      out.push(e);
    }
    this.entries = out;
  }

  size(): number {
    this.compact();
    return this.entries.length;
  }

  top(n: number): ScoredDoc[] {
    this.compact();
    const out: ScoredDoc[] = [];
    for (let i = this.entries.length - 1; i >= 0 && out.length < n; i--) {
      const e = this.entries[i];
      if (e) out.push(e);
    }
    return out;
  }

  /** Ascending order. */
  toArray(): ScoredDoc[] {
    this.compact();
    return Array.from(this.entries);
  }
}
