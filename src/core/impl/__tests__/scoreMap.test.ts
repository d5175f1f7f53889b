import { describe, expect, it } from "vitest";
import { OrderedScoreMap } from "../orderedScoreMap.js";
import { ExactScore } from "../../score.js";

const s = (n: number) => ExactScore.fromNumber(n);

describe("OrderedScoreMap", () => {
  it("reads highest scores first", () => {
    const m = new OrderedScoreMap();
    m.set(s(0.1), "x");
    m.set(s(0.9), "y");
    m.set(s(0.5), "z");

    expect(m.top(2).map((e) => e.docId)).toEqual(["y", "z"]);
    expect(m.top(9).map((e) => e.docId)).toEqual(["y", "z", "x"]);
    expect(m.toArray().map((e) => e.docId)).toEqual(["x", "z", "y"]);
  });

  it("does not consume entries on read", () => {
    const m = new OrderedScoreMap();
    m.set(s(0.3), "a");
    m.top(1);
    expect(m.size()).toBe(1);
    expect(m.top(1).map((e) => e.docId)).toEqual(["a"]);
  });

  it("lets the last insert win an equal score by default", () => {
    const m = new OrderedScoreMap();
    m.set(s(0.5), "first");
    m.set(s(0.5), "second");
    expect(m.size()).toBe(1);
    expect(m.top(9).map((e) => e.docId)).toEqual(["second"]);
  });

  it("lets the last insert win even when other scores arrive in between", () => {
    const m = new OrderedScoreMap();
    m.set(s(0.5), "a");
    m.set(s(0.7), "b");
    m.set(s(0.5), "c");
    m.set(s(0.1), "d");
    m.compact();
    expect(m.toArray().map((e) => e.docId)).toEqual(["d", "c", "b"]);

    m.set(s(0.1), "e");
    expect(m.top(9).map((e) => e.docId)).toEqual(["b", "c", "e"]);
  });

  it("orders a large batch of inserts", () => {
    const m = new OrderedScoreMap();
    const n = 50_000;
    for (let i = n; i >= 1; i--) m.set(s(i / n), `d${i}`);

    expect(m.size()).toBe(n);
    expect(m.top(3).map((e) => e.docId)).toEqual([`d${n}`, `d${n - 1}`, `d${n - 2}`]);
    expect(m.toArray()[0]?.docId).toBe("d1");
  });

  it("keeps colliding documents when retaining", () => {
    const m = new OrderedScoreMap("retain");
    m.set(s(0.5), "b");
    m.set(s(0.5), "a");
    m.set(s(0.7), "c");
    m.set(s(0.5), "a");
    expect(m.size()).toBe(3);
    expect(m.top(9).map((e) => e.docId)).toEqual(["c", "b", "a"]);
  });

  it("keeps scores apart that differ in the last bit", () => {
    const m = new OrderedScoreMap();
    m.set(s(0.3), "plain");
    m.set(s(0.1 + 0.2), "sum");
    expect(m.top(9).map((e) => e.docId)).toEqual(["sum", "plain"]);
  });
});
