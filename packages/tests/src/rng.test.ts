import { describe, it, expect } from "vitest";
import { SeededRng } from "@ocrsets/core";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("int stays in [min, max) and reaches both ends", () => {
    const rng = new SeededRng(7);
    const seen = new Set<number>();
    for (let i = 0; i < 2000; i++) {
      const v = rng.int(0, 4);
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(4);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([0, 1, 2, 3]);
  });

  it("shuffle permutes in place", () => {
    const rng = new SeededRng(3);
    const arr = Array.from({ length: 20 }, (_, i) => i);
    const out = rng.shuffle(arr);
    expect(out).toBe(arr);
    expect([...arr].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(arr).not.toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it("reseeding replays the sequence", () => {
    const rng = new SeededRng(5);
    const first = [rng.next(), rng.next()];
    rng.seed(5);
    expect([rng.next(), rng.next()]).toEqual(first);
    expect(rng.state()).toBe(5);
  });

  it("different seeds give different sequences", () => {
    const rng1 = new SeededRng(1);
    const rng2 = new SeededRng(2);
    const v1 = rng1.next();
    const v2 = rng2.next();
    expect(v1).not.toBe(v2);
  });
});
