import { describe, it, expect } from "vitest";
import { createRandom, mathRandom, ScriptedRandom, SeededRandom } from "./rng";

describe("random sources", () => {
  it("the same seed yields the same stream", () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const drawsA = Array.from({ length: 20 }, () => a.next());
    const drawsB = Array.from({ length: 20 }, () => b.next());
    expect(drawsA).toEqual(drawsB);
    for (const d of drawsA) {
      expect(d).toBeGreaterThanOrEqual(0);
      expect(d).toBeLessThan(1);
    }
  });

  it("different seeds diverge", () => {
    expect(new SeededRandom(1).next()).not.toBe(new SeededRandom(2).next());
  });

  it("rejects invalid seeds", () => {
    expect(() => new SeededRandom(-1)).toThrow(RangeError);
    expect(() => new SeededRandom(1.5)).toThrow(RangeError);
  });

  it("scripted draws replay then fall back", () => {
    const rng = new ScriptedRandom([0.1, 0.9]);
    expect(rng.next()).toBe(0.1);
    expect(rng.next()).toBe(0.9);
    expect(rng.next()).toBe(0.5);
    expect(rng.consumed).toBe(2);
    expect(new ScriptedRandom([], 0.99).next()).toBe(0.99);
    expect(() => new ScriptedRandom([1])).toThrow(RangeError);
  });

  it("createRandom seeds only when asked", () => {
    expect(createRandom()).toBe(mathRandom);
    expect(createRandom(7)).toBeInstanceOf(SeededRandom);
  });
});
