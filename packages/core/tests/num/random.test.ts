import { describe, it, expect } from "vitest";
import { createPRNG, sampleDistinctIndices } from "../../src/num/random.js";

describe("random", () => {
  describe("createPRNG", () => {
    it("should repeat the sequence for the same seed", () => {
      const a = createPRNG(42);
      const b = createPRNG(42);
      const first = Array.from({ length: 5 }, () => a());
      const second = Array.from({ length: 5 }, () => b());
      expect(first).toEqual(second);
    });

    it("should produce different sequences for different seeds", () => {
      const a = createPRNG(1);
      const b = createPRNG(2);
      expect(a()).not.toBe(b());
    });

    it("should stay within [0, 1)", () => {
      const rng = createPRNG(7);
      for (let i = 0; i < 1000; i++) {
        const x = rng();
        expect(x).toBeGreaterThanOrEqual(0);
        expect(x).toBeLessThan(1);
      }
    });
  });

  describe("sampleDistinctIndices", () => {
    it("should draw distinct indices in range", () => {
      const rng = createPRNG(3);
      for (let round = 0; round < 50; round++) {
        const sample = sampleDistinctIndices(10, 3, rng);
        expect(sample).toHaveLength(3);
        expect(new Set(sample).size).toBe(3);
        for (const i of sample) {
          expect(i).toBeGreaterThanOrEqual(0);
          expect(i).toBeLessThan(10);
        }
      }
    });

    it("should return every index when n < k", () => {
      const sample = sampleDistinctIndices(2, 3, createPRNG(5));
      expect([...sample].sort()).toEqual([0, 1]);
    });
  });
});
