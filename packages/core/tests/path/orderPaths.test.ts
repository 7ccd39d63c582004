import { describe, it, expect } from "vitest";
import {
  dominantAxis,
  greedyPathOrder,
  meanPathDistance,
  orderPathIndices,
  orderPaths,
  pathCentroid,
} from "../../src/path/orderPaths.js";
import { checkPathSet, reversePath, type Path } from "../../src/path/types.js";
import { straightPath } from "../fixtures/geometry.js";

describe("orderPaths", () => {
  describe("meanPathDistance", () => {
    const a = straightPath(0, 3);
    const b = straightPath(3, 3);

    it("should average corresponding point distances", () => {
      expect(meanPathDistance(a, b)).toBe(3);
    });

    it("should ignore the direction either path was drawn in", () => {
      expect(meanPathDistance(a, reversePath(b))).toBe(3);
      expect(meanPathDistance(reversePath(b), a)).toBeCloseTo(meanPathDistance(a, b), 12);
    });

    it("should compare over the shorter length", () => {
      const short: Path = [
        [3, 0, 0],
        [3, 1, 0],
      ];
      expect(meanPathDistance(a, short)).toBe(3);
    });
  });

  describe("dominantAxis", () => {
    it("should pick the axis with the largest spread", () => {
      expect(
        dominantAxis([
          [0, 0, 0],
          [0, 1, 5],
        ])
      ).toBe(2);
    });

    it("should break ties toward x, then y", () => {
      expect(
        dominantAxis([
          [0, 0, 0],
          [1, 1, 0],
        ])
      ).toBe(0);
      expect(
        dominantAxis([
          [0, 0, 0],
          [0, 2, 2],
        ])
      ).toBe(1);
    });
  });

  it("should compute path centroids", () => {
    expect(pathCentroid(straightPath(4, 3))).toEqual([4, 1, 0]);
  });

  describe("greedyPathOrder", () => {
    it("should start at the extreme path and walk to nearest neighbours", () => {
      const paths = [straightPath(2, 3), straightPath(0, 3), straightPath(3, 3), straightPath(1, 3)];
      expect(greedyPathOrder(paths)).toEqual([1, 3, 0, 2]);
    });

    it("should handle reversed paths", () => {
      const paths = [straightPath(2, 3), straightPath(0, 3), reversePath(straightPath(1, 3))];
      expect(greedyPathOrder(paths)).toEqual([1, 2, 0]);
    });

    it("should break distance ties by input order", () => {
      const a = straightPath(0, 3);
      const b = straightPath(2, 3);
      const c = straightPath(0, 3, 2);
      expect(greedyPathOrder([a, b, c])).toEqual([0, 1, 2]);
      expect(greedyPathOrder([a, c, b])).toEqual([0, 1, 2]);
    });
  });

  describe("orderPaths", () => {
    const paths = [straightPath(2, 4), straightPath(0, 4), straightPath(3, 4), straightPath(1, 4)];

    it("should return the same path objects in traversal order", () => {
      const result = orderPaths(paths);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toHaveLength(4);
        expect(result.value[0]).toBe(paths[1]);
        expect(result.value[1]).toBe(paths[3]);
        expect(result.value[2]).toBe(paths[0]);
        expect(result.value[3]).toBe(paths[2]);
      }
    });

    it("should return a permutation of the input", () => {
      const result = orderPathIndices(paths);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect([...result.value].sort()).toEqual([0, 1, 2, 3]);
      }
    });

    it("should be idempotent", () => {
      const once = orderPaths(paths);
      expect(once.ok).toBe(true);
      if (once.ok) {
        const twice = orderPaths(once.value);
        expect(twice.ok && twice.value).toEqual(once.value);
      }
    });

    it("should not mutate the input array", () => {
      const copy = [...paths];
      orderPaths(paths);
      expect(paths).toEqual(copy);
    });

    it("should reject fewer than two paths", () => {
      const result = orderPaths([straightPath(0, 3)]);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("insufficientInput");
        expect(result.error.operation).toBe("orderPaths");
      }
    });

    it("should reject paths with fewer than two points", () => {
      const result = orderPaths([[[0, 0, 0]], [[1, 0, 0]]]);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("insufficientInput");
      }
    });

    it("should reject paths of differing lengths", () => {
      const result = orderPaths([straightPath(0, 3), straightPath(1, 3), straightPath(2, 4)]);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("mismatchedLength");
        expect(result.error.details).toEqual({ expected: 3, index: 2, actual: 4 });
      }
    });
  });

  describe("checkPathSet", () => {
    it("should return the common point count", () => {
      const result = checkPathSet([straightPath(0, 5), straightPath(1, 5)], "loftPaths");
      expect(result).toEqual({ ok: true, value: 5 });
    });
  });
});
