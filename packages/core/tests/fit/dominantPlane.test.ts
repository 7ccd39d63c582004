import { describe, it, expect, vi, afterEach } from "vitest";
import {
  allTriples,
  fitDominantPlane,
  fitDominantPlaneToPoints,
  hasNonCollinearTriple,
  uniquePoints,
} from "../../src/fit/dominantPlane.js";
import { createPRNG } from "../../src/num/random.js";
import { createNumericContext } from "../../src/num/tolerance.js";
import type { Vec3 } from "../../src/num/vec3.js";
import type { Segment3D } from "../../src/geom/line3d.js";
import { CIRCLE_POINTS, edgeLoop, expectVecClose } from "../fixtures/geometry.js";

const OUTLIERS: readonly Vec3[] = [
  [1, 1, 20],
  [-1, 2, 21],
];

describe("dominantPlane", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("helpers", () => {
    it("should keep the first occurrence of each point", () => {
      expect(
        uniquePoints([
          [0, 0, 0],
          [1, 0, 0],
          [0, 0, 0],
          [1, 0, 0],
          [0, 1, 0],
        ])
      ).toEqual([
        [0, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
      ]);
    });

    it("should enumerate triples lexicographically", () => {
      expect(allTriples(4)).toEqual([
        [0, 1, 2],
        [0, 1, 3],
        [0, 2, 3],
        [1, 2, 3],
      ]);
      expect(allTriples(2)).toEqual([]);
    });

    it("should detect whether any triple spans a plane", () => {
      const ctx = createNumericContext();
      expect(
        hasNonCollinearTriple(
          [
            [0, 0, 0],
            [1, 0, 0],
            [2, 0, 0],
          ],
          ctx
        )
      ).toBe(false);
      expect(hasNonCollinearTriple([...CIRCLE_POINTS], ctx)).toBe(true);
    });
  });

  describe("fitDominantPlaneToPoints", () => {
    it.each([1e-6, 0.01, 0.5])("should separate coplanar points from outliers (eps = %s)", (eps) => {
      const result = fitDominantPlaneToPoints([...CIRCLE_POINTS, ...OUTLIERS], { eps });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.inliers).toEqual(CIRCLE_POINTS);
        expect(result.value.outliers).toEqual(OUTLIERS);
        expect(result.value.score).toBe(6);
        expect(result.value.maxScore).toBe(8);
        expectVecClose(result.value.plane.normal, [0, 0, 1]);
        expect(result.value.plane.offset).toBeCloseTo(0);
      }
    });

    it("should stop as soon as every point is an inlier", () => {
      const result = fitDominantPlaneToPoints([
        [0, 0, 0],
        [1, 0, 0],
        [1, 1, 0],
        [0, 1, 0],
      ]);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.candidatesTested).toBe(1);
        expect(result.value.outliers).toEqual([]);
      }
    });

    it("should sample deterministically with a seeded generator", () => {
      const grid: Vec3[] = [];
      for (let x = 0; x < 4; x++) {
        for (let y = 0; y < 4; y++) {
          grid.push([x, y, 0]);
        }
      }
      const outliers: Vec3[] = [
        [0.5, 0.5, 5],
        [2.5, 0.5, 6],
        [0.5, 2.5, 7],
        [2.5, 2.5, 8],
      ];
      const points = [...grid, ...outliers];

      const first = fitDominantPlaneToPoints(points, { random: createPRNG(11) });
      const second = fitDominantPlaneToPoints(points, { random: createPRNG(11) });

      expect(first.ok && second.ok).toBe(true);
      if (first.ok && second.ok) {
        expect(first.value.inliers).toEqual(grid);
        expect(first.value.outliers).toEqual(outliers);
        expect(first.value.candidatesTested).toBeLessThanOrEqual(400);
        expect(second.value.candidatesTested).toBe(first.value.candidatesTested);
        expect(second.value.plane).toEqual(first.value.plane);
      }
    });

    it("should report no solution when sampling yields no candidate", () => {
      const points: Vec3[] = Array.from({ length: 13 }, (_, i): Vec3 => [i, i * i, 0]);
      const result = fitDominantPlaneToPoints(points, { maxSamples: 0 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("noSolution");
        expect(result.error.details).toEqual({ candidates: 0, outliers: points });
      }
    });

    it("should reject a sample count that is not a number", () => {
      const result = fitDominantPlaneToPoints([...CIRCLE_POINTS], { maxSamples: Number.NaN });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("toleranceMisconfigured");
        expect(result.error.message).toBe("maxSamples must be a non-negative integer");
        expect(result.error.hints?.[0].relatedParameters).toEqual(["maxSamples"]);
      }
    });

    it("should reject a negative exhaustive limit", () => {
      const result = fitDominantPlaneToPoints([...CIRCLE_POINTS], { exhaustiveLimit: -1 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("toleranceMisconfigured");
        expect(result.error.message).toBe("exhaustiveLimit must be a non-negative integer");
      }
    });

    it("should reject fewer than three distinct points", () => {
      const result = fitDominantPlaneToPoints([
        [0, 0, 0],
        [1, 0, 0],
        [0, 0, 0],
      ]);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("insufficientInput");
        expect(result.error.operation).toBe("fitDominantPlane");
      }
    });

    it("should reject collinear points", () => {
      const result = fitDominantPlaneToPoints([
        [0, 0, 0],
        [1, 0, 0],
        [2, 0, 0],
        [3, 0, 0],
      ]);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("degenerateInput");
      }
    });

    it("should reject a negative tolerance", () => {
      const result = fitDominantPlaneToPoints([...CIRCLE_POINTS], { eps: -0.5 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("toleranceMisconfigured");
      }
    });

    it("should log candidate counts when verbose", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      fitDominantPlaneToPoints(
        [
          [0, 0, 0],
          [1, 0, 0],
          [1, 1, 0],
          [0, 1, 0],
        ],
        { verbose: true }
      );
      expect(log).toHaveBeenNthCalledWith(1, "[planeFit] 4 unique points, 4 exhaustive candidates");
      expect(log).toHaveBeenNthCalledWith(2, "[planeFit] best score 4/4 after 1 planes: 4 inliers, 0 outliers");
    });
  });

  describe("fitDominantPlane", () => {
    const loop = edgeLoop(CIRCLE_POINTS);
    const strays: Segment3D[] = [
      { start: CIRCLE_POINTS[0], end: OUTLIERS[0] },
      { start: CIRCLE_POINTS[2], end: OUTLIERS[1] },
    ];

    it("should keep edges with both endpoints in the plane", () => {
      const result = fitDominantPlane([...loop, ...strays], { eps: 0.01 });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.inliers).toEqual(loop);
        expect(result.value.outliers).toEqual(strays);
        expect(result.value.score).toBe(14);
        expect(result.value.maxScore).toBe(16);
      }
    });

    it("should treat a fully coplanar selection as all inliers", () => {
      const result = fitDominantPlane(loop);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.inliers).toHaveLength(6);
        expect(result.value.outliers).toEqual([]);
      }
    });
  });
});
