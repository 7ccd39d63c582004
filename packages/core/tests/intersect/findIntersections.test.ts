import { describe, it, expect, vi, afterEach } from "vitest";
import {
  findIntersections,
  findLineIntersections,
  findSegmentIntersections,
} from "../../src/intersect/findIntersections.js";
import { lineEntity, segmentEntity } from "../../src/intersect/lineLine.js";
import type { Line3D } from "../../src/geom/line3d.js";
import { expectPointsClose } from "../fixtures/geometry.js";

// Two horizontal and two vertical construction lines forming a unit square
const GRID: Line3D[] = [
  { origin: [0, 0, 0], direction: [1, 0, 0] },
  { origin: [0, 1, 0], direction: [1, 0, 0] },
  { origin: [0, 0, 0], direction: [0, 1, 0] },
  { origin: [1, 0, 0], direction: [0, 1, 0] },
];

describe("findIntersections", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should find every crossing once, in pair order", () => {
    const result = findLineIntersections(GRID);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expectPointsClose(result.value.points, [
        [0, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
        [1, 1, 0],
      ]);
      expect(result.value.pairsTested).toBe(6);
      expect(result.value.duplicates).toBe(0);
      expect(result.value.overlaps).toEqual([]);
    }
  });

  it("should add nothing when run again with its own output", () => {
    const first = findLineIntersections(GRID);
    expect(first.ok).toBe(true);
    if (first.ok) {
      const second = findLineIntersections(GRID, { knownPoints: first.value.points });
      expect(second.ok).toBe(true);
      if (second.ok) {
        expect(second.value.points).toEqual([]);
        expect(second.value.duplicates).toBe(4);
      }
    }
  });

  it("should report concurrent lines as a single point", () => {
    const result = findLineIntersections([
      { origin: [0, 0, 0], direction: [1, 0, 0] },
      { origin: [0, 0, 0], direction: [0, 1, 0] },
      { origin: [-1, -1, 0], direction: [1, 1, 0] },
    ]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expectPointsClose(result.value.points, [[0, 0, 0]]);
      expect(result.value.duplicates).toBe(2);
    }
  });

  it("should find nothing among parallel lines", () => {
    const result = findLineIntersections([
      { origin: [0, 0, 0], direction: [1, 0, 0] },
      { origin: [0, 1, 0], direction: [1, 0, 0] },
      { origin: [0, 0, 1], direction: [-1, 0, 0] },
    ]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.points).toEqual([]);
      expect(result.value.pairsTested).toBe(3);
    }
  });

  it("should only report segment crossings inside both extents", () => {
    const result = findSegmentIntersections([
      { start: [0, 0, 0], end: [2, 2, 0] },
      { start: [2, 0, 0], end: [0, 2, 0] },
      { start: [5, 0, 0], end: [5, 1, 0] },
    ]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expectPointsClose(result.value.points, [[1, 1, 0]]);
    }
  });

  it("should list overlapping collinear entities by input index", () => {
    const result = findIntersections([
      segmentEntity({ start: [0, 0, 0], end: [2, 0, 0] }),
      lineEntity({ origin: [0, 5, 0], direction: [0, 1, 0] }),
      segmentEntity({ start: [1, 0, 0], end: [3, 0, 0] }),
    ]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.overlaps).toEqual([[0, 2]]);
      expectPointsClose(result.value.points, [[0, 0, 0]]);
    }
  });

  it("should drop zero-length lines with a warning", () => {
    const result = findLineIntersections([
      GRID[0],
      { origin: [3, 3, 3], direction: [0, 0, 0] },
      GRID[2],
    ]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.pairsTested).toBe(1);
      expect(result.warnings).toEqual(["Ignored 1 zero-length line(s) at index 1"]);
    }
  });

  it("should keep lines whose directions are shorter than eps", () => {
    const shortGrid = GRID.map((line): Line3D => ({
      origin: line.origin,
      direction: [line.direction[0] / 4, line.direction[1] / 4, line.direction[2] / 4],
    }));
    const result = findLineIntersections(shortGrid, { eps: 0.5 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expectPointsClose(result.value.points, [
        [0, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
        [1, 1, 0],
      ]);
      expect(result.value.pairsTested).toBe(6);
      expect(result.warnings).toBeUndefined();
    }
  });

  it("should intersect a line with a tiny direction at the default eps", () => {
    const result = findLineIntersections([
      { origin: [0, 0, 0], direction: [1e-4, 0, 0] },
      { origin: [0, 0, 0], direction: [0, 1, 0] },
    ]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expectPointsClose(result.value.points, [[0, 0, 0]]);
    }
  });

  it("should reject fewer than two usable lines", () => {
    const result = findLineIntersections([GRID[0], { origin: [0, 0, 0], direction: [0, 0, 0] }]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("insufficientInput");
      expect(result.error.operation).toBe("findIntersections");
    }
  });

  it("should reject a negative tolerance", () => {
    const result = findLineIntersections(GRID, { eps: -1 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("toleranceMisconfigured");
    }
  });

  it("should log counts when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    findLineIntersections(GRID, { verbose: true });
    expect(log).toHaveBeenCalledWith("[intersect] 6 pairs, 4 new points, 0 duplicates, 0 overlaps");
  });
});
