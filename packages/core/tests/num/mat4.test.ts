import { describe, it, expect } from "vitest";
import {
  identity4,
  mul4,
  translation4,
  scalingAbout4,
  transformPoint3,
  transformDirection3,
} from "../../src/num/mat4.js";
import { vec3 } from "../../src/num/vec3.js";

describe(`mat4`, () => {
  describe(`basic operations`, () => {
    it(`should create identity matrix`, () => {
      const I = identity4();
      expect(I[0]).toBe(1);
      expect(I[5]).toBe(1);
      expect(I[10]).toBe(1);
      expect(I[15]).toBe(1);
      expect(I[1]).toBe(0);
      expect(I[12]).toBe(0);
    });

    it(`should multiply by identity`, () => {
      const m = translation4([5, 6, 7]);
      expect(mul4(m, identity4())).toEqual(m);
      expect(mul4(identity4(), m)).toEqual(m);
    });

    it(`should apply the right-hand matrix first`, () => {
      const scaleThenMove = mul4(translation4([1, 0, 0]), scalingAbout4([0, 0, 0], 2));
      expect(transformPoint3(scaleThenMove, vec3(1, 0, 0))).toEqual([3, 0, 0]);

      const moveThenScale = mul4(scalingAbout4([0, 0, 0], 2), translation4([1, 0, 0]));
      expect(transformPoint3(moveThenScale, vec3(1, 0, 0))).toEqual([4, 0, 0]);
    });
  });

  describe(`transforms`, () => {
    it(`should translate points but not directions`, () => {
      const m = translation4([10, 20, 30]);
      expect(transformPoint3(m, vec3(1, 2, 3))).toEqual([11, 22, 33]);
      expect(transformDirection3(m, vec3(1, 2, 3))).toEqual([1, 2, 3]);
    });

    it(`should scale about an anchor`, () => {
      const m = scalingAbout4([1, 1, 1], 2);
      expect(transformPoint3(m, vec3(1, 1, 1))).toEqual([1, 1, 1]);
      expect(transformPoint3(m, vec3(2, 1, 1))).toEqual([3, 1, 1]);
      expect(transformPoint3(m, vec3(0, 0, 0))).toEqual([-1, -1, -1]);
    });

    it(`should scale directions without the anchor offset`, () => {
      const m = scalingAbout4([5, 5, 5], 3);
      expect(transformDirection3(m, vec3(0, 1, 0))).toEqual([0, 3, 0]);
    });
  });
});
