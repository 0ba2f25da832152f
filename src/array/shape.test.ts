import { describe, expect, it } from "vitest";
import { dimensionsFromShape, resolveShape, sameShape, shapeSize } from "./shape.js";

describe("shape resolution", () => {
  it("reverses declared dimensions into storage order", () => {
    expect(resolveShape([3, 2])).toEqual([2, 3]);
    expect(resolveShape([4, 5, 6])).toEqual([6, 5, 4]);
  });

  it("recovers declared dimensions from a shape", () => {
    expect(dimensionsFromShape([2, 3])).toEqual([3, 2]);
  });

  it("is stable across a full reversal round trip", () => {
    for (const dimensions of [[], [7], [1, 1], [3, 0, 2], [2, 3, 4, 5]]) {
      const shape = resolveShape(dimensions);
      expect(resolveShape(dimensionsFromShape(shape))).toEqual(shape);
    }
  });

  it("does not mutate its input", () => {
    const dimensions = [1, 2, 3];
    resolveShape(dimensions);
    expect(dimensions).toEqual([1, 2, 3]);
  });

  it("computes the element count", () => {
    expect(shapeSize([2, 3, 4])).toBe(24);
    expect(shapeSize([5, 0])).toBe(0);
    expect(shapeSize([])).toBe(1);
  });

  it("compares shapes", () => {
    expect(sameShape([2, 3], [2, 3])).toBe(true);
    expect(sameShape([2, 3], [3, 2])).toBe(false);
    expect(sameShape([2], [2, 1])).toBe(false);
  });
});
