import { describe, expect, it } from "vitest";
import { NdArray } from "./ndarray.js";

describe("NdArray", () => {
  it("stores values row-major", () => {
    const array = NdArray.from("int32", [2, 3], [1, 2, 3, 4, 5, 6]);
    expect(array.get([0, 2])).toBe(3);
    expect(array.get([1, 0])).toBe(4);
    expect(array.offsetOf([1, 2])).toBe(5);
    expect(array.size).toBe(6);
  });

  it("allocates zero-filled storage of the scalar type", () => {
    const array = NdArray.zeros("float32", [2, 2]);
    expect(array.data).toBeInstanceOf(Float32Array);
    expect(array.values()).toEqual([0, 0, 0, 0]);
  });

  it("holds 64-bit integers as bigints", () => {
    const array = NdArray.zeros("int64", [2]);
    array.set([0], 9007199254740993n);
    array.set([1], 5);
    expect(array.data).toBeInstanceOf(BigInt64Array);
    expect(array.get([0])).toBe(9007199254740993n);
    expect(array.get([1])).toBe(5n);
  });

  it("rejects out-of-range indices", () => {
    const array = NdArray.zeros("int16", [2, 2]);
    expect(() => array.get([2, 0])).toThrow(RangeError);
    expect(() => array.get([0])).toThrow(RangeError);
  });

  it("rejects value lists of the wrong length", () => {
    expect(() => NdArray.from("float64", [2, 2], [1, 2, 3])).toThrow(/Expected 4 values/);
  });

  it("compares type, shape and values", () => {
    const a = NdArray.from("float64", [2], [Number.NaN, -0]);
    expect(a.equals(NdArray.from("float64", [2], [Number.NaN, -0]))).toBe(true);
    expect(a.equals(NdArray.from("float64", [2], [Number.NaN, 0]))).toBe(false);
    expect(a.equals(NdArray.from("float32", [2], [Number.NaN, -0]))).toBe(false);
    expect(a.equals(NdArray.from("float64", [2, 1], [Number.NaN, -0]))).toBe(false);
  });
});
