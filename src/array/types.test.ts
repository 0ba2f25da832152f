import { describe, expect, it } from "vitest";
import { ElementError } from "../document/errors.js";
import { classify, isTypeName, nameFor, storageScalarType } from "./types.js";

describe("type classification", () => {
  it("classifies integer and float type names", () => {
    expect(classify("int_4s")).toBe("integer");
    expect(classify("int_8u")).toBe("integer");
    expect(classify("real_4")).toBe("float");
    expect(classify("double")).toBe("float");
  });

  it("maps names to storage scalars", () => {
    expect(storageScalarType("int_2s")).toBe("int16");
    expect(storageScalarType("int")).toBe("int32");
    expect(storageScalarType("int_8s")).toBe("int64");
    expect(storageScalarType("real_8")).toBe("float64");
  });

  it("maps scalars back to canonical names", () => {
    for (const name of ["int_2s", "int_2u", "int_4s", "int_4u", "int_8s", "int_8u", "real_4", "real_8"]) {
      expect(nameFor(storageScalarType(name))).toBe(name);
    }
    expect(nameFor(storageScalarType("float"))).toBe("real_4");
  });

  it("rejects unknown names", () => {
    expect(isTypeName("lstring")).toBe(false);
    expect(isTypeName("toString")).toBe(false);
    expect(() => classify("lstring")).toThrow(ElementError);
    expect(() => storageScalarType("complex_8")).toThrow(/Unrecognized array type "complex_8"/);
  });
});
