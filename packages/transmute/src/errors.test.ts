import { describe, it, expect } from "vitest";
import {
  ConversionCheckError,
  ShapeError,
  describeType,
  describeValue,
  isConversionCheckError,
  isShapeError,
  isTransmuteError,
} from "./errors";

describe("Errors", () => {
  describe("ConversionCheckError", () => {
    it("should expose tag, name, error and value", () => {
      const error = new ConversionCheckError("Missing value", null);

      expect(error._tag).toBe("ConversionCheckError");
      expect(error.name).toBe("ConversionCheckError");
      expect(error.message).toBe("Missing value for: null");
      expect(error.error).toBe("Missing value");
      expect(error.value).toBeNull();
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe("ShapeError", () => {
    it("should describe the expected and actual shapes", () => {
      const error = new ShapeError({ converter: "struct", expected: "a mapping", actual: [1] });

      expect(error._tag).toBe("ShapeError");
      expect(error.message).toBe("struct expected a mapping, got array");
      expect(error.converter).toBe("struct");
      expect(error.expected).toBe("a mapping");
      expect(error.actual).toEqual([1]);
    });
  });

  describe("type guards", () => {
    it("should recognize each error type", () => {
      const checkError = new ConversionCheckError("Bad", 1);
      const shapeError = new ShapeError({ converter: "tuple", expected: "an array", actual: 1 });

      expect(isConversionCheckError(checkError)).toBe(true);
      expect(isConversionCheckError(shapeError)).toBe(false);
      expect(isShapeError(shapeError)).toBe(true);
      expect(isTransmuteError(checkError)).toBe(true);
      expect(isTransmuteError(shapeError)).toBe(true);
      expect(isTransmuteError(new Error("other"))).toBe(false);
    });
  });

  describe("describeType", () => {
    it("should name collection types", () => {
      expect(describeType(null)).toBe("null");
      expect(describeType([])).toBe("array");
      expect(describeType(new Set())).toBe("set");
      expect(describeType(new Map())).toBe("map");
      expect(describeType(1)).toBe("number");
      expect(describeType({})).toBe("object");
    });
  });

  describe("describeValue", () => {
    it("should format primitives", () => {
      expect(describeValue("a")).toBe("'a'");
      expect(describeValue(1)).toBe("1");
      expect(describeValue(undefined)).toBe("undefined");
    });

    it("should abbreviate long collections", () => {
      expect(describeValue([1, 2])).toBe("[1, 2]");
      expect(describeValue([1, 2, 3, 4])).toBe("[1, 2, 3, ... (4 items)]");
      expect(describeValue({ a: 1, b: "x" })).toBe("{ a: 1, b: 'x' }");
      expect(describeValue({ a: 1, b: 2, c: 3, d: 4, e: 5 })).toBe(
        "{ a: 1, b: 2, c: 3, d: 4, ... (5 keys) }"
      );
      expect(describeValue(new Set([1]))).toBe("Set([1])");
      expect(describeValue({})).toBe("{}");
    });
  });
});
