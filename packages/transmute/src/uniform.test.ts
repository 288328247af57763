import { describe, it, expect } from "vitest";
import type { AnyConverter } from "./converter";
import { fail, noop, test, transform } from "./leaves";
import { pipe } from "./pipe";
import { err, ok } from "./result";
import { uniformMapping, uniformSequence } from "./uniform";

const toInt = pipe(
  test((value: unknown) => typeof value === "string" && /^-?\d+$/.test(value.trim()), {
    message: "Value must be an integer",
  }),
  transform((value: unknown) => Number(value))
);
const trimKey = transform((key: string) => key.trim() || null);

describe("Uniform aggregation", () => {
  // ===========================================================================
  // uniformMapping()
  // ===========================================================================

  describe("uniformMapping", () => {
    it("should convert every value", () => {
      expect(uniformMapping(toInt).apply({ alice: "12", bob: "7" })).toEqual(
        ok({ alice: 12, bob: 7 })
      );
    });

    it("should report failures per key", () => {
      expect(uniformMapping(toInt).apply({ alice: "12", bob: "x", carol: "y" })).toEqual(
        err({ alice: 12, bob: "x", carol: "y" }, { bob: "Value must be an integer", carol: "Value must be an integer" })
      );
    });

    it("should convert keys", () => {
      const scores = uniformMapping(toInt, { keyConverter: trimKey });

      expect(scores.apply({ " alice ": "12", bob: "7" })).toEqual(ok({ alice: 12, bob: 7 }));
    });

    it("should drop entries whose key converts to a missing value", () => {
      const scores = uniformMapping(toInt, { keyConverter: trimKey });

      expect(scores.apply({ "  ": "1", bob: "7" })).toEqual(ok({ bob: 7 }));
    });

    it("should report key failures under the original key and skip the value", () => {
      const badKey = test((key: string) => key.length <= 3, { message: "Key too long" });
      const values = transform((value: string) => value.toUpperCase());

      expect(uniformMapping(values, { keyConverter: badKey }).apply({ abc: "x", abcd: "y" })).toEqual(
        err({ abc: "X", abcd: "y" }, { abcd: "Key too long" })
      );
    });

    it("should stringify number keys", () => {
      const keyLength = transform((key: string) => key.length);

      expect(uniformMapping(noop(), { keyConverter: keyLength }).apply({ abc: 1 })).toEqual(
        ok({ 3: 1 })
      );
    });

    it("should drop missing values with dropMissingValues", () => {
      expect(
        uniformMapping(noop(), { dropMissingValues: true }).apply({ a: null, b: 1, c: undefined })
      ).toEqual(ok({ b: 1 }));
    });

    it("should map a missing input to itself", () => {
      expect(uniformMapping(toInt).apply(null)).toEqual(ok(null));
    });

    it("should throw on non-mapping input", () => {
      const loose: AnyConverter = uniformMapping(toInt);

      expect(() => loose.apply([1])).toThrow("uniformMapping expected a mapping, got array");
    });

    it("should throw when a key converts to something other than a string or number", () => {
      const toObject = transform((key: string) => ({ key }));

      expect(() => uniformMapping(noop(), { keyConverter: toObject }).apply({ a: 1 })).toThrow(
        "uniformMapping expected a string or number key, got object"
      );
    });
  });

  // ===========================================================================
  // uniformSequence()
  // ===========================================================================

  describe("uniformSequence", () => {
    it("should convert every item, keeping order and duplicates", () => {
      expect(uniformSequence(toInt).apply(["3", "1", "3"])).toEqual(ok([3, 1, 3]));
    });

    it("should build a set with kind: set", () => {
      const result = uniformSequence(noop(), { kind: "set" }).apply([1, 1, 2]);

      expect(result.ok).toBe(true);
      expect(result.value).toEqual(new Set([1, 2]));
    });

    it("should key set errors by position before duplicates are removed", () => {
      expect(uniformSequence(toInt, { kind: "set" }).apply(["1", "1", "x"])).toEqual(
        err(new Set([1, "x"]), { 2: "Value must be an integer" })
      );
    });

    it("should accept a set as input", () => {
      expect(uniformSequence(toInt).apply(new Set(["1", "2"]))).toEqual(ok([1, 2]));
    });

    it("should report errors as a sparse index record", () => {
      const result = uniformSequence(toInt).apply(["1", "x", "3", "y"]);

      expect(result).toEqual(
        err([1, "x", 3, "y"], { 1: "Value must be an integer", 3: "Value must be an integer" })
      );
      expect(Object.keys(result.error ?? {})).toEqual(["1", "3"]);
    });

    it("should drop missing items with dropMissingItems", () => {
      const trim = transform((value: string) => value.trim() || null);

      expect(uniformSequence(trim, { dropMissingItems: true }).apply(["a", " ", "b"])).toEqual(
        ok(["a", "b"])
      );
    });

    it("should index errors by position in the converted items", () => {
      const trimOrFail = pipe(
        transform((value: string) => value.trim() || null),
        test((value: string) => value !== "x", { message: "No x" })
      );

      expect(
        uniformSequence(trimOrFail, { dropMissingItems: true }).apply([" ", "a", "x"])
      ).toEqual(err(["a", "x"], { 1: "No x" }));
    });

    it("should keep failing missing items even with dropMissingItems", () => {
      expect(uniformSequence(fail("Bad"), { dropMissingItems: true }).apply([null])).toEqual(
        err([null], { 0: "Bad" })
      );
    });

    it("should not treat a missing input as empty", () => {
      expect(uniformSequence(toInt).apply(null)).toEqual(ok(null));
      expect(uniformSequence(toInt).apply([])).toEqual(ok([]));
    });

    it("should throw on non-sequence input", () => {
      const loose: AnyConverter = uniformSequence(toInt);

      expect(() => loose.apply("abc")).toThrow(
        "uniformSequence expected an array or a set, got string"
      );
    });
  });
});
