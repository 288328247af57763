import { describe, it, expect, vi, afterEach } from "vitest";
import type { AnyConverter } from "./converter";
import { fail, noop, required, setValue, test, transform } from "./leaves";
import { ShapeError } from "./errors";
import { pipe } from "./pipe";
import { err, ok } from "./result";
import { merge, struct, submapping, tuple } from "./struct";
import { uniformMapping } from "./uniform";
import { createProbe } from "./testing";

const toInt = pipe(
  test((value: unknown) => typeof value === "string" && /^-?\d+$/.test(value.trim()), {
    message: "Value must be an integer",
  }),
  transform((value: unknown) => Number(value))
);
const trim = transform((value: string) => value.trim() || null);
const keysOf = (value: unknown): string[] =>
  value !== null && typeof value === "object" ? Object.keys(value) : [];

describe("Aggregation", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ===========================================================================
  // struct()
  // ===========================================================================

  describe("struct", () => {
    it("should convert each declared key", () => {
      const point = struct({ x: toInt, y: toInt });

      expect(point.apply({ x: "1", y: " 2 " })).toEqual(ok({ x: 1, y: 2 }));
    });

    it("should evaluate keys independently and report only failing keys", () => {
      const second = createProbe(transform((value: number) => value * 10));
      const converter = struct({ a: fail("Bad a"), b: second });

      const result = converter.apply({ a: 1, b: 2 });

      expect(result).toEqual(err({ a: 1, b: 20 }, { a: "Bad a" }));
      expect(second.callCount).toBe(1);
    });

    it("should convert absent declared keys from null", () => {
      const converter = struct({ name: pipe(trim, required()), nickname: trim });

      expect(converter.apply({})).toEqual(
        err({ name: null, nickname: null }, { name: "Missing value" })
      );
    });

    it("should keep schema order, then input order for unexpected keys", () => {
      const converter = struct({ b: noop(), a: noop() }, { unexpected: "passthrough" });

      const result = converter.apply({ z: 0, a: 1, y: 9, b: 2 });

      expect(keysOf(result.value)).toEqual(["b", "a", "z", "y"]);
    });

    it("should map a missing input to itself", () => {
      const converter = struct({ a: required() });

      expect(converter.apply(null)).toEqual(ok(null));
      expect(converter.apply(undefined)).toEqual(ok(undefined));
    });

    it("should throw ShapeError on non-mapping input", () => {
      const converter: AnyConverter = struct({ a: noop() });

      expect(() => converter.apply(["a"])).toThrow(ShapeError);
      expect(() => converter.apply("a")).toThrow("struct expected a mapping, got string");
    });

    describe("unexpected keys", () => {
      const input = { a: 1, extra: 2 };

      it("should reject them by default", () => {
        expect(struct({ a: noop() }).apply(input)).toEqual(
          err({ a: 1, extra: 2 }, { extra: "Unexpected item" })
        );
      });

      it("should drop them", () => {
        expect(struct({ a: noop() }, { unexpected: "drop" }).apply(input)).toEqual(ok({ a: 1 }));
      });

      it("should pass them through", () => {
        expect(struct({ a: noop() }, { unexpected: "passthrough" }).apply(input)).toEqual(
          ok({ a: 1, extra: 2 })
        );
      });

      it("should convert them with a converter", () => {
        const double = transform((value: number) => value * 2);

        expect(struct({ a: noop() }, { unexpected: double }).apply(input)).toEqual(
          ok({ a: 1, extra: 4 })
        );
        expect(struct({ a: noop() }, { unexpected: fail("No extras") }).apply(input)).toEqual(
          err({ a: 1, extra: 2 }, { extra: "No extras" })
        );
      });
    });

    describe("missing values", () => {
      it("should drop successful missing values with dropMissingValues", () => {
        const converter = struct({ a: noop(), b: noop() }, { dropMissingValues: true });

        expect(converter.apply({ a: null, b: 2 })).toEqual(ok({ b: 2 }));
      });

      it("should keep failing entries even when their value is missing", () => {
        const converter = struct({ a: required(), b: noop() }, { dropMissingValues: true });

        expect(converter.apply({ b: 2 })).toEqual(err({ a: null, b: 2 }, { a: "Missing value" }));
      });

      it("should only drop absent keys with dropMissingValues: missing", () => {
        const converter = struct({ a: noop(), b: noop() }, { dropMissingValues: "missing" });

        expect(converter.apply({ a: null })).toEqual(ok({ a: null }));
      });

      it("should not run converters of absent keys with skipMissingKeys", () => {
        const probe = createProbe();
        const converter = struct({ a: noop(), b: probe }, { skipMissingKeys: true });

        expect(converter.apply({ a: 1 })).toEqual(ok({ a: 1 }));
        expect(probe.callCount).toBe(0);
      });
    });

    it("should nest error trees", () => {
      const converter = struct({
        user: struct({ name: required(), age: toInt }),
        active: noop(),
      });

      expect(converter.apply({ user: { age: "x" }, active: true })).toEqual(
        err(
          { user: { name: null, age: "x" }, active: true },
          { user: { name: "Missing value", age: "Value must be an integer" } }
        )
      );
    });

    it("should keep a __proto__ key as a regular entry", () => {
      const input: Record<string, unknown> = JSON.parse('{"__proto__": 1}');
      const result = struct({}, { unexpected: "passthrough" }).apply(input);

      expect(Object.getPrototypeOf(result.value)).toBe(Object.prototype);
      expect(keysOf(result.value)).toEqual(["__proto__"]);
    });

    it("should warn about an empty schema", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      struct({});

      expect(warn).toHaveBeenCalledWith("transmute: struct() called with an empty schema");
    });

    it("should not warn about an empty schema that converts unexpected keys", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      struct({}, { unexpected: toInt });
      struct({}, { unexpected: "passthrough" });

      expect(warn).not.toHaveBeenCalled();
    });

    it("should list integer-like keys before other declared keys", () => {
      const result = struct({ b: noop(), "2": noop() }).apply({ b: 1, "2": 2 });

      expect(result).toEqual(ok({ b: 1, "2": 2 }));
      expect(keysOf(result.value)).toEqual(["2", "b"]);
    });
  });

  // ===========================================================================
  // tuple()
  // ===========================================================================

  describe("tuple", () => {
    const point = tuple([toInt, toInt]);

    it("should convert each position", () => {
      expect(point.apply(["1", "2"])).toEqual(ok([1, 2]));
    });

    it("should key errors by index", () => {
      expect(point.apply(["1", "x"])).toEqual(err([1, "x"], { 1: "Value must be an integer" }));
    });

    it("should convert positions past the end from null", () => {
      const pair = tuple([noop(), required()]);

      expect(pair.apply(["a"])).toEqual(err(["a", null], { 1: "Missing value" }));
    });

    it("should apply the unexpected policy to extra items", () => {
      expect(point.apply(["1", "2", "3"])).toEqual(err([1, 2, "3"], { 2: "Unexpected item" }));
      expect(tuple([toInt], { unexpected: "drop" }).apply(["1", "2"])).toEqual(ok([1]));
      expect(tuple([toInt], { unexpected: toInt }).apply(["1", "2"])).toEqual(ok([1, 2]));
    });

    it("should map a missing input to itself and reject non-arrays", () => {
      expect(point.apply(null)).toEqual(ok(null));
      const loose: AnyConverter = point;
      expect(() => loose.apply({})).toThrow("tuple expected an array, got object");
    });
  });

  // ===========================================================================
  // merge() / submapping()
  // ===========================================================================

  describe("merge", () => {
    const ab = struct({ a: toInt, b: toInt }, { unexpected: "drop" });
    const c = struct({ c: required() }, { unexpected: "drop" });

    it("should merge values of several struct converters", () => {
      expect(merge(ab, c).apply({ a: "1", b: "2", c: "x" })).toEqual(ok({ a: 1, b: 2, c: "x" }));
    });

    it("should merge error trees", () => {
      expect(merge(ab, c).apply({ a: "z" })).toEqual(
        err({ a: "z", b: null, c: null }, { a: "Value must be an integer", c: "Missing value" })
      );
    });

    it("should stop at an atomic error", () => {
      expect(merge(ab, fail("Broken"), c).apply({ a: "1" })).toEqual(err({ a: "1" }, "Broken"));
    });

    it("should map a missing input to itself", () => {
      expect(merge(ab, c).apply(null)).toEqual(ok(null));
    });

    it("should throw when a converter returns a non-mapping value", () => {
      expect(() => merge(ab, setValue(42)).apply({ a: "1" })).toThrow(ShapeError);
    });
  });

  describe("submapping", () => {
    const toPoint = transform((part: Record<string, unknown>) => ({ point: [part.x, part.y] }));

    it("should convert the selected keys and pass the rest through", () => {
      expect(submapping(["x", "y"], toPoint).apply({ x: 1, y: 2, label: "A" })).toEqual(
        ok({ point: [1, 2], label: "A" })
      );
    });

    it("should convert the remaining keys with a second converter", () => {
      const onlyOnes = uniformMapping(test((value: unknown) => value === 1, { message: "Must be 1" }));
      const onlyThrees = uniformMapping(test((value: unknown) => value === 3, { message: "Must be 3" }));

      expect(submapping(["x", "y"], onlyOnes, onlyThrees).apply({ x: 1, y: 2, z: 3, t: 4 })).toEqual(
        err({ x: 1, y: 2, z: 3, t: 4 }, { y: "Must be 1", t: "Must be 3" })
      );
    });

    it("should keep the first error when errors cannot be merged", () => {
      const onlyThrees = uniformMapping(test((value: unknown) => value === 3, { message: "Must be 3" }));

      expect(submapping(["x"], fail("Bad part"), onlyThrees).apply({ x: 1, t: 4 })).toEqual(
        err({ x: 1, t: 4 }, "Bad part")
      );
    });

    it("should handle empty and missing inputs", () => {
      expect(submapping(["x"], noop()).apply({})).toEqual(ok({}));
      expect(submapping(["x"], noop()).apply(null)).toEqual(ok(null));
    });
  });
});
