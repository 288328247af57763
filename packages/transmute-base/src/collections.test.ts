import { describe, it, expect } from "vitest";
import { err, ok, pipe, ShapeError } from "transmute";
import {
  extractWhenSingleton,
  get,
  itemOrSequence,
  itemToSingleton,
  newMapping,
  newSequence,
  renameItem,
} from "./collections";
import { inputToEmail } from "./email";
import { inputToInt } from "./numbers";
import { testIsString } from "./tests";

describe("Collection converters", () => {
  // ===========================================================================
  // get()
  // ===========================================================================

  describe("get", () => {
    it("should read a mapping key", () => {
      expect(get("a").apply({ a: 1, b: 2 })).toEqual(ok(1));
    });

    it("should report an unknown key unless a default is given", () => {
      expect(get("c").apply({ a: 1, b: 2 })).toEqual(err({ a: 1, b: 2 }, "Unknown key: c"));
      expect(get("c", { default: null }).apply({ a: 1, b: 2 })).toEqual(ok(null));
      expect(get("c", { message: "Key Error" }).apply({ a: 1 })).toEqual(err({ a: 1 }, "Key Error"));
    });

    it("should read Map entries", () => {
      expect(get("k").apply(new Map([["k", 1]]))).toEqual(ok(1));
    });

    it("should index arrays and strings from either end", () => {
      expect(get(0).apply("ab")).toEqual(ok("a"));
      expect(get(-2).apply(["a", "b"])).toEqual(ok("a"));
      expect(get(-3).apply("ab")).toEqual(err("ab", "Index out of range: -3"));
      expect(get(2, { default: null }).apply(["a", "b"])).toEqual(ok(null));
    });

    it("should return missing values untouched", () => {
      expect(get("a").apply(null)).toEqual(ok(null));
    });

    it("should throw on values that have no items", () => {
      expect(() => get(0).apply(42)).toThrow(ShapeError);
      expect(() => renameItem("a", "b").apply(["a"])).toThrow(ShapeError);
    });
  });

  // ===========================================================================
  // Reshaping
  // ===========================================================================

  describe("renameItem", () => {
    it("should rename into a copy", () => {
      const input = { a: 1, b: 2 };
      const result = renameItem("a", "c").apply(input);

      expect(result).toEqual(ok({ b: 2, c: 1 }));
      expect(input).toEqual({ a: 1, b: 2 });
    });

    it("should keep a mapping without the key", () => {
      expect(renameItem("c", "d").apply({ a: 1 })).toEqual(ok({ a: 1 }));
      expect(renameItem("c", "d").apply(null)).toEqual(ok(null));
    });
  });

  describe("extractWhenSingleton", () => {
    it("should unwrap one-item collections", () => {
      expect(extractWhenSingleton.apply([42])).toEqual(ok(42));
      expect(extractWhenSingleton.apply(new Set(["a"]))).toEqual(ok("a"));
    });

    it("should keep other values", () => {
      expect(extractWhenSingleton.apply([42, 43])).toEqual(ok([42, 43]));
      expect(extractWhenSingleton.apply([])).toEqual(ok([]));
      expect(extractWhenSingleton.apply([[42]])).toEqual(ok([[42]]));
      expect(extractWhenSingleton.apply("42")).toEqual(ok("42"));
      expect(extractWhenSingleton.apply(null)).toEqual(ok(null));
    });
  });

  describe("itemToSingleton", () => {
    it("should wrap single items into an array", () => {
      expect(itemToSingleton().apply("a")).toEqual(ok(["a"]));
      expect(itemToSingleton().apply(["a", "b"])).toEqual(ok(["a", "b"]));
      expect(itemToSingleton().apply(null)).toEqual(ok(null));
    });

    it("should build sets", () => {
      expect(itemToSingleton("set").apply("a")).toEqual(ok(new Set(["a"])));
      expect(itemToSingleton("set").apply([1, 1])).toEqual(ok(new Set([1])));
    });
  });

  describe("itemOrSequence", () => {
    const ints = itemOrSequence(inputToInt);

    it("should convert a single item", () => {
      expect(ints.apply("42")).toEqual(ok(42));
    });

    it("should convert sequences and unwrap singletons", () => {
      expect(ints.apply(["42"])).toEqual(ok(42));
      expect(ints.apply(["42", "43"])).toEqual(ok([42, 43]));
      expect(ints.apply([null, null])).toEqual(ok([null, null]));
    });

    it("should report item errors by index", () => {
      expect(ints.apply(["42", "43", "Hello world!"])).toEqual(
        err([42, 43, "Hello world!"], { 2: "Value must be an integer" })
      );
    });

    it("should drop missing items on request", () => {
      expect(itemOrSequence(inputToInt, { dropMissingItems: true }).apply(["42", null, "43"])).toEqual(
        ok([42, 43])
      );
    });

    it("should convert sets", () => {
      expect(itemOrSequence(inputToInt, { kind: "set" }).apply(new Set(["42", "43"]))).toEqual(
        ok(new Set([42, 43]))
      );
    });
  });

  // ===========================================================================
  // Construction
  // ===========================================================================

  describe("newMapping", () => {
    const person = newMapping({
      name: get(0),
      age: pipe(get(1), testIsString(), inputToInt),
      email: pipe(get(2), inputToEmail),
    });

    it("should build a mapping from a sequence", () => {
      expect(person.apply(["John Doe", "72", "john@doe.name"])).toEqual(
        ok({ name: "John Doe", age: 72, email: "john@doe.name" })
      );
    });

    it("should collect errors by key", () => {
      expect(person.apply(["John Doe", "72"])).toEqual(
        err({ name: "John Doe", age: 72, email: ["John Doe", "72"] }, { email: "Index out of range: 2" })
      );
    });

    it("should drop missing values on request", () => {
      expect(person.apply([null, " ", null])).toEqual(ok({ name: null, age: null, email: null }));
      expect(
        newMapping({ name: get(0), age: pipe(get(1), testIsString(), inputToInt) }, { dropMissingValues: true }).apply([
          null,
          " ",
        ])
      ).toEqual(ok({}));
    });

    it("should build from a missing value only when asked", () => {
      expect(person.apply(null)).toEqual(ok(null));
      expect(newMapping({ name: get(0) }, { handleMissingValue: true }).apply(null)).toEqual(ok({ name: null }));
    });
  });

  describe("newSequence", () => {
    const row = newSequence([
      get("name", { default: null }),
      pipe(get("age", { default: null }), testIsString(), inputToInt),
    ]);

    it("should build an array from a mapping", () => {
      expect(row.apply({ age: "72", name: "John Doe" })).toEqual(ok(["John Doe", 72]));
      expect(row.apply({})).toEqual(ok([null, null]));
    });

    it("should build from a missing value only when asked", () => {
      expect(row.apply(null)).toEqual(ok(null));
      expect(newSequence([get(0)], { handleMissingValue: true }).apply(undefined)).toEqual(ok([undefined]));
    });

    it("should key errors by position", () => {
      expect(newSequence([get("name")]).apply({})).toEqual(err([{}], { 0: "Unknown key: name" }));
    });
  });
});
