import { describe, it, expect } from "vitest";
import { check, passes } from "./check";
import { createContext, catalogTranslator } from "./context";
import { ConversionCheckError } from "./errors";
import { required, test } from "./leaves";
import { err, ok } from "./result";

const positive = test((value: number) => value > 0, { message: "Must be positive" });

describe("check", () => {
  describe("with a conversion", () => {
    it("should return the value of a success", () => {
      expect(check(ok(42))).toBe(42);
    });

    it("should throw ConversionCheckError on failure", () => {
      expect(() => check(err("abc", "Value must be an integer"))).toThrow(ConversionCheckError);
      expect(() => check(err("abc", "Value must be an integer"))).toThrow(
        "Value must be an integer for: 'abc'"
      );
    });

    it("should carry the error and the value", () => {
      try {
        check(err({ a: 1 }, { a: "Bad" }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConversionCheckError);
        if (error instanceof ConversionCheckError) {
          expect(error.error).toEqual({ a: "Bad" });
          expect(error.value).toEqual({ a: 1 });
          expect(error.message).toBe("a: Bad for: { a: 1 }");
        }
      }
    });

    it("should return null with clearOnError", () => {
      expect(check(err("abc", "Bad"), { clearOnError: true })).toBeNull();
      expect(check(ok(1), { clearOnError: true })).toBe(1);
    });
  });

  describe("with a converter", () => {
    it("should return a function that applies and checks", () => {
      const toPositive = check(positive);

      expect(toPositive(3)).toBe(3);
      expect(() => toPositive(-1)).toThrow("Must be positive for: -1");
    });

    it("should pass the context through", () => {
      const context = createContext({ translate: catalogTranslator({ "Missing value": "Valeur manquante" }) });

      expect(() => check(required())(null, context)).toThrow("Valeur manquante for: null");
    });

    it("should return null with clearOnError", () => {
      expect(check(positive, { clearOnError: true })(-1)).toBeNull();
    });
  });
});

describe("passes", () => {
  it("should tell whether a conversion succeeded", () => {
    expect(passes(ok(1))).toBe(true);
    expect(passes(err(1, "Bad"))).toBe(false);
  });

  it("should build a predicate from a converter", () => {
    const isPositive = passes(positive);

    expect(isPositive(2)).toBe(true);
    expect(isPositive(-2)).toBe(false);
    expect(isPositive(null)).toBe(true);
  });
});
