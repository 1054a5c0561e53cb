import { describe, expect, it } from "vitest";
import {
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "../assertions";
import { AssertionError, ASSERTION_ERROR } from "../error";

describe("assertions", () => {
  //=========================================================
  // integer predicates
  //=========================================================

  it("is_non_negative_integer accepts zero and positive integers", () => {
    expect(is_non_negative_integer(0)).toBe(true);
    expect(is_non_negative_integer(42)).toBe(true);
  });

  it("is_non_negative_integer rejects negatives and fractions", () => {
    expect(is_non_negative_integer(-1)).toBe(false);
    expect(is_non_negative_integer(1.5)).toBe(false);
    expect(is_non_negative_integer(NaN)).toBe(false);
    expect(is_non_negative_integer(Infinity)).toBe(false);
  });

  it("is_positive_integer rejects zero", () => {
    expect(is_positive_integer(0)).toBe(false);
    expect(is_positive_integer(1)).toBe(true);
    expect(is_positive_integer(64)).toBe(true);
    expect(is_positive_integer(-64)).toBe(false);
  });

  //=========================================================
  // validate_and_cast
  //=========================================================

  it("validate_and_cast returns the value when validation passes", () => {
    expect(validate_and_cast(42, is_positive_integer, "positive integer")).toBe(42);
  });

  it("validate_and_cast throws with VALIDATION_FAIL_CONDITION and context", () => {
    let caught: unknown;
    try {
      validate_and_cast(-1, is_positive_integer, "positive integer");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(AssertionError);
    const err = caught as AssertionError;
    expect(err.category).toBe(ASSERTION_ERROR.VALIDATION_FAIL_CONDITION);
    expect(err.message).toBe("Expected value to meet validation: positive integer");
    expect(err.context).toEqual({ value: -1 });
    expect(err.is_operational).toBe(false);
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the same reference", () => {
    const obj = { x: 1 };
    expect(unsafe_cast<{ x: number }>(obj)).toBe(obj);
  });
});
