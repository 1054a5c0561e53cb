/***
 * Assertions — Runtime validation and branded casting.
 *
 * validate_and_cast validates the input and returns it as the branded
 * (or otherwise narrowed) type. The check is guarded by __DEV__, which
 * the library build turns into a NODE_ENV check. unsafe_cast bypasses
 * all checks (used when the caller guarantees validity).
 *
 ***/

import { ASSERTION_ERROR, AssertionError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_positive_integer = (v: number): boolean =>
  Number.isInteger(v) && v > 0;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new AssertionError(
      ASSERTION_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
