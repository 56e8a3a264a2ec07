/***
 * Assertions - Dev-only runtime validation and branded casting.
 *
 * Checks are guarded by __DEV__ and skipped when NODE_ENV is "production".
 * validate_and_cast is the primary tool for creating branded IDs and
 * checked option values: it validates the input in dev and returns the
 * value as the branded type. unsafe_cast bypasses all checks (used on hot
 * paths where the caller guarantees validity).
 *
 ***/

import { __DEV__ } from "../utils/dev";
import { TYPE_ERROR, TypeError } from "./error";

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
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
