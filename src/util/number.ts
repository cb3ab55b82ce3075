import { fail, ok } from "@/errors/AngleErrors";
import type { Result } from "@/types";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?\d+\.\d+(?:[eE][+-]?\d+)?$/;

/**
 * Convert a string of digits to an integer without throwing.
 * "13" succeeds, "13.2" does not.
 */
export function stringToInteger(value: string): Result<number, string> {
  if (!INTEGER_PATTERN.test(value)) {
    return fail("Unable to convert value to integer");
  }
  return ok(Number.parseInt(value, 10));
}

/**
 * Convert a decimal numeral to a float without throwing.
 * A decimal point is required: "13.2" succeeds, "13" does not.
 */
export function stringToFloat(value: string): Result<number, string> {
  if (!FLOAT_PATTERN.test(value)) {
    return fail("Unable to convert value to float");
  }
  return ok(Number.parseFloat(value));
}

/**
 * Convert a string to a number, trying float first, then integer.
 */
export function stringToNumber(value: string): Result<number, string> {
  const asFloat = stringToFloat(value);
  if (asFloat.ok) return asFloat;

  const asInteger = stringToInteger(value);
  if (asInteger.ok) return asInteger;

  return fail("Unable to convert value to number");
}
