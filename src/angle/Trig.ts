/**
 * Trig - Trigonometric functions that work with angles
 *
 * Forward functions take an angle, make sure it carries radians, and return
 * that angle with the result. Inverse functions check their domain and wrap
 * the radian result in a new angle.
 *
 * Results come straight from the platform's Math functions; hyperbolic and
 * inverse functions may differ in the last digit between engines, so compare
 * with a tolerance.
 */

import { ConversionDebugLogger } from "@/debug/ConversionDebugLogger";
import { domainFailure, fail, ok } from "@/errors/AngleErrors";
import type { Angle, AngleFailure, Conversion, Result } from "@/types";
import { Radian } from "./Radian";

type RealFunction = (x: number) => number;

function forward(fn: RealFunction, angle: Angle): Conversion<number> {
  const ensured = Radian.ensure(angle);
  return { angle: ensured, value: fn(ensured.r) };
}

function inverse(
  name: string,
  fn: RealFunction,
  x: number,
  inDomain: (x: number) => boolean
): Result<Angle, AngleFailure> {
  if (Number.isNaN(x) || !inDomain(x)) {
    ConversionDebugLogger.logDomainError(name, [x]);
    return fail(domainFailure());
  }
  return ok(Radian.init(fn(x)));
}

const unitInterval = (x: number): boolean => x >= -1 && x <= 1;
const anyReal = (): boolean => true;

export const Trig = {
  /**
   * Arccosine of x in [-1, 1]
   */
  acos(x: number): Result<Angle, AngleFailure> {
    return inverse("acos", Math.acos, x, unitInterval);
  },

  /**
   * Inverse hyperbolic cosine of x in [1, +∞)
   */
  acosh(x: number): Result<Angle, AngleFailure> {
    return inverse("acosh", Math.acosh, x, (v) => v >= 1);
  },

  /**
   * Arcsine of x in [-1, 1]
   */
  asin(x: number): Result<Angle, AngleFailure> {
    return inverse("asin", Math.asin, x, unitInterval);
  },

  asinh(x: number): Result<Angle, AngleFailure> {
    return inverse("asinh", Math.asinh, x, anyReal);
  },

  atan(x: number): Result<Angle, AngleFailure> {
    return inverse("atan", Math.atan, x, anyReal);
  },

  /**
   * Angle between the positive x-axis and the point (x, y).
   * Takes y first, like Math.atan2.
   */
  atan2(y: number, x: number): Result<Angle, AngleFailure> {
    if (Number.isNaN(y) || Number.isNaN(x)) {
      ConversionDebugLogger.logDomainError("atan2", [y, x]);
      return fail(domainFailure());
    }
    return ok(Radian.init(Math.atan2(y, x)));
  },

  /**
   * Cosine of the angle, in [-1, 1]
   */
  cos(angle: Angle): Conversion<number> {
    return forward(Math.cos, angle);
  },

  /**
   * Hyperbolic cosine, in [1, +∞)
   */
  cosh(angle: Angle): Conversion<number> {
    return forward(Math.cosh, angle);
  },

  sin(angle: Angle): Conversion<number> {
    return forward(Math.sin, angle);
  },

  sinh(angle: Angle): Conversion<number> {
    return forward(Math.sinh, angle);
  },

  tan(angle: Angle): Conversion<number> {
    return forward(Math.tan, angle);
  },

  /**
   * Hyperbolic tangent, in (-1, 1)
   */
  tanh(angle: Angle): Conversion<number> {
    return forward(Math.tanh, angle);
  },
};
