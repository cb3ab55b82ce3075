import { ConversionDebugLogger } from "@/debug/ConversionDebugLogger";
import { AngleContractError, fail, ok, parseFailure } from "@/errors/AngleErrors";
import type { Angle, AngleFailure, Conversion, Result, WithRadians } from "@/types";
import { stringToNumber } from "@/util/number";
import { foldIntoRevolution, hasDegrees, hasDMS, hasGradians, hasRadians, zero } from "./AngleValue";
import { dmsToDegrees } from "./Degree";

const RADIANS_PATTERN = /^-?[0-9]+(?:\.[0-9]+)?/;
const PARSE_ERROR = "Unable to parse value as radians";

/** One full revolution */
export const TAU = 2 * Math.PI;

/**
 * Radian - Angles in radians
 *
 * Radians are the pivot every trigonometric function works in.
 */
export const Radian = {
  /**
   * Create an angle from a number of radians.
   * Zero radians is the canonical zero angle.
   */
  init(n: number): Angle {
    if (n === 0) return zero();
    return { kind: "radians", r: n };
  },

  /**
   * Parse a leading decimal numeral, e.g. "13", "0.25㎭"
   */
  parse(text: string): Result<Angle, AngleFailure> {
    const match = RADIANS_PATTERN.exec(text);
    if (!match) return fail(parseFailure(PARSE_ERROR));

    const [numeral = ""] = match;
    const n = stringToNumber(numeral);
    if (!n.ok) return fail(parseFailure(PARSE_ERROR));
    return ok(Radian.init(n.value));
  },

  /**
   * Ensure a radian representation is present, computing it from
   * degrees, gradians or DMS (in that order) if not.
   */
  ensure(angle: Angle): WithRadians {
    if (hasRadians(angle)) return angle;

    if (hasDegrees(angle)) {
      const radians = (angle.d / 180.0) * Math.PI;
      ConversionDebugLogger.logConversion("degrees", "radians", angle.d, radians);
      return { ...angle, r: radians };
    }

    if (hasGradians(angle)) {
      const radians = (angle.g * Math.PI) / 200;
      ConversionDebugLogger.logConversion("gradians", "radians", angle.g, radians);
      return { ...angle, r: radians };
    }

    if (hasDMS(angle)) {
      const [d, m, s] = angle.dms;
      const radians = (dmsToDegrees(d, m, s) / 180.0) * Math.PI;
      ConversionDebugLogger.logConversion("dms", "radians", angle.dms, radians);
      return { ...angle, r: radians };
    }

    throw new AngleContractError("Cannot convert an angle with no representation to radians");
  },

  /**
   * Return the radian representation along with the (possibly updated) angle
   */
  toRadians(angle: Angle): Conversion<number> {
    const ensured = Radian.ensure(angle);
    return { angle: ensured, value: ensured.r };
  },

  /**
   * Discard complete revolutions and convert negatives, so the result
   * lies in [0, 2π].
   */
  abs(angle: Angle): Angle {
    if (!hasRadians(angle)) {
      throw new AngleContractError("Radian.abs requires a radian representation");
    }
    return Radian.init(foldIntoRevolution(angle.r, TAU));
  },
};
