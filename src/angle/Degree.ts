import { ConversionDebugLogger } from "@/debug/ConversionDebugLogger";
import { AngleContractError, fail, ok, parseFailure } from "@/errors/AngleErrors";
import type { Angle, AngleFailure, Conversion, Result, WithDegrees } from "@/types";
import { stringToNumber } from "@/util/number";
import { foldIntoRevolution, hasDegrees, hasDMS, hasGradians, hasRadians, zero } from "./AngleValue";

const DEGREES_PATTERN = /^-?[0-9]+(?:\.[0-9]+)?/;
const PARSE_ERROR = "Unable to parse value as degrees";

/**
 * Degree - Angles in decimal degrees
 */
export const Degree = {
  /**
   * Create an angle from a number of degrees.
   * Zero degrees is the canonical zero angle.
   */
  init(n: number): Angle {
    if (n === 0) return zero();
    return { kind: "degrees", d: n };
  },

  /**
   * Parse a leading decimal numeral, e.g. "13", "13.2°", "-13.2°"
   */
  parse(text: string): Result<Angle, AngleFailure> {
    const match = DEGREES_PATTERN.exec(text);
    if (!match) return fail(parseFailure(PARSE_ERROR));

    const [numeral = ""] = match;
    const n = stringToNumber(numeral);
    if (!n.ok) return fail(parseFailure(PARSE_ERROR));
    return ok(Degree.init(n.value));
  },

  /**
   * Ensure a degree representation is present, computing it from
   * radians, gradians or DMS (in that order) if not.
   */
  ensure(angle: Angle): WithDegrees {
    if (hasDegrees(angle)) return angle;

    if (hasRadians(angle)) {
      const degrees = (angle.r * 180.0) / Math.PI;
      ConversionDebugLogger.logConversion("radians", "degrees", angle.r, degrees);
      return { ...angle, d: degrees };
    }

    if (hasGradians(angle)) {
      const degrees = (angle.g / 400.0) * 360.0;
      ConversionDebugLogger.logConversion("gradians", "degrees", angle.g, degrees);
      return { ...angle, d: degrees };
    }

    if (hasDMS(angle)) {
      const degrees = dmsToDegrees(angle.dms[0], angle.dms[1], angle.dms[2]);
      ConversionDebugLogger.logConversion("dms", "degrees", angle.dms, degrees);
      return { ...angle, d: degrees };
    }

    throw new AngleContractError("Cannot convert an angle with no representation to degrees");
  },

  /**
   * Return the degree representation along with the (possibly updated) angle
   */
  toDegrees(angle: Angle): Conversion<number> {
    const ensured = Degree.ensure(angle);
    return { angle: ensured, value: ensured.d };
  },

  /**
   * Discard complete revolutions and convert negatives, so the result
   * lies in [0, 360]: -270 becomes 90, 1170 becomes 90.
   */
  abs(angle: Angle): Angle {
    if (!hasDegrees(angle)) {
      throw new AngleContractError("Degree.abs requires a degree representation");
    }
    return Degree.init(foldIntoRevolution(angle.d, 360));
  },
};

/**
 * D + M/60 + S/3600, components assumed to share a sign
 */
export function dmsToDegrees(d: number, m: number, s: number): number {
  return d + m / 60.0 + s / 3600.0;
}
