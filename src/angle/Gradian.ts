import { ConversionDebugLogger } from "@/debug/ConversionDebugLogger";
import { AngleContractError, fail, ok, parseFailure } from "@/errors/AngleErrors";
import type { Angle, AngleFailure, Conversion, Result, WithGradians } from "@/types";
import { stringToNumber } from "@/util/number";
import { hasDegrees, hasDMS, hasGradians, hasRadians, zero } from "./AngleValue";
import { Degree } from "./Degree";

const GRADIANS_PATTERN = /^-?[0-9]+(?:\.[0-9]+)?/;
const PARSE_ERROR = "Unable to parse value as gradians";

/**
 * Gradian - Angles in gradians (400 to the revolution)
 *
 * There is no gradian `abs`: `absoluteValue` normalizes gradian-only
 * angles through degrees.
 */
export const Gradian = {
  /**
   * Create an angle from a number of gradians.
   * Zero gradians is the canonical zero angle.
   */
  init(n: number): Angle {
    if (n === 0) return zero();
    return { kind: "gradians", g: n };
  },

  /**
   * Parse a leading decimal numeral, e.g. "40", "13.2ᵍ"
   */
  parse(text: string): Result<Angle, AngleFailure> {
    const match = GRADIANS_PATTERN.exec(text);
    if (!match) return fail(parseFailure(PARSE_ERROR));

    const [numeral = ""] = match;
    const n = stringToNumber(numeral);
    if (!n.ok) return fail(parseFailure(PARSE_ERROR));
    return ok(Gradian.init(n.value));
  },

  /**
   * Ensure a gradian representation is present, computing it from
   * radians or degrees. DMS-only angles pivot through degrees first.
   */
  ensure(angle: Angle): WithGradians {
    if (hasGradians(angle)) return angle;

    if (hasRadians(angle)) {
      const gradians = (angle.r * 200.0) / Math.PI;
      ConversionDebugLogger.logConversion("radians", "gradians", angle.r, gradians);
      return { ...angle, g: gradians };
    }

    if (hasDegrees(angle)) {
      const gradians = (angle.d / 360.0) * 400.0;
      ConversionDebugLogger.logConversion("degrees", "gradians", angle.d, gradians);
      return { ...angle, g: gradians };
    }

    if (hasDMS(angle)) {
      return Gradian.ensure(Degree.ensure(angle));
    }

    throw new AngleContractError("Cannot convert an angle with no representation to gradians");
  },

  /**
   * Return the gradian representation along with the (possibly updated) angle
   */
  toGradians(angle: Angle): Conversion<number> {
    const ensured = Gradian.ensure(angle);
    return { angle: ensured, value: ensured.g };
  },
};
