import { ConversionDebugLogger } from "@/debug/ConversionDebugLogger";
import { AngleContractError, fail, ok, parseFailure } from "@/errors/AngleErrors";
import type { Angle, AngleFailure, Conversion, DMSTriple, Result, WithDMS } from "@/types";
import { stringToInteger, stringToNumber } from "@/util/number";
import { hasDegrees, hasDMS, shedRevolutions } from "./AngleValue";
import { Degree } from "./Degree";

/**
 * Degrees, then minutes, then seconds. Separators are optional and may be
 * the unit symbols, an ASCII prime, a comma or spaces.
 */
const DMS_PATTERN =
  /(-?[0-9]+)(?:[°, ]? *)([0-9]+)(?:[′', ]? *)([0-9]+(?:\.[0-9]+)?)[″"]?/u;
const PARSE_ERROR = "Unable to parse value as DMS";

function assertComponents(d: number, m: number, s: number): void {
  if (!Number.isInteger(d) || !Number.isInteger(m)) {
    throw new AngleContractError(`DMS degrees and minutes must be integers, got (${d}, ${m})`);
  }
  if (!Number.isFinite(s)) {
    throw new AngleContractError(`DMS seconds must be finite, got ${s}`);
  }
}

/**
 * DMS - Angles in degrees, minutes and seconds
 *
 * Components are stored as given; minutes and seconds outside [0, 60)
 * are accepted and only `abs` normalizes them.
 */
export const DMS = {
  /**
   * Create an angle from integer degrees, optionally followed by integer
   * minutes and seconds. Omitted components are zero. Unlike the other units,
   * an all-zero input stays a DMS angle.
   */
  init(d: number, m = 0, s = 0): Angle {
    assertComponents(d, m, s);
    return { kind: "dms", dms: [d, m, s] };
  },

  /**
   * Parse text such as "166 45 58.46", "166,45,58.46" or "166° 45′ 58.46″"
   */
  parse(text: string): Result<Angle, AngleFailure> {
    const match = DMS_PATTERN.exec(text);
    if (!match) return fail(parseFailure(PARSE_ERROR));

    const [, rawD = "", rawM = "", rawS = ""] = match;
    const d = stringToInteger(rawD);
    const m = stringToInteger(rawM);
    const s = stringToNumber(rawS);
    if (!d.ok) return fail(parseFailure(d.error));
    if (!m.ok) return fail(parseFailure(m.error));
    if (!s.ok) return fail(parseFailure(s.error));

    return ok(DMS.init(d.value, m.value, s.value));
  },

  /**
   * Ensure a DMS representation is present. Degrees are split by truncating
   * toward zero at each step, so negative degrees give negative components.
   * Angles without degrees pivot through degrees first.
   */
  ensure(angle: Angle): WithDMS {
    if (hasDMS(angle)) return angle;

    if (hasDegrees(angle)) {
      const dms = degreesToDMS(angle.d);
      ConversionDebugLogger.logConversion("degrees", "dms", angle.d, dms);
      return { ...angle, dms };
    }

    return DMS.ensure(Degree.ensure(angle));
  },

  /**
   * Return the DMS representation along with the (possibly updated) angle
   */
  toDMS(angle: Angle): Conversion<DMSTriple> {
    const ensured = DMS.ensure(angle);
    return { angle: ensured, value: ensured.dms };
  },

  /**
   * Discard complete revolutions and convert negatives.
   *
   * Steps of ±360 are taken on the degrees alone until the degrees are in
   * [-360, 360]. A remaining negative value gets one more +360 together with
   * the complement of minutes and seconds (60 - M, 60 - S). The complement is
   * applied once, however many steps came before it.
   */
  abs(angle: Angle): Angle {
    if (!hasDMS(angle)) {
      throw new AngleContractError("DMS.abs requires a DMS representation");
    }

    let [d, m, s] = angle.dms;
    if (!Number.isFinite(d)) {
      throw new AngleContractError(`Cannot normalize non-finite angle ${d}`);
    }

    d = shedRevolutions(d, 360);
    while (d < 0 || d > 360) {
      if (d > 360 || d < -360) {
        d = d > 360 ? d - 360 : d + 360;
      } else {
        d += 360;
        m = 60 - m;
        s = 60 - s;
      }
    }
    return { kind: "dms", dms: [d, m, s] };
  },
};

/**
 * Split decimal degrees into (D, M, S), truncating toward zero
 */
export function degreesToDMS(realDegrees: number): DMSTriple {
  const d = Math.trunc(realDegrees);
  const realMinutes = (realDegrees - d) * 60;
  const m = Math.trunc(realMinutes);
  const s = (realMinutes - m) * 60;
  return [d, m, s];
}
