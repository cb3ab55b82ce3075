import { InvalidAngleError } from "@/errors/AngleErrors";
import type { Angle, AngleFailure, Result } from "@/types";
import { zero } from "./AngleValue";
import { Degree } from "./Degree";
import { DMS } from "./DMS";
import { Gradian } from "./Gradian";
import { Radian } from "./Radian";

/** Unit modifiers accepted by `angle()` */
export type AngleModifier = "d" | "r" | "g" | "dms";

const PARSERS: Record<AngleModifier, (text: string) => Result<Angle, AngleFailure>> = {
  d: Degree.parse,
  r: Radian.parse,
  g: Gradian.parse,
  dms: DMS.parse,
};

function isModifier(value: string): value is AngleModifier {
  return Object.prototype.hasOwnProperty.call(PARSERS, value);
}

/**
 * Shorthand for writing angles inline:
 *
 *   angle("13.2", "d")        // 13.2°
 *   angle("0.25", "r")        // 0.25㎭
 *   angle("90 30 50", "dms")  // 90° 30′ 50″
 *   angle("0")                // zero, no unit needed
 *
 * Throws InvalidAngleError when the text cannot be parsed.
 */
export function angle(text: string, modifier?: string): Angle {
  if (text === "0") return zero();

  if (modifier === undefined || !isModifier(modifier)) {
    throw new InvalidAngleError("Unable to parse angle");
  }

  const result = PARSERS[modifier](text);
  if (!result.ok) {
    throw new InvalidAngleError(result.error.message);
  }
  return result.value;
}
