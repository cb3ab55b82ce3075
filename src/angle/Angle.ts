import { AngleContractError } from "@/errors/AngleErrors";
import type { Angle as AngleValue, Conversion, DMSTriple, ZeroAngle } from "@/types";
import { representationOf, zero } from "./AngleValue";
import { Degree } from "./Degree";
import { DMS } from "./DMS";
import { Gradian } from "./Gradian";
import { Radian } from "./Radian";

export type Angle = AngleValue;

/**
 * Angle - Construct angles in any unit and read them back in any other
 *
 * Every `to*` function returns the angle together with the value. Keep the
 * returned angle: it carries the converted representation, so asking again
 * costs nothing.
 */
export const Angle = {
  zero(): ZeroAngle {
    return zero();
  },

  degrees(n: number): AngleValue {
    return Degree.init(n);
  },

  radians(n: number): AngleValue {
    return Radian.init(n);
  },

  gradians(n: number): AngleValue {
    return Gradian.init(n);
  },

  dms(d: number, m = 0, s = 0): AngleValue {
    return DMS.init(d, m, s);
  },

  toDegrees(angle: AngleValue): Conversion<number> {
    return Degree.toDegrees(angle);
  },

  toRadians(angle: AngleValue): Conversion<number> {
    return Radian.toRadians(angle);
  },

  toGradians(angle: AngleValue): Conversion<number> {
    return Gradian.toGradians(angle);
  },

  toDMS(angle: AngleValue): Conversion<DMSTriple> {
    return DMS.toDMS(angle);
  },

  /**
   * Normalize an angle into its unit's principal range.
   *
   * The unit is picked by the first populated field in the order radians,
   * degrees, gradians, DMS. Gradians have no range of their own and are
   * normalized in degrees.
   */
  absoluteValue(angle: AngleValue): AngleValue {
    const unit = representationOf(angle);
    switch (unit) {
      case "radians":
        return Radian.abs(angle);
      case "degrees":
        return Degree.abs(angle);
      case "gradians":
        return Degree.abs(Degree.ensure(angle));
      case "dms":
        return DMS.abs(angle);
      case null:
        throw new AngleContractError("Cannot take the absolute value of an angle with no representation");
    }
  },
};
