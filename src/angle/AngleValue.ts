import { AngleContractError } from "@/errors/AngleErrors";
import type {
  Angle,
  AngleUnit,
  WithDegrees,
  WithDMS,
  WithGradians,
  WithRadians,
  ZeroAngle,
} from "@/types";

/**
 * Return the canonical zero angle
 */
export function zero(): ZeroAngle {
  return { kind: "zero", d: 0, r: 0, g: 0 };
}

export function hasDegrees(angle: Angle): angle is WithDegrees {
  return typeof angle.d === "number";
}

export function hasRadians(angle: Angle): angle is WithRadians {
  return typeof angle.r === "number";
}

export function hasGradians(angle: Angle): angle is WithGradians {
  return typeof angle.g === "number";
}

export function hasDMS(angle: Angle): angle is WithDMS {
  return angle.dms !== undefined;
}

/**
 * The representation `absoluteValue` normalizes: the first populated field
 * in the order radians, degrees, gradians, DMS.
 * Returns null for a record with no representation at all.
 */
export function representationOf(angle: Angle): AngleUnit | null {
  if (hasRadians(angle)) return "radians";
  if (hasDegrees(angle)) return "degrees";
  if (hasGradians(angle)) return "gradians";
  if (hasDMS(angle)) return "dms";
  return null;
}

/**
 * True when the angle is zero in whichever unit is populated.
 * Used for display: a zero angle looks the same in every unit.
 */
export function isZero(angle: Angle): boolean {
  if (angle.d === 0 || angle.r === 0 || angle.g === 0) return true;
  if (angle.dms !== undefined) {
    const [d, m, s] = angle.dms;
    return d === 0 && m === 0 && s === 0;
  }
  return false;
}

/** Magnitude above which revolutions are dropped in one step rather than one at a time */
const STEPWISE_LIMIT_TURNS = 2 ** 20;

/**
 * Drop whole revolutions from a large value, leaving one more revolution than
 * the remainder (same sign as the input) so a stepwise reduction of the result
 * ends where stepping from the original value would.
 * Values within the stepwise limit are returned as-is.
 */
export function shedRevolutions(value: number, modulus: number): number {
  if (Math.abs(value) <= modulus * STEPWISE_LIMIT_TURNS) return value;
  return (value % modulus) + Math.sign(value) * modulus;
}

/**
 * Fold a scalar into [0, modulus] one revolution at a time.
 * Values already in range, including the modulus itself, are returned as-is.
 */
export function foldIntoRevolution(value: number, modulus: number): number {
  if (!Number.isFinite(value)) {
    throw new AngleContractError(`Cannot normalize non-finite angle ${value}`);
  }

  let current = shedRevolutions(value, modulus);
  while (current < 0 || current > modulus) {
    current = current > modulus ? current - modulus : current + modulus;
  }
  return current;
}
