/**
 * Core type definitions for lazy-angle
 */

// =============================================================================
// ANGLE TYPES
// =============================================================================

/** Units an angle can be expressed in */
export type AngleUnit = "degrees" | "radians" | "gradians" | "dms";

/** Degrees, minutes, seconds. Degrees and minutes are integers. */
export type DMSTriple = readonly [degrees: number, minutes: number, seconds: number];

/** Every representation an angle may carry (computed lazily) */
export interface AngleRepresentations {
  readonly d?: number;
  readonly r?: number;
  readonly g?: number;
  readonly dms?: DMSTriple;
}

/** Canonical zero: unit-independent, carries degrees, radians and gradians */
export interface ZeroAngle extends AngleRepresentations {
  readonly kind: "zero";
  readonly d: number;
  readonly r: number;
  readonly g: number;
}

export interface DegreeAngle extends AngleRepresentations {
  readonly kind: "degrees";
  readonly d: number;
}

export interface RadianAngle extends AngleRepresentations {
  readonly kind: "radians";
  readonly r: number;
}

export interface GradianAngle extends AngleRepresentations {
  readonly kind: "gradians";
  readonly g: number;
}

export interface DMSAngle extends AngleRepresentations {
  readonly kind: "dms";
  readonly dms: DMSTriple;
}

/**
 * An angle value. `kind` names the representation it was constructed from;
 * the other fields fill in as conversions are requested.
 */
export type Angle = ZeroAngle | DegreeAngle | RadianAngle | GradianAngle | DMSAngle;

export type AngleKind = Angle["kind"];

export type WithDegrees = Angle & { readonly d: number };
export type WithRadians = Angle & { readonly r: number };
export type WithGradians = Angle & { readonly g: number };
export type WithDMS = Angle & { readonly dms: DMSTriple };

/** An angle (possibly carrying a newly cached field) and the value read from it */
export interface Conversion<T> {
  readonly angle: Angle;
  readonly value: T;
}

// =============================================================================
// RESULT TYPES
// =============================================================================

/** Outcome of an operation that can fail for expected reasons */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** Kinds of expected failure */
export type AngleFailureKind =
  | "domain" // Inverse trig input outside the function's domain
  | "parse"; // Malformed angle text

export interface AngleFailure {
  readonly kind: AngleFailureKind;
  readonly message: string;
}

// =============================================================================
// FORMAT TYPES
// =============================================================================

export interface UnitSymbols {
  readonly degrees: string;
  readonly radians: string;
  readonly gradians: string;
  readonly minutes: string;
  readonly seconds: string;
}

/** Options for rendering an angle as text */
export interface FormatOptions {
  readonly symbols: UnitSymbols;
  /** Placed between DMS components */
  readonly separator: string;
  /** Marker for any zero-valued angle */
  readonly zero: string;
  /** Fraction digits to round to, or null to print numbers as-is */
  readonly precision: number | null;
}
