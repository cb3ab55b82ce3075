/**
 * lazy-angle
 *
 * Angles that convert between units on demand, once.
 */

// Angle value and unit modules
export { Angle } from "./angle/Angle";
export { zero, isZero, representationOf } from "./angle/AngleValue";
export { Degree, dmsToDegrees } from "./angle/Degree";
export { Radian, TAU } from "./angle/Radian";
export { Gradian } from "./angle/Gradian";
export { DMS, degreesToDMS } from "./angle/DMS";
export { Trig } from "./angle/Trig";
export { angle, type AngleModifier } from "./angle/literal";

// Formatting and configuration
export { formatAngle, inspectAngle } from "./format/AngleFormatter";
export { createFormatConfig, DEFAULT_FORMAT_OPTIONS, DEFAULT_UNIT_SYMBOLS } from "./config/angleConfig";

// Errors and debugging
export { AngleContractError, InvalidAngleError, DOMAIN_ERROR_MESSAGE } from "./errors/AngleErrors";
export {
  ConversionDebugLogger,
  type ConversionDebugLog,
  type DomainErrorDebugLog,
} from "./debug/ConversionDebugLogger";
export { stringToFloat, stringToInteger, stringToNumber } from "./util/number";

export type {
  AngleFailure,
  AngleFailureKind,
  AngleKind,
  AngleUnit,
  Conversion,
  DegreeAngle,
  DMSAngle,
  DMSTriple,
  FormatOptions,
  GradianAngle,
  RadianAngle,
  Result,
  UnitSymbols,
  ZeroAngle,
} from "./types";
