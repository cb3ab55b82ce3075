/**
 * AngleFormatter - Renders angles for display
 *
 * The representation an angle was constructed in is the one shown, so an
 * angle made from radians prints in radians even after it has cached degrees.
 */

import { isZero } from "@/angle/AngleValue";
import { DEFAULT_FORMAT_OPTIONS } from "@/config/angleConfig";
import type { Angle, DMSTriple, FormatOptions } from "@/types";

function formatNumber(n: number, options: FormatOptions): string {
  if (options.precision === null) return String(n);
  // Number() drops trailing zeros left by toFixed
  return String(Number(n.toFixed(options.precision)));
}

function formatDMS([d, m, s]: DMSTriple, options: FormatOptions): string {
  const { symbols, separator } = options;
  const parts = [`${formatNumber(d, options)}${symbols.degrees}`];

  if (m !== 0 || s !== 0) {
    parts.push(`${formatNumber(m, options)}${symbols.minutes}`);
  }
  if (s !== 0) {
    parts.push(`${formatNumber(s, options)}${symbols.seconds}`);
  }
  return parts.join(separator);
}

/**
 * Format an angle as e.g. "13.2°", "0.25㎭", "40ᵍ" or "90° 30′ 50″".
 * Any zero-valued angle renders as the zero marker.
 */
export function formatAngle(angle: Angle, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): string {
  if (isZero(angle)) return options.zero;

  const { symbols } = options;
  switch (angle.kind) {
    case "zero":
      return options.zero;
    case "degrees":
      return `${formatNumber(angle.d, options)}${symbols.degrees}`;
    case "radians":
      return `${formatNumber(angle.r, options)}${symbols.radians}`;
    case "gradians":
      return `${formatNumber(angle.g, options)}${symbols.gradians}`;
    case "dms":
      return formatDMS(angle.dms, options);
  }
}

/**
 * Format an angle wrapped as `#Angle<...>`, for logs and test output.
 */
export function inspectAngle(angle: Angle, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): string {
  return `#Angle<${formatAngle(angle, options)}>`;
}
