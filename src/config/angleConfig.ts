import type { FormatOptions, UnitSymbols } from "@/types";

export const DEFAULT_UNIT_SYMBOLS: UnitSymbols = {
  degrees: "°",
  radians: "㎭",
  gradians: "ᵍ",
  minutes: "′",
  seconds: "″",
};

/**
 * Default format options
 */
export const DEFAULT_FORMAT_OPTIONS: FormatOptions = {
  symbols: DEFAULT_UNIT_SYMBOLS,
  separator: " ",
  zero: "0",
  precision: null,
};

/**
 * Creates a complete format configuration from partial overrides.
 * Symbols may be overridden one at a time.
 */
export function createFormatConfig(
  options: Partial<Omit<FormatOptions, "symbols">> & { symbols?: Partial<UnitSymbols> } = {}
): FormatOptions {
  const { symbols, ...rest } = options;

  if (rest.precision !== undefined && rest.precision !== null) {
    if (!Number.isInteger(rest.precision) || rest.precision < 0 || rest.precision > 100) {
      throw new Error(`Invalid precision ${rest.precision}, expected an integer in [0, 100]`);
    }
  }

  return {
    ...DEFAULT_FORMAT_OPTIONS,
    ...rest,
    symbols: { ...DEFAULT_UNIT_SYMBOLS, ...symbols },
  };
}
