import type { AngleFailure, Result } from "@/types";

/**
 * Thrown by the `angle()` literal shorthand when its text cannot be parsed.
 */
export class InvalidAngleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidAngleError";
  }
}

/**
 * Thrown when a value breaks an invariant the caller was responsible for:
 * an angle with no representation, non-integer DMS components, or a scalar
 * that cannot be normalized. These are defects, not user errors.
 */
export class AngleContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AngleContractError";
  }
}

export const DOMAIN_ERROR_MESSAGE = "Invalid function domain";

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function domainFailure(): AngleFailure {
  return { kind: "domain", message: DOMAIN_ERROR_MESSAGE };
}

export function parseFailure(message: string): AngleFailure {
  return { kind: "parse", message };
}
