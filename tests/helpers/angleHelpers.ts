import type { Result } from "@/types";
import { expect } from "vitest";

/**
 * Unwrap a successful result, failing the test otherwise
 */
export function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected ok result, got error: ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

/**
 * Unwrap a failed result, failing the test otherwise
 */
export function expectError<T, E>(result: Result<T, E>): E {
  expect(result.ok).toBe(false);
  if (result.ok) {
    throw new Error("Expected error result");
  }
  return result.error;
}
