import { expect } from "vitest";

import type { Err, Ok, Result } from "~shared/utils/Result";

export function expectOk<T, E>(result: Result<T, E>): asserts result is Ok<T> {
  expect(result.ok, result.ok ? "" : JSON.stringify(result.error)).toBe(true);
}

export function expectErr<T, E>(
  result: Result<T, E>
): asserts result is Err<E> {
  expect(result.ok).toBe(false);
}
