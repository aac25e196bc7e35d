import { expect } from "vitest";

import type { Err, Ok, Result } from "~shared/utils/Result";

export function expectOk<T, E>(result: Result<T, E>): asserts result is Ok<T> {
  if (!result.ok) {
    expect.fail(`預期成功，實際為錯誤: ${JSON.stringify(result.error)}`);
  }
}

export function expectErr<T, E>(
  result: Result<T, E>
): asserts result is Err<E> {
  if (result.ok) {
    expect.fail(`預期錯誤，實際為成功: ${JSON.stringify(result.value)}`);
  }
}
