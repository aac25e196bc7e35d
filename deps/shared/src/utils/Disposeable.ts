export type AsyncDisposableLike = {
  [Symbol.asyncDispose](): Promise<void>;
};

/**
 * 依序釋放資源；任一釋放失敗仍會繼續釋放其餘資源，最後拋出第一個錯誤。
 */
export async function dispose(...targets: AsyncDisposableLike[]) {
  let firstError: unknown = undefined;
  for (const target of targets) {
    try {
      await target[Symbol.asyncDispose]();
    } catch (error) {
      firstError ??= error;
    }
  }
  if (firstError !== undefined) throw firstError;
}
