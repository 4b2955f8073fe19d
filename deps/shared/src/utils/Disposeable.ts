export function isAsyncDisposable(value: unknown): value is AsyncDisposable {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncDispose in value &&
    typeof value[Symbol.asyncDispose] === "function"
  );
}

/**
 * 依序釋放資源；非 AsyncDisposable 的值直接略過。
 */
export async function dispose(...targets: unknown[]) {
  for (const target of targets) {
    if (isAsyncDisposable(target)) {
      await target[Symbol.asyncDispose]();
    }
  }
}
