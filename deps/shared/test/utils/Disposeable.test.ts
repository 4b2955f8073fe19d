import { describe, expect, test } from "vitest";

import { dispose, isAsyncDisposable } from "~shared/utils/Disposeable";
import { err, isErr, isOk, ok } from "~shared/utils/Result";

describe("dispose", () => {
  test("依序釋放並略過非 AsyncDisposable 的值", async () => {
    const order: string[] = [];
    const resource = (name: string) => ({
      async [Symbol.asyncDispose]() {
        order.push(name);
      },
    });

    await dispose(resource("a"), undefined, "text", resource("b"));
    expect(order).toEqual(["a", "b"]);
  });

  test("isAsyncDisposable", () => {
    expect(isAsyncDisposable({ [Symbol.asyncDispose]: async () => {} })).toBe(
      true
    );
    expect(isAsyncDisposable({ [Symbol.asyncDispose]: "no" })).toBe(false);
    expect(isAsyncDisposable(null)).toBe(false);
  });
});

describe("Result", () => {
  test("ok / err", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(err("x")).toEqual({ ok: false, error: "x" });
    expect(isOk(ok())).toBe(true);
    expect(isErr(err({ type: "SCAN_FAILED" }))).toBe(true);
  });
});
