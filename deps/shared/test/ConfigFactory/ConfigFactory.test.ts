import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
} from "~shared/ConfigFactory";

const schema = t.Object({
  APP_NAME: t.String({ default: "raw-ingest" }),
  APP_DEBUG: t.Optional(envBoolean()),
  APP_MODE: t.Optional(t.Union([t.Literal("a"), t.Literal("b")])),
});

describe("buildConfigFactoryEnv", () => {
  test("未設定時套用預設值", () => {
    const getConfig = buildConfigFactoryEnv(schema, {});
    expect(getConfig()).toEqual({ APP_NAME: "raw-ingest" });
  });

  test("envBoolean 能解析 1/0/true/false", () => {
    expect(buildConfigFactoryEnv(schema, { APP_DEBUG: "1" })().APP_DEBUG).toBe(
      true
    );
    expect(
      buildConfigFactoryEnv(schema, { APP_DEBUG: "false" })().APP_DEBUG
    ).toBe(false);
  });

  test("空字串視為未設定，未宣告的 key 不會被帶入", () => {
    const getConfig = buildConfigFactoryEnv(schema, {
      APP_NAME: "",
      OTHER: "x",
    });
    expect(getConfig()).toEqual({ APP_NAME: "raw-ingest" });
  });

  test("不合法的值拋出 ConfigError", () => {
    const getConfig = buildConfigFactoryEnv(schema, { APP_MODE: "c" });
    expect(() => getConfig()).toThrow(ConfigError);
  });

  test("結果會被快取", () => {
    const env: NodeJS.ProcessEnv = { APP_NAME: "first" };
    const getConfig = buildConfigFactoryEnv(schema, env);
    expect(getConfig().APP_NAME).toBe("first");
    env.APP_NAME = "second";
    expect(getConfig().APP_NAME).toBe("first");
  });
});
