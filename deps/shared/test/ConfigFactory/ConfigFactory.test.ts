import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
  envNumber,
} from "~shared/ConfigFactory";

const schema = t.Object({
  APP_NAME: t.String({ default: "collector" }),
  APP_VERBOSE: envBoolean({ default: false }),
  APP_RETRIES: t.Optional(envNumber()),
});

describe("buildConfigFactoryEnv", () => {
  test("未設定時套用預設值", () => {
    const getConfig = buildConfigFactoryEnv(schema, {});
    expect(getConfig()).toEqual({ APP_NAME: "collector", APP_VERBOSE: false });
  });

  test("字串會轉成 boolean 與 number", () => {
    const getConfig = buildConfigFactoryEnv(schema, {
      APP_NAME: "demo",
      APP_VERBOSE: "true",
      APP_RETRIES: "3",
    });
    expect(getConfig()).toEqual({
      APP_NAME: "demo",
      APP_VERBOSE: true,
      APP_RETRIES: 3,
    });
  });

  test("空字串視為未設定，且忽略 schema 以外的變數", () => {
    const getConfig = buildConfigFactoryEnv(schema, {
      APP_NAME: "",
      UNRELATED: "x",
    });
    expect(getConfig()).toEqual({ APP_NAME: "collector", APP_VERBOSE: false });
  });

  test("無法轉換時丟出 ConfigError", () => {
    const getConfig = buildConfigFactoryEnv(schema, { APP_RETRIES: "many" });
    expect(getConfig).toThrow(ConfigError);
    try {
      getConfig();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.some((issue) => issue.startsWith("/APP_RETRIES"))).toBe(true);
      }
    }
  });
});
