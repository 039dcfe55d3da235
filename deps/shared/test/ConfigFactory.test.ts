import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
} from "~shared/ConfigFactory";
import { getLoggerConfig } from "~shared/Logger";

describe("buildConfigFactoryEnv", () => {
  test("套用預設值", () => {
    expect(getLoggerConfig({})).toEqual({ LOG_LEVEL: "info", LOG_EMOJI: true });
  });

  test("解析設定值並忽略未宣告的變數", () => {
    expect(
      getLoggerConfig({ LOG_LEVEL: "debug", LOG_EMOJI: "0", OTHER: "x" })
    ).toEqual({ LOG_LEVEL: "debug", LOG_EMOJI: false });
  });

  test("不合法的值拋出 ConfigError", () => {
    let caught: unknown;
    try {
      getLoggerConfig({ LOG_LEVEL: "loud" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ path: "/LOG_LEVEL" });
  });

  test("envBoolean 接受 true/false/1/0", () => {
    const getConfig = buildConfigFactoryEnv(
      t.Object({ FLAG: t.Optional(envBoolean()) })
    );
    expect(getConfig({ FLAG: "true" }).FLAG).toBe(true);
    expect(getConfig({ FLAG: "1" }).FLAG).toBe(true);
    expect(getConfig({ FLAG: "false" }).FLAG).toBe(false);
    expect(getConfig({ FLAG: "0" }).FLAG).toBe(false);
    expect(getConfig({}).FLAG).toBeUndefined();
    expect(() => getConfig({ FLAG: "yes" })).toThrow(ConfigError);
  });
});
