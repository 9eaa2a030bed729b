import { describe, expect, test } from "vitest";
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_START_TIMEOUT_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  loadRuntimeConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

const baseEnv = { WHEELHOUSE_CACHE_DIR: "/tmp/wheelhouse-cache" };

describe("loadRuntimeConfig", () => {
  test("falls back to defaults", () => {
    expect(loadRuntimeConfig(baseEnv)).toEqual({
      driverPath: undefined,
      cacheDir: "/tmp/wheelhouse-cache",
      headless: false,
      startTimeoutMs: DEFAULT_START_TIMEOUT_MS,
      stopTimeoutMs: DEFAULT_STOP_TIMEOUT_MS,
      connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
      commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    });
  });

  test("reads timeouts and flags from the environment", () => {
    const config = loadRuntimeConfig({
      ...baseEnv,
      WHEELHOUSE_HEADLESS: "TRUE",
      WHEELHOUSE_START_TIMEOUT_MS: "2500",
      WHEELHOUSE_STOP_TIMEOUT_MS: "",
      WHEELHOUSE_COMMAND_TIMEOUT_MS: " 1000 ",
    });

    expect(config.headless).toBe(true);
    expect(config.startTimeoutMs).toBe(2500);
    expect(config.stopTimeoutMs).toBe(DEFAULT_STOP_TIMEOUT_MS);
    expect(config.commandTimeoutMs).toBe(1000);
  });

  test("prefers WHEELHOUSE_DRIVER_PATH over DRIVER_PATH", () => {
    expect(loadRuntimeConfig({ ...baseEnv, DRIVER_PATH: "/opt/alias" }).driverPath).toBe("/opt/alias");
    expect(
      loadRuntimeConfig({
        ...baseEnv,
        DRIVER_PATH: "/opt/alias",
        WHEELHOUSE_DRIVER_PATH: "/opt/primary",
      }).driverPath
    ).toBe("/opt/primary");
    expect(loadRuntimeConfig({ ...baseEnv, WHEELHOUSE_DRIVER_PATH: "  " }).driverPath).toBeUndefined();
  });

  test("reports every invalid variable", () => {
    let caught: unknown;
    try {
      loadRuntimeConfig({
        ...baseEnv,
        WHEELHOUSE_HEADLESS: "maybe",
        WHEELHOUSE_CONNECT_TIMEOUT_MS: "-5",
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.issues : []).toEqual([
      'WHEELHOUSE_HEADLESS: Expected a boolean flag, got "maybe"',
      "WHEELHOUSE_CONNECT_TIMEOUT_MS: Number must be greater than 0",
    ]);
  });
});
