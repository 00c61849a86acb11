/**
 * CONFIG LOADER TESTS
 */

import { describe, it, expect } from "vitest";
import { ConfigError, DEFAULT_TIMEOUTS, MAX_TIMEOUT_SECONDS, loadConfig } from "../index";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      debug: false,
      deviceSerial: undefined,
      platform: "android",
      automation: { url: undefined, apiKey: undefined },
      timeouts: DEFAULT_TIMEOUTS,
      defaultProviders: ["uber", "ola", "rapido"],
      snapshotDir: undefined,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      RIDE_COMPARE_DEBUG: "true",
      DEVICE_SERIAL: " emulator-5554 ",
      PLATFORM: "iOS",
      AUTOMATION_URL: "http://localhost:8765",
      AUTOMATION_API_KEY: "test-secret",
      QUOTE_TIMEOUT_SECONDS: "45",
      COMPARISON_TIMEOUT_SECONDS: "90",
      SNAPSHOT_DIR: "./snapshots",
    });

    expect(config.debug).toBe(true);
    expect(config.deviceSerial).toBe("emulator-5554");
    expect(config.platform).toBe("ios");
    expect(config.automation).toEqual({ url: "http://localhost:8765", apiKey: "test-secret" });
    expect(config.timeouts).toEqual({ openSeconds: 30, quoteSeconds: 45, bookSeconds: 180, comparisonSeconds: 90 });
    expect(config.snapshotDir).toBe("./snapshots");
  });

  it("dedupes the provider list and keeps its order", () => {
    expect(loadConfig({ DEFAULT_PROVIDERS: "Ola, rapido,ola" }).defaultProviders).toEqual(["ola", "rapido"]);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ DEFAULT_PROVIDERS: " ", AUTOMATION_URL: "", SNAPSHOT_DIR: "  " });

    expect(config.defaultProviders).toEqual(["uber", "ola", "rapido"]);
    expect(config.automation.url).toBeUndefined();
    expect(config.snapshotDir).toBeUndefined();
  });

  it("rejects an unknown provider", () => {
    expect(() => loadConfig({ DEFAULT_PROVIDERS: "uber,lyft" })).toThrow(ConfigError);
    expect(() => loadConfig({ DEFAULT_PROVIDERS: "uber,lyft" })).toThrow('Unknown provider "lyft"');
  });

  it("rejects bad timeouts, platforms and URLs", () => {
    expect(() => loadConfig({ QUOTE_TIMEOUT_SECONDS: "soon" })).toThrow("QUOTE_TIMEOUT_SECONDS");
    expect(() => loadConfig({ BOOK_TIMEOUT_SECONDS: "-1" })).toThrow("BOOK_TIMEOUT_SECONDS");
    expect(() => loadConfig({ PLATFORM: "windows" })).toThrow("PLATFORM");
    expect(() => loadConfig({ AUTOMATION_URL: "not a url" })).toThrow("AUTOMATION_URL");
  });

  it("rejects a timeout longer than a timer can hold", () => {
    expect(() => loadConfig({ COMPARISON_TIMEOUT_SECONDS: "3000000" })).toThrow("COMPARISON_TIMEOUT_SECONDS");
    expect(loadConfig({ COMPARISON_TIMEOUT_SECONDS: String(MAX_TIMEOUT_SECONDS) }).timeouts.comparisonSeconds).toBe(
      MAX_TIMEOUT_SECONDS
    );
  });
});
