/**
 * Environment Config Tests
 */

import { describe, expect, it } from "vitest";
import { loadEnv } from "../env.ts";

describe("loadEnv", () => {
  it("should apply defaults to an empty environment", () => {
    const env = loadEnv({});

    expect(env.NODE_ENV).toBe("development");
    expect(env.CHANNELS_PER_ROUND).toBe(4);
    expect(env.FALLBACK_ALARM_RATIO).toBe(0.1);
    expect(env.LOG_LEVEL).toBeUndefined();
    expect(env.MARKET_DATA_CSV).toBeUndefined();
  });

  it("should coerce numeric settings", () => {
    const env = loadEnv({
      CHANNELS_PER_ROUND: "3",
      FALLBACK_ALARM_RATIO: "0.25",
      LOG_LEVEL: "WARN",
      MARKET_DATA_CSV: "data/all_apps_wide.csv",
    });

    expect(env.CHANNELS_PER_ROUND).toBe(3);
    expect(env.FALLBACK_ALARM_RATIO).toBe(0.25);
    expect(env.LOG_LEVEL).toBe("WARN");
    expect(env.MARKET_DATA_CSV).toBe("data/all_apps_wide.csv");
  });

  it("should list every invalid setting", () => {
    expect(() => loadEnv({ CHANNELS_PER_ROUND: "0", FALLBACK_ALARM_RATIO: "2" })).toThrow(
      /Environment validation failed:\n {2}CHANNELS_PER_ROUND: .*\n {2}FALLBACK_ALARM_RATIO: /,
    );
  });

  it("should reject an unknown log level", () => {
    expect(() => loadEnv({ LOG_LEVEL: "VERBOSE" })).toThrow(/LOG_LEVEL/);
  });
});
