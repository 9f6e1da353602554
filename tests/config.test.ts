import { describe, expect, it } from "vitest";
import { buildRuntimeConfig, ConfigValidationError } from "../src/config";

const issuesOf = (build: () => unknown): string[] => {
  try {
    build();
  } catch (error) {
    if (error instanceof ConfigValidationError) return error.issues;
    throw error;
  }
  throw new Error("Expected a ConfigValidationError.");
};

describe("buildRuntimeConfig", () => {
  it("falls back to defaults without input or environment", () => {
    expect(buildRuntimeConfig({}, {})).toEqual({
      logLevel: "INFO",
      logRedactionEnabled: true,
      browserHeadless: true,
      browserLaunchTimeoutMs: 30000,
      navigationTimeoutMs: 30000,
      navigationAttempts: 3,
      sessionStorageEnabled: true,
      sessionStoreName: "LIST_HARVESTER_SESSIONS",
      sessionStoreKey: "browser-session",
      sessionStorageRetentionMs: 604800000,
      maxItemsCeiling: 2500,
      loadMaxAttempts: 500,
      loadMaxConsecutiveFailures: 10,
      noProgressLimit: 50,
      scrollIncrementPx: 200,
      csvOutputEnabled: true,
    });
  });

  it("parses environment variables", () => {
    const config = buildRuntimeConfig(
      {},
      {
        LOG_LEVEL: "debug",
        BROWSER_HEADLESS: "no",
        MAX_ITEMS_CEILING: "300",
        CSV_OUTPUT_ENABLED: "off",
        SESSION_STORE_NAME: "  team-sessions ",
      },
    );

    expect(config).toMatchObject({
      logLevel: "DEBUG",
      browserHeadless: false,
      maxItemsCeiling: 300,
      csvOutputEnabled: false,
      sessionStoreName: "team-sessions",
    });
  });

  it("prefers Actor input over environment variables", () => {
    const config = buildRuntimeConfig(
      { maxItemsCeiling: 40, browserHeadless: true },
      { MAX_ITEMS_CEILING: "300", BROWSER_HEADLESS: "false" },
    );

    expect(config.maxItemsCeiling).toBe(40);
    expect(config.browserHeadless).toBe(true);
  });

  it("collects every invalid value before failing", () => {
    const issues = issuesOf(() =>
      buildRuntimeConfig(
        { navigationAttempts: 0 },
        { BROWSER_HEADLESS: "maybe", SCROLL_INCREMENT_PX: "1.5" },
      ),
    );

    expect(issues).toEqual([
      '`browserHeadless` must be a boolean (true/false, 1/0, yes/no). Received: "maybe".',
      "`navigationAttempts` must be within 1-10. Received: 0.",
      '`scrollIncrementPx` must be an integer. Received: "1.5".',
    ]);
  });

  it("rejects unknown log levels", () => {
    expect(issuesOf(() => buildRuntimeConfig({}, { LOG_LEVEL: "loud" }))).toEqual([
      '`logLevel` must be one of DEBUG, INFO, WARNING, ERROR. Received: "loud" (input `logLevel` or env `LOG_LEVEL`).',
    ]);
  });

  it("requires the failure budget to fit inside the attempt budget", () => {
    const issues = issuesOf(() =>
      buildRuntimeConfig({}, { LOAD_MAX_ATTEMPTS: "5", LOAD_MAX_CONSECUTIVE_FAILURES: "6" }),
    );

    expect(issues).toEqual([
      "`loadMaxConsecutiveFailures` must be less than or equal to `loadMaxAttempts`.",
    ]);
  });

  it("rejects blank session store names", () => {
    expect(issuesOf(() => buildRuntimeConfig({ sessionStoreName: "  " }, {}))).toEqual([
      "`sessionStoreName` must be a non-empty string.",
    ]);
  });
});
