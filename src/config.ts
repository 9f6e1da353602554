import { config as loadDotEnv } from "dotenv";
import { DEFAULT_LIMITS } from "./extraction/defaults";
import type { ActorInput, LogLevelName, RuntimeConfig } from "./types";

loadDotEnv();

const ALLOWED_LOG_LEVELS: readonly LogLevelName[] = ["DEBUG", "INFO", "WARNING", "ERROR"];
const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(
      `Configuration validation failed:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
    );
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

const isLogLevel = (value: string): value is LogLevelName =>
  ALLOWED_LOG_LEVELS.some((level) => level === value);

const parseBooleanWithValidation = (
  value: boolean | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: boolean,
): boolean => {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return fallback;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;

  issues.push(
    `\`${fieldName}\` must be a boolean (true/false, 1/0, yes/no). Received: ${JSON.stringify(value)}.`,
  );
  return fallback;
};

const parseIntegerWithRangeValidation = (
  value: number | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: number,
  min: number,
  max: number,
): number => {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number(value)
        : fallback;

  if (!Number.isInteger(parsed)) {
    issues.push(`\`${fieldName}\` must be an integer. Received: ${JSON.stringify(value)}.`);
    return fallback;
  }
  if (parsed < min || parsed > max) {
    issues.push(`\`${fieldName}\` must be within ${min}-${max}. Received: ${parsed}.`);
    return fallback;
  }
  return parsed;
};

const parseNonEmptyString = (
  value: string | undefined,
  fieldName: string,
  issues: string[],
  fallback: string,
): string => {
  if (typeof value !== "string") return fallback;
  const normalized = value.trim();
  if (!normalized) {
    issues.push(`\`${fieldName}\` must be a non-empty string.`);
    return fallback;
  }
  return normalized;
};

/** Actor input wins over environment variables, which win over defaults. */
export const buildRuntimeConfig = (
  input: ActorInput,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig => {
  const issues: string[] = [];

  const rawLogLevel = input.logLevel ?? env.LOG_LEVEL ?? "INFO";
  const normalizedLogLevel = String(rawLogLevel).trim().toUpperCase();
  let logLevel: LogLevelName = "INFO";
  if (isLogLevel(normalizedLogLevel)) {
    logLevel = normalizedLogLevel;
  } else {
    issues.push(
      `\`logLevel\` must be one of ${ALLOWED_LOG_LEVELS.join(", ")}. Received: ${JSON.stringify(rawLogLevel)} (input \`logLevel\` or env \`LOG_LEVEL\`).`,
    );
  }

  const logRedactionEnabled = parseBooleanWithValidation(
    input.logRedactionEnabled ?? env.LOG_REDACTION_ENABLED,
    "logRedactionEnabled",
    issues,
    true,
  );

  const browserHeadless = parseBooleanWithValidation(
    input.browserHeadless ?? env.BROWSER_HEADLESS,
    "browserHeadless",
    issues,
    true,
  );

  const browserLaunchTimeoutMs = parseIntegerWithRangeValidation(
    input.browserLaunchTimeoutMs ?? env.BROWSER_LAUNCH_TIMEOUT_MS,
    "browserLaunchTimeoutMs",
    issues,
    30000,
    1000,
    120000,
  );

  const navigationTimeoutMs = parseIntegerWithRangeValidation(
    input.navigationTimeoutMs ?? env.NAVIGATION_TIMEOUT_MS,
    "navigationTimeoutMs",
    issues,
    30000,
    1000,
    300000,
  );

  const navigationAttempts = parseIntegerWithRangeValidation(
    input.navigationAttempts ?? env.NAVIGATION_ATTEMPTS,
    "navigationAttempts",
    issues,
    3,
    1,
    10,
  );

  const sessionStorageEnabled = parseBooleanWithValidation(
    input.sessionStorageEnabled ?? env.SESSION_STORAGE_ENABLED,
    "sessionStorageEnabled",
    issues,
    true,
  );

  const sessionStoreName = parseNonEmptyString(
    input.sessionStoreName ?? env.SESSION_STORE_NAME,
    "sessionStoreName",
    issues,
    "LIST_HARVESTER_SESSIONS",
  );

  const sessionStoreKey = parseNonEmptyString(
    input.sessionStoreKey ?? env.SESSION_STORE_KEY,
    "sessionStoreKey",
    issues,
    "browser-session",
  );

  const sessionStorageRetentionMs = parseIntegerWithRangeValidation(
    input.sessionStorageRetentionMs ?? env.SESSION_STORAGE_RETENTION_MS,
    "sessionStorageRetentionMs",
    issues,
    7 * 24 * 60 * 60 * 1000,
    60_000,
    90 * 24 * 60 * 60 * 1000,
  );

  const maxItemsCeiling = parseIntegerWithRangeValidation(
    input.maxItemsCeiling ?? env.MAX_ITEMS_CEILING,
    "maxItemsCeiling",
    issues,
    DEFAULT_LIMITS.maxItemsCeiling,
    1,
    100000,
  );

  const loadMaxAttempts = parseIntegerWithRangeValidation(
    input.loadMaxAttempts ?? env.LOAD_MAX_ATTEMPTS,
    "loadMaxAttempts",
    issues,
    DEFAULT_LIMITS.loadMaxAttempts,
    1,
    10000,
  );

  const loadMaxConsecutiveFailures = parseIntegerWithRangeValidation(
    input.loadMaxConsecutiveFailures ?? env.LOAD_MAX_CONSECUTIVE_FAILURES,
    "loadMaxConsecutiveFailures",
    issues,
    DEFAULT_LIMITS.loadMaxConsecutiveFailures,
    1,
    1000,
  );

  if (loadMaxConsecutiveFailures > loadMaxAttempts) {
    issues.push(
      "`loadMaxConsecutiveFailures` must be less than or equal to `loadMaxAttempts`.",
    );
  }

  const noProgressLimit = parseIntegerWithRangeValidation(
    input.noProgressLimit ?? env.NO_PROGRESS_LIMIT,
    "noProgressLimit",
    issues,
    DEFAULT_LIMITS.noProgressLimit,
    1,
    10000,
  );

  const scrollIncrementPx = parseIntegerWithRangeValidation(
    input.scrollIncrementPx ?? env.SCROLL_INCREMENT_PX,
    "scrollIncrementPx",
    issues,
    DEFAULT_LIMITS.scrollIncrementPx,
    10,
    10000,
  );

  const csvOutputEnabled = parseBooleanWithValidation(
    input.csvOutputEnabled ?? env.CSV_OUTPUT_ENABLED,
    "csvOutputEnabled",
    issues,
    true,
  );

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return {
    logLevel,
    logRedactionEnabled,
    browserHeadless,
    browserLaunchTimeoutMs,
    navigationTimeoutMs,
    navigationAttempts,
    sessionStorageEnabled,
    sessionStoreName,
    sessionStoreKey,
    sessionStorageRetentionMs,
    maxItemsCeiling,
    loadMaxAttempts,
    loadMaxConsecutiveFailures,
    noProgressLimit,
    scrollIncrementPx,
    csvOutputEnabled,
  };
};
