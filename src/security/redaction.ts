const DEFAULT_REDACTED = "[REDACTED]";

const SENSITIVE_KEYWORDS = [
  "api_key",
  "apikey",
  "authorization",
  "cookie",
  "password",
  "token",
  "secret",
  "session",
  "storagestate",
  "email",
  "phone",
] as const;

const EMAIL_PATTERN = /[^\s@<>"'(),;:]+@[^\s@<>"'(),;:]+\.[a-z]{2,}/gi;
const TEL_PATTERN = /\btel:[+\d][\d\s().-]*/gi;

const hasSensitiveKey = (key: string): boolean => {
  const normalized = key.trim().toLowerCase();
  return SENSITIVE_KEYWORDS.some((keyword) => normalized.includes(keyword));
};

const redactBearer = (value: string): string =>
  value.replace(/(bearer)\s+([a-z0-9._~+/=-]+)/gi, "$1 [REDACTED]");

const redactUrlCredentials = (value: string): string => {
  try {
    const url = new URL(value);
    if (!url.username && !url.password) return value;
    url.username = "REDACTED";
    url.password = "";
    return url.toString();
  } catch {
    return value;
  }
};

const redactContactValues = (value: string): string =>
  value.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]").replace(TEL_PATTERN, "tel:[REDACTED]");

const maybeRedactString = (value: string): string => {
  const trimmed = value.trim();
  if (!trimmed) return value;
  if (/^bearer\s+/i.test(trimmed)) return redactBearer(trimmed);
  if (/^https?:\/\//i.test(trimmed)) {
    const masked = redactUrlCredentials(trimmed);
    return masked === trimmed ? redactContactValues(trimmed) : masked;
  }
  return redactContactValues(value);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export interface RedactionOptions {
  maxDepth?: number;
  redactedValue?: string;
}

/** Masks secrets and harvested contact data before they reach log sinks. */
export const redact = (value: unknown, options: RedactionOptions = {}): unknown => {
  const maxDepth = Math.max(1, options.maxDepth ?? 6);
  const redactedValue = options.redactedValue ?? DEFAULT_REDACTED;

  const walk = (input: unknown, depth: number): unknown => {
    if (depth > maxDepth) return "[TRUNCATED]";
    if (input === null || input === undefined) return input;

    if (typeof input === "string") {
      return maybeRedactString(input);
    }

    if (typeof input === "number" || typeof input === "boolean") return input;

    if (Array.isArray(input)) {
      return input.map((entry) => walk(entry, depth + 1));
    }

    if (input instanceof Error) {
      return { name: input.name, message: maybeRedactString(input.message) };
    }

    if (isRecord(input)) {
      const out: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(input)) {
        if (hasSensitiveKey(key) && (typeof entry === "string" || isRecord(entry))) {
          out[key] = redactedValue;
          continue;
        }
        out[key] = walk(entry, depth + 1);
      }
      return out;
    }

    return String(input);
  };

  return walk(value, 0);
};
