import Ajv, { type ErrorObject } from "ajv";
import { ValidationError } from "../runtime/errors";
import type {
  FieldStrategyMap,
  HarvestMode,
  HarvestTarget,
  ListProfile,
} from "../extraction/types";
import {
  buildHarvestRequestSchema,
  HARVEST_REQUEST_DEFAULTS,
  LIST_PROFILE_SCHEMA,
} from "./contracts";

interface HarvestRequestPayload {
  listId: string;
  maxItems?: number;
  perItemDelayMs?: number;
  filter?: string;
  mode?: HarvestMode;
  profileId?: string;
  profile?: Record<string, unknown>;
}

export interface HarvestRequest {
  target: HarvestTarget;
  profileId: string;
  /** Unvalidated custom profile; checked by the list profile validator. */
  customProfile: Record<string, unknown> | null;
}

const formatAjvError = (error: ErrorObject): string => {
  const location = error.instancePath || "/";
  if (error.keyword === "required") {
    const field = String(error.params.missingProperty ?? "");
    return `${location} missing required field '${field}'.`;
  }
  return `${location} ${error.message ?? "is invalid"}.`;
};

const createAjv = (): Ajv =>
  new Ajv({
    allErrors: true,
    strict: false,
  });

const normalizeHarvestRequest = (payload: HarvestRequestPayload): HarvestRequest => ({
  target: {
    listId: payload.listId.trim(),
    maxItems: payload.maxItems ?? HARVEST_REQUEST_DEFAULTS.maxItems,
    perItemDelayMs: payload.perItemDelayMs ?? HARVEST_REQUEST_DEFAULTS.perItemDelayMs,
    filter: payload.filter?.trim() || HARVEST_REQUEST_DEFAULTS.filter,
    mode: payload.mode ?? HARVEST_REQUEST_DEFAULTS.mode,
  },
  profileId: payload.profileId?.trim() || HARVEST_REQUEST_DEFAULTS.profileId,
  customProfile: payload.profile ?? null,
});

export const createHarvestRequestValidator = (maxItemsCeiling: number) => {
  const validate = createAjv().compile<HarvestRequestPayload>(
    buildHarvestRequestSchema(maxItemsCeiling),
  );

  return (payload: unknown): HarvestRequest => {
    if (!validate(payload)) {
      const issues = (validate.errors ?? []).map(formatAjvError);
      throw new ValidationError("Harvest request failed schema validation.", {
        schema: "HarvestRequestV1",
        issues,
      });
    }

    return normalizeHarvestRequest(payload);
  };
};

const regexIssue = (source: string, location: string): string | null => {
  try {
    new RegExp(source, "i");
    return null;
  } catch {
    return `${location} is not a valid regular expression.`;
  }
};

const collectPatternIssues = (profile: ListProfile): string[] => {
  const issues: string[] = [];
  const landingPatterns: Array<readonly [string, string | undefined]> = [
    ["/landingPattern", profile.landingPattern],
    ["/profilePage/landingPattern", profile.profilePage?.landingPattern],
  ];
  for (const [location, source] of landingPatterns) {
    const issue = source === undefined ? null : regexIssue(source, location);
    if (issue) issues.push(issue);
  }

  const fieldMaps: Array<readonly [string, FieldStrategyMap]> = [
    ["primaryFields", profile.primaryFields],
    ["reveal/fields", profile.reveal?.fields ?? {}],
    ["profilePage/primaryFields", profile.profilePage?.primaryFields ?? {}],
    ["profilePage/reveal/fields", profile.profilePage?.reveal.fields ?? {}],
  ];
  for (const [prefix, fields] of fieldMaps) {
    for (const [field, strategies] of Object.entries(fields)) {
      strategies.forEach((strategy, index) => {
        if (typeof strategy === "string" || strategy.pattern === undefined) return;
        const issue = regexIssue(strategy.pattern, `/${prefix}/${field}/${index}/pattern`);
        if (issue) issues.push(issue);
      });
    }
  }
  return issues;
};

export const createListProfileValidator = () => {
  const validate = createAjv().compile<ListProfile>(LIST_PROFILE_SCHEMA);

  return (payload: unknown): ListProfile => {
    if (!validate(payload)) {
      const issues = (validate.errors ?? []).map(formatAjvError);
      throw new ValidationError("List profile failed schema validation.", {
        schema: "ListProfileV1",
        issues,
      });
    }

    const issues = collectPatternIssues(payload);
    if (issues.length > 0) {
      throw new ValidationError("List profile failed schema validation.", {
        schema: "ListProfileV1",
        issues,
      });
    }
    return payload;
  };
};
