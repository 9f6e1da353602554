export const API_VERSION = "0.1.0";

export const HARVEST_REQUEST_DEFAULTS = {
  maxItems: 20,
  perItemDelayMs: 500,
  filter: "none",
  mode: "full",
  profileId: "hiring-applicants",
} as const;

const nonEmptyString = { type: "string", minLength: 1, pattern: "\\S" };

const strategyListSchema = {
  type: "array",
  minItems: 1,
  items: {
    anyOf: [nonEmptyString, { $ref: "#/definitions/locatorStrategy" }],
  },
};

const fieldMapSchema = {
  type: "object",
  minProperties: 1,
  additionalProperties: strategyListSchema,
};

const revealSchema = {
  type: "object",
  additionalProperties: false,
  required: ["control", "fields"],
  properties: {
    control: strategyListSchema,
    fields: fieldMapSchema,
  },
};

export const LIST_PROFILE_SCHEMA: Record<string, unknown> = {
  $id: "ListProfileV1",
  type: "object",
  additionalProperties: false,
  required: [
    "id",
    "listUrlTemplate",
    "filterParam",
    "filters",
    "landingPattern",
    "itemLocator",
    "label",
    "loadMore",
    "listContainers",
    "primaryFields",
    "dismiss",
  ],
  definitions: {
    locatorStrategy: {
      type: "object",
      additionalProperties: false,
      required: ["locator"],
      properties: {
        locator: nonEmptyString,
        attribute: nonEmptyString,
        scheme: nonEmptyString,
        contains: nonEmptyString,
        pattern: nonEmptyString,
        stripQuery: { type: "boolean" },
        multiple: { type: "boolean" },
      },
    },
  },
  properties: {
    id: nonEmptyString,
    listUrlTemplate: {
      type: "string",
      pattern: "\\{listId\\}",
      description: "List view URL; `{listId}` is replaced with the encoded list id.",
    },
    filterParam: {
      anyOf: [nonEmptyString, { type: "null" }],
    },
    filters: {
      type: "array",
      uniqueItems: true,
      items: nonEmptyString,
    },
    landingPattern: nonEmptyString,
    itemLocator: nonEmptyString,
    label: {
      type: "object",
      additionalProperties: false,
      required: ["affixes"],
      properties: {
        attribute: nonEmptyString,
        affixes: { type: "array", items: nonEmptyString },
      },
    },
    loadMore: { ...strategyListSchema, minItems: 0 },
    listContainers: { type: "array", items: nonEmptyString },
    detailReady: nonEmptyString,
    primaryFields: fieldMapSchema,
    reveal: revealSchema,
    dismiss: { ...strategyListSchema, minItems: 0 },
    profilePage: {
      type: "object",
      additionalProperties: false,
      required: ["urlField", "landingPattern", "reveal", "dismiss"],
      description: "Per-item profile page read in `profile_contact` mode.",
      properties: {
        urlField: nonEmptyString,
        landingPattern: nonEmptyString,
        ready: nonEmptyString,
        primaryFields: fieldMapSchema,
        reveal: revealSchema,
        dismiss: { ...strategyListSchema, minItems: 0 },
      },
    },
  },
};

export const buildHarvestRequestSchema = (maxItemsCeiling: number): Record<string, unknown> => ({
  $id: "HarvestRequestV1",
  type: "object",
  additionalProperties: false,
  required: ["listId"],
  properties: {
    listId: {
      ...nonEmptyString,
      examples: ["4325022456"],
    },
    maxItems: {
      type: "integer",
      minimum: 1,
      maximum: maxItemsCeiling,
      default: HARVEST_REQUEST_DEFAULTS.maxItems,
    },
    perItemDelayMs: {
      type: "integer",
      minimum: 0,
      maximum: 600000,
      default: HARVEST_REQUEST_DEFAULTS.perItemDelayMs,
    },
    filter: {
      type: "string",
      default: HARVEST_REQUEST_DEFAULTS.filter,
      description: "One of the list profile's filters, or `none`.",
    },
    mode: {
      type: "string",
      enum: ["full", "keys_only", "profile_contact"],
      default: HARVEST_REQUEST_DEFAULTS.mode,
      description:
        "`keys_only` records identity keys without opening detail views; `profile_contact` also reads each item's profile page contact overlay.",
    },
    profileId: nonEmptyString,
    profile: {
      type: "object",
      description: "Custom list profile, validated against ListProfileV1.",
    },
  },
});

export const EXAMPLES = {
  harvestRequest: {
    listId: "4325022456",
    maxItems: 50,
    perItemDelayMs: 500,
    filter: "GOOD_FIT",
    mode: "full",
  },
};
