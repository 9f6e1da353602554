import { Actor, log } from "apify";
import type { HarvestOutcome } from "../extraction/orchestrator";
import { createErrorEnvelope, createSuccessEnvelope } from "./envelope";
import { csvColumnsFor, renderItemsCsv, toDatasetRecord } from "./export";

export const OUTPUT_KEY = "OUTPUT";
export const CSV_OUTPUT_KEY = "OUTPUT.csv";

/** Where a finished harvest is written; the Actor's default storages in production. */
export interface OutputSinks {
  pushData(records: Array<Record<string, unknown>>): Promise<void>;
  setValue(key: string, value: unknown, options?: { contentType?: string }): Promise<void>;
}

export const actorOutputSinks: OutputSinks = {
  pushData: async (records) => {
    await Actor.pushData(records);
  },
  setValue: async (key, value, options) => {
    await Actor.setValue(key, value, options);
  },
};

export interface WriteOutputOptions {
  csvEnabled: boolean;
  metaExtras?: Record<string, unknown>;
}

export const writeHarvestOutput = async (
  outcome: HarvestOutcome,
  options: WriteOutputOptions,
  sinks: OutputSinks = actorOutputSinks,
): Promise<void> => {
  if (!outcome.ok) {
    await sinks.setValue(OUTPUT_KEY, createErrorEnvelope(outcome.error, options.metaExtras));
    return;
  }

  const { result } = outcome;
  if (result.items.length > 0) {
    await sinks.pushData(result.items.map((item) => toDatasetRecord(item, result.listId)));
  }
  await sinks.setValue(OUTPUT_KEY, createSuccessEnvelope(result, options.metaExtras));

  if (options.csvEnabled) {
    await sinks.setValue(CSV_OUTPUT_KEY, renderItemsCsv(result.items, csvColumnsFor(result.mode)), {
      contentType: "text/csv",
    });
  }
  log.info("Harvest output stored.", {
    items: result.items.length,
    csv: options.csvEnabled,
  });
};
