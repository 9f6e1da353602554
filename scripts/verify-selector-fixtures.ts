import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { buildRuntimeConfig } from "../src/config";
import { HarvestService } from "../src/extraction/service";
import { SnapshotPageDriver } from "../src/runtime/snapshot-driver";

interface FixtureExpectation {
  profileId: string;
  landingUrl?: string;
  request: Record<string, unknown>;
  /** Subset of `errorKind`, `totalProcessed`, `stopReason` and `items`. */
  expected: Record<string, unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const deepEqual = (left: unknown, right: unknown): boolean => {
  if (left === right) return true;
  if (left === null || right === null) return false;

  if (Array.isArray(left) && Array.isArray(right)) {
    if (left.length !== right.length) return false;
    return left.every((entry, index) => deepEqual(entry, right[index]));
  }

  if (isRecord(left) && isRecord(right)) {
    const keys = [...new Set([...Object.keys(left), ...Object.keys(right)])];
    return keys.every((key) => deepEqual(left[key], right[key]));
  }

  return false;
};

const parseExpectation = (raw: string, file: string): FixtureExpectation => {
  const parsed: unknown = JSON.parse(raw);
  if (
    !isRecord(parsed) ||
    typeof parsed.profileId !== "string" ||
    !isRecord(parsed.request) ||
    !isRecord(parsed.expected)
  ) {
    throw new Error(`${file} must define profileId, request and expected.`);
  }
  return {
    profileId: parsed.profileId,
    landingUrl: typeof parsed.landingUrl === "string" ? parsed.landingUrl : undefined,
    request: parsed.request,
    expected: parsed.expected,
  };
};

const run = async (): Promise<void> => {
  const fixturesDir = path.join(process.cwd(), "fixtures", "snapshots");
  const fixtureFiles = await readdir(fixturesDir);
  const expectationFiles = fixtureFiles
    .filter((file) => file.endsWith(".expected.json"))
    .sort((a, b) => a.localeCompare(b));

  if (expectationFiles.length === 0) {
    throw new Error("No snapshot expectation fixtures found.");
  }

  const service = new HarvestService({ runtime: buildRuntimeConfig({}) });

  const failures: string[] = [];
  for (const expectationFile of expectationFiles) {
    const baseName = expectationFile.replace(".expected.json", "");
    const [html, expectationRaw] = await Promise.all([
      readFile(path.join(fixturesDir, `${baseName}.html`), "utf8"),
      readFile(path.join(fixturesDir, expectationFile), "utf8"),
    ]);

    const expectation = parseExpectation(expectationRaw, expectationFile);
    const driver = new SnapshotPageDriver(html, { landingUrl: expectation.landingUrl });
    const outcome = await service.harvest(driver, {
      ...expectation.request,
      profileId: expectation.profileId,
    });

    const actual: Record<string, unknown> = outcome.ok
      ? {
          totalProcessed: outcome.result.totalProcessed,
          stopReason: outcome.result.stopReason,
          items: outcome.result.items.map((item) => ({ key: item.key, fields: { ...item.fields } })),
        }
      : { errorKind: outcome.error.kind };

    for (const [key, expectedValue] of Object.entries(expectation.expected)) {
      if (!deepEqual(actual[key], expectedValue)) {
        failures.push(
          `${baseName}.${key} expected=${JSON.stringify(expectedValue)} actual=${JSON.stringify(actual[key])}`,
        );
      }
    }
  }

  if (failures.length > 0) {
    throw new Error(`Fixture validation failed:\n${failures.map((line) => `- ${line}`).join("\n")}`);
  }

  // eslint-disable-next-line no-console
  console.log(`Snapshot fixture validation passed (${expectationFiles.length} fixtures).`);
};

run().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
