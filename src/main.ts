import { Actor, log } from "apify";
import { buildRuntimeConfig, ConfigValidationError } from "./config";
import { writeHarvestOutput } from "./api/output";
import { HarvestService } from "./extraction/service";
import type { HarvestOutcome } from "./extraction/orchestrator";
import { installCorrelationLogging } from "./observability/correlation-log";
import { BrowserSession } from "./runtime/browser-session";
import { describeError } from "./runtime/errors";
import { PlaywrightPageDriver } from "./runtime/playwright-driver";
import { SessionStorageManager } from "./runtime/session-storage";
import { SnapshotPageDriver } from "./runtime/snapshot-driver";
import { installLogRedaction } from "./security/secure-log";
import type { ActorInput, RuntimeConfig } from "./types";

const toHarvestPayload = (input: ActorInput): Record<string, unknown> => {
  const payload: Record<string, unknown> = {
    listId: input.listId,
    maxItems: input.maxItems,
    perItemDelayMs: input.perItemDelayMs,
    filter: input.filter,
    mode: input.mode,
    profileId: input.profileId,
    profile: input.profile,
  };
  return Object.fromEntries(Object.entries(payload).filter(([, value]) => value !== undefined));
};

const harvestLive = async (
  service: HarvestService,
  runtime: RuntimeConfig,
  payload: Record<string, unknown>,
): Promise<HarvestOutcome> => {
  const sessionStorage = new SessionStorageManager({
    enabled: runtime.sessionStorageEnabled,
    storeName: runtime.sessionStoreName,
    key: runtime.sessionStoreKey,
    retentionMs: runtime.sessionStorageRetentionMs,
  });
  await sessionStorage.init();

  const session = new BrowserSession({
    headless: runtime.browserHeadless,
    launchTimeoutMs: runtime.browserLaunchTimeoutMs,
    sessionStorage,
  });

  try {
    const page = await session.start();
    const driver = new PlaywrightPageDriver(page, {
      navigationTimeoutMs: runtime.navigationTimeoutMs,
    });
    return await service.harvest(driver, payload);
  } finally {
    await session.stop();
  }
};

const run = async (): Promise<void> => {
  await Actor.init();

  const input = (await Actor.getInput<ActorInput>()) ?? {};
  const runtime = buildRuntimeConfig(input);

  log.setLevel(log.LEVELS[runtime.logLevel]);
  installCorrelationLogging(log, true);
  installLogRedaction(log, runtime.logRedactionEnabled);

  const service = new HarvestService({ runtime });
  const payload = toHarvestPayload(input);
  const dryRun = typeof input.dryRunHtml === "string";

  log.info("List harvester started.", {
    logLevel: runtime.logLevel,
    dryRun,
    profiles: service.listProfiles(),
    browserHeadless: runtime.browserHeadless,
    sessionStorageEnabled: runtime.sessionStorageEnabled,
    maxItemsCeiling: runtime.maxItemsCeiling,
    loadMaxAttempts: runtime.loadMaxAttempts,
    loadMaxConsecutiveFailures: runtime.loadMaxConsecutiveFailures,
    noProgressLimit: runtime.noProgressLimit,
    scrollIncrementPx: runtime.scrollIncrementPx,
    csvOutputEnabled: runtime.csvOutputEnabled,
    logRedactionEnabled: runtime.logRedactionEnabled,
  });

  const outcome =
    typeof input.dryRunHtml === "string"
      ? await service.harvest(
          new SnapshotPageDriver(input.dryRunHtml, { landingUrl: input.dryRunUrl }),
          payload,
        )
      : await harvestLive(service, runtime, payload);

  await writeHarvestOutput(outcome, {
    csvEnabled: runtime.csvOutputEnabled,
    metaExtras: { dry_run: dryRun },
  });

  if (!outcome.ok) {
    await Actor.fail(`${outcome.error.kind}: ${outcome.error.message}`);
    return;
  }
  await Actor.exit();
};

run().catch(async (error: unknown) => {
  if (error instanceof ConfigValidationError) {
    log.error("Actor bootstrap failed due to invalid configuration.", {
      issues: error.issues,
    });
    await Actor.fail(error.message);
    return;
  }

  log.exception(error instanceof Error ? error : new Error(describeError(error)), "Actor run failed");
  await Actor.fail(describeError(error));
});
