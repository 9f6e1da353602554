import { log } from "apify";
import { createHarvestRequestValidator } from "../api/schema-validation";
import { toHarvestError, type HarvestError } from "../runtime/errors";
import type { RuntimeConfig } from "../types";
import { HarvestOrchestrator, type HarvestOutcome } from "./orchestrator";
import type { PageDriver } from "./page-driver";
import { createDefaultProfiles, resolveProfile } from "./profiles";
import type { HarvestTarget, ListProfile, PacingConfig } from "./types";

export type HarvestServiceRuntime = Pick<
  RuntimeConfig,
  | "maxItemsCeiling"
  | "loadMaxAttempts"
  | "loadMaxConsecutiveFailures"
  | "noProgressLimit"
  | "scrollIncrementPx"
  | "navigationAttempts"
>;

export interface HarvestServiceConfig {
  runtime: HarvestServiceRuntime;
  profiles?: ListProfile[];
  pacing?: Partial<PacingConfig>;
}

/**
 * Entry point for hosts: validates the raw request, resolves the list
 * profile and runs one harvest. Like the orchestrator it never throws.
 */
export class HarvestService {
  private readonly runtime: HarvestServiceRuntime;
  private readonly profiles: ListProfile[];
  private readonly pacing: Partial<PacingConfig>;
  private readonly validateRequest: ReturnType<typeof createHarvestRequestValidator>;

  public constructor(config: HarvestServiceConfig) {
    this.runtime = config.runtime;
    this.profiles = config.profiles ?? createDefaultProfiles();
    this.pacing = config.pacing ?? {};
    this.validateRequest = createHarvestRequestValidator(config.runtime.maxItemsCeiling);
  }

  public listProfiles(): string[] {
    return this.profiles.map((profile) => profile.id);
  }

  public async harvest<H>(driver: PageDriver<H>, payload: unknown): Promise<HarvestOutcome> {
    const prepared = this.prepare(driver, payload);
    if (!prepared.ok) return prepared;
    return prepared.orchestrator.harvest(prepared.target);
  }

  private prepare<H>(
    driver: PageDriver<H>,
    payload: unknown,
  ):
    | { ok: true; orchestrator: HarvestOrchestrator<H>; target: HarvestTarget }
    | { ok: false; error: HarvestError } {
    try {
      const request = this.validateRequest(payload);
      const profile = resolveProfile(request, this.profiles);
      const orchestrator = new HarvestOrchestrator({
        driver,
        profile,
        pacing: this.pacing,
        navigationAttempts: this.runtime.navigationAttempts,
        limits: {
          maxItemsCeiling: this.runtime.maxItemsCeiling,
          loadMaxAttempts: this.runtime.loadMaxAttempts,
          loadMaxConsecutiveFailures: this.runtime.loadMaxConsecutiveFailures,
          noProgressLimit: this.runtime.noProgressLimit,
          scrollIncrementPx: this.runtime.scrollIncrementPx,
        },
      });
      log.info("Harvest request accepted.", {
        listId: request.target.listId,
        profileId: profile.id,
        maxItems: request.target.maxItems,
        filter: request.target.filter,
        mode: request.target.mode,
      });
      return { ok: true, orchestrator, target: request.target };
    } catch (error) {
      const tagged = toHarvestError(error, { stage: "request" });
      log.warning("Harvest request rejected.", { kind: tagged.kind, message: tagged.message });
      return { ok: false, error: tagged };
    }
  }
}
