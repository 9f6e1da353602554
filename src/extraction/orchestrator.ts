import { randomUUID } from "node:crypto";
import { log } from "apify";
import {
  AccessDeniedError,
  describeError,
  NoItemsFoundError,
  normalizeError,
  toHarvestError,
  ValidationError,
  type HarvestError,
} from "../runtime/errors";
import { navigateWithRetry } from "../runtime/navigation";
import { runWithRunContext } from "../observability/run-context";
import { DEFAULT_LIMITS, DEFAULT_PACING } from "./defaults";
import { DetailExtractor, listDetailSteps, profilePageDetailSteps } from "./detail-extractor";
import { ItemDiscoverer } from "./item-discoverer";
import { checkLanding } from "./landing-check";
import { ListLoader } from "./list-loader";
import { buildListUrl, isNoFilter } from "./normalization";
import type { PageDriver, ScrollDelta, ScrollOutcome } from "./page-driver";
import { createHarvestState, ResultBuilder } from "./result";
import type {
  ExtractionResult,
  HarvestLimits,
  HarvestState,
  FieldValue,
  HarvestTarget,
  Item,
  ListProfile,
  PacingConfig,
  ProfileContactStats,
  ProfilePageSteps,
} from "./types";

const freezeItem = (key: string, fields: Record<string, FieldValue>): Item =>
  Object.freeze({ key, fields: Object.freeze({ ...fields }) });

const mergePresent = (
  base: Record<string, FieldValue>,
  extra: Record<string, FieldValue>,
): Record<string, FieldValue> => {
  const merged = { ...base };
  for (const [field, value] of Object.entries(extra)) {
    if (value !== null) merged[field] = value;
  }
  return merged;
};

export type HarvestOutcome =
  | { ok: true; result: ExtractionResult }
  | { ok: false; error: HarvestError };

export interface HarvestOrchestratorConfig<H> {
  driver: PageDriver<H>;
  profile: ListProfile;
  limits?: Partial<HarvestLimits>;
  pacing?: Partial<PacingConfig>;
  navigationAttempts?: number;
}

/**
 * Owns one session for the duration of a harvest: landing check, bulk
 * expansion, reset to origin, then the incremental scan-and-extract loop.
 * Handles are re-queried every round because the list evicts off-screen
 * items.
 */
export class HarvestOrchestrator<H> {
  private readonly driver: PageDriver<H>;
  private readonly profile: ListProfile;
  private readonly limits: HarvestLimits;
  private readonly pacing: PacingConfig;
  private readonly navigationAttempts: number;
  private readonly discoverer: ItemDiscoverer<H>;
  private readonly loader: ListLoader<H>;
  private readonly extractor: DetailExtractor<H>;

  public constructor(config: HarvestOrchestratorConfig<H>) {
    this.driver = config.driver;
    this.profile = config.profile;
    this.limits = { ...DEFAULT_LIMITS, ...config.limits };
    this.pacing = { ...DEFAULT_PACING, ...config.pacing };
    this.navigationAttempts = config.navigationAttempts ?? 3;
    this.discoverer = new ItemDiscoverer(this.driver, this.profile);
    this.loader = new ListLoader({
      driver: this.driver,
      profile: this.profile,
      discoverer: this.discoverer,
      pacing: this.pacing,
    });
    this.extractor = new DetailExtractor({
      driver: this.driver,
      steps: listDetailSteps(this.profile),
      pacing: this.pacing,
    });
  }

  /** Never throws: returns the result or a tagged error. */
  public async harvest(target: HarvestTarget): Promise<HarvestOutcome> {
    const context = {
      run_id: randomUUID(),
      list_id: target.listId,
      profile_id: this.profile.id,
      mode: target.mode,
      started_at_ms: Date.now(),
    };

    return runWithRunContext(context, async () => {
      try {
        const result = await this.run(target);
        return { ok: true as const, result };
      } catch (error) {
        const tagged = toHarvestError(error, { listId: target.listId, profileId: this.profile.id });
        log.error("Harvest failed.", { kind: tagged.kind, message: tagged.message });
        return { ok: false as const, error: tagged };
      }
    });
  }

  private async run(target: HarvestTarget): Promise<ExtractionResult> {
    const filter = this.resolveFilter(target.filter);
    const resolved: HarvestTarget = { ...target, filter };
    const profilePage = this.resolveProfilePage(resolved);
    const state = createHarvestState();
    const builder = new ResultBuilder([
      ...Object.keys(this.profile.reveal?.fields ?? {}),
      ...Object.keys(profilePage?.reveal.fields ?? {}),
    ]);

    await this.land(resolved);

    const targetCount = Math.min(resolved.maxItems, this.limits.maxItemsCeiling);
    log.info("Loading list items.", { targetCount });
    const loaded = await this.loader.expand(
      targetCount,
      this.limits.loadMaxAttempts,
      this.limits.loadMaxConsecutiveFailures,
    );
    state.loadedCount = loaded.loadedCount;
    state.consecutiveLoadFailures = loaded.consecutiveFailures;

    await this.resetToOrigin(state);

    const stopReason = await this.scanAndExtract(resolved, state, builder);
    if (stopReason === "no_progress") {
      log.info("No unseen items surfaced; finishing.", {
        noProgressLimit: this.limits.noProgressLimit,
      });
    }

    const profileContacts = profilePage
      ? await this.collectProfileContacts(profilePage, resolved, builder)
      : null;

    const result = builder.finalize({
      target: resolved,
      profileId: this.profile.id,
      state,
      stopReason,
      profileContacts,
    });
    log.info("Harvest complete.", {
      totalProcessed: result.totalProcessed,
      loadedCount: result.loadedCount,
      secondaryFieldCounts: result.secondaryFieldCounts,
      stopReason,
    });
    return result;
  }

  private resolveFilter(filter: string): string {
    if (isNoFilter(filter)) return "none";
    const match = this.profile.filters.find(
      (entry) => entry.toLowerCase() === filter.trim().toLowerCase(),
    );
    if (!match) {
      throw new ValidationError(`Filter '${filter}' is not supported by this list profile.`, {
        filter,
        supportedFilters: ["none", ...this.profile.filters],
      });
    }
    return match;
  }

  private resolveProfilePage(target: HarvestTarget): ProfilePageSteps | null {
    if (target.mode !== "profile_contact") return null;
    if (!this.profile.profilePage) {
      throw new ValidationError(
        "This list profile does not define a profile page for contact details.",
        { profileId: this.profile.id, mode: target.mode },
      );
    }
    return this.profile.profilePage;
  }

  private async land(target: HarvestTarget): Promise<void> {
    const url = buildListUrl(
      this.profile.listUrlTemplate,
      target.listId,
      this.profile.filterParam,
      target.filter,
    );
    log.info("Navigating to list view.", { url });
    await navigateWithRetry(this.driver, url, { attempts: this.navigationAttempts });
    await this.driver.waitFor(this.profile.itemLocator, this.pacing.landingSettleMs);

    const currentUrl = await this.driver.currentUrl();
    const landing = checkLanding(currentUrl, this.profile.landingPattern);
    if (!landing.ok) {
      throw new AccessDeniedError({
        listId: target.listId,
        currentUrl,
        reason: landing.kind,
        evidence: landing.evidence,
      });
    }

    let visible = await this.discoverer.countVisible();
    log.info("Initial item count visible.", { visible });
    if (visible === 0) {
      log.info("No items visible yet, waiting longer for the list to render.");
      await this.driver.sleep(this.pacing.extendedSettleMs);
      visible = await this.discoverer.countVisible();
    } else {
      await this.driver.sleep(this.pacing.landingRecheckMs);
    }

    if (visible === 0) {
      throw new NoItemsFoundError({
        listId: target.listId,
        currentUrl: await this.driver.currentUrl(),
      });
    }
  }

  private async resetToOrigin(state: HarvestState): Promise<void> {
    log.info("Scrolling list back to the top before processing.");
    try {
      const outcome = await this.scrollList("start");
      state.scrollOffset = outcome?.offset ?? 0;
    } catch (error) {
      log.debug("Resetting the list viewport failed.", { error: describeError(error) });
    }
    await this.driver.sleep(this.pacing.afterResetMs);
  }

  /** Scrolls the first profile container that moves, then the document. */
  private async scrollList(delta: ScrollDelta): Promise<ScrollOutcome | null> {
    for (const container of [...this.profile.listContainers, null]) {
      const outcome = await this.driver.scrollContainer(container, delta);
      if (outcome.scrolled) return outcome;
    }
    return null;
  }

  private async scanAndExtract(
    target: HarvestTarget,
    state: HarvestState,
    builder: ResultBuilder,
  ): Promise<ExtractionResult["stopReason"]> {
    const discoverySet = new Set<string>();

    while (
      state.processedCount < target.maxItems &&
      state.consecutiveNoProgress < this.limits.noProgressLimit
    ) {
      state.rounds += 1;
      let processedThisRound = 0;

      try {
        const visible = await this.discoverer.discoverVisible();
        for (const { key, handle } of visible) {
          if (state.processedCount >= target.maxItems) break;
          if (discoverySet.has(key)) {
            state.duplicatesSkipped += 1;
            continue;
          }

          discoverySet.add(key);
          builder.append(await this.extractOne(key, handle, target));
          state.processedCount += 1;
          processedThisRound += 1;

          if (state.processedCount % 10 === 0 || state.processedCount <= 5) {
            log.info("Processed item.", {
              processed: state.processedCount,
              loaded: state.loadedCount,
            });
          }
          await this.driver.sleep(target.perItemDelayMs);
        }
      } catch (error) {
        log.debug("Scan round failed; continuing with the next window.", {
          round: state.rounds,
          error: describeError(error),
        });
      }

      state.consecutiveNoProgress = processedThisRound > 0 ? 0 : state.consecutiveNoProgress + 1;
      if (state.processedCount >= target.maxItems) break;

      await this.advanceViewport(state);
      if (state.consecutiveNoProgress > 0 && state.consecutiveNoProgress % 10 === 0) {
        log.info("Scrolling to find more items.", {
          processed: state.processedCount,
          attempt: state.consecutiveNoProgress,
          noProgressLimit: this.limits.noProgressLimit,
        });
      }
    }

    return state.processedCount >= target.maxItems ? "max_items" : "no_progress";
  }

  private async extractOne(key: string, handle: H, target: HarvestTarget): Promise<Item> {
    if (target.mode === "keys_only") {
      return this.extractor.blankItem(key);
    }

    try {
      const extraction = await this.extractor.extract(key, handle);
      return extraction.item;
    } catch (error) {
      log.debug("Detail extraction failed; keeping the item with empty fields.", {
        error: describeError(error),
      });
      return this.extractor.blankItem(key);
    }
  }

  /**
   * Visits each harvested item's profile page, opens its contact overlay and
   * merges the non-null values into the item. Runs after the list pass so the
   * list session is never left mid-scroll.
   */
  private async collectProfileContacts(
    page: ProfilePageSteps,
    target: HarvestTarget,
    builder: ResultBuilder,
  ): Promise<ProfileContactStats> {
    const extractor = new DetailExtractor({
      driver: this.driver,
      steps: profilePageDetailSteps(page),
      pacing: this.pacing,
    });
    const stats: ProfileContactStats = { visited: 0, failed: 0, skipped: 0 };
    const items = [...builder.entries];
    log.info("Collecting contact details from profile pages.", { items: items.length });

    for (const [index, item] of items.entries()) {
      const baseFields = { ...extractor.emptyFields(), ...item.fields };
      const url = item.fields[page.urlField];
      if (typeof url !== "string" || url.trim().length === 0) {
        stats.skipped += 1;
        builder.replace(index, freezeItem(item.key, baseFields));
        continue;
      }

      try {
        await navigateWithRetry(this.driver, url, {
          attempts: this.navigationAttempts,
          logUrl: false,
        });
        await this.settleProfilePage(page);

        const currentUrl = await this.driver.currentUrl();
        const landing = checkLanding(currentUrl, page.landingPattern);
        if (!landing.ok) {
          throw new AccessDeniedError({ currentUrl, reason: landing.kind, evidence: landing.evidence });
        }

        const read = await extractor.readOpen();
        builder.replace(index, freezeItem(item.key, mergePresent(baseFields, read.fields)));
        stats.visited += 1;
      } catch (error) {
        stats.failed += 1;
        builder.replace(index, freezeItem(item.key, baseFields));
        log.debug("Profile page contact extraction failed.", {
          index,
          code: normalizeError(error).code,
        });
      }

      if (index < items.length - 1) await this.driver.sleep(target.perItemDelayMs);
    }

    log.info("Profile page contact pass complete.", { ...stats });
    return stats;
  }

  private async settleProfilePage(page: ProfilePageSteps): Promise<void> {
    if (page.ready) {
      await this.driver.waitFor(page.ready, this.pacing.profileSettleMs);
      return;
    }
    await this.driver.sleep(this.pacing.profileSettleMs);
  }

  private async advanceViewport(state: HarvestState): Promise<void> {
    const increment = this.limits.scrollIncrementPx;
    let outcome: ScrollOutcome | null = null;
    try {
      outcome = await this.scrollList(increment);
    } catch (error) {
      log.debug("Advancing the list viewport failed.", { error: describeError(error) });
    }
    state.scrollOffset = outcome ? outcome.offset : state.scrollOffset + increment;
    await this.driver.sleep(this.pacing.afterAdvanceMs);
  }
}
