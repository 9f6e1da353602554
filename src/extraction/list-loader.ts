import { log } from "apify";
import { isTransientElementError } from "../runtime/errors";
import type { ItemDiscoverer } from "./item-discoverer";
import type { PageDriver } from "./page-driver";
import { findActionableControl } from "./selector-fallback";
import type { ListProfile, LoadOutcome, PacingConfig } from "./types";

/**
 * Grows the rendered list through load-more controls, falling back to
 * scroll-triggered lazy loading when no control is available.
 */
export class ListLoader<H> {
  private readonly driver: PageDriver<H>;
  private readonly profile: ListProfile;
  private readonly discoverer: ItemDiscoverer<H>;
  private readonly pacing: PacingConfig;

  public constructor(params: {
    driver: PageDriver<H>;
    profile: ListProfile;
    discoverer: ItemDiscoverer<H>;
    pacing: PacingConfig;
  }) {
    this.driver = params.driver;
    this.profile = params.profile;
    this.discoverer = params.discoverer;
    this.pacing = params.pacing;
  }

  public async expand(
    targetCount: number,
    maxAttempts: number,
    maxConsecutiveFailures: number,
  ): Promise<LoadOutcome> {
    let loadedCount = await this.discoverer.countVisible();
    let activations = 0;
    let attempts = 0;
    let consecutiveFailures = 0;

    const finish = (stopReason: LoadOutcome["stopReason"]): LoadOutcome => {
      log.info("List expansion finished.", {
        loadedCount,
        activations,
        attempts,
        stopReason,
      });
      return { loadedCount, activations, attempts, consecutiveFailures, stopReason };
    };

    while (attempts < maxAttempts) {
      if (loadedCount >= targetCount) return finish("target_reached");
      if (consecutiveFailures >= maxConsecutiveFailures) return finish("failure_streak");
      attempts += 1;

      if (await this.activateLoadMore()) {
        activations += 1;
        consecutiveFailures = 0;
        await this.driver.sleep(this.pacing.afterLoadMoreMs);
        const measured = await this.discoverer.countVisible();
        if (activations % 10 === 0) {
          log.info("Load more progress.", {
            activations,
            rendered: measured,
            delta: measured - loadedCount,
          });
        }
        loadedCount = Math.max(loadedCount, measured);
        continue;
      }

      if (!(await this.scrollToEnd())) {
        log.debug("No scrollable list container or rendered item to scroll.");
      }
      await this.driver.sleep(this.pacing.afterScrollMs);
      const measured = await this.discoverer.countVisible();
      if (measured > loadedCount) {
        log.info("Scroll loaded more items.", { rendered: measured, delta: measured - loadedCount });
        loadedCount = measured;
        consecutiveFailures = 0;
      } else {
        consecutiveFailures += 1;
        if (consecutiveFailures % 3 === 0) {
          log.info("No new items loaded.", {
            attempt: consecutiveFailures,
            maxConsecutiveFailures,
          });
        }
        await this.driver.sleep(this.pacing.afterFailedScrollMs);
      }
    }

    if (loadedCount >= targetCount) return finish("target_reached");
    if (consecutiveFailures >= maxConsecutiveFailures) return finish("failure_streak");
    return finish("attempts_exhausted");
  }

  private async activateLoadMore(): Promise<boolean> {
    const control = await findActionableControl(this.driver, this.profile.loadMore);
    if (!control) return false;
    try {
      await this.driver.activate(control);
      return true;
    } catch (error) {
      if (isTransientElementError(error)) return false;
      throw error;
    }
  }

  private async scrollToEnd(): Promise<boolean> {
    for (const container of this.profile.listContainers) {
      const outcome = await this.driver.scrollContainer(container, "end");
      if (outcome.scrolled) return true;
    }

    const last = await this.discoverer.lastVisible();
    if (!last) return false;
    try {
      await this.driver.scrollIntoView(last);
      return true;
    } catch (error) {
      if (isTransientElementError(error)) return false;
      throw error;
    }
  }
}
