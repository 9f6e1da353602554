import { log } from "apify";
import { isTransientElementError } from "../runtime/errors";
import { deriveIdentityKey } from "./normalization";
import type { PageDriver } from "./page-driver";
import type { DiscoveredItem, ListProfile } from "./types";

export class ItemDiscoverer<H> {
  private readonly driver: PageDriver<H>;
  private readonly profile: ListProfile;

  public constructor(driver: PageDriver<H>, profile: ListProfile) {
    this.driver = driver;
    this.profile = profile;
  }

  public async countVisible(): Promise<number> {
    const handles = await this.driver.findAll(this.profile.itemLocator);
    return handles.length;
  }

  public async lastVisible(): Promise<H | null> {
    const handles = await this.driver.findAll(this.profile.itemLocator);
    return handles.at(-1) ?? null;
  }

  /**
   * Keys are unique within one pass only. Repeated passes may yield the same
   * key again; the caller owns cross-pass deduplication.
   */
  public async discoverVisible(): Promise<Array<DiscoveredItem<H>>> {
    const handles = await this.driver.findAll(this.profile.itemLocator);
    const seenThisPass = new Set<string>();
    const discovered: Array<DiscoveredItem<H>> = [];

    for (const handle of handles) {
      let label: string | null;
      try {
        label = await this.readLabel(handle);
      } catch (error) {
        if (isTransientElementError(error)) {
          log.debug("Item detached before its label was read.");
          continue;
        }
        throw error;
      }

      const key = deriveIdentityKey(label, this.profile.label.affixes);
      if (!key || seenThisPass.has(key)) continue;
      seenThisPass.add(key);
      discovered.push({ key, handle });
    }

    return discovered;
  }

  private async readLabel(handle: H): Promise<string | null> {
    const attribute = this.profile.label.attribute;
    if (typeof attribute === "string") {
      return this.driver.attribute(handle, attribute);
    }
    return this.driver.text(handle);
  }
}
