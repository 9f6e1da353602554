import { log } from "apify";
import { describeError, isTransientElementError } from "../runtime/errors";
import type { PageDriver } from "./page-driver";
import { extractWithFallback, findActionableControl } from "./selector-fallback";
import type {
  DetailSteps,
  FieldStrategyMap,
  FieldValue,
  Item,
  ListProfile,
  PacingConfig,
  ProfilePageSteps,
} from "./types";

export interface DetailRead {
  fields: Record<string, FieldValue>;
  selectorTrace: Record<string, string | null>;
  revealed: boolean;
  dismissed: boolean;
}

export interface DetailExtraction extends DetailRead {
  item: Item;
  selected: boolean;
}

export const listDetailSteps = (profile: ListProfile): DetailSteps => ({
  ready: profile.detailReady,
  primaryFields: profile.primaryFields,
  reveal: profile.reveal,
  dismiss: profile.dismiss,
});

export const profilePageDetailSteps = (page: ProfilePageSteps): DetailSteps => ({
  ready: page.ready,
  primaryFields: page.primaryFields ?? {},
  reveal: page.reveal,
  dismiss: page.dismiss,
});

const emptyFields = (map: FieldStrategyMap | undefined): Record<string, FieldValue> => {
  const fields: Record<string, FieldValue> = {};
  for (const field of Object.keys(map ?? {})) fields[field] = null;
  return fields;
};

const freezeItem = (key: string, fields: Record<string, FieldValue>): Item =>
  Object.freeze({ key, fields: Object.freeze({ ...fields }) });

/**
 * Runs select → read → reveal → read → dismiss for one item handle. Missing
 * fields resolve to null; only driver failures unrelated to detached
 * elements propagate.
 */
export class DetailExtractor<H> {
  private readonly driver: PageDriver<H>;
  private readonly steps: DetailSteps;
  private readonly pacing: PacingConfig;

  public constructor(params: { driver: PageDriver<H>; steps: DetailSteps; pacing: PacingConfig }) {
    this.driver = params.driver;
    this.steps = params.steps;
    this.pacing = params.pacing;
  }

  /** Every field the steps can produce, all null. */
  public emptyFields(): Record<string, FieldValue> {
    return {
      ...emptyFields(this.steps.primaryFields),
      ...emptyFields(this.steps.reveal?.fields),
    };
  }

  /** An item carrying only its key, every field null. */
  public blankItem(key: string): Item {
    return freezeItem(key, { ...this.emptyFields(), name: key });
  }

  public async extract(key: string, handle: H): Promise<DetailExtraction> {
    const selected = await this.select(handle);
    const read: DetailRead = selected
      ? await this.readOpen()
      : { fields: this.emptyFields(), selectorTrace: {}, revealed: false, dismissed: false };

    const fields: Record<string, FieldValue> = { name: null, ...read.fields };
    if (!fields.name) fields.name = key;

    return { ...read, item: freezeItem(key, fields), selected };
  }

  /** Reads the detail view that is already showing, revealing and dismissing as configured. */
  public async readOpen(): Promise<DetailRead> {
    const fields = this.emptyFields();
    const selectorTrace: Record<string, string | null> = {};

    const primary = await extractWithFallback(this.driver, this.steps.primaryFields);
    Object.assign(fields, primary.fields);
    Object.assign(selectorTrace, primary.selectorTrace);

    let revealed = false;
    let dismissed = false;
    if (this.steps.reveal) {
      revealed = await this.reveal();
      if (revealed) {
        const secondary = await extractWithFallback(this.driver, this.steps.reveal.fields);
        Object.assign(fields, secondary.fields);
        Object.assign(selectorTrace, secondary.selectorTrace);
        dismissed = await this.dismiss();
      }
    }

    return { fields, selectorTrace, revealed, dismissed };
  }

  private async select(handle: H): Promise<boolean> {
    try {
      await this.driver.activate(handle);
    } catch (error) {
      if (isTransientElementError(error)) {
        log.debug("Item detached before it could be selected.");
        return false;
      }
      throw error;
    }

    await this.settle(this.steps.ready, this.pacing.afterSelectMs);
    return true;
  }

  private async reveal(): Promise<boolean> {
    if (!this.steps.reveal) return false;
    const control = await findActionableControl(this.driver, this.steps.reveal.control);
    if (!control) return false;

    try {
      await this.driver.activate(control);
    } catch (error) {
      if (isTransientElementError(error)) return false;
      throw error;
    }
    await this.driver.sleep(this.pacing.afterRevealMs);
    return true;
  }

  private async dismiss(): Promise<boolean> {
    let dismissed = false;
    try {
      const control = await findActionableControl(this.driver, this.steps.dismiss);
      if (control) {
        await this.driver.click(control);
        dismissed = true;
      } else {
        const body = await this.driver.findFirst("body");
        await this.driver.pressKey(body, "Escape");
        dismissed = true;
      }
    } catch (error) {
      log.debug("Dismissing the revealed panel failed.", {
        error: describeError(error),
      });
    }

    await this.driver.sleep(this.pacing.afterDismissMs);
    return dismissed;
  }

  private async settle(readyLocator: string | undefined, timeoutMs: number): Promise<void> {
    if (readyLocator) {
      await this.driver.waitFor(readyLocator, timeoutMs);
      return;
    }
    await this.driver.sleep(timeoutMs);
  }
}
