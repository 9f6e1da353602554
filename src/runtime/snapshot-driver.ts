import { load, type CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { PageDriver, ScrollOutcome } from "../extraction/page-driver";

export interface SnapshotPageDriverOptions {
  /** Location reported after navigation; defaults to the navigated URL. */
  landingUrl?: string;
}

const HIDDEN_STYLE = /(?:^|;)\s*(?:display\s*:\s*none|visibility\s*:\s*hidden)/i;

/**
 * Serves a saved HTML snapshot through the page driver capability. The
 * document never changes: activations are recorded, scrolling never moves
 * and pauses return immediately.
 */
export class SnapshotPageDriver implements PageDriver<Element> {
  private readonly $: CheerioAPI;
  private readonly landingUrl: string | null;
  private location = "about:blank";
  private readonly activated: Element[] = [];
  private sleptMs = 0;

  public constructor(html: string, options: SnapshotPageDriverOptions = {}) {
    this.$ = load(html);
    this.landingUrl = options.landingUrl ?? null;
  }

  public get activations(): number {
    return this.activated.length;
  }

  public get totalSleptMs(): number {
    return this.sleptMs;
  }

  public async navigate(url: string): Promise<void> {
    this.location = this.landingUrl ?? url;
  }

  public async currentUrl(): Promise<string> {
    return this.location;
  }

  public async findAll(locator: string, scope?: Element): Promise<Element[]> {
    const matches = scope ? this.$(scope).find(locator) : this.$<Element, string>(locator);
    return matches.toArray();
  }

  public async findFirst(locator: string, scope?: Element): Promise<Element | null> {
    const [first] = await this.findAll(locator, scope);
    return first ?? null;
  }

  public async attribute(handle: Element, name: string): Promise<string | null> {
    return this.$(handle).attr(name) ?? null;
  }

  public async text(handle: Element): Promise<string> {
    return this.$(handle).text();
  }

  public async click(handle: Element): Promise<void> {
    this.activated.push(handle);
  }

  public async activate(handle: Element): Promise<void> {
    this.activated.push(handle);
  }

  public async scrollIntoView(): Promise<void> {
    return;
  }

  public async scrollContainer(): Promise<ScrollOutcome> {
    return { scrolled: false, offset: 0, extent: 0 };
  }

  public async typeText(handle: Element, text: string): Promise<void> {
    this.$(handle).attr("value", text);
  }

  public async pressKey(): Promise<void> {
    return;
  }

  public async isDisplayed(handle: Element): Promise<boolean> {
    const chain = [handle, ...this.$(handle).parents().toArray()];
    return chain.every((node) => {
      const attribs = node.attribs;
      if ("hidden" in attribs) return false;
      if (attribs["aria-hidden"] === "true") return false;
      return !HIDDEN_STYLE.test(attribs.style ?? "");
    });
  }

  public async isEnabled(handle: Element): Promise<boolean> {
    const attribs = handle.attribs;
    return !("disabled" in attribs) && attribs["aria-disabled"] !== "true";
  }

  public async waitFor(locator: string, _timeoutMs: number): Promise<boolean> {
    return this.$(locator).length > 0;
  }

  public async sleep(ms: number): Promise<void> {
    this.sleptMs += Math.max(0, ms);
  }
}
