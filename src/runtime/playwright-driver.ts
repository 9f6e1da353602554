import { errors } from "playwright-core";
import type { PageDriver, ScrollDelta, ScrollOutcome } from "../extraction/page-driver";
import { describeError, TransientElementError } from "./errors";

/** The slice of Playwright's `ElementHandle` the driver uses. */
export interface DriverElement {
  $(selector: string): Promise<DriverElement | null>;
  $$(selector: string): Promise<DriverElement[]>;
  getAttribute(name: string): Promise<string | null>;
  /** Runs `script` in the page against the element; it must not close over driver code. */
  evaluate<R>(script: (element: Element) => R): Promise<R>;
  click(options: { timeout: number }): Promise<void>;
  fill(value: string, options: { timeout: number }): Promise<void>;
  press(key: string, options: { timeout: number }): Promise<void>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
}

export interface ScrollRequest {
  locator: string | null;
  change: ScrollDelta;
}

/** The slice of Playwright's `Page` the driver uses. */
export interface DriverPage {
  goto(url: string, options: { waitUntil: "domcontentloaded"; timeout: number }): Promise<unknown>;
  url(): string;
  $(selector: string): Promise<DriverElement | null>;
  $$(selector: string): Promise<DriverElement[]>;
  evaluate(
    script: (request: ScrollRequest) => ScrollOutcome,
    request: ScrollRequest,
  ): Promise<ScrollOutcome>;
  waitForSelector(selector: string, options: { state: "attached"; timeout: number }): Promise<unknown>;
  readonly keyboard: { press(key: string): Promise<void> };
}

export interface PlaywrightPageDriverConfig {
  navigationTimeoutMs: number;
  actionTimeoutMs?: number;
}

export const DETACHED_PATTERN =
  /not attached to the DOM|element is detached|Execution context was destroyed|JSHandle is disposed/i;

const sleep = async (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Maps Playwright's detached-handle failures onto the engine's transient error. */
const guard = async <T>(operation: string, task: () => Promise<T>): Promise<T> => {
  try {
    return await task();
  } catch (error) {
    if (error instanceof Error && DETACHED_PATTERN.test(error.message)) {
      throw new TransientElementError(operation, describeError(error));
    }
    throw error;
  }
};

/**
 * Evicted rows keep a live handle to a node that is no longer in the
 * document; Playwright still reads and clicks those without complaint.
 */
const requireConnected = (operation: string, connected: boolean): void => {
  if (!connected) throw new TransientElementError(operation, "element is disconnected");
};

// In-page scripts are serialized into the browser, so each one stands alone.
const readText = (element: Element): { connected: boolean; text: string } => {
  if (!element.isConnected) return { connected: false, text: "" };
  const text =
    element instanceof HTMLElement && typeof element.innerText === "string"
      ? element.innerText
      : (element.textContent ?? "");
  return { connected: true, text };
};

const isConnected = (element: Element): boolean => element.isConnected;

const centerAndClick = (element: Element): boolean => {
  if (!element.isConnected) return false;
  element.scrollIntoView({ block: "center" });
  if (element instanceof HTMLElement) {
    element.click();
  } else {
    element.dispatchEvent(new MouseEvent("click", { bubbles: true }));
  }
  return true;
};

const scrollToEnd = (element: Element): boolean => {
  if (!element.isConnected) return false;
  element.scrollIntoView({ block: "end" });
  return true;
};

const scrollBy = ({ locator, change }: ScrollRequest): ScrollOutcome => {
  const container = locator ? document.querySelector(locator) : null;
  if (locator && !container) return { scrolled: false, offset: 0, extent: 0 };
  const node = container ?? document.scrollingElement ?? document.documentElement;
  const before = node.scrollTop;
  if (change === "start") {
    node.scrollTop = 0;
  } else if (change === "end") {
    node.scrollTop = node.scrollHeight;
  } else {
    node.scrollTop = before + change;
  }
  return {
    scrolled: node.scrollTop !== before,
    offset: node.scrollTop,
    extent: node.scrollHeight,
  };
};

export class PlaywrightPageDriver implements PageDriver<DriverElement> {
  private readonly page: DriverPage;
  private readonly navigationTimeoutMs: number;
  private readonly actionTimeoutMs: number;

  public constructor(page: DriverPage, config: PlaywrightPageDriverConfig) {
    this.page = page;
    this.navigationTimeoutMs = config.navigationTimeoutMs;
    this.actionTimeoutMs = config.actionTimeoutMs ?? 5000;
  }

  public async navigate(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: this.navigationTimeoutMs,
    });
  }

  public async currentUrl(): Promise<string> {
    return this.page.url();
  }

  public async findAll(locator: string, scope?: DriverElement): Promise<DriverElement[]> {
    if (!scope) return this.page.$$(locator);
    return guard("findAll", () => scope.$$(locator));
  }

  public async findFirst(locator: string, scope?: DriverElement): Promise<DriverElement | null> {
    if (!scope) return this.page.$(locator);
    return guard("findFirst", () => scope.$(locator));
  }

  public async attribute(handle: DriverElement, name: string): Promise<string | null> {
    requireConnected("attribute", await guard("attribute", () => handle.evaluate(isConnected)));
    return guard("attribute", () => handle.getAttribute(name));
  }

  public async text(handle: DriverElement): Promise<string> {
    const read = await guard("text", () => handle.evaluate(readText));
    requireConnected("text", read.connected);
    return read.text;
  }

  public async click(handle: DriverElement): Promise<void> {
    await guard("click", () => handle.click({ timeout: this.actionTimeoutMs }));
  }

  public async activate(handle: DriverElement): Promise<void> {
    // Script click: virtualized rows are often covered by sticky headers.
    requireConnected("activate", await guard("activate", () => handle.evaluate(centerAndClick)));
  }

  public async scrollIntoView(handle: DriverElement): Promise<void> {
    requireConnected(
      "scrollIntoView",
      await guard("scrollIntoView", () => handle.evaluate(scrollToEnd)),
    );
  }

  public async scrollContainer(locator: string | null, delta: ScrollDelta): Promise<ScrollOutcome> {
    return guard("scrollContainer", () => this.page.evaluate(scrollBy, { locator, change: delta }));
  }

  public async typeText(handle: DriverElement, text: string): Promise<void> {
    await guard("typeText", () => handle.fill(text, { timeout: this.actionTimeoutMs }));
  }

  public async pressKey(handle: DriverElement | null, key: string): Promise<void> {
    if (!handle) {
      await this.page.keyboard.press(key);
      return;
    }
    await guard("pressKey", () => handle.press(key, { timeout: this.actionTimeoutMs }));
  }

  public async isDisplayed(handle: DriverElement): Promise<boolean> {
    return guard("isDisplayed", () => handle.isVisible());
  }

  public async isEnabled(handle: DriverElement): Promise<boolean> {
    return guard("isEnabled", () => handle.isEnabled());
  }

  public async waitFor(locator: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(locator, { state: "attached", timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) return false;
      throw error;
    }
  }

  public async sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    await sleep(ms);
  }
}
