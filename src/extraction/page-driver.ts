export interface ScrollOutcome {
  scrolled: boolean;
  offset: number;
  extent: number;
}

export type ScrollDelta = number | "start" | "end";

/**
 * Browser capability consumed by the harvesting engine. One driver wraps one
 * page of one session; calls are issued strictly one at a time.
 *
 * Implementations throw `TransientElementError` when a handle has detached
 * from the document between query and use.
 */
export interface PageDriver<H> {
  navigate(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  findAll(locator: string, scope?: H): Promise<H[]>;
  findFirst(locator: string, scope?: H): Promise<H | null>;
  attribute(handle: H, name: string): Promise<string | null>;
  text(handle: H): Promise<string>;
  click(handle: H): Promise<void>;
  /** Scrolls the handle to the viewport center and clicks it in a single step. */
  activate(handle: H): Promise<void>;
  scrollIntoView(handle: H): Promise<void>;
  /** `locator` null targets the document scroller. */
  scrollContainer(locator: string | null, delta: ScrollDelta): Promise<ScrollOutcome>;
  typeText(handle: H, text: string): Promise<void>;
  /** `handle` null sends the key to the focused page. */
  pressKey(handle: H | null, key: string): Promise<void>;
  isDisplayed(handle: H): Promise<boolean>;
  isEnabled(handle: H): Promise<boolean>;
  /** Resolves true once `locator` matches, false when `timeoutMs` passes first. */
  waitFor(locator: string, timeoutMs: number): Promise<boolean>;
  sleep(ms: number): Promise<void>;
}
