import { log } from "apify";
import type { Browser, BrowserContext, Page } from "playwright-core";
import { describeError } from "./errors";
import type { SessionStorageManager } from "./session-storage";

export interface BrowserSessionConfig {
  headless: boolean;
  launchTimeoutMs: number;
  sessionStorage: SessionStorageManager;
}

/**
 * The one automated browser session a harvest runs in. Storage state is
 * restored on start and written back on stop.
 */
export class BrowserSession {
  private readonly config: BrowserSessionConfig;
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private currentPage: Page | null = null;

  public constructor(config: BrowserSessionConfig) {
    this.config = config;
  }

  public get page(): Page {
    if (!this.currentPage) {
      throw new Error("Browser session is not started.");
    }
    return this.currentPage;
  }

  public async start(): Promise<Page> {
    if (this.currentPage) return this.currentPage;

    const { chromium } = await import("playwright-core");
    this.browser = await chromium.launch({
      headless: this.config.headless,
      timeout: this.config.launchTimeoutMs,
      args: ["--no-sandbox", "--disable-dev-shm-usage"],
    });
    log.info("Launched Playwright browser.", {
      headless: this.config.headless,
      launchTimeoutMs: this.config.launchTimeoutMs,
    });

    const persistedState = await this.config.sessionStorage.load();
    this.context = await this.browser.newContext(
      persistedState ? { storageState: persistedState } : undefined,
    );
    log.info("Browser context created.", { restoredState: persistedState !== undefined });

    this.currentPage = await this.context.newPage();
    return this.currentPage;
  }

  public async stop(): Promise<void> {
    await this.persistState();
    this.currentPage = null;

    const context = this.context;
    this.context = null;
    if (context) {
      await context.close().catch((error: unknown) => {
        log.warning("Failed closing browser context.", { error: describeError(error) });
      });
    }

    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close().catch((error: unknown) => {
        log.warning("Failed closing Playwright browser.", { error: describeError(error) });
      });
    }
  }

  private async persistState(): Promise<void> {
    if (!this.context) return;
    try {
      const state = await this.context.storageState();
      await this.config.sessionStorage.save(state);
    } catch (error) {
      log.warning("Failed persisting session storage state.", { error: describeError(error) });
    }
  }
}
