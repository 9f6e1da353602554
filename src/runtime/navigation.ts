import { log } from "apify";
import type { PageDriver } from "../extraction/page-driver";
import { describeError, NavigationError } from "./errors";

export interface NavigateOptions {
  attempts?: number;
  backoffMs?: number;
  /** False keeps the URL out of retry logs, e.g. for a person's profile page. */
  logUrl?: boolean;
}

export const navigateWithRetry = async <H>(
  driver: PageDriver<H>,
  url: string,
  options: NavigateOptions = {},
): Promise<void> => {
  const attempts = Math.max(1, options.attempts ?? 3);
  const backoffMs = options.backoffMs ?? 300;
  const logUrl = options.logUrl ?? true;

  let lastError: string | null = null;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      await driver.navigate(url);
      return;
    } catch (error) {
      lastError = describeError(error);
      // Driver messages quote the URL they failed on.
      log.warning(
        "Navigation attempt failed.",
        logUrl ? { url, attempt, attempts, error: lastError } : { attempt, attempts },
      );
      if (attempt < attempts) {
        await driver.sleep(backoffMs * attempt);
      }
    }
  }

  throw new NavigationError("Navigation failed after retries.", {
    url,
    attempts,
    lastError,
  });
};

