import { isTransientElementError } from "../runtime/errors";
import { qualifyValue } from "./normalization";
import type { PageDriver } from "./page-driver";
import type { FieldStrategyMap, FieldValue, LocatorStrategy, StrategyList } from "./types";

export interface SelectorFallbackResult {
  value: FieldValue;
  selector: string | null;
}

export const normalizeStrategy = (candidate: string | LocatorStrategy): LocatorStrategy =>
  typeof candidate === "string" ? { locator: candidate } : candidate;

const readNode = async <H>(
  driver: PageDriver<H>,
  node: H,
  strategy: LocatorStrategy,
): Promise<string | null> => {
  const raw =
    typeof strategy.attribute === "string"
      ? await driver.attribute(node, strategy.attribute)
      : await driver.text(node);
  return qualifyValue(raw, strategy);
};

const valueFromStrategy = async <H>(
  driver: PageDriver<H>,
  strategy: LocatorStrategy,
  scope?: H,
): Promise<string | null> => {
  try {
    const node = await driver.findFirst(strategy.locator, scope);
    if (!node) return null;
    return await readNode(driver, node, strategy);
  } catch (error) {
    if (isTransientElementError(error)) return null;
    throw error;
  }
};

/** Distinct qualifying values of every match, in document order; null when none qualify. */
const valuesFromStrategy = async <H>(
  driver: PageDriver<H>,
  strategy: LocatorStrategy,
  scope?: H,
): Promise<string[] | null> => {
  const values: string[] = [];
  for (const node of await driver.findAll(strategy.locator, scope)) {
    try {
      const value = await readNode(driver, node, strategy);
      if (value && !values.includes(value)) values.push(value);
    } catch (error) {
      if (!isTransientElementError(error)) throw error;
    }
  }
  return values.length > 0 ? values : null;
};

/** First strategy yielding a non-empty value wins; the rest are never queried. */
export const pickFirstValue = async <H>(
  driver: PageDriver<H>,
  strategies: StrategyList,
  scope?: H,
): Promise<SelectorFallbackResult> => {
  for (const candidateInput of strategies) {
    const strategy = normalizeStrategy(candidateInput);
    const value = strategy.multiple
      ? await valuesFromStrategy(driver, strategy, scope)
      : await valueFromStrategy(driver, strategy, scope);
    if (value) {
      return { value, selector: strategy.locator };
    }
  }
  return { value: null, selector: null };
};

export interface ExtractWithFallbackOutput {
  fields: Record<string, FieldValue>;
  selectorTrace: Record<string, string | null>;
}

export const extractWithFallback = async <H>(
  driver: PageDriver<H>,
  map: FieldStrategyMap,
  scope?: H,
): Promise<ExtractWithFallbackOutput> => {
  const fields: Record<string, FieldValue> = {};
  const selectorTrace: Record<string, string | null> = {};

  for (const [field, strategies] of Object.entries(map)) {
    const result = await pickFirstValue(driver, strategies, scope);
    fields[field] = result.value;
    selectorTrace[field] = result.selector;
  }

  return { fields, selectorTrace };
};

/**
 * Returns the first displayed and enabled element matched by the strategies.
 * `contains` filters on the element text. Detached candidates are skipped.
 */
export const findActionableControl = async <H>(
  driver: PageDriver<H>,
  strategies: StrategyList,
): Promise<H | null> => {
  for (const candidateInput of strategies) {
    const strategy = normalizeStrategy(candidateInput);
    const candidates = await driver.findAll(strategy.locator);
    for (const candidate of candidates) {
      try {
        if (strategy.contains) {
          const label =
            typeof strategy.attribute === "string"
              ? await driver.attribute(candidate, strategy.attribute)
              : await driver.text(candidate);
          if (!label || !label.includes(strategy.contains)) continue;
        }
        if ((await driver.isDisplayed(candidate)) && (await driver.isEnabled(candidate))) {
          return candidate;
        }
      } catch (error) {
        if (isTransientElementError(error)) continue;
        throw error;
      }
    }
  }
  return null;
};
