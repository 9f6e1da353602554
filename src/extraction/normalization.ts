import type { LocatorStrategy } from "./types";

export const asTrimmed = (value: unknown): string | null => {
  if (typeof value !== "string") return null;
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
};

export const collapseWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

/**
 * Derives the identity key from a rendered item label, removing the markers
 * the UI adds around names (e.g. `", Verified profile"`).
 */
export const deriveIdentityKey = (label: string | null, affixes: string[]): string | null => {
  if (!label) return null;
  let key = label;
  for (const affix of affixes) {
    if (!affix) continue;
    key = key.split(affix).join(" ");
  }
  const normalized = collapseWhitespace(key);
  return normalized.length > 0 ? normalized : null;
};

export const stripQueryAndHash = (value: string): string => value.split(/[?#]/, 1)[0];

/**
 * Applies a strategy's value rules. Returns null when the raw value does not
 * qualify, so the caller moves on to the next strategy.
 */
export const qualifyValue = (raw: string | null, strategy: LocatorStrategy): string | null => {
  let value = asTrimmed(raw);
  if (!value) return null;

  if (strategy.scheme) {
    if (!value.toLowerCase().startsWith(strategy.scheme.toLowerCase())) return null;
    value = asTrimmed(decodeURIComponentSafe(value.slice(strategy.scheme.length)));
    if (!value) return null;
  }

  if (strategy.contains && !value.includes(strategy.contains)) return null;
  if (strategy.pattern && !new RegExp(strategy.pattern, "i").test(value)) return null;
  if (strategy.stripQuery) value = stripQueryAndHash(value);

  return asTrimmed(value);
};

const decodeURIComponentSafe = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

export const buildListUrl = (
  template: string,
  listId: string,
  filterParam: string | null,
  filter: string,
): string => {
  const url = new URL(template.replace("{listId}", encodeURIComponent(listId)));
  if (filterParam && !isNoFilter(filter)) {
    url.searchParams.set(filterParam, filter);
  }
  return url.toString();
};

export const isNoFilter = (filter: string): boolean => {
  const normalized = filter.trim().toLowerCase();
  return normalized === "" || normalized === "none" || normalized === "all";
};
