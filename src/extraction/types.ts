export interface LocatorStrategy {
  locator: string;
  /** Read this attribute instead of the element text. */
  attribute?: string;
  /** Required value prefix, stripped from the result (e.g. `tel:`). */
  scheme?: string;
  /** Required substring of the value (e.g. `@`). */
  contains?: string;
  /** Regular expression source the value must match. */
  pattern?: string;
  /** Drop `?query` and `#hash` from the value. */
  stripQuery?: boolean;
  /** Collect every qualifying match as a list instead of the first one. */
  multiple?: boolean;
}

export type StrategyList = Array<string | LocatorStrategy>;

export type FieldStrategyMap = Record<string, StrategyList>;

/** What happens once an item's detail view is open. */
export interface DetailSteps {
  ready?: string;
  primaryFields: FieldStrategyMap;
  reveal?: {
    control: StrategyList;
    fields: FieldStrategyMap;
  };
  dismiss: StrategyList;
}

/** Per-item profile page visited after the list pass in `profile_contact` mode. */
export interface ProfilePageSteps {
  /** Item field holding the page URL. */
  urlField: string;
  /** Regular expression source matched against the landed URL path. */
  landingPattern: string;
  ready?: string;
  primaryFields?: FieldStrategyMap;
  reveal: {
    control: StrategyList;
    fields: FieldStrategyMap;
  };
  dismiss: StrategyList;
}

export interface ListProfile {
  id: string;
  listUrlTemplate: string;
  filterParam: string | null;
  filters: string[];
  /** Regular expression source matched against the landed URL path. */
  landingPattern: string;
  itemLocator: string;
  label: {
    attribute?: string;
    affixes: string[];
  };
  loadMore: StrategyList;
  listContainers: string[];
  detailReady?: string;
  primaryFields: FieldStrategyMap;
  reveal?: {
    control: StrategyList;
    fields: FieldStrategyMap;
  };
  dismiss: StrategyList;
  profilePage?: ProfilePageSteps;
}

export type FieldValue = string | string[] | null;

export type ItemFields = Readonly<Record<string, FieldValue>>;

export interface Item {
  readonly key: string;
  readonly fields: ItemFields;
}

export interface DiscoveredItem<H> {
  key: string;
  handle: H;
}

export type HarvestMode = "full" | "keys_only" | "profile_contact";

export interface HarvestTarget {
  listId: string;
  maxItems: number;
  perItemDelayMs: number;
  filter: string;
  mode: HarvestMode;
}

export interface HarvestState {
  loadedCount: number;
  processedCount: number;
  scrollOffset: number;
  consecutiveNoProgress: number;
  consecutiveLoadFailures: number;
  rounds: number;
  duplicatesSkipped: number;
}

export type LoadStopReason = "target_reached" | "attempts_exhausted" | "failure_streak";

export interface LoadOutcome {
  loadedCount: number;
  activations: number;
  attempts: number;
  consecutiveFailures: number;
  stopReason: LoadStopReason;
}

export type HarvestStopReason = "max_items" | "no_progress";

export interface ProfileContactStats {
  visited: number;
  failed: number;
  /** Items without a usable profile URL. */
  skipped: number;
}

export interface ExtractionResult {
  listId: string;
  profileId: string;
  filter: string;
  mode: HarvestMode;
  totalProcessed: number;
  loadedCount: number;
  secondaryFieldCounts: Record<string, number>;
  items: Item[];
  state: HarvestState;
  stopReason: HarvestStopReason;
  /** Set only in `profile_contact` mode. */
  profileContacts: ProfileContactStats | null;
  startedAt: string;
  finishedAt: string;
}

/** Minimum settle times after UI-mutating actions, in milliseconds. */
export interface PacingConfig {
  landingSettleMs: number;
  landingRecheckMs: number;
  extendedSettleMs: number;
  afterLoadMoreMs: number;
  afterScrollMs: number;
  afterFailedScrollMs: number;
  afterResetMs: number;
  afterSelectMs: number;
  afterRevealMs: number;
  afterDismissMs: number;
  afterAdvanceMs: number;
  profileSettleMs: number;
}

export interface HarvestLimits {
  maxItemsCeiling: number;
  loadMaxAttempts: number;
  loadMaxConsecutiveFailures: number;
  noProgressLimit: number;
  scrollIncrementPx: number;
}
