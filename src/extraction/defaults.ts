import type { HarvestLimits, PacingConfig } from "./types";

export const DEFAULT_PACING: PacingConfig = {
  landingSettleMs: 4000,
  landingRecheckMs: 1000,
  extendedSettleMs: 5000,
  afterLoadMoreMs: 500,
  afterScrollMs: 500,
  afterFailedScrollMs: 300,
  afterResetMs: 500,
  afterSelectMs: 400,
  afterRevealMs: 400,
  afterDismissMs: 150,
  afterAdvanceMs: 200,
  profileSettleMs: 3000,
};

export const DEFAULT_LIMITS: HarvestLimits = {
  maxItemsCeiling: 2500,
  loadMaxAttempts: 500,
  loadMaxConsecutiveFailures: 10,
  noProgressLimit: 50,
  scrollIncrementPx: 200,
};
