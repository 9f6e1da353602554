import type { HarvestMode, ListProfile } from "./extraction/types";

export type LogLevelName = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface ActorInput {
  listId?: string;
  maxItems?: number;
  perItemDelayMs?: number;
  filter?: string;
  mode?: HarvestMode;
  profileId?: string;
  profile?: ListProfile;
  /** Harvest this HTML with the snapshot driver instead of a live browser. */
  dryRunHtml?: string;
  dryRunUrl?: string;
  logLevel?: LogLevelName;
  logRedactionEnabled?: boolean;
  browserHeadless?: boolean;
  browserLaunchTimeoutMs?: number;
  navigationTimeoutMs?: number;
  navigationAttempts?: number;
  sessionStorageEnabled?: boolean;
  sessionStoreName?: string;
  sessionStoreKey?: string;
  sessionStorageRetentionMs?: number;
  maxItemsCeiling?: number;
  loadMaxAttempts?: number;
  loadMaxConsecutiveFailures?: number;
  noProgressLimit?: number;
  scrollIncrementPx?: number;
  csvOutputEnabled?: boolean;
}

export interface RuntimeConfig {
  logLevel: LogLevelName;
  logRedactionEnabled: boolean;
  browserHeadless: boolean;
  browserLaunchTimeoutMs: number;
  navigationTimeoutMs: number;
  navigationAttempts: number;
  sessionStorageEnabled: boolean;
  sessionStoreName: string;
  sessionStoreKey: string;
  sessionStorageRetentionMs: number;
  maxItemsCeiling: number;
  loadMaxAttempts: number;
  loadMaxConsecutiveFailures: number;
  noProgressLimit: number;
  scrollIncrementPx: number;
  csvOutputEnabled: boolean;
}
