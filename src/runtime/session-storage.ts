import { Actor, log } from "apify";
import type { BrowserContext } from "playwright-core";

export type StorageState = Awaited<ReturnType<BrowserContext["storageState"]>>;

export interface SessionStorageConfig {
  enabled: boolean;
  storeName: string;
  key: string;
  retentionMs: number;
}

interface PersistedSessionRecord {
  version: 1;
  updatedAt: string;
  storageState: StorageState;
}

/** The slice of an Apify key-value store the session storage needs. */
export interface SessionRecordStore {
  getValue(key: string): Promise<unknown>;
  setValue(key: string, value: unknown): Promise<void>;
}

export interface SessionStorageStatus {
  enabled: boolean;
  ready: boolean;
  storeName: string;
  key: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPersistedSessionRecord = (value: unknown): value is PersistedSessionRecord =>
  isRecord(value) &&
  value.version === 1 &&
  typeof value.updatedAt === "string" &&
  isRecord(value.storageState) &&
  Array.isArray(value.storageState.cookies) &&
  Array.isArray(value.storageState.origins);

/**
 * Keeps one browser storage state (cookies and local storage) between runs so
 * an authenticated session can be reused.
 */
export class SessionStorageManager {
  private readonly config: SessionStorageConfig;
  private readonly openStore: (name: string) => Promise<SessionRecordStore>;
  private store: SessionRecordStore | null = null;

  public constructor(
    config: SessionStorageConfig,
    openStore: (name: string) => Promise<SessionRecordStore> = (name) =>
      Actor.openKeyValueStore(name),
  ) {
    this.config = config;
    this.openStore = openStore;
  }

  public async init(): Promise<void> {
    if (!this.config.enabled) return;
    this.store = await this.openStore(this.config.storeName);
    log.info("Session storage initialized.", {
      storeName: this.config.storeName,
      key: this.config.key,
    });
  }

  public getStatus(): SessionStorageStatus {
    return {
      enabled: this.config.enabled,
      ready: this.store !== null,
      storeName: this.config.storeName,
      key: this.config.key,
    };
  }

  public async load(): Promise<StorageState | undefined> {
    if (!this.config.enabled || !this.store) return undefined;

    const key = this.config.key;
    const record = await this.store.getValue(key);
    if (record === null || record === undefined) return undefined;

    if (!isPersistedSessionRecord(record)) {
      log.warning("Invalid persisted session record, clearing it.", { key });
      await this.store.setValue(key, null);
      return undefined;
    }

    const updatedAtMs = Date.parse(record.updatedAt);
    if (Number.isFinite(updatedAtMs) && this.config.retentionMs > 0) {
      const ageMs = Date.now() - updatedAtMs;
      if (ageMs > this.config.retentionMs) {
        log.info("Persisted session record expired, clearing it.", {
          key,
          age_ms: ageMs,
          retention_ms: this.config.retentionMs,
        });
        await this.store.setValue(key, null);
        return undefined;
      }
    }

    return record.storageState;
  }

  public async save(storageState: StorageState): Promise<void> {
    if (!this.config.enabled || !this.store) return;

    const record: PersistedSessionRecord = {
      version: 1,
      updatedAt: new Date().toISOString(),
      storageState,
    };
    await this.store.setValue(this.config.key, record);
  }

  public async clear(): Promise<void> {
    if (!this.config.enabled || !this.store) return;
    await this.store.setValue(this.config.key, null);
  }
}
