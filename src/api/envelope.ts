import type { HarvestError } from "../runtime/errors";
import { API_VERSION } from "./contracts";

export interface ApiMeta {
  timestamp: string;
  version: string;
  [key: string]: unknown;
}

export const createMeta = (extras: Record<string, unknown> = {}): ApiMeta => ({
  timestamp: new Date().toISOString(),
  version: API_VERSION,
  ...extras,
});

export const createSuccessEnvelope = <T>(data: T, metaExtras: Record<string, unknown> = {}) => ({
  ok: true as const,
  data,
  error: null,
  meta: createMeta(metaExtras),
});

export const createErrorEnvelope = (
  error: HarvestError,
  metaExtras: Record<string, unknown> = {},
) => ({
  ok: false as const,
  data: null,
  error,
  meta: createMeta(metaExtras),
});
