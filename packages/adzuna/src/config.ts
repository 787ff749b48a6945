import type { SearchRequest } from '@jobcompass/listing-sdk';
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_RETRY_DELAY_MS, DEFAULT_TIMEOUT_MS } from './client.js';

export const DEFAULT_BASE_URL = 'https://api.adzuna.com/v1/api/jobs';
export const DEFAULT_COUNTRY = 'us';

export interface AdzunaConfig {
  appId?: string;
  appKey?: string;
  baseUrl: string;
  country: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
}

export type AdzunaCredentials = Required<Pick<AdzunaConfig, 'appId' | 'appKey'>>;

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveAdzunaConfig(overrides: Partial<AdzunaConfig> = {}): AdzunaConfig {
  return {
    appId: blankToUndefined(overrides.appId),
    appKey: blankToUndefined(overrides.appKey),
    baseUrl: (blankToUndefined(overrides.baseUrl) ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    country: (blankToUndefined(overrides.country) ?? DEFAULT_COUNTRY).toLowerCase(),
    timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxAttempts: overrides.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    retryDelayMs: overrides.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
  };
}

export function hasCredentials(config: AdzunaConfig): config is AdzunaConfig & AdzunaCredentials {
  return Boolean(config.appId && config.appKey);
}

/**
 * First page of `/{country}/search` for the request.
 */
export function buildSearchUrl(config: AdzunaConfig & AdzunaCredentials, request: SearchRequest): string {
  const params = new URLSearchParams({
    app_id: config.appId,
    app_key: config.appKey,
    results_per_page: String(request.numResults),
    what: request.role,
    where: request.location,
    'content-type': 'application/json',
  });

  return `${config.baseUrl}/${encodeURIComponent(config.country)}/search/1?${params.toString()}`;
}
