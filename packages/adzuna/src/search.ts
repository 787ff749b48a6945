import pino, { type Logger } from 'pino';
import { renderFailure, renderOutcome } from '@jobcompass/listing-format';
import {
  asNumber,
  isRecord,
  validateSearchInput,
  type FetchOutcome,
  type RawListing,
  type SearchRequest,
} from '@jobcompass/listing-sdk';
import { fetchJson } from './client.js';
import { buildSearchUrl, hasCredentials, type AdzunaConfig } from './config.js';

export const ADZUNA_SOURCE = {
  sourceName: 'Adzuna API',
  credentialVars: ['ADZUNA_APP_ID', 'ADZUNA_APP_KEY'],
} as const;

export interface SearchDeps {
  config: AdzunaConfig;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface SearchPage {
  listings: RawListing[];
  totalCount: number;
}

/**
 * Read `results` and `count` from a search payload. Non-object payloads are malformed;
 * a missing `results` array is an empty page.
 */
export function parseSearchPayload(payload: unknown): SearchPage | null {
  if (!isRecord(payload)) {
    return null;
  }

  const resultsRaw = Array.isArray(payload.results) ? payload.results : [];
  const listings = resultsRaw.filter(isRecord);

  return {
    listings,
    totalCount: asNumber(payload.count) ?? listings.length,
  };
}

/**
 * Run one search against Adzuna. Missing credentials short-circuit before any request.
 */
export async function fetchListings(request: SearchRequest, deps: SearchDeps): Promise<FetchOutcome> {
  const { config } = deps;
  const logger = deps.logger ?? pino({ level: 'silent' });

  if (!hasCredentials(config)) {
    logger.error({ event: 'search_unconfigured', missing: ADZUNA_SOURCE.credentialVars }, 'Adzuna credentials missing');
    return { ok: false, reason: 'missing-credentials' };
  }

  logger.info(
    { event: 'search_started', role: request.role, location: request.location, numResults: request.numResults },
    `Searching for ${request.numResults} '${request.role}' jobs in ${request.location}`,
  );

  const result = await fetchJson(buildSearchUrl(config, request), {
    maxAttempts: config.maxAttempts,
    timeoutMs: config.timeoutMs,
    retryDelayMs: config.retryDelayMs,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
    logger,
  });

  if (!result.ok) {
    return { ok: false, reason: result.reason };
  }

  const page = parseSearchPayload(result.payload);
  if (!page) {
    logger.error({ event: 'search_malformed', attempts: result.attempts }, 'Adzuna payload is not an object');
    return { ok: false, reason: 'malformed-response' };
  }

  logger.info(
    { event: 'search_completed', found: page.listings.length, totalCount: page.totalCount, attempts: result.attempts },
    `Found ${page.listings.length} job listings`,
  );

  return { ok: true, listings: page.listings, totalCount: page.totalCount };
}

/**
 * Search tool consumed by the orchestration layer: `{ role, location, num_results }` in,
 * display-ready text out. Problems come back as text, never as exceptions.
 */
export async function searchJobs(input: Record<string, unknown>, deps: SearchDeps): Promise<string> {
  const validation = validateSearchInput(input);
  if (!validation.valid) {
    return renderFailure('invalid-input', { ...ADZUNA_SOURCE, detail: validation.error });
  }

  const outcome = await fetchListings(validation.request, deps);
  return renderOutcome(outcome, validation.request, ADZUNA_SOURCE);
}
