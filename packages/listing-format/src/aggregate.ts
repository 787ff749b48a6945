import type { FailureReason, FetchOutcome, RawListing, SearchRequest } from '@jobcompass/listing-sdk';
import { formatListing } from './format.js';

export const LISTING_SEPARATOR = '='.repeat(80);

export interface FailureRenderOptions {
  /** Validator message, shown for `invalid-input`. */
  detail?: string;
  /** Display name of the upstream API. */
  sourceName?: string;
  /** Environment variables that hold the API credentials. */
  credentialVars?: readonly string[];
}

const DEFAULT_SOURCE_NAME = 'the job search API';

function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join('\n');
}

/**
 * Caller-facing message for a failed search. One message per failure category.
 */
export function renderFailure(reason: FailureReason, options: FailureRenderOptions = {}): string {
  const source = options.sourceName ?? DEFAULT_SOURCE_NAME;

  switch (reason) {
    case 'invalid-input':
      return [
        'ERROR: Invalid input parameters.',
        '',
        options.detail ?? 'The search parameters could not be validated.',
        '',
        'Please provide valid parameters:',
        bulletList([
          'role: Job title (non-empty string)',
          'location: Search location (non-empty string)',
          'num_results: Number of results (1-50)',
        ]),
      ].join('\n');

    case 'missing-credentials': {
      const vars = options.credentialVars ?? [];
      return [
        `ERROR: ${source} credentials not configured.`,
        ...(vars.length > 0 ? ['', 'Please set the following environment variables:', bulletList(vars)] : []),
      ].join('\n');
    }

    case 'network-failure':
      return [
        `ERROR: Failed to fetch job listings from ${source}.`,
        '',
        'Possible causes:',
        bulletList(['Network connection issues', 'API service temporarily unavailable', 'Rate limit exceeded']),
        '',
        'Please try again in a few moments.',
      ].join('\n');

    case 'client-rejected':
      return [
        `ERROR: ${source} rejected the search request.`,
        '',
        'Possible causes:',
        bulletList(['Invalid or revoked API credentials', 'Unsupported search parameters']),
        '',
        'Check the configuration and search parameters before retrying.',
      ].join('\n');

    case 'malformed-response':
      return [
        `ERROR: ${source} returned a response that could not be read.`,
        '',
        'The service may be degraded. Please try again later.',
      ].join('\n');
  }
}

export function renderNoResults(request: Pick<SearchRequest, 'role' | 'location'>): string {
  return [
    `No job listings found for '${request.role}' in ${request.location}.`,
    '',
    'Suggestions:',
    bulletList([
      'Try a broader search term (e.g., "Data" instead of "Senior Data Scientist")',
      'Try a different location',
      'Try searching for related roles',
    ]),
  ].join('\n');
}

/**
 * Numbered listing blocks under a summary header.
 */
export function renderListings(
  listings: readonly RawListing[],
  totalCount: number,
  request: Pick<SearchRequest, 'role' | 'location'>,
): string {
  const total = listings.length;
  const header = [
    `Successfully found ${total} job listings (out of ${totalCount} total matches)`,
    '',
    'Search Parameters:',
    `- Role: ${request.role}`,
    `- Location: ${request.location}`,
    '',
    'Job Listings:',
    LISTING_SEPARATOR,
  ].join('\n');

  const blocks = listings.map((listing, index) => `[Job ${index + 1}/${total}]\n${formatListing(listing)}`);

  return `${header}\n\n${blocks.join(`\n\n${LISTING_SEPARATOR}\n\n`)}`;
}

/**
 * Turn a fetch outcome into the text handed back to the orchestration layer.
 */
export function renderOutcome(
  outcome: FetchOutcome,
  request: Pick<SearchRequest, 'role' | 'location'>,
  options: Omit<FailureRenderOptions, 'detail'> = {},
): string {
  if (!outcome.ok) {
    return renderFailure(outcome.reason, options);
  }

  if (outcome.listings.length === 0) {
    return renderNoResults(request);
  }

  return renderListings(outcome.listings, outcome.totalCount, request);
}
