export { searchJobs, fetchListings, parseSearchPayload, ADZUNA_SOURCE } from './search.js';
export type { SearchDeps } from './search.js';
export {
  fetchJson,
  describeTarget,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_MS,
} from './client.js';
export type { FetchJsonOptions, FetchJsonResult } from './client.js';
export { RETRY_POLICY, classifyStatus, classifyRequestError, settleAttempt } from './retry.js';
export type { AttemptOutcome, FailedAttempt, FetchFailureReason, RequestFailure, RetryState } from './retry.js';
export { resolveAdzunaConfig, hasCredentials, buildSearchUrl, DEFAULT_BASE_URL, DEFAULT_COUNTRY } from './config.js';
export type { AdzunaConfig, AdzunaCredentials } from './config.js';
