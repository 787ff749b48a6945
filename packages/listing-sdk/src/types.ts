/**
 * A validated search. Built only by `validateSearchInput`.
 */
export interface SearchRequest {
  readonly role: string;
  readonly location: string;
  readonly numResults: number;
}

/**
 * One listing as returned by the search API. Every field is optional and may be null,
 * so reads go through the accessors in `accessors.ts` rather than direct indexing.
 */
export type RawListing = Record<string, unknown>;

export type FailureReason =
  | 'invalid-input'
  | 'missing-credentials'
  | 'network-failure'
  | 'client-rejected'
  | 'malformed-response';

/**
 * Result of one logical search. `totalCount` is the API's global match count and can be
 * larger than `listings.length`.
 */
export type FetchOutcome =
  | { ok: true; listings: RawListing[]; totalCount: number }
  | { ok: false; reason: FailureReason };

export type SearchValidation = { valid: true; request: SearchRequest } | { valid: false; error: string };
