export type { SearchRequest, RawListing, FailureReason, FetchOutcome, SearchValidation } from './types.js';
export {
  searchInputSchema,
  validateSearchInput,
  REQUIRED_SEARCH_FIELDS,
  MIN_RESULTS,
  MAX_RESULTS,
} from './schema.js';
export type { SearchInput } from './schema.js';
export { isRecord, asString, asNumber, readString, readNested, readAmount } from './accessors.js';
