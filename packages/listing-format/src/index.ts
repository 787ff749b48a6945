export {
  formatListing,
  formatSalary,
  formatAmount,
  truncateDescription,
  escapeTagText,
  escapeUrlText,
  MAX_DESCRIPTION_LENGTH,
  ELLIPSIS,
} from './format.js';
export { renderOutcome, renderFailure, renderNoResults, renderListings, LISTING_SEPARATOR } from './aggregate.js';
export type { FailureRenderOptions } from './aggregate.js';
