import { z } from 'zod';
import type { SearchRequest, SearchValidation } from './types.js';

export const MIN_RESULTS = 1;
export const MAX_RESULTS = 50;

export const REQUIRED_SEARCH_FIELDS = ['role', 'location', 'num_results'] as const;

const ROLE_MESSAGE = 'Role must be a non-empty string';
const LOCATION_MESSAGE = 'Location must be a non-empty string';
const NUM_RESULTS_TYPE_MESSAGE = 'num_results must be an integer';
const NUM_RESULTS_RANGE_MESSAGE = `num_results must be between ${MIN_RESULTS} and ${MAX_RESULTS}`;

function nonEmptyString(message: string) {
  return z
    .string({ invalid_type_error: message, required_error: message })
    .refine((value) => value.trim().length > 0, { message });
}

/**
 * Type and range rules for search input. Field order here is the order errors are reported in.
 */
export const searchInputSchema = z.object({
  role: nonEmptyString(ROLE_MESSAGE),
  location: nonEmptyString(LOCATION_MESSAGE),
  num_results: z
    .number({ invalid_type_error: NUM_RESULTS_TYPE_MESSAGE, required_error: NUM_RESULTS_TYPE_MESSAGE })
    .int(NUM_RESULTS_TYPE_MESSAGE)
    .min(MIN_RESULTS, NUM_RESULTS_RANGE_MESSAGE)
    .max(MAX_RESULTS, NUM_RESULTS_RANGE_MESSAGE),
});

export type SearchInput = z.infer<typeof searchInputSchema>;

/**
 * Validate caller-supplied search parameters.
 * Presence of every field is checked before any type or range rule; only the first
 * violation is reported. Never throws.
 */
export function validateSearchInput(input: Record<string, unknown>): SearchValidation {
  for (const field of REQUIRED_SEARCH_FIELDS) {
    if (input[field] === undefined) {
      return { valid: false, error: `Missing required field: '${field}'` };
    }
  }

  const result = searchInputSchema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    return { valid: false, error: issue?.message ?? 'Invalid search parameters' };
  }

  const request: SearchRequest = Object.freeze({
    role: result.data.role,
    location: result.data.location,
    numResults: result.data.num_results,
  });

  return { valid: true, request };
}
