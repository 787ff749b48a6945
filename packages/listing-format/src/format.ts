import { isRecord, readAmount, readNested, readString, type RawListing } from '@jobcompass/listing-sdk';

export const MAX_DESCRIPTION_LENGTH = 500;
export const ELLIPSIS = '...';

const NOT_AVAILABLE = 'N/A';
const SALARY_NOT_SPECIFIED = 'Not specified';
const NO_DESCRIPTION = 'No description available';

const amountFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * `120000` → `$120,000`.
 */
export function formatAmount(amount: number): string {
  return `$${amountFormat.format(amount)}`;
}

/**
 * Salary line for a listing. Both bounds, then min only, then max only.
 */
export function formatSalary(listing: RawListing): string {
  const min = readAmount(listing, 'salary_min');
  const max = readAmount(listing, 'salary_max');

  if (min !== undefined && max !== undefined) {
    return `${formatAmount(min)} - ${formatAmount(max)}`;
  }

  if (min !== undefined) {
    return `From ${formatAmount(min)}`;
  }

  if (max !== undefined) {
    return `Up to ${formatAmount(max)}`;
  }

  return SALARY_NOT_SPECIFIED;
}

/**
 * Cap a description at MAX_DESCRIPTION_LENGTH code points, appending an ellipsis when cut.
 */
export function truncateDescription(description: string, maxLength = MAX_DESCRIPTION_LENGTH): string {
  const chars = Array.from(description);
  if (chars.length <= maxLength) {
    return description;
  }

  return chars.slice(0, maxLength).join('') + ELLIPSIS;
}

/**
 * Escape the characters that could open or close a tag in the listing block.
 */
export function escapeTagText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Percent-encode tag delimiters in a URL. `&` query separators are left as they are.
 */
export function escapeUrlText(url: string): string {
  return url.replace(/</g, '%3C').replace(/>/g, '%3E');
}

/**
 * Render one listing as a fixed-tag text block. Total: any input, including non-objects,
 * produces a block with every field defaulted.
 */
export function formatListing(raw: unknown): string {
  const listing: RawListing = isRecord(raw) ? raw : {};

  const title = readString(listing, 'title', NOT_AVAILABLE);
  const company = readNested(listing, 'company', 'display_name', NOT_AVAILABLE);
  const location = readNested(listing, 'location', 'display_name', NOT_AVAILABLE);
  const description = truncateDescription(readString(listing, 'description', NO_DESCRIPTION));
  const url = readString(listing, 'redirect_url', NOT_AVAILABLE);
  const created = readString(listing, 'created', NOT_AVAILABLE);

  return [
    '<job>',
    `    <title>${escapeTagText(title)}</title>`,
    `    <company>${escapeTagText(company)}</company>`,
    `    <location>${escapeTagText(location)}</location>`,
    `    <salary>${formatSalary(listing)}</salary>`,
    `    <posted_date>${escapeTagText(created)}</posted_date>`,
    '    <description>',
    `        ${escapeTagText(description)}`,
    '    </description>',
    `    <apply_url>${escapeUrlText(url)}</apply_url>`,
    '</job>',
  ].join('\n');
}
