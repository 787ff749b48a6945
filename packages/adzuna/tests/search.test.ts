import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it, vi } from 'vitest';
import { resolveAdzunaConfig } from '../src/config.js';
import { fetchListings, parseSearchPayload, searchJobs } from '../src/search.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture: unknown = JSON.parse(readFileSync(resolve(__dirname, '../fixtures/response.json'), 'utf-8'));

const config = resolveAdzunaConfig({ appId: 'test-id', appKey: 'test-key', retryDelayMs: 0 });

const validInput = {
  role: 'Data Scientist',
  location: 'Los Angeles',
  num_results: 2,
};

function mockFetchSequence(responses: Response[]) {
  let idx = 0;
  const fetchMock = vi.fn(async () => {
    const response = responses[Math.min(idx, responses.length - 1)]!;
    idx += 1;
    return response.clone();
  });

  return fetchMock;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

const noSleep = async () => undefined;

describe('parseSearchPayload', () => {
  it('reads results and count', () => {
    const page = parseSearchPayload(fixture);

    expect(page?.listings).toHaveLength(2);
    expect(page?.totalCount).toBe(100);
  });

  it('defaults a missing count to the page size', () => {
    expect(parseSearchPayload({ results: [{ title: 'A' }] })).toEqual({ listings: [{ title: 'A' }], totalCount: 1 });
  });

  it('treats missing results as an empty page and drops non-object items', () => {
    expect(parseSearchPayload({})).toEqual({ listings: [], totalCount: 0 });
    expect(parseSearchPayload({ results: ['x', null, { title: 'B' }], count: 9 })).toEqual({
      listings: [{ title: 'B' }],
      totalCount: 9,
    });
  });

  it('rejects non-object payloads', () => {
    expect(parseSearchPayload([])).toBeNull();
    expect(parseSearchPayload('text')).toBeNull();
  });
});

describe('searchJobs', () => {
  it('formats listings from a successful search', async () => {
    const fetchMock = mockFetchSequence([jsonResponse(fixture)]);

    const text = await searchJobs(validInput, {
      config,
      fetchImpl: fetchMock as unknown as typeof fetch,
      sleep: noSleep,
    });

    expect(text.split('\n')[0]).toBe('Successfully found 2 job listings (out of 100 total matches)');
    expect(text).toContain('[Job 1/2]');
    expect(text).toContain('    <company>Tech Company</company>');
    expect(text).toContain('    <salary>$100,000 - $150,000</salary>');
    expect(text).toContain('[Job 2/2]');
    expect(text).toContain('    <company>Startup Inc</company>');
    expect(text).not.toContain('ERROR');
  });

  it('requests the first page with the search parameters', async () => {
    const fetchMock = mockFetchSequence([jsonResponse(fixture)]);

    await searchJobs(validInput, { config, fetchImpl: fetchMock as unknown as typeof fetch, sleep: noSleep });

    const call = fetchMock.mock.calls.at(0) as unknown[] | undefined;
    const url = new URL(String(call?.[0]));
    expect(url.pathname).toBe('/v1/api/jobs/us/search/1');
    expect(url.searchParams.get('what')).toBe('Data Scientist');
    expect(url.searchParams.get('where')).toBe('Los Angeles');
    expect(url.searchParams.get('results_per_page')).toBe('2');
  });

  it('returns the no-results message for an empty page', async () => {
    const fetchMock = mockFetchSequence([jsonResponse({ count: 0, results: [] })]);

    const text = await searchJobs(
      { role: 'Extremely Rare Job Title', location: 'Middle of Nowhere', num_results: 5 },
      { config, fetchImpl: fetchMock as unknown as typeof fetch, sleep: noSleep },
    );

    expect(text.split('\n')[0]).toBe("No job listings found for 'Extremely Rare Job Title' in Middle of Nowhere.");
    expect(text).not.toContain('<job>');
  });

  it('returns a validation error without touching the network', async () => {
    const fetchMock = mockFetchSequence([jsonResponse(fixture)]);

    const text = await searchJobs(
      { role: 'Data Scientist' },
      { config, fetchImpl: fetchMock as unknown as typeof fetch, sleep: noSleep },
    );

    expect(text.split('\n')[0]).toBe('ERROR: Invalid input parameters.');
    expect(text).toContain("Missing required field: 'location'");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('short-circuits on missing credentials before any request', async () => {
    const fetchMock = mockFetchSequence([jsonResponse(fixture)]);

    const text = await searchJobs(validInput, {
      config: resolveAdzunaConfig(),
      fetchImpl: fetchMock as unknown as typeof fetch,
      sleep: noSleep,
    });

    expect(text.split('\n')[0]).toBe('ERROR: Adzuna API credentials not configured.');
    expect(text).toContain('- ADZUNA_APP_KEY');
    expect(fetchMock).toHaveBeenCalledTimes(0);
  });

  it('reports a network failure after exhausting retries', async () => {
    const fetchMock = mockFetchSequence([jsonResponse({}, 500)]);

    const text = await searchJobs(validInput, {
      config,
      fetchImpl: fetchMock as unknown as typeof fetch,
      sleep: noSleep,
    });

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(text.split('\n')[0]).toBe('ERROR: Failed to fetch job listings from Adzuna API.');
  });

  it('reports a rejected request after a single 401', async () => {
    const fetchMock = mockFetchSequence([jsonResponse({ exception: 'AUTH_FAIL' }, 401)]);

    const text = await searchJobs(validInput, {
      config,
      fetchImpl: fetchMock as unknown as typeof fetch,
      sleep: noSleep,
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(text.split('\n')[0]).toBe('ERROR: Adzuna API rejected the search request.');
  });

  it('reports a malformed response when the payload is not an object', async () => {
    const fetchMock = mockFetchSequence([jsonResponse(['unexpected'])]);

    const text = await searchJobs(validInput, {
      config,
      fetchImpl: fetchMock as unknown as typeof fetch,
      sleep: noSleep,
    });

    expect(text.split('\n')[0]).toBe('ERROR: Adzuna API returned a response that could not be read.');
  });
});

describe('fetchListings', () => {
  it('returns the structured outcome', async () => {
    const fetchMock = mockFetchSequence([jsonResponse({ count: 42, results: [{ title: 'Analyst' }] })]);

    const outcome = await fetchListings(
      { role: 'Analyst', location: 'Remote', numResults: 1 },
      { config, fetchImpl: fetchMock as unknown as typeof fetch, sleep: noSleep },
    );

    expect(outcome).toEqual({ ok: true, listings: [{ title: 'Analyst' }], totalCount: 42 });
  });
});
