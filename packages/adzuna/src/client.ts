import pino, { type Logger } from 'pino';
import {
  classifyRequestError,
  classifyStatus,
  settleAttempt,
  type AttemptOutcome,
  type FetchFailureReason,
  type RetryState,
} from './retry.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_DELAY_MS = 2_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface FetchJsonOptions {
  /** Attempt budget, the first request included. */
  maxAttempts?: number;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Constant delay between attempts. */
  retryDelayMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export type FetchJsonResult =
  | { ok: true; payload: unknown; attempts: number }
  | { ok: false; reason: FetchFailureReason; attempts: number };

/**
 * Origin and path only; query strings carry credentials.
 */
export function describeTarget(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return '<invalid url>';
  }
}

async function attemptOnce(
  url: string,
  fetchImpl: typeof fetch,
  timeoutMs: number,
  headers: Record<string, string>,
): Promise<AttemptOutcome> {
  let response: Response;

  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    return classifyRequestError(error);
  }

  try {
    if (!response.ok) {
      // drain so the connection is released before any retry delay
      await response.text();
      return classifyStatus(response.status);
    }

    return { kind: 'success', payload: await response.json() };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { kind: 'malformed-body', message: error.message };
    }

    return classifyRequestError(error);
  }
}

/**
 * GET a JSON document with a bounded, constant-delay retry policy.
 * 429, 5xx, timeouts and connection errors are retried; other 4xx and unparseable bodies
 * end the run at once. Resolves to a failure instead of throwing.
 */
export async function fetchJson(url: string, options: FetchJsonOptions = {}): Promise<FetchJsonResult> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const headers = { Accept: 'application/json', ...options.headers };
  const fetchImpl = options.fetchImpl ?? fetch;
  const wait = options.sleep ?? sleep;
  const logger = options.logger ?? pino({ level: 'silent' });
  const target = describeTarget(url);

  let state: RetryState = { state: 'attempting', attempt: 1 };

  while (true) {
    switch (state.state) {
      case 'attempting': {
        logger.debug({ event: 'fetch_attempt', target, attempt: state.attempt, maxAttempts }, 'Requesting');
        const outcome = await attemptOnce(url, fetchImpl, timeoutMs, headers);
        state = settleAttempt(state.attempt, maxAttempts, outcome);
        break;
      }

      case 'retryable-failure': {
        logger.warn(
          {
            event: 'fetch_retry',
            target,
            attempt: state.attempt,
            maxAttempts,
            failure: state.outcome,
            delayMs: retryDelayMs,
          },
          `Request failed (${state.outcome.kind}), retrying ${state.attempt + 1}/${maxAttempts}`,
        );
        await wait(retryDelayMs);
        state = { state: 'attempting', attempt: state.attempt + 1 };
        break;
      }

      case 'terminal-failure':
        logger.error(
          {
            event: 'fetch_failed',
            target,
            attempt: state.attempt,
            maxAttempts,
            failure: state.outcome,
            reason: state.reason,
          },
          `Request failed (${state.outcome.kind})`,
        );
        return { ok: false, reason: state.reason, attempts: state.attempt };

      case 'success':
        return { ok: true, payload: state.payload, attempts: state.attempt };
    }
  }
}
