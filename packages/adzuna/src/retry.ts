import type { FailureReason } from '@jobcompass/listing-sdk';

/**
 * Classified result of a single HTTP attempt.
 */
export type AttemptOutcome =
  | { kind: 'success'; payload: unknown }
  | { kind: 'rate-limited'; status: number }
  | { kind: 'server-error'; status: number }
  | { kind: 'client-error'; status: number }
  | { kind: 'timeout'; message: string }
  | { kind: 'connection-error'; message: string }
  | { kind: 'request-error'; message: string }
  | { kind: 'malformed-body'; message: string };

export type FailedAttempt = Exclude<AttemptOutcome, { kind: 'success' }>;
export type FailedAttemptKind = FailedAttempt['kind'];
export type RequestFailure = Extract<FailedAttempt, { kind: 'timeout' | 'connection-error' | 'request-error' }>;

export type FetchFailureReason = Extract<FailureReason, 'network-failure' | 'client-rejected' | 'malformed-response'>;

export interface AttemptPolicy {
  retry: boolean;
  reason: FetchFailureReason;
}

/**
 * What to do after each failure class. `reason` is reported when the failure ends the run,
 * either directly or because the attempt budget is spent.
 */
export const RETRY_POLICY: Readonly<Record<FailedAttemptKind, AttemptPolicy>> = {
  'rate-limited': { retry: true, reason: 'network-failure' },
  'server-error': { retry: true, reason: 'network-failure' },
  timeout: { retry: true, reason: 'network-failure' },
  'connection-error': { retry: true, reason: 'network-failure' },
  'client-error': { retry: false, reason: 'client-rejected' },
  'request-error': { retry: false, reason: 'network-failure' },
  'malformed-body': { retry: false, reason: 'malformed-response' },
};

export type RetryState =
  | { state: 'attempting'; attempt: number }
  | { state: 'retryable-failure'; attempt: number; outcome: FailedAttempt }
  | { state: 'terminal-failure'; attempt: number; outcome: FailedAttempt; reason: FetchFailureReason }
  | { state: 'success'; attempt: number; payload: unknown };

export type SettledState = Exclude<RetryState, { state: 'attempting' }>;

export function classifyStatus(status: number): FailedAttempt {
  if (status === 429) {
    return { kind: 'rate-limited', status };
  }

  if (status >= 500) {
    return { kind: 'server-error', status };
  }

  return { kind: 'client-error', status };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify a rejected fetch or body read. Abort signals raise TimeoutError/AbortError, undici
 * raises TypeError for DNS, refused and reset connections and for bodies cut off mid-stream.
 */
export function classifyRequestError(error: unknown): RequestFailure {
  const message = errorMessage(error);

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { kind: 'timeout', message };
  }

  if (error instanceof TypeError) {
    return { kind: 'connection-error', message };
  }

  return { kind: 'request-error', message };
}

/**
 * Transition out of `attempting` once the attempt has been classified.
 */
export function settleAttempt(attempt: number, maxAttempts: number, outcome: AttemptOutcome): SettledState {
  if (outcome.kind === 'success') {
    return { state: 'success', attempt, payload: outcome.payload };
  }

  const policy = RETRY_POLICY[outcome.kind];
  if (policy.retry && attempt < maxAttempts) {
    return { state: 'retryable-failure', attempt, outcome };
  }

  return { state: 'terminal-failure', attempt, outcome, reason: policy.reason };
}
