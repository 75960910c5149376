/**
 * Retry Logic with Linear Backoff
 *
 * Drives the attempt chain of a search call as an explicit state machine:
 *
 *   attempting -> succeeded
 *   attempting -> failed            (non-retryable, or attempts exhausted)
 *   attempting -> backoff -> attempting
 *
 * Attempts are strictly sequential. The delay before attempt N+1 is
 * `baseDelayMs * (N + 1)`, which is linear, not exponential.
 */

// ============================================================================
// Configuration
// ============================================================================

export interface RetryPolicy {
  /** Retries after the first attempt (default: 3) */
  maxRetries: number;
  /** Base delay in ms, multiplied by the attempt number (default: 1000) */
  baseDelayMs: number;
  /** Cancels the chain; pending sleeps reject with the signal's reason */
  signal?: AbortSignal;
  /** Enable debug logging (default: false) */
  debug: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  debug: false,
};

// ============================================================================
// States
// ============================================================================

/**
 * Result of one attempt. `retryable` is only consulted for failures.
 */
export type AttemptOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'failure'; value: T; retryable: boolean };

export type RetryState<T> =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'backoff'; attempt: number; delayMs: number; last: T }
  | { phase: 'succeeded'; attempt: number; value: T }
  | { phase: 'failed'; attempt: number; value: T; exhausted: boolean };

export interface RetryRun<T> {
  value: T;
  succeeded: boolean;
  /** Total attempts performed (>= 1) */
  attempts: number;
  /** Retries performed (attempts - 1) */
  retries: number;
  /** True when the last failure was retryable but no attempts were left */
  exhausted: boolean;
}

/**
 * Delay before the attempt following `attempt` (0-indexed).
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return Math.max(0, baseDelayMs) * (attempt + 1);
}

/**
 * Transition out of the attempting state given that attempt's outcome.
 */
export function nextRetryState<T>(
  attempt: number,
  outcome: AttemptOutcome<T>,
  policy: Pick<RetryPolicy, 'maxRetries' | 'baseDelayMs'>,
): RetryState<T> {
  if (outcome.kind === 'success') {
    return { phase: 'succeeded', attempt, value: outcome.value };
  }
  if (!outcome.retryable) {
    return { phase: 'failed', attempt, value: outcome.value, exhausted: false };
  }
  if (attempt >= policy.maxRetries) {
    return { phase: 'failed', attempt, value: outcome.value, exhausted: true };
  }
  return {
    phase: 'backoff',
    attempt,
    delayMs: backoffDelayMs(attempt, policy.baseDelayMs),
    last: outcome.value,
  };
}

// ============================================================================
// Execution
// ============================================================================

/**
 * The value a cancelled operation rejects with.
 */
export function abortReason(signal: AbortSignal): unknown {
  if (signal.reason !== undefined) return signal.reason;
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

/** Largest delay setTimeout honors; Node fires longer ones after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function timerDelayMs(ms: number): number {
  return Math.min(Math.max(0, ms), MAX_TIMER_DELAY_MS);
}

/**
 * Sleep for a specified duration. Rejects with the signal's reason on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, timerDelayMs(ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` until it succeeds, fails non-retryably, or runs out of
 * attempts. Throws only when the operation throws or the signal aborts.
 */
export async function runWithRetry<T>(
  operation: (attempt: number, signal?: AbortSignal) => Promise<AttemptOutcome<T>>,
  operationName: string,
  policy: Partial<RetryPolicy> = {},
  wait: (ms: number, signal?: AbortSignal) => Promise<void> = sleep,
): Promise<RetryRun<T>> {
  const fullPolicy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };
  const maxRetries = Math.max(0, Math.floor(fullPolicy.maxRetries));
  let state: RetryState<T> = { phase: 'attempting', attempt: 0 };

  for (;;) {
    switch (state.phase) {
      case 'attempting': {
        if (fullPolicy.signal?.aborted) throw abortReason(fullPolicy.signal);
        const outcome = await operation(state.attempt, fullPolicy.signal);
        state = nextRetryState(state.attempt, outcome, { ...fullPolicy, maxRetries });
        break;
      }
      case 'backoff': {
        if (fullPolicy.debug) {
          console.error(
            `[retry] ${operationName}: Attempt ${state.attempt + 1} failed, retrying in ${state.delayMs}ms (attempt ${state.attempt + 2}/${maxRetries + 1})`,
          );
        }
        await wait(state.delayMs, fullPolicy.signal);
        state = { phase: 'attempting', attempt: state.attempt + 1 };
        break;
      }
      case 'succeeded': {
        if (state.attempt > 0 && fullPolicy.debug) {
          console.error(`[retry] ${operationName}: Succeeded on attempt ${state.attempt + 1}`);
        }
        return {
          value: state.value,
          succeeded: true,
          attempts: state.attempt + 1,
          retries: state.attempt,
          exhausted: false,
        };
      }
      case 'failed': {
        if (fullPolicy.debug) {
          console.error(
            state.exhausted
              ? `[retry] ${operationName}: Giving up after ${state.attempt + 1} attempts`
              : `[retry] ${operationName}: Non-retryable failure on attempt ${state.attempt + 1}`,
          );
        }
        return {
          value: state.value,
          succeeded: false,
          attempts: state.attempt + 1,
          retries: state.attempt,
          exhausted: state.exhausted,
        };
      }
    }
  }
}
