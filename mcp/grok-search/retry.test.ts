/**
 * Tests for the retry state machine with linear backoff
 */
import { describe, expect, it, vi } from 'vitest';
import {
  type AttemptOutcome,
  backoffDelayMs,
  nextRetryState,
  MAX_TIMER_DELAY_MS,
  runWithRetry,
  sleep,
  timerDelayMs,
} from './retry.js';

const policy = { maxRetries: 2, baseDelayMs: 100 };

function recordingWait() {
  const delays: number[] = [];
  const wait = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, wait };
}

describe('retry utilities', () => {
  describe('backoffDelayMs', () => {
    it('grows linearly with the attempt index', () => {
      expect(backoffDelayMs(0, 1000)).toBe(1000);
      expect(backoffDelayMs(1, 1000)).toBe(2000);
      expect(backoffDelayMs(2, 1000)).toBe(3000);
    });

    it('never goes negative', () => {
      expect(backoffDelayMs(3, -5)).toBe(0);
    });
  });

  describe('nextRetryState', () => {
    it('succeeds on a successful outcome', () => {
      expect(nextRetryState(1, { kind: 'success', value: 'ok' }, policy)).toEqual({
        phase: 'succeeded',
        attempt: 1,
        value: 'ok',
      });
    });

    it('fails at once on a non-retryable failure', () => {
      expect(
        nextRetryState(0, { kind: 'failure', value: 'bad', retryable: false }, policy),
      ).toEqual({ phase: 'failed', attempt: 0, value: 'bad', exhausted: false });
    });

    it('backs off while attempts remain', () => {
      expect(
        nextRetryState(1, { kind: 'failure', value: 'busy', retryable: true }, policy),
      ).toEqual({ phase: 'backoff', attempt: 1, delayMs: 200, last: 'busy' });
    });

    it('fails as exhausted on the last attempt', () => {
      expect(
        nextRetryState(2, { kind: 'failure', value: 'busy', retryable: true }, policy),
      ).toEqual({ phase: 'failed', attempt: 2, value: 'busy', exhausted: true });
    });
  });

  describe('runWithRetry', () => {
    it('returns the first success without waiting', async () => {
      const { delays, wait } = recordingWait();
      const operation = vi.fn(async (): Promise<AttemptOutcome<string>> => ({
        kind: 'success',
        value: 'done',
      }));

      const run = await runWithRetry(operation, 'test', policy, wait);

      expect(run).toEqual({
        value: 'done',
        succeeded: true,
        attempts: 1,
        retries: 0,
        exhausted: false,
      });
      expect(operation).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });

    it('retries retryable failures with linear delays', async () => {
      const { delays, wait } = recordingWait();
      const outcomes: AttemptOutcome<string>[] = [
        { kind: 'failure', value: 'busy', retryable: true },
        { kind: 'failure', value: 'busy', retryable: true },
        { kind: 'success', value: 'done' },
      ];
      const seen: number[] = [];

      const run = await runWithRetry(
        async (attempt) => {
          seen.push(attempt);
          return outcomes[attempt] ?? { kind: 'success', value: 'unexpected' };
        },
        'test',
        policy,
        wait,
      );

      expect(run.value).toBe('done');
      expect(run.retries).toBe(2);
      expect(seen).toEqual([0, 1, 2]);
      expect(delays).toEqual([100, 200]);
    });

    it('stops after maxRetries + 1 attempts', async () => {
      const { delays, wait } = recordingWait();
      const operation = vi.fn(async (): Promise<AttemptOutcome<string>> => ({
        kind: 'failure',
        value: 'busy',
        retryable: true,
      }));

      const run = await runWithRetry(operation, 'test', policy, wait);

      expect(operation).toHaveBeenCalledTimes(3);
      expect(run).toEqual({
        value: 'busy',
        succeeded: false,
        attempts: 3,
        retries: 2,
        exhausted: true,
      });
      expect(delays).toEqual([100, 200]);
    });

    it('does not retry non-retryable failures', async () => {
      const { delays, wait } = recordingWait();
      const operation = vi.fn(async (): Promise<AttemptOutcome<string>> => ({
        kind: 'failure',
        value: 'unauthorized',
        retryable: false,
      }));

      const run = await runWithRetry(operation, 'test', policy, wait);

      expect(operation).toHaveBeenCalledTimes(1);
      expect(run.exhausted).toBe(false);
      expect(run.retries).toBe(0);
      expect(delays).toEqual([]);
    });

    it('makes a single attempt when maxRetries is 0', async () => {
      const operation = vi.fn(async (): Promise<AttemptOutcome<string>> => ({
        kind: 'failure',
        value: 'busy',
        retryable: true,
      }));

      const run = await runWithRetry(operation, 'test', { maxRetries: 0, baseDelayMs: 0 });

      expect(operation).toHaveBeenCalledTimes(1);
      expect(run.attempts).toBe(1);
      expect(run.exhausted).toBe(true);
    });

    it('rejects with the abort reason before the first attempt', async () => {
      const controller = new AbortController();
      controller.abort(new Error('stop'));
      const operation = vi.fn(async (): Promise<AttemptOutcome<string>> => ({
        kind: 'success',
        value: 'done',
      }));

      await expect(
        runWithRetry(operation, 'test', { ...policy, signal: controller.signal }),
      ).rejects.toThrow('stop');
      expect(operation).not.toHaveBeenCalled();
    });

    it('rejects when aborted during backoff', async () => {
      const controller = new AbortController();
      const operation = vi.fn(async (): Promise<AttemptOutcome<string>> => {
        setTimeout(() => controller.abort(new Error('cancelled')), 5);
        return { kind: 'failure', value: 'busy', retryable: true };
      });

      await expect(
        runWithRetry(operation, 'test', {
          maxRetries: 3,
          baseDelayMs: 10_000,
          signal: controller.signal,
        }),
      ).rejects.toThrow('cancelled');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('sleep', () => {
    it('resolves after the delay', async () => {
      await expect(sleep(1)).resolves.toBeUndefined();
    });

    it('rejects at once on an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort(new Error('already'));
      await expect(sleep(10_000, controller.signal)).rejects.toThrow('already');
    });

    it('keeps an oversized delay pending instead of firing at once', async () => {
      const controller = new AbortController();
      let settled = false;
      const pending = sleep(3_000_000_000, controller.signal).then(
        () => {
          settled = true;
        },
        () => {},
      );
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(settled).toBe(false);
      controller.abort(new Error('done'));
      await pending;
    });
  });

  describe('timerDelayMs', () => {
    it('clamps to the setTimeout range', () => {
      expect(timerDelayMs(3_000_000_000)).toBe(MAX_TIMER_DELAY_MS);
      expect(timerDelayMs(-5)).toBe(0);
      expect(timerDelayMs(1500)).toBe(1500);
    });
  });
});
