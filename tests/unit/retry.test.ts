import { describe, expect, it } from 'vitest';
import { RetryPolicy, backoffDelay, completeWithRetry, estimateMaxTokens } from '../../src/core/providers/retry';
import {
  FailureKind,
  ProviderFailure,
  ProviderRejectedError,
  ProviderUnavailableError,
} from '../../src/utils/errors';
import { ScriptedProvider } from '../helpers/scripted_provider';

const POLICY: RetryPolicy = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 30_000, maxTotalWaitMs: 60_000 };

const serverError = () => new ProviderFailure(FailureKind.SERVER_ERROR, 'API 503: overloaded', { status: 503 });

function recordingSleep() {
  const waits: number[] = [];
  const sleep = async (ms: number) => {
    waits.push(ms);
  };
  return { waits, sleep };
}

describe('completeWithRetry', () => {
  it('succeeds after k transient failures when the ceiling allows it', async () => {
    const provider = new ScriptedProvider([serverError(), serverError(), 'ok']);
    const { waits, sleep } = recordingSleep();

    const outcome = await completeWithRetry(provider, 'prompt', 100, { policy: POLICY, sleep });

    expect(outcome).toEqual({ text: 'ok', attempts: 3 });
    expect(waits).toEqual([100, 200]);
  });

  it('gives up after ceiling + 1 attempts', async () => {
    const provider = new ScriptedProvider([serverError()]);
    const { sleep } = recordingSleep();

    const error = await completeWithRetry(provider, 'prompt', 100, { policy: { ...POLICY, maxRetries: 2 }, sleep })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    if (!(error instanceof ProviderUnavailableError)) return;
    expect(error.attempts).toBe(3);
    expect(error.lastFailure.kind).toBe(FailureKind.SERVER_ERROR);
    expect(provider.calls).toHaveLength(3);
  });

  it('never retries non-transient failures', async () => {
    const provider = new ScriptedProvider([new ProviderFailure(FailureKind.BAD_REQUEST, 'API 400: bad model', { status: 400 })]);
    const { waits, sleep } = recordingSleep();

    const error = await completeWithRetry(provider, 'prompt', 100, { policy: POLICY, sleep }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderRejectedError);
    if (!(error instanceof ProviderRejectedError)) return;
    expect(error.attempts).toBe(1);
    expect(error.failure.kind).toBe(FailureKind.BAD_REQUEST);
    expect(waits).toEqual([]);
  });

  it('honours a longer Retry-After hint', async () => {
    const rateLimited = new ProviderFailure(FailureKind.RATE_LIMITED, 'API 429', { status: 429, retryAfterMs: 5000 });
    const provider = new ScriptedProvider([rateLimited, 'ok']);
    const { waits, sleep } = recordingSleep();

    await completeWithRetry(provider, 'prompt', 100, { policy: POLICY, sleep });

    expect(waits).toEqual([5000]);
  });

  it('stops when the next wait would exceed the total wait budget', async () => {
    const provider = new ScriptedProvider([serverError()]);
    const { waits, sleep } = recordingSleep();
    const policy = { maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 30_000, maxTotalWaitMs: 2500 };

    const error = await completeWithRetry(provider, 'prompt', 100, { policy, sleep }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(waits).toEqual([1000]);
    expect(provider.calls).toHaveLength(2);
  });

  it('stops retrying once the signal is aborted during a wait', async () => {
    const controller = new AbortController();
    const provider = new ScriptedProvider([serverError(), 'ok']);
    const sleep = async () => {
      controller.abort();
    };

    const error = await completeWithRetry(provider, 'prompt', 100, { policy: POLICY, sleep, signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderRejectedError);
    if (!(error instanceof ProviderRejectedError)) return;
    expect(error.failure.kind).toBe(FailureKind.ABORTED);
    expect(provider.calls).toHaveLength(1);
  });

  it('rethrows errors that are not provider failures', async () => {
    const provider = new ScriptedProvider([new TypeError('boom')]);
    await expect(completeWithRetry(provider, 'prompt', 100, { policy: POLICY })).rejects.toThrow('boom');
  });
});

describe('backoffDelay', () => {
  it('doubles from the base delay and caps each wait', () => {
    const policy = { ...POLICY, baseDelayMs: 1000, maxDelayMs: 5000 };
    expect([0, 1, 2, 3].map(i => backoffDelay(policy, i))).toEqual([1000, 2000, 4000, 5000]);
  });

  it('uses the hint only when it is longer, still capped', () => {
    const policy = { ...POLICY, baseDelayMs: 1000, maxDelayMs: 5000 };
    expect(backoffDelay(policy, 2, 500)).toBe(4000);
    expect(backoffDelay(policy, 0, 3000)).toBe(3000);
    expect(backoffDelay(policy, 0, 60_000)).toBe(5000);
  });
});

describe('estimateMaxTokens', () => {
  it('scales with prompt size and target length', () => {
    // ceil(4 * 1.5 + 10 * 4) + 50
    expect(estimateMaxTokens('one two three four', 10)).toBe(96);
  });

  it('never exceeds the ceiling', () => {
    expect(estimateMaxTokens('one two three four', 10, 50)).toBe(50);
    expect(estimateMaxTokens('word', 5000)).toBe(4000);
  });
});
