import { setTimeout as delay } from 'timers/promises';
import { Logger } from '../../utils/logger';
import { FailureKind, ProviderFailure, ProviderRejectedError, ProviderUnavailableError } from '../../utils/errors';
import { ProviderClient } from './provider';

export interface RetryPolicy {
    /** Retries after the first attempt; total attempts = maxRetries + 1. */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Cumulative sleep budget across all retries of one request. */
    maxTotalWaitMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30_000,
    maxTotalWaitMs: 60_000,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: SleepFn = async (ms, signal) => {
    try {
        await delay(ms, undefined, { signal });
    } catch (error) {
        // Aborted mid-wait: the caller checks the signal and stops.
        if (signal?.aborted) return;
        throw error;
    }
};

export interface RetryOptions {
    policy?: RetryPolicy;
    sleep?: SleepFn;
    system?: string;
    signal?: AbortSignal;
}

export interface CompletionOutcome {
    text: string;
    attempts: number;
}

/**
 * Exponential backoff, or the provider's Retry-After hint when it asks for longer,
 * capped per wait.
 */
export function backoffDelay(policy: RetryPolicy, retryIndex: number, retryAfterMs?: number): number {
    const exponential = policy.baseDelayMs * Math.pow(2, retryIndex);
    return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0));
}

/**
 * Token budget for a completion: prompt size plus a few tokens per requested word.
 */
export function estimateMaxTokens(prompt: string, targetLength: number, ceiling: number = 4000): number {
    const promptWords = prompt.split(/\s+/).filter(Boolean).length;
    const estimate = Math.ceil(promptWords * 1.5 + targetLength * 4) + 50;
    return Math.min(estimate, ceiling);
}

/**
 * 🔁 Bounded retry loop around a single-attempt ProviderClient.
 *
 * Transient failures are retried until the ceiling or the wait budget runs out
 * (ProviderUnavailableError). Anything else fails on the spot (ProviderRejectedError).
 */
export async function completeWithRetry(
    client: ProviderClient,
    prompt: string,
    maxTokens: number,
    options: RetryOptions = {}
): Promise<CompletionOutcome> {
    const policy = options.policy ?? DEFAULT_RETRY_POLICY;
    const sleep = options.sleep ?? defaultSleep;
    const { provider, model } = client.identify();

    let attempts = 0;
    let waitedMs = 0;

    for (let retryIndex = 0; ; retryIndex++) {
        attempts++;
        try {
            const text = await client.complete(prompt, maxTokens, { system: options.system, signal: options.signal });
            return { text, attempts };
        } catch (error) {
            if (!(error instanceof ProviderFailure)) throw error;

            if (!error.transient) {
                Logger.warn(`[Retry] ${provider} rejected request (${error.kind}), not retrying`, { provider, model });
                throw new ProviderRejectedError(provider, attempts, error);
            }
            if (retryIndex >= policy.maxRetries) {
                Logger.error(`[Retry] ${provider} failed after ${attempts} attempt(s)`, { provider, model, error });
                throw new ProviderUnavailableError(provider, attempts, error);
            }

            const waitMs = backoffDelay(policy, retryIndex, error.retryAfterMs);
            if (waitedMs + waitMs > policy.maxTotalWaitMs) {
                Logger.error(`[Retry] ${provider} wait budget of ${policy.maxTotalWaitMs}ms exhausted`, { provider, model });
                throw new ProviderUnavailableError(provider, attempts, error);
            }

            Logger.warn(
                `[Retry] ${provider} ${error.kind} (attempt ${attempts}/${policy.maxRetries + 1}). Retrying in ${waitMs}ms...`,
                { provider, model, status: error.status }
            );
            await sleep(waitMs, options.signal);
            waitedMs += waitMs;

            if (options.signal?.aborted) {
                throw new ProviderRejectedError(
                    provider,
                    attempts,
                    new ProviderFailure(FailureKind.ABORTED, 'Request aborted while waiting to retry')
                );
            }
        }
    }
}
