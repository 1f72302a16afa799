import { ProviderIdentity } from '../../types';
import { ConfigurationError, FailureKind, ProviderFailure } from '../../utils/errors';

/**
 * 🔌 PROVIDER CLIENT CONTRACT
 *
 * `complete()` is exactly one request/response cycle against the backend. It
 * either resolves with raw completion text or throws a classified ProviderFailure.
 * Retries live in `completeWithRetry()`, never inside a provider.
 */
export interface ProviderClient {
    identify(): ProviderIdentity;
    complete(prompt: string, maxTokens: number, options?: CompletionOptions): Promise<string>;
}

export interface CompletionOptions {
    system?: string;
    signal?: AbortSignal;
}

export interface ProviderOptions {
    apiKey: string;
    model: string;
    baseUrl?: string;
    timeoutMs: number;
    temperature: number;
    headers?: Record<string, string>;
}

export const DEFAULT_SYSTEM_PROMPT =
    'You are a helpful assistant that generates wordlists for authorized security testing.';

export abstract class BaseProviderClient implements ProviderClient {
    protected constructor(public readonly providerName: string, protected readonly options: ProviderOptions) {
        if (!options.apiKey.trim()) {
            throw new ConfigurationError(`${providerName} requires an API key`, { provider: providerName });
        }
        if (!options.model.trim()) {
            throw new ConfigurationError(`${providerName} requires a model name`, { provider: providerName });
        }
    }

    identify(): ProviderIdentity {
        return { provider: this.providerName, model: this.options.model };
    }

    async complete(prompt: string, maxTokens: number, options: CompletionOptions = {}): Promise<string> {
        if (options.signal?.aborted) {
            throw new ProviderFailure(FailureKind.ABORTED, 'Request aborted before it was sent');
        }

        try {
            return await this.send(prompt, maxTokens, options);
        } catch (error) {
            if (error instanceof ProviderFailure) throw error;
            throw this.classifyError(error);
        }
    }

    /** One HTTP round trip. Throw anything; `classifyError` turns it into a failure kind. */
    protected abstract send(prompt: string, maxTokens: number, options: CompletionOptions): Promise<string>;

    protected abstract classifyError(error: unknown): ProviderFailure;
}

/**
 * Maps an HTTP status to a failure kind. Shared by every HTTP-based provider,
 * each of which may special-case statuses before falling back to this.
 */
export function kindForStatus(status: number): FailureKind {
    if (status === 401 || status === 403) return FailureKind.AUTH;
    if (status === 408) return FailureKind.TIMEOUT;
    if (status === 429) return FailureKind.RATE_LIMITED;
    if (status >= 500) return FailureKind.SERVER_ERROR;
    return FailureKind.BAD_REQUEST;
}

/**
 * `Retry-After` is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
    if (typeof value !== 'string' || value.trim() === '') return undefined;

    const seconds = Number(value);
    if (Number.isFinite(seconds)) {
        return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
    }

    const date = Date.parse(value);
    if (Number.isNaN(date)) return undefined;
    return Math.max(0, date - now);
}
