import OpenAI from 'openai';
import { ConfigurationError, FailureKind, ProviderFailure } from '../../utils/errors';
import { BaseProviderClient, CompletionOptions, DEFAULT_SYSTEM_PROMPT, ProviderOptions, kindForStatus, parseRetryAfter } from './provider';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export const OPENAI_MODELS = ['gpt-4o', 'gpt-4o-mini', 'gpt-4.1', 'gpt-4.1-mini', 'gpt-4-turbo'];

export const OPENROUTER_MODELS = [
    'anthropic/claude-sonnet-4',
    'anthropic/claude-3.5-sonnet',
    'anthropic/claude-3-opus',
    'openai/gpt-4o',
    'openai/gpt-4o-mini',
    'openai/gpt-4-turbo-preview',
    'google/gemini-2.0-flash-001',
    'meta-llama/llama-3.3-70b-instruct',
    'deepseek/deepseek-chat',
];

/**
 * 🧠 OPENAI-COMPATIBLE CHAT COMPLETIONS
 *
 * One client class for every backend that speaks the OpenAI chat API; they only
 * differ in base URL and headers. The SDK's own retries are disabled so the
 * shared retry policy is the only one in play.
 */
export abstract class OpenAICompatibleProvider extends BaseProviderClient {
    private readonly client: OpenAI;

    protected constructor(providerName: string, options: ProviderOptions, defaultBaseUrl?: string) {
        super(providerName, options);
        this.client = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl ?? defaultBaseUrl,
            maxRetries: 0,
            timeout: options.timeoutMs,
            defaultHeaders: options.headers,
        });
    }

    protected async send(prompt: string, maxTokens: number, options: CompletionOptions): Promise<string> {
        const content = await this.requestCompletion(prompt, maxTokens, options);

        if (!content || !content.trim()) {
            throw new ProviderFailure(FailureKind.SERVER_ERROR, `Empty completion from ${this.providerName}`);
        }
        return content;
    }

    protected async requestCompletion(
        prompt: string,
        maxTokens: number,
        options: CompletionOptions
    ): Promise<string | null | undefined> {
        const response = await this.client.chat.completions.create(
            {
                model: this.options.model,
                messages: [
                    { role: 'system', content: options.system ?? DEFAULT_SYSTEM_PROMPT },
                    { role: 'user', content: prompt },
                ],
                max_tokens: maxTokens,
                temperature: this.options.temperature,
            },
            { signal: options.signal }
        );

        return response.choices[0]?.message?.content;
    }

    protected classifyError(error: unknown): ProviderFailure {
        return classifyOpenAIError(this.providerName, error);
    }
}

export function classifyOpenAIError(providerName: string, error: unknown): ProviderFailure {
    // Order matters: the abort and connection classes extend APIError.
    if (error instanceof OpenAI.APIUserAbortError) {
        return new ProviderFailure(FailureKind.ABORTED, `${providerName} request aborted`, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
        return new ProviderFailure(FailureKind.TIMEOUT, `${providerName} request timeout`, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionError) {
        return new ProviderFailure(FailureKind.NETWORK, `Connection error to ${providerName}: ${error.message}`, { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
        const status = error.status;
        if (status === undefined) {
            return new ProviderFailure(FailureKind.NETWORK, `${providerName} API error: ${error.message}`, { cause: error });
        }
        return new ProviderFailure(kindForStatus(status), `${providerName} API ${status}: ${error.message}`, {
            status,
            retryAfterMs: parseRetryAfter(error.headers?.['retry-after']),
            cause: error,
        });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderFailure(FailureKind.BAD_REQUEST, `Unexpected error calling ${providerName}: ${message}`, { cause: error });
}

export class OpenAIProvider extends OpenAICompatibleProvider {
    constructor(options: ProviderOptions) {
        super('openai', options);
    }
}

/** 🔀 OpenRouter: one key, many upstream models. */
export class OpenRouterProvider extends OpenAICompatibleProvider {
    constructor(options: ProviderOptions) {
        super('openrouter', options, OPENROUTER_BASE_URL);
    }
}

/** Any self-hosted or third-party endpoint exposing the OpenAI chat API. */
export class CustomProvider extends OpenAICompatibleProvider {
    constructor(options: ProviderOptions) {
        if (!options.baseUrl) {
            throw new ConfigurationError('custom provider requires CUSTOM_API_URL', { provider: 'custom' });
        }
        super('custom', options);
    }
}
