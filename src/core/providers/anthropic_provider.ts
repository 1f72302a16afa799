import axios from 'axios';
import { z } from 'zod';
import { FailureKind, ProviderFailure } from '../../utils/errors';
import { BaseProviderClient, CompletionOptions, DEFAULT_SYSTEM_PROMPT, ProviderOptions, kindForStatus, parseRetryAfter } from './provider';

const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';

export const ANTHROPIC_MODELS = [
    'claude-sonnet-4-20250514',
    'claude-opus-4-20250514',
    'claude-3-7-sonnet-20250219',
    'claude-3-5-sonnet-20241022',
    'claude-3-5-haiku-20241022',
    'claude-3-opus-20240229',
    'claude-3-haiku-20240307',
];

const MessagesResponseSchema = z.object({
    content: z.array(z.object({
        type: z.string(),
        text: z.string().optional(),
    })).min(1),
    stop_reason: z.string().nullable().optional(),
});

const ApiErrorBodySchema = z.object({
    error: z.object({ message: z.string() }),
});

export interface AnthropicMessagesPayload {
    model: string;
    max_tokens: number;
    temperature: number;
    system: string;
    messages: Array<{ role: 'user'; content: string }>;
}

/**
 * 🟠 ANTHROPIC: direct Messages API over HTTP.
 */
export class AnthropicProvider extends BaseProviderClient {
    constructor(options: ProviderOptions) {
        super('anthropic', options);
    }

    buildPayload(prompt: string, maxTokens: number, system: string = DEFAULT_SYSTEM_PROMPT): AnthropicMessagesPayload {
        return {
            model: this.options.model,
            max_tokens: maxTokens,
            temperature: this.options.temperature,
            system,
            messages: [{ role: 'user', content: prompt }],
        };
    }

    protected async send(prompt: string, maxTokens: number, options: CompletionOptions): Promise<string> {
        const data = await this.postMessages(this.buildPayload(prompt, maxTokens, options.system), options.signal);

        const parsed = MessagesResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new ProviderFailure(
                FailureKind.MALFORMED_RESPONSE,
                `Malformed response from Anthropic: ${parsed.error.issues.map(i => i.path.join('.') || i.message).join(', ')}`
            );
        }

        const text = parsed.data.content
            .filter(block => block.type === 'text' && block.text)
            .map(block => block.text)
            .join('\n');

        if (!text.trim()) {
            throw new ProviderFailure(FailureKind.MALFORMED_RESPONSE, 'No text content in Anthropic response');
        }
        return text;
    }

    protected async postMessages(payload: AnthropicMessagesPayload, signal?: AbortSignal): Promise<unknown> {
        const response = await axios.post<unknown>(this.options.baseUrl ?? ANTHROPIC_MESSAGES_URL, payload, {
            headers: {
                'x-api-key': this.options.apiKey,
                'anthropic-version': ANTHROPIC_VERSION,
                'content-type': 'application/json',
                ...this.options.headers,
            },
            timeout: this.options.timeoutMs,
            signal,
        });
        return response.data;
    }

    protected classifyError(error: unknown): ProviderFailure {
        return classifyAnthropicError(error);
    }
}

export function classifyAnthropicError(error: unknown): ProviderFailure {
    if (axios.isCancel(error)) {
        return new ProviderFailure(FailureKind.ABORTED, 'Anthropic request aborted', { cause: error });
    }

    if (!axios.isAxiosError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        return new ProviderFailure(FailureKind.BAD_REQUEST, `Unexpected error calling Anthropic API: ${message}`, { cause: error });
    }

    const response = error.response;
    if (response) {
        const status = response.status;
        // 529 = overloaded
        const kind = status === 529 ? FailureKind.SERVER_ERROR : kindForStatus(status);
        const body = ApiErrorBodySchema.safeParse(response.data);
        const detail = body.success ? body.data.error.message : error.message;

        return new ProviderFailure(kind, `Anthropic API ${status}: ${detail}`, {
            status,
            retryAfterMs: parseRetryAfter(response.headers['retry-after']),
            cause: error,
        });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new ProviderFailure(FailureKind.TIMEOUT, `Anthropic request timeout: ${error.message}`, { cause: error });
    }

    return new ProviderFailure(FailureKind.NETWORK, `Connection error to Anthropic API: ${error.message}`, { cause: error });
}
