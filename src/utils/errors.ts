/**
 * 🚨 ERROR TAXONOMY
 * Every failure the core raises is a WordforgeError with a stable `code`, so the
 * CLI and the batch orchestrator can react by class instead of by message.
 */

export class WordforgeError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/** Missing/invalid API key, unknown model, bad environment or bad type registration. */
export class ConfigurationError extends WordforgeError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', { fatal: true, ...context });
    }
}

export class InvalidRequestError extends WordforgeError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'INVALID_REQUEST', { issues });
    }
}

export type RegistryKind = 'wordlist type' | 'provider';

export class NotFoundError extends WordforgeError {
    constructor(public kind: RegistryKind, public id: string, public known: string[]) {
        super(
            `Unknown ${kind} "${id}". Known: ${known.length > 0 ? known.join(', ') : '(none registered)'}`,
            'NOT_FOUND',
            { kind, id, known }
        );
    }
}

// ─────────────────────────────────────────────
// PROVIDER FAILURES
// ─────────────────────────────────────────────

export enum FailureKind {
    RATE_LIMITED = 'RATE_LIMITED',
    SERVER_ERROR = 'SERVER_ERROR',
    NETWORK = 'NETWORK',
    TIMEOUT = 'TIMEOUT',
    AUTH = 'AUTH',
    BAD_REQUEST = 'BAD_REQUEST',
    MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
    ABORTED = 'ABORTED',
}

const TRANSIENT_KINDS: ReadonlySet<FailureKind> = new Set([
    FailureKind.RATE_LIMITED,
    FailureKind.SERVER_ERROR,
    FailureKind.NETWORK,
    FailureKind.TIMEOUT,
]);

export interface ProviderFailureDetails {
    status?: number;
    retryAfterMs?: number;
    cause?: unknown;
}

/**
 * Outcome of a single failed request/response cycle. Providers classify their
 * own transport errors into one of these; the retry loop only looks at `transient`.
 */
export class ProviderFailure extends WordforgeError {
    public readonly status?: number;
    public readonly retryAfterMs?: number;

    constructor(public kind: FailureKind, message: string, details: ProviderFailureDetails = {}) {
        super(message, 'PROVIDER_FAILURE', { kind, status: details.status });
        this.status = details.status;
        this.retryAfterMs = details.retryAfterMs;
        if (details.cause !== undefined) {
            this.cause = details.cause;
        }
    }

    get transient(): boolean {
        return TRANSIENT_KINDS.has(this.kind);
    }
}

/** Retry ceiling (or wait budget) exhausted on transient failures. */
export class ProviderUnavailableError extends WordforgeError {
    constructor(public provider: string, public attempts: number, public lastFailure: ProviderFailure) {
        super(
            `${provider} unavailable after ${attempts} attempt(s): ${lastFailure.message}`,
            'PROVIDER_UNAVAILABLE',
            { provider, attempts, kind: lastFailure.kind }
        );
    }
}

/** Non-transient failure (auth, bad request, malformed response). Never retried. */
export class ProviderRejectedError extends WordforgeError {
    constructor(public provider: string, public attempts: number, public failure: ProviderFailure) {
        super(
            `${provider} rejected the request (${failure.kind}): ${failure.message}`,
            'PROVIDER_REJECTED',
            { provider, attempts, kind: failure.kind, status: failure.status }
        );
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
