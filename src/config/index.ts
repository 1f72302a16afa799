/**
 * 🔒 ENVIRONMENT CONFIGURATION
 * Centralized .env parsing with zod. Invalid values stop the CLI before any
 * provider is contacted.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';
import { LogLevel } from '../utils/logger';
import { RetryPolicy } from '../core/providers/retry';

export const PROVIDER_KEY_VARS = {
    anthropic: 'ANTHROPIC_API_KEY',
    openai: 'OPENAI_API_KEY',
    openrouter: 'OPENROUTER_API_KEY',
    custom: 'CUSTOM_API_KEY',
} as const;

export type BuiltInProviderId = keyof typeof PROVIDER_KEY_VARS;

export const ENV_PREFIX = 'WORDFORGE_';

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

/**
 * 📋 CONFIG SCHEMA
 */
const ConfigSchema = z.object({
    // 🔌 Providers
    CUSTOM_API_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    DEFAULT_PROVIDER: z.preprocess(blankToUndefined, z.string().trim().toLowerCase().default('openrouter')),
    DEFAULT_MODEL: optionalString,
    OPENROUTER_REFERER: z.preprocess(blankToUndefined, z.string().default('http://localhost')),
    OPENROUTER_APP_TITLE: z.preprocess(blankToUndefined, z.string().default('wordforge')),

    // 🧠 LLM request settings
    DEFAULT_WORDLIST_LENGTH: z.coerce.number().int().min(1).max(10000).default(100),
    LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600000).default(30000),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_MAX_TOKENS: z.coerce.number().int().min(100).max(200000).default(4000),

    // 🔁 Retry
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
    LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).max(60000).default(1000),
    LLM_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).max(300000).default(30000),
    LLM_RETRY_MAX_TOTAL_WAIT_MS: z.coerce.number().int().min(0).max(3600000).default(60000),

    // 📦 Batch
    BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(5),
    BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(1),
    REQUESTS_PER_MINUTE: z.coerce.number().min(0).max(100000).default(0),

    // 🏷️ Service identity
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    SERVICE_NAME: z.string().default('wordforge'),
    WORDFORGE_HOME: optionalString,
});

export interface AppConfig {
    apiKeys: Partial<Record<string, string>>;
    customApiUrl?: string;
    defaultProvider: string;
    defaultModel?: string;
    defaultWordlistLength: number;
    llm: {
        timeoutMs: number;
        temperature: number;
        maxTokens: number;
    };
    retry: RetryPolicy;
    batch: {
        size: number;
        concurrency: number;
        requestsPerMinute: number;
    };
    openRouter: {
        referer: string;
        appTitle: string;
    };
    logging: {
        level: LogLevel;
        pretty: boolean;
        serviceName: string;
    };
    nodeEnv: 'development' | 'production' | 'test';
    configDir: string;
}

export type Env = Record<string, string | undefined>;

/**
 * A provider key may be given plain (OPENAI_API_KEY) or namespaced
 * (WORDFORGE_OPENAI_API_KEY); the namespaced form wins.
 */
export function getApiKey(env: Env, envVar: string): string | undefined {
    const value = env[`${ENV_PREFIX}${envVar}`] ?? env[envVar];
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function resolveConfigDir(env: Env = process.env): string {
    const override = env.WORDFORGE_HOME?.trim();
    return override ? path.resolve(override) : path.join(os.homedir(), '.wordforge');
}

/**
 * Loads `.env` from the working directory, then `~/.wordforge/.env`. Values
 * already in the environment are never overwritten, so the first source wins.
 */
export function loadEnvFiles(env: Env = process.env): string[] {
    const candidates = [path.resolve(process.cwd(), '.env'), path.join(resolveConfigDir(env), '.env')];
    const loaded: string[] = [];
    for (const file of candidates) {
        const result = dotenv.config({ path: file });
        if (!result.error) loaded.push(file);
    }
    return loaded;
}

/**
 * 🚀 Parse and validate an environment into an AppConfig.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const result = ConfigSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration:\n  • ${issues.join('\n  • ')}`, { issues });
    }

    const data = result.data;
    const apiKeys: Partial<Record<string, string>> = {};
    for (const [provider, envVar] of Object.entries(PROVIDER_KEY_VARS)) {
        const key = getApiKey(env, envVar);
        if (key) apiKeys[provider] = key;
    }

    return {
        apiKeys,
        customApiUrl: data.CUSTOM_API_URL,
        defaultProvider: data.DEFAULT_PROVIDER,
        defaultModel: data.DEFAULT_MODEL,
        defaultWordlistLength: data.DEFAULT_WORDLIST_LENGTH,
        llm: {
            timeoutMs: data.LLM_TIMEOUT_MS,
            temperature: data.LLM_TEMPERATURE,
            maxTokens: data.LLM_MAX_TOKENS,
        },
        retry: {
            maxRetries: data.LLM_MAX_RETRIES,
            baseDelayMs: data.LLM_RETRY_BASE_DELAY_MS,
            maxDelayMs: data.LLM_RETRY_MAX_DELAY_MS,
            maxTotalWaitMs: data.LLM_RETRY_MAX_TOTAL_WAIT_MS,
        },
        batch: {
            size: data.BATCH_SIZE,
            concurrency: data.BATCH_CONCURRENCY,
            requestsPerMinute: data.REQUESTS_PER_MINUTE,
        },
        openRouter: {
            referer: data.OPENROUTER_REFERER,
            appTitle: data.OPENROUTER_APP_TITLE,
        },
        logging: {
            level: data.LOG_LEVEL,
            pretty: data.NODE_ENV !== 'production',
            serviceName: data.SERVICE_NAME,
        },
        nodeEnv: data.NODE_ENV,
        configDir: resolveConfigDir(env),
    };
}
