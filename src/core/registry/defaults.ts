import { AppConfig, PROVIDER_KEY_VARS } from '../../config';
import { Preferences, preferredModel } from '../../config/preferences';
import { AnthropicProvider, ANTHROPIC_MODELS } from '../providers/anthropic_provider';
import {
    CustomProvider,
    OpenAIProvider,
    OpenRouterProvider,
    OPENAI_MODELS,
    OPENROUTER_MODELS,
} from '../providers/openai_compatible_provider';
import { BUILT_IN_WORDLIST_TYPES } from '../generators/wordlist_types';
import { Registry, RegistrySettings } from './index';

export interface DefaultRegistrySettings extends RegistrySettings {
    customApiUrl?: string;
    openRouter: {
        referer: string;
        appTitle: string;
    };
}

export function settingsFromConfig(config: AppConfig, preferences?: Preferences): DefaultRegistrySettings {
    const modelPreferences: Partial<Record<string, string>> = {};
    if (preferences) {
        for (const provider of Object.keys(PROVIDER_KEY_VARS)) {
            const model = preferredModel(preferences, provider);
            if (model) modelPreferences[provider] = model;
        }
    }

    return {
        apiKeys: config.apiKeys,
        timeoutMs: config.llm.timeoutMs,
        temperature: config.llm.temperature,
        maxTokensCeiling: config.llm.maxTokens,
        defaultProvider: config.defaultProvider,
        defaultModel: config.defaultModel,
        preferredProvider: preferences?.default_provider,
        modelPreferences,
        customApiUrl: config.customApiUrl,
        openRouter: config.openRouter,
    };
}

/**
 * Registers the four built-in wordlist types and providers.
 */
export function createDefaultRegistry(settings: DefaultRegistrySettings): Registry {
    const registry = new Registry(settings);

    for (const definition of BUILT_IN_WORDLIST_TYPES) {
        registry.registerWordlistType(definition);
    }

    registry.registerProvider({
        id: 'anthropic',
        displayName: 'Anthropic',
        envVar: PROVIDER_KEY_VARS.anthropic,
        models: ANTHROPIC_MODELS,
        defaultModel: 'claude-sonnet-4-20250514',
        acceptsAnyModel: false,
        create: options => new AnthropicProvider(options),
    });

    registry.registerProvider({
        id: 'openai',
        displayName: 'OpenAI',
        envVar: PROVIDER_KEY_VARS.openai,
        models: OPENAI_MODELS,
        defaultModel: 'gpt-4o-mini',
        acceptsAnyModel: false,
        create: options => new OpenAIProvider(options),
    });

    registry.registerProvider({
        id: 'openrouter',
        displayName: 'OpenRouter',
        envVar: PROVIDER_KEY_VARS.openrouter,
        models: OPENROUTER_MODELS,
        defaultModel: 'anthropic/claude-sonnet-4',
        acceptsAnyModel: true,
        create: options => new OpenRouterProvider({
            ...options,
            headers: {
                'HTTP-Referer': settings.openRouter.referer,
                'X-Title': settings.openRouter.appTitle,
            },
        }),
    });

    registry.registerProvider({
        id: 'custom',
        displayName: 'Custom (OpenAI-compatible)',
        envVar: PROVIDER_KEY_VARS.custom,
        models: [],
        defaultModel: 'default',
        acceptsAnyModel: true,
        create: options => new CustomProvider({ ...options, baseUrl: settings.customApiUrl }),
    });

    return registry;
}
