import { z } from 'zod';
import { WordlistTypeDefinition } from '../../types';
import { Logger } from '../../utils/logger';
import { ConfigurationError, NotFoundError } from '../../utils/errors';
import { ProviderClient, ProviderOptions } from '../providers/provider';
import { WordlistGenerator } from '../generators/wordlist_generator';

export interface ProviderRegistration {
    id: string;
    displayName: string;
    /** Environment variable holding the API key, without the WORDFORGE_ prefix. */
    envVar: string;
    models: string[];
    defaultModel: string;
    /** Routers and self-hosted backends take model names we cannot enumerate. */
    acceptsAnyModel: boolean;
    create: (options: ProviderOptions) => ProviderClient;
}

export interface RegistrySettings {
    apiKeys: Partial<Record<string, string>>;
    timeoutMs: number;
    temperature: number;
    maxTokensCeiling: number;
    defaultProvider: string;
    defaultModel?: string;
    preferredProvider?: string;
    modelPreferences?: Partial<Record<string, string>>;
}

export interface ResolveProviderOptions {
    model?: string;
    apiKey?: string;
}

export interface ProviderSummary {
    id: string;
    displayName: string;
    envVar: string;
    models: string[];
    defaultModel: string;
    acceptsAnyModel: boolean;
    configured: boolean;
}

const WordlistTypeShape = z.object({
    id: z.string().regex(/^[a-z][a-z0-9-]*$/, 'id must be lowercase letters, digits and hyphens'),
    description: z.string(),
    validate: z.function(),
    defaultFilename: z.string().min(1),
    prompt: z.object({
        system: z.string(),
        template: z.function(),
    }),
    normalize: z.function().optional(),
});

const ProviderRegistrationShape = z.object({
    id: z.string().regex(/^[a-z][a-z0-9-]*$/, 'id must be lowercase letters, digits and hyphens'),
    displayName: z.string().min(1),
    envVar: z.string().regex(/^[A-Z][A-Z0-9_]*$/, 'envVar must be an upper-case variable name'),
    models: z.array(z.string().min(1)),
    defaultModel: z.string().min(1),
    acceptsAnyModel: z.boolean(),
    create: z.function(),
});

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || 'definition'}: ${issue.message}`).join('; ');
}

/**
 * 🗂️ REGISTRY
 *
 * Explicit, instance-scoped lookup of wordlist types and providers. Nothing is
 * registered at import time; `createDefaultRegistry()` does the built-ins.
 */
export class Registry {
    private readonly wordlistTypes = new Map<string, WordlistTypeDefinition>();
    private readonly generators = new Map<string, WordlistGenerator>();
    private readonly providers = new Map<string, ProviderRegistration>();

    constructor(private readonly settings: RegistrySettings) { }

    registerWordlistType(definition: WordlistTypeDefinition): void {
        const shape = WordlistTypeShape.safeParse(definition);
        if (!shape.success) {
            throw new ConfigurationError(`Invalid wordlist type registration: ${describeIssues(shape.error)}`);
        }
        if (this.wordlistTypes.has(definition.id)) {
            throw new ConfigurationError(`Wordlist type "${definition.id}" is already registered`);
        }
        this.wordlistTypes.set(definition.id, definition);
    }

    registerProvider(registration: ProviderRegistration): void {
        const shape = ProviderRegistrationShape.safeParse(registration);
        if (!shape.success) {
            throw new ConfigurationError(`Invalid provider registration: ${describeIssues(shape.error)}`);
        }
        if (this.providers.has(registration.id)) {
            throw new ConfigurationError(`Provider "${registration.id}" is already registered`);
        }
        if (!registration.acceptsAnyModel && !registration.models.includes(registration.defaultModel)) {
            throw new ConfigurationError(
                `Provider "${registration.id}" default model "${registration.defaultModel}" is not in its model list`
            );
        }
        this.providers.set(registration.id, registration);
    }

    listWordlistTypes(): WordlistTypeDefinition[] {
        return [...this.wordlistTypes.values()];
    }

    getWordlistType(typeId: string): WordlistTypeDefinition {
        const definition = this.wordlistTypes.get(typeId);
        if (!definition) {
            throw new NotFoundError('wordlist type', typeId, [...this.wordlistTypes.keys()]);
        }
        return definition;
    }

    resolveGenerator(typeId: string): WordlistGenerator {
        const cached = this.generators.get(typeId);
        if (cached) return cached;

        const generator = new WordlistGenerator(this.getWordlistType(typeId), {
            maxTokensCeiling: this.settings.maxTokensCeiling,
        });
        this.generators.set(typeId, generator);
        return generator;
    }

    getProvider(providerId: string): ProviderRegistration {
        const registration = this.providers.get(providerId);
        if (!registration) {
            throw new NotFoundError('provider', providerId, [...this.providers.keys()]);
        }
        return registration;
    }

    hasApiKey(providerId: string): boolean {
        return Boolean(this.settings.apiKeys[providerId]);
    }

    listProviders(): ProviderSummary[] {
        return [...this.providers.values()].map(registration => ({
            id: registration.id,
            displayName: registration.displayName,
            envVar: registration.envVar,
            models: registration.models,
            defaultModel: registration.defaultModel,
            acceptsAnyModel: registration.acceptsAnyModel,
            configured: this.hasApiKey(registration.id),
        }));
    }

    /**
     * Requested model, then the stored per-provider preference, then
     * DEFAULT_MODEL (default provider only), then the registration default.
     */
    resolveModel(providerId: string, requested?: string): string {
        const registration = this.getProvider(providerId);
        const model = requested?.trim()
            || this.settings.modelPreferences?.[providerId]
            || (providerId === this.settings.defaultProvider ? this.settings.defaultModel : undefined)
            || registration.defaultModel;

        if (!registration.acceptsAnyModel && !registration.models.includes(model)) {
            throw new ConfigurationError(
                `Unknown model "${model}" for ${registration.displayName}. Known: ${registration.models.join(', ')}`,
                { provider: providerId, model }
            );
        }
        return model;
    }

    /**
     * Provider to use when the caller did not name one (or named one explicitly,
     * in which case it must exist and have a key).
     */
    selectProviderId(explicit?: string): string {
        if (explicit) {
            const registration = this.getProvider(explicit);
            if (!this.hasApiKey(explicit)) throw this.missingKeyError(registration);
            return explicit;
        }

        const fallbacks = [this.settings.preferredProvider, this.settings.defaultProvider];
        for (const candidate of fallbacks) {
            if (candidate && this.providers.has(candidate) && this.hasApiKey(candidate)) return candidate;
        }

        const firstConfigured = [...this.providers.keys()].find(id => this.hasApiKey(id));
        if (firstConfigured) {
            Logger.debug(`[Registry] Falling back to first configured provider: ${firstConfigured}`);
            return firstConfigured;
        }

        throw new ConfigurationError(
            'No provider is configured. Set one of ' +
            [...this.providers.values()].map(registration => registration.envVar).join(', ') +
            ' or run: wordforge config --provider <id> --key <key>'
        );
    }

    resolveProvider(providerId: string, options: ResolveProviderOptions = {}): ProviderClient {
        const registration = this.getProvider(providerId);
        const model = this.resolveModel(providerId, options.model);
        const apiKey = options.apiKey ?? this.settings.apiKeys[providerId];
        if (!apiKey) throw this.missingKeyError(registration);

        Logger.debug(`[Registry] Using ${registration.displayName} (${model})`);
        return registration.create({
            apiKey,
            model,
            timeoutMs: this.settings.timeoutMs,
            temperature: this.settings.temperature,
        });
    }

    private missingKeyError(registration: ProviderRegistration): ConfigurationError {
        return new ConfigurationError(
            `No API key for ${registration.displayName}. Set ${registration.envVar} or run: ` +
            `wordforge config --provider ${registration.id} --key <key>`,
            { provider: registration.id }
        );
    }
}
