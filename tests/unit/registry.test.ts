import { describe, expect, it } from 'vitest';
import { Registry, RegistrySettings } from '../../src/core/registry';
import { DefaultRegistrySettings, createDefaultRegistry } from '../../src/core/registry/defaults';
import { PASSWORD_TYPE } from '../../src/core/generators/wordlist_types';
import { ConfigurationError, NotFoundError } from '../../src/utils/errors';
import { ScriptedProvider } from '../helpers/scripted_provider';

function settings(overrides: Partial<DefaultRegistrySettings> = {}): DefaultRegistrySettings {
  return {
    apiKeys: { openrouter: 'test-key', anthropic: 'test-key' },
    timeoutMs: 1000,
    temperature: 0.7,
    maxTokensCeiling: 4000,
    defaultProvider: 'openrouter',
    openRouter: { referer: 'http://localhost', appTitle: 'wordforge' },
    ...overrides,
  };
}

describe('createDefaultRegistry', () => {
  it('registers the four built-in types and providers', () => {
    const registry = createDefaultRegistry(settings());

    expect(registry.listWordlistTypes().map(type => type.id)).toEqual(['password', 'subdomain', 'directory', 'cloud-resource']);
    expect(registry.listProviders().map(provider => provider.id)).toEqual(['anthropic', 'openai', 'openrouter', 'custom']);
  });

  it('reports which providers have keys', () => {
    const configured = createDefaultRegistry(settings()).listProviders()
      .filter(provider => provider.configured)
      .map(provider => provider.id);
    expect(configured).toEqual(['anthropic', 'openrouter']);
  });

  it('resolves generators by type id', () => {
    const registry = createDefaultRegistry(settings());
    const generator = registry.resolveGenerator('directory');

    expect(generator.definition.defaultFilename).toBe('directory_wordlist.txt');
    expect(registry.resolveGenerator('directory')).toBe(generator);
  });

  it('lists known ids for unknown types and providers', () => {
    const registry = createDefaultRegistry(settings());

    expect(() => registry.resolveGenerator('usernames')).toThrow(NotFoundError);
    expect(() => registry.resolveGenerator('usernames'))
      .toThrow('Unknown wordlist type "usernames". Known: password, subdomain, directory, cloud-resource');
    expect(() => registry.resolveProvider('gemini')).toThrow('Unknown provider "gemini". Known: anthropic, openai, openrouter, custom');
  });
});

describe('Registry model resolution', () => {
  it('prefers the requested model', () => {
    const registry = createDefaultRegistry(settings({ modelPreferences: { anthropic: 'claude-3-5-haiku-20241022' } }));
    expect(registry.resolveModel('anthropic', 'claude-3-opus-20240229')).toBe('claude-3-opus-20240229');
  });

  it('falls back to the stored preference, then DEFAULT_MODEL, then the registration default', () => {
    const withPreference = createDefaultRegistry(settings({ modelPreferences: { anthropic: 'claude-3-5-haiku-20241022' } }));
    expect(withPreference.resolveModel('anthropic')).toBe('claude-3-5-haiku-20241022');

    const withDefaultModel = createDefaultRegistry(settings({ defaultModel: 'deepseek/deepseek-chat' }));
    expect(withDefaultModel.resolveModel('openrouter')).toBe('deepseek/deepseek-chat');
    // DEFAULT_MODEL only applies to the default provider
    expect(withDefaultModel.resolveModel('anthropic')).toBe('claude-sonnet-4-20250514');
  });

  it('rejects unknown models for strict providers only', () => {
    const registry = createDefaultRegistry(settings());

    expect(() => registry.resolveModel('openai', 'gpt-99')).toThrow(ConfigurationError);
    expect(registry.resolveModel('openrouter', 'mistralai/mistral-large')).toBe('mistralai/mistral-large');
  });
});

describe('Registry provider selection', () => {
  it('uses an explicit provider only when it has a key', () => {
    const registry = createDefaultRegistry(settings());

    expect(registry.selectProviderId('anthropic')).toBe('anthropic');
    expect(() => registry.selectProviderId('openai')).toThrow('No API key for OpenAI. Set OPENAI_API_KEY');
  });

  it('prefers the stored preference over DEFAULT_PROVIDER', () => {
    expect(createDefaultRegistry(settings({ preferredProvider: 'anthropic' })).selectProviderId()).toBe('anthropic');
    expect(createDefaultRegistry(settings()).selectProviderId()).toBe('openrouter');
  });

  it('falls back to the first configured provider', () => {
    const registry = createDefaultRegistry(settings({ apiKeys: { openai: 'test-key' }, preferredProvider: 'anthropic' }));
    expect(registry.selectProviderId()).toBe('openai');
  });

  it('fails when nothing is configured', () => {
    expect(() => createDefaultRegistry(settings({ apiKeys: {} })).selectProviderId()).toThrow(ConfigurationError);
  });

  it('builds clients with the resolved model and key', () => {
    const registry = createDefaultRegistry(settings());
    expect(registry.resolveProvider('openrouter', { model: 'openai/gpt-4o' }).identify())
      .toEqual({ provider: 'openrouter', model: 'openai/gpt-4o' });
    expect(() => registry.resolveProvider('openai')).toThrow(ConfigurationError);
    expect(registry.resolveProvider('openai', { apiKey: 'test-key' }).identify().model).toBe('gpt-4o-mini');
  });
});

describe('Registry registration', () => {
  const base: RegistrySettings = {
    apiKeys: { scripted: 'test-key' },
    timeoutMs: 1000,
    temperature: 0.7,
    maxTokensCeiling: 4000,
    defaultProvider: 'scripted',
  };

  it('rejects duplicate ids', () => {
    const registry = new Registry(base);
    registry.registerWordlistType(PASSWORD_TYPE);
    expect(() => registry.registerWordlistType(PASSWORD_TYPE)).toThrow('Wordlist type "password" is already registered');
  });

  it('rejects definitions without a filename or a predicate', () => {
    const registry = new Registry(base);
    expect(() => registry.registerWordlistType({ ...PASSWORD_TYPE, id: 'pins', defaultFilename: '' })).toThrow(ConfigurationError);

    const withoutPredicate: unknown = { ...PASSWORD_TYPE, id: 'pins', validate: undefined };
    expect(() => Reflect.apply(registry.registerWordlistType, registry, [withoutPredicate])).toThrow(ConfigurationError);
  });

  it('accepts custom providers', () => {
    const registry = new Registry(base);
    registry.registerProvider({
      id: 'scripted',
      displayName: 'Scripted',
      envVar: 'SCRIPTED_API_KEY',
      models: ['test-model'],
      defaultModel: 'test-model',
      acceptsAnyModel: false,
      create: options => new ScriptedProvider(['ok'], { provider: 'scripted', model: options.model }),
    });

    expect(registry.resolveProvider('scripted').identify()).toEqual({ provider: 'scripted', model: 'test-model' });
  });

  it('rejects a default model outside a strict model list', () => {
    const registry = new Registry(base);
    expect(() => registry.registerProvider({
      id: 'scripted',
      displayName: 'Scripted',
      envVar: 'SCRIPTED_API_KEY',
      models: ['a'],
      defaultModel: 'b',
      acceptsAnyModel: false,
      create: () => new ScriptedProvider(['ok']),
    })).toThrow(ConfigurationError);
  });
});
