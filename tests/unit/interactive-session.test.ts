import * as path from 'path';
import { PassThrough, Writable } from 'stream';
import { describe, expect, it } from 'vitest';
import { createDefaultRegistry } from '../../src/core/registry/defaults';
import { InteractiveSession, parseYesNo, pickFromList } from '../../src/interactive_session';

function registryWithKeys(apiKeys: Partial<Record<string, string>>) {
  return createDefaultRegistry({
    apiKeys,
    timeoutMs: 1000,
    temperature: 0.7,
    maxTokensCeiling: 4000,
    defaultProvider: 'openrouter',
    openRouter: { referer: 'http://localhost', appTitle: 'wordforge' },
  });
}

/** Feeds the answers line by line and collects everything the session prints. */
function terminal(answers: string[]) {
  const input = new PassThrough();
  input.end(answers.map(answer => `${answer}\n`).join(''));

  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { input, output, text: () => chunks.join('') };
}

const defaults = (append = false) => ({
  targetLength: 100,
  append,
  outputPathFor: (filename: string) => path.join('/lists', filename),
});

describe('InteractiveSession', () => {
  it('collects a complete plan step by step', async () => {
    const io = terminal([
      'subdomain',
      '',
      'acme',
      'portal',
      '',
      '50',
      'focus on staging',
      '',
      '',
      '2',
      'mistralai/mixtral-8x7b',
      '',
    ]);
    const session = new InteractiveSession(registryWithKeys({ openai: 'test-key', openrouter: 'test-key' }), io, defaults());

    await expect(session.run()).resolves.toEqual({
      wordlistType: 'subdomain',
      seeds: ['acme', 'portal'],
      targetLength: 50,
      extraInstructions: 'focus on staging',
      outputPath: path.join('/lists', 'subdomain_wordlist.txt'),
      append: false,
      providerId: 'openrouter',
      model: 'mistralai/mixtral-8x7b',
    });

    const text = io.text();
    expect(text).toContain(`  2) ${'subdomain'.padEnd(16)} Subdomain labels for DNS enumeration\n`);
    expect(text).toContain('Please enter at least one seed word\n');
    expect(text).toContain('  ✓ Added: portal\n');
    expect(text).toContain('  2) OpenRouter (default)\n');
    expect(text).toContain('  Seeds:    acme, portal\n');
  });

  it('skips the provider menu when only one provider has a key and keeps defaults on Enter', async () => {
    const io = terminal(['1', 'acme', '', '', '', '', '', '', '']);
    const session = new InteractiveSession(registryWithKeys({ openai: 'test-key' }), io, defaults(true));

    await expect(session.run()).resolves.toEqual({
      wordlistType: 'password',
      seeds: ['acme'],
      targetLength: 100,
      extraInstructions: undefined,
      outputPath: path.join('/lists', 'password_base_wordlist.txt'),
      append: true,
      providerId: 'openai',
      model: 'gpt-4o-mini',
    });
    expect(io.text()).not.toContain('Select provider:');
    expect(io.text()).toContain('Append to file? [Y/n]: ');
    expect(io.text()).toContain('  2) gpt-4o-mini (default)\n');
  });

  it('returns nothing when the user declines the summary', async () => {
    const io = terminal(['1', 'acme', '', '', '', '', '', '', 'n']);
    const session = new InteractiveSession(registryWithKeys({ openai: 'test-key' }), io, defaults());

    await expect(session.run()).resolves.toBeUndefined();
    expect(io.text()).toContain('Cancelled.\n');
  });

  it('returns nothing on an invalid type choice', async () => {
    const io = terminal(['9']);
    const session = new InteractiveSession(registryWithKeys({ openai: 'test-key' }), io, defaults());

    await expect(session.run()).resolves.toBeUndefined();
    expect(io.text()).toContain('Invalid choice\n');
  });

  it('returns nothing when input ends mid-session', async () => {
    const io = terminal(['password', 'acme']);
    const session = new InteractiveSession(registryWithKeys({ openai: 'test-key' }), io, defaults());

    await expect(session.run()).resolves.toBeUndefined();
  });

  it('stops before choosing a provider when no key is configured', async () => {
    const io = terminal(['1', 'acme', '', '', '', '', '']);
    const session = new InteractiveSession(registryWithKeys({}), io, defaults());

    await expect(session.run()).resolves.toBeUndefined();
    expect(io.text()).toContain('No provider has an API key. Run: wordforge config --provider <id> --key <key>\n');
  });
});

describe('session helpers', () => {
  it('picks by 1-based number or by id', () => {
    const ids = ['password', 'subdomain'];
    expect(pickFromList(ids, '2')).toBe('subdomain');
    expect(pickFromList(ids, 'password')).toBe('password');
    expect(pickFromList(ids, '0')).toBeUndefined();
    expect(pickFromList(ids, '3')).toBeUndefined();
    expect(pickFromList(ids, 'dns')).toBeUndefined();
  });

  it('reads yes and no answers with a fallback', () => {
    expect(parseYesNo('Y', false)).toBe(true);
    expect(parseYesNo('no', true)).toBe(false);
    expect(parseYesNo('', true)).toBe(true);
    expect(parseYesNo('maybe', false)).toBe(false);
  });
});
