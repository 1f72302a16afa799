import { describe, expect, it } from 'vitest';
import { GenerationState, WordlistGenerator } from '../../src/core/generators/wordlist_generator';
import { DIRECTORY_TYPE, PASSWORD_TYPE, SUBDOMAIN_TYPE } from '../../src/core/generators/wordlist_types';
import { estimateMaxTokens } from '../../src/core/providers/retry';
import { FailureKind, InvalidRequestError, ProviderFailure, ProviderRejectedError } from '../../src/utils/errors';
import { ScriptedProvider, noSleep } from '../helpers/scripted_provider';

describe('WordlistGenerator.processCompletion', () => {
  it('lowercases, validates and dedupes subdomain candidates in first-seen order', () => {
    const generator = new WordlistGenerator(SUBDOMAIN_TYPE);
    const raw = 'acme-api\nStaging_DB\nacme-dev\nacme-api\napi--test\n-badstart\n';

    const processed = generator.processCompletion(raw, 5);

    expect(processed.words).toEqual(['acme-api', 'acme-dev']);
    expect(processed.candidateCount).toBe(6);
    expect(processed.rejectedCount).toBe(3);
    expect(processed.duplicateCount).toBe(1);
    expect(processed.truncatedCount).toBe(0);
  });

  it('drops short and duplicate password base words', () => {
    const generator = new WordlistGenerator(PASSWORD_TYPE);
    const processed = generator.processCompletion('ab\nabcd1234\nvalidword\nvalidword', 10);
    expect(processed.words).toEqual(['abcd1234', 'validword']);
  });

  it('keeps password case as given', () => {
    const generator = new WordlistGenerator(PASSWORD_TYPE);
    expect(generator.processCompletion('Chicago\nchicago', 10).words).toEqual(['Chicago', 'chicago']);
  });

  it('truncates to the target length keeping the first words', () => {
    const generator = new WordlistGenerator(PASSWORD_TYPE);
    const processed = generator.processCompletion('one1\ntwo2\nthree3\nfour4', 2);
    expect(processed.words).toEqual(['one1', 'two2']);
    expect(processed.truncatedCount).toBe(2);
  });

  it('is idempotent on its own output', () => {
    const generator = new WordlistGenerator(DIRECTORY_TYPE);
    const raw = '```\n/admin\nadmin\nwp-admin\n../secret\nbackup.zip\n- api/v1\n```';

    const first = generator.processCompletion(raw, 10);
    const second = generator.processCompletion(first.words.join('\n'), 10);

    expect(first.words).toEqual(['admin', 'wp-admin', 'backup.zip', 'api/v1']);
    expect(second.words).toEqual(first.words);
  });
});

describe('WordlistGenerator prompts', () => {
  it('renders seeds, target length and extra instructions', () => {
    const generator = new WordlistGenerator(SUBDOMAIN_TYPE);
    const prompt = generator.buildPrompt({
      wordlistType: 'subdomain',
      seeds: ['acme', 'fintech'],
      targetLength: 50,
      extraInstructions: 'focus on EU regions',
    });

    expect(prompt).toContain('Given these seed words about the organization: acme, fintech');
    expect(prompt).toContain('Generate 50 likely subdomain labels for this organization.');
    expect(prompt).toContain('Output exactly 50 subdomain labels');
    expect(prompt.endsWith('\n\nAdditional instructions: focus on EU regions')).toBe(true);
  });

  it('previews without a provider, trimming seeds', () => {
    const generator = new WordlistGenerator(SUBDOMAIN_TYPE);
    const preview = generator.preview({ wordlistType: 'subdomain', seeds: ['  acme ', ''], targetLength: 50 });

    expect(preview.wordlistType).toBe('subdomain');
    expect(preview.system).toBe(SUBDOMAIN_TYPE.prompt.system);
    expect(preview.prompt).toContain('Given these seed words about the organization: acme\n');
    expect(preview.prompt).not.toContain('Additional instructions');
    expect(preview.maxTokens).toBe(estimateMaxTokens(preview.prompt, 50));
  });

  it('caps the token estimate at the configured ceiling', () => {
    const generator = new WordlistGenerator(PASSWORD_TYPE, { maxTokensCeiling: 500 });
    const preview = generator.preview({ wordlistType: 'password', seeds: ['fluffy'], targetLength: 1000 });
    expect(preview.maxTokens).toBe(500);
  });
});

describe('WordlistGenerator request validation', () => {
  const generator = new WordlistGenerator(PASSWORD_TYPE);

  it('rejects seed sets with no usable seeds', () => {
    expect(() => generator.preview({ wordlistType: 'password', seeds: ['  ', ''], targetLength: 10 }))
      .toThrow(InvalidRequestError);
  });

  it('rejects non-positive and fractional target lengths', () => {
    expect(() => generator.preview({ wordlistType: 'password', seeds: ['a'], targetLength: 0 }))
      .toThrow(InvalidRequestError);
    expect(() => generator.preview({ wordlistType: 'password', seeds: ['a'], targetLength: 2.5 }))
      .toThrow(InvalidRequestError);
  });

  it('rejects requests for another wordlist type', () => {
    expect(() => generator.preview({ wordlistType: 'subdomain', seeds: ['a'], targetLength: 10 }))
      .toThrow('Request for "subdomain" sent to the password generator');
  });
});

describe('WordlistGenerator.generate', () => {
  it('returns a filtered result with provider identity and attempt count', async () => {
    const generator = new WordlistGenerator(SUBDOMAIN_TYPE);
    const provider = new ScriptedProvider(['api\nDev\ndev\nmail']);
    const states: GenerationState[] = [];

    const result = await generator.generate(
      { wordlistType: 'subdomain', seeds: ['acme'], targetLength: 3 },
      provider,
      { sleep: noSleep, onStateChange: state => states.push(state) }
    );

    expect(result.words).toEqual(['api', 'dev', 'mail']);
    expect(result.actualCount).toBe(3);
    expect(result.duplicateCount).toBe(1);
    expect(result.exhausted).toBe(false);
    expect(result.provider).toBe('scripted');
    expect(result.model).toBe('test-model');
    expect(result.attempts).toBe(1);
    expect(result.seeds).toEqual(['acme']);
    expect(states).toEqual([
      GenerationState.BUILDING_PROMPT,
      GenerationState.AWAITING_COMPLETION,
      GenerationState.PARSING,
      GenerationState.VALIDATING,
      GenerationState.SIZING,
      GenerationState.DONE,
    ]);
  });

  it('sends the type system prompt and the estimated token budget', async () => {
    const generator = new WordlistGenerator(PASSWORD_TYPE);
    const provider = new ScriptedProvider(['fluffy']);
    const request = { wordlistType: 'password', seeds: ['fluffy'], targetLength: 20 };

    await generator.generate(request, provider, { sleep: noSleep });

    const prompt = generator.buildPrompt(request);
    expect(provider.calls).toEqual([
      { prompt, maxTokens: estimateMaxTokens(prompt, 20), system: PASSWORD_TYPE.prompt.system },
    ]);
  });

  it('flags a short list as exhausted instead of failing', async () => {
    const generator = new WordlistGenerator(PASSWORD_TYPE);
    const result = await generator.generate(
      { wordlistType: 'password', seeds: ['fluffy'], targetLength: 5 },
      new ScriptedProvider(['fluffy\nx\nfluffy']),
      { sleep: noSleep }
    );

    expect(result.words).toEqual(['fluffy']);
    expect(result.exhausted).toBe(true);
    expect(result.rejectedCount).toBe(1);
  });

  it('moves to FAILED and surfaces rejected requests', async () => {
    const generator = new WordlistGenerator(PASSWORD_TYPE);
    const provider = new ScriptedProvider([new ProviderFailure(FailureKind.AUTH, 'API 401: invalid key', { status: 401 })]);
    const states: GenerationState[] = [];

    await expect(generator.generate(
      { wordlistType: 'password', seeds: ['fluffy'], targetLength: 5 },
      provider,
      { sleep: noSleep, onStateChange: state => states.push(state) }
    )).rejects.toBeInstanceOf(ProviderRejectedError);

    expect(states).toEqual([
      GenerationState.BUILDING_PROMPT,
      GenerationState.AWAITING_COMPLETION,
      GenerationState.FAILED,
    ]);
    expect(provider.calls).toHaveLength(1);
  });
});
