import { describe, expect, it } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { buildProgram, maskKey, parseNonNegativeNumber, parsePositiveInt, splitSeedArgs } from '../../src/cli';

describe('CLI argument helpers', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('25')).toBe(25);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('ten')).toThrow(InvalidArgumentError);
  });

  it('parses non-negative rates', () => {
    expect(parseNonNegativeNumber('0')).toBe(0);
    expect(parseNonNegativeNumber('1.5')).toBe(1.5);
    expect(() => parseNonNegativeNumber('-1')).toThrow(InvalidArgumentError);
  });

  it('splits seed arguments on commas and keeps multi-word seeds', () => {
    expect(splitSeedArgs(['acme', 'new york', 'api,dev', ' , '])).toEqual(['acme', 'new york', 'api', 'dev']);
  });

  it('masks API keys', () => {
    expect(maskKey('test-key')).toBe('********');
    expect(maskKey('test-key-123456')).toBe('test...3456');
  });
});

describe('buildProgram', () => {
  it('registers every command', () => {
    expect(buildProgram().commands.map(command => command.name())).toEqual(['generate', 'batch', 'types', 'providers', 'config']);
  });

  it('tells users to give the type before the variadic seed list', () => {
    const generate = buildProgram().commands.find(command => command.name() === 'generate');
    expect(generate?.registeredArguments[0].description).toBe('wordlist type (see: wordforge types); give it before -s');
    expect(generate?.options.find(option => option.long === '--seeds')?.description).toBe(
      'seed words, space or comma separated; takes every word up to the next option'
    );
  });
});
