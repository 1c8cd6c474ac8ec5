import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  exitCodeFor,
  parseIntOption,
  parseLogLevel,
  parseNumberOption,
} from '../../src/cli/options.js';
import { ConfigError, InputReadError, RegistryError } from '../../src/utils/errors.js';

describe('CLI options', () => {
  it('should parse numbers', () => {
    expect(parseNumberOption('25.5')).toBe(25.5);
    expect(() => parseNumberOption('')).toThrow(InvalidArgumentError);
    expect(() => parseNumberOption('abc')).toThrow('Not a number.');
  });

  it('should parse integers', () => {
    expect(parseIntOption('100')).toBe(100);
    expect(() => parseIntOption('1.5')).toThrow('Not an integer.');
  });

  it('should parse log levels', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(() => parseLogLevel('verbose')).toThrow(InvalidArgumentError);
  });

  it('should map errors to exit codes', () => {
    expect(exitCodeFor(new ConfigError('bad config'))).toBe(2);
    expect(exitCodeFor(new RegistryError('bad registry'))).toBe(2);
    expect(exitCodeFor(new InputReadError('bad input'))).toBe(1);
  });
});
