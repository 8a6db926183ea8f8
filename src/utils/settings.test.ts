import { describe, it, expect } from 'vitest';
import { resolveLogLevel, LOG_LEVEL_ENV } from './settings.js';

describe('resolveLogLevel', () => {
  it('defaults to warn', () => {
    expect(resolveLogLevel({}, {})).toBe('warn');
  });

  it('uses --verbose as debug', () => {
    expect(resolveLogLevel({ verbose: true }, {})).toBe('debug');
  });

  it('prefers the environment variable over --verbose', () => {
    expect(resolveLogLevel({ verbose: true }, { [LOG_LEVEL_ENV]: 'error' })).toBe('error');
  });

  it('reads the environment variable case-insensitively', () => {
    expect(resolveLogLevel({}, { [LOG_LEVEL_ENV]: 'INFO' })).toBe('info');
  });

  it('prefers --log-level over everything else', () => {
    expect(resolveLogLevel({ logLevel: 'info', verbose: true }, { [LOG_LEVEL_ENV]: 'error' })).toBe('info');
  });

  it('ignores unknown values', () => {
    expect(resolveLogLevel({ logLevel: 'loud' }, { [LOG_LEVEL_ENV]: 'chatty' })).toBe('warn');
  });
});
