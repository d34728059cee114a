// packages/game-core/src/__tests__/config.test.ts
//
// Unit tests for loadConfig(): defaults, environment overrides, .env files
// and validation failures.

import { loadConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { errorCode, fixture } from './helpers.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({ env: {} })).toEqual({
      debug: false,
      dictionaryPath: undefined,
      logLevel: 'info',
    });
  });

  it('reads every variable from the environment', () => {
    const config = loadConfig({
      env: {
        WORDMASTER_DEBUG: 'true',
        WORDMASTER_DICTIONARY: '/srv/words.json',
        LOG_LEVEL: 'debug',
      },
    });
    expect(config).toEqual({
      debug: true,
      dictionaryPath: '/srv/words.json',
      logLevel: 'debug',
    });
  });

  it('accepts 0/1 for the debug flag', () => {
    expect(loadConfig({ env: { WORDMASTER_DEBUG: '1' } }).debug).toBe(true);
    expect(loadConfig({ env: { WORDMASTER_DEBUG: '0' } }).debug).toBe(false);
  });

  it('ignores unrelated and unset variables', () => {
    const config = loadConfig({ env: { HOME: '/root', LOG_LEVEL: undefined } });
    expect(config.logLevel).toBe('info');
  });

  it('rejects an unknown log level', () => {
    const load = () => loadConfig({ env: { LOG_LEVEL: 'loud' } });
    expect(load).toThrow(InvalidArgumentError);
    expect(errorCode(load)).toBe('INVALID_CONFIG');
  });

  it('rejects a malformed debug flag', () => {
    expect(errorCode(() => loadConfig({ env: { WORDMASTER_DEBUG: 'yes' } }))).toBe(
      'INVALID_CONFIG',
    );
  });

  it('reads a .env file', () => {
    expect(loadConfig({ env: {}, envFile: fixture('test.env') })).toEqual({
      debug: true,
      dictionaryPath: './words.json',
      logLevel: 'warn',
    });
  });

  it('lets the environment win over the .env file', () => {
    const config = loadConfig({ env: { LOG_LEVEL: 'error' }, envFile: fixture('test.env') });
    expect(config.logLevel).toBe('error');
    expect(config.debug).toBe(true);
  });

  it('fails when the .env file is missing', () => {
    expect(errorCode(() => loadConfig({ env: {}, envFile: fixture('missing.env') }))).toBe(
      'INVALID_CONFIG',
    );
  });
});
