import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, configFromEnv, resolveConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('configFromEnv', () => {
  it('reads nothing from an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });

  it('reads TERMEXPECT_* overrides', () => {
    expect(configFromEnv({
      TERMEXPECT_READ_SIZE: '64',
      TERMEXPECT_EXIT_TIMEOUT: '250',
      TERMEXPECT_COLS: '80',
      TERMEXPECT_ROWS: '24',
      TERMEXPECT_TERM: 'vt100',
      TERMEXPECT_ECHO: 'off',
    })).toEqual({
      readSize: 64,
      exitTimeout: 250,
      cols: 80,
      rows: 24,
      term: 'vt100',
      echo: false,
    });
  });

  it('treats any other echo value as on', () => {
    expect(configFromEnv({ TERMEXPECT_ECHO: 'yes' })).toEqual({ echo: true });
    expect(configFromEnv({ TERMEXPECT_ECHO: 'FALSE' })).toEqual({ echo: false });
  });

  it('rejects values that are not positive integers', () => {
    expect(() => configFromEnv({ TERMEXPECT_COLS: 'wide' })).toThrow(ConfigError);
    expect(() => configFromEnv({ TERMEXPECT_COLS: 'wide' })).toThrow(
      'TERMEXPECT_COLS must be a positive integer, got "wide"'
    );
    expect(() => configFromEnv({ TERMEXPECT_READ_SIZE: '1.5' })).toThrow(ConfigError);
    expect(() => configFromEnv({ TERMEXPECT_ROWS: '-3' })).toThrow(ConfigError);
  });
});

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      readSize: 1024,
      exitTimeout: 5000,
      cols: 120,
      rows: 30,
      term: 'xterm-256color',
      echo: true,
    });
  });

  it('lets options override the environment', () => {
    const config = resolveConfig({ cols: 100 }, { TERMEXPECT_COLS: '80', TERMEXPECT_ROWS: '24' });

    expect(config.cols).toBe(100);
    expect(config.rows).toBe(24);
  });

  it('skips options that are undefined', () => {
    const config = resolveConfig({ readSize: undefined }, { TERMEXPECT_READ_SIZE: '64' });
    expect(config.readSize).toBe(64);
  });

  it('validates explicit options', () => {
    expect(() => resolveConfig({ readSize: 0 }, {})).toThrow('readSize must be greater than zero, got 0');
    expect(() => resolveConfig({ exitTimeout: -1 }, {})).toThrow('exitTimeout cannot be negative, got -1');
  });

  it('does not modify the defaults', () => {
    resolveConfig({ cols: 10 }, {});
    expect(DEFAULT_CONFIG.cols).toBe(120);
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });
});
