/**
 * Session configuration
 *
 * Defaults, overridden by TERMEXPECT_* environment variables, overridden by
 * explicit options.
 *
 * Environment:
 *   TERMEXPECT_READ_SIZE=1024     Max bytes taken from the transport per poll
 *   TERMEXPECT_EXIT_TIMEOUT=5000  How long waitForExit waits for an exit status (ms)
 *   TERMEXPECT_COLS=120           Pseudo-terminal width
 *   TERMEXPECT_ROWS=30            Pseudo-terminal height
 *   TERMEXPECT_TERM=xterm-256color
 *   TERMEXPECT_ECHO=0             Disable echo of consumed output by default
 */

import { ConfigError } from './errors.js';

export interface SessionConfig {
  /** Max bytes read from the transport per poll */
  readSize: number;
  /** How long waitForExit waits for an exit status after output ends (ms) */
  exitTimeout: number;
  /** Pseudo-terminal columns */
  cols: number;
  /** Pseudo-terminal rows */
  rows: number;
  /** TERM name announced to the program */
  term: string;
  /** Echo consumed output during expect by default */
  echo: boolean;
}

export const DEFAULT_CONFIG: Readonly<SessionConfig> = Object.freeze({
  readSize: 1024,
  exitTimeout: 5000,
  cols: 120,
  rows: 30,
  term: 'xterm-256color',
  echo: true,
});

function positiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(
      `${name} must be a positive integer, got "${raw}"`,
      `Unset ${name} or give it a whole number greater than zero`
    );
  }
  return value;
}

function flag(raw: string): boolean {
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

/**
 * Read TERMEXPECT_* overrides from an environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SessionConfig> {
  const config: Partial<SessionConfig> = {};

  if (env.TERMEXPECT_READ_SIZE) config.readSize = positiveInt('TERMEXPECT_READ_SIZE', env.TERMEXPECT_READ_SIZE);
  if (env.TERMEXPECT_EXIT_TIMEOUT) config.exitTimeout = positiveInt('TERMEXPECT_EXIT_TIMEOUT', env.TERMEXPECT_EXIT_TIMEOUT);
  if (env.TERMEXPECT_COLS) config.cols = positiveInt('TERMEXPECT_COLS', env.TERMEXPECT_COLS);
  if (env.TERMEXPECT_ROWS) config.rows = positiveInt('TERMEXPECT_ROWS', env.TERMEXPECT_ROWS);
  if (env.TERMEXPECT_TERM) config.term = env.TERMEXPECT_TERM;
  if (env.TERMEXPECT_ECHO) config.echo = flag(env.TERMEXPECT_ECHO);

  return config;
}

/**
 * Merge defaults, environment and explicit options
 */
export function resolveConfig(
  options: Partial<SessionConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  const config: SessionConfig = {
    ...DEFAULT_CONFIG,
    ...configFromEnv(env),
  };

  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  if (config.readSize <= 0) {
    throw new ConfigError(`readSize must be greater than zero, got ${config.readSize}`);
  }
  if (config.exitTimeout < 0) {
    throw new ConfigError(`exitTimeout cannot be negative, got ${config.exitTimeout}`);
  }

  return config;
}
