/**
 * Scripted interactions for the CLI: argument parsing and the
 * expect/send step runner.
 */

import { END_OF_STREAM } from './types.js';
import type { ExpectSession } from './expect.js';
import { ConfigError } from './errors.js';

export const VERSION = '0.1.0';

export const HELP = `
termexpect - expect-style automation for terminal programs

Usage:
  termexpect [options] <command> [args...]

Options:
  --expect <regex>          Wait for output matching <regex> (repeatable)
  --send <text>             Send <text> followed by a newline (repeatable)
  --remote <user@host[:port]>
                            Run the command over SSH instead of locally
  -q, --quiet               Do not echo the program's output
  -h, --help                Show this help
  -v, --version             Show version

Steps run in the order given. After the last step the program's remaining
output is forwarded until it exits, and termexpect exits with its status.

Examples:
  termexpect --expect 'Password: ' --send test-secret passwd
  termexpect --remote deploy@web-01 --expect '\\$ ' --send 'exit' bash

Environment:
  TERMEXPECT_SSH_PASSWORD   Password for --remote
  TERMEXPECT_SSH_KEY        Private key file for --remote
  TERMEXPECT_DEBUG=1        Enable debug logging to stderr
  TERMEXPECT_LOG_LEVEL      debug | info | warn | error | silent
`;

export type ScriptStep =
  | { kind: 'expect'; pattern: RegExp }
  | { kind: 'send'; text: string };

export interface RemoteTarget {
  username: string;
  host: string;
  port: number;
}

export interface CliOptions {
  command: string;
  args: string[];
  steps: ScriptStep[];
  remote: RemoteTarget | null;
  quiet: boolean;
  help: boolean;
  version: boolean;
}

/**
 * `user@host` or `user@host:port`
 */
export function parseRemote(target: string): RemoteTarget {
  const match = /^([^@\s]+)@([^:\s]+)(?::(\d+))?$/.exec(target);
  if (!match) {
    throw new ConfigError(`Invalid remote "${target}"`, 'Use user@host or user@host:port');
  }
  const port = match[3] === undefined ? 22 : Number(match[3]);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`Invalid port in "${target}"`);
  }
  return { username: match[1], host: match[2], port };
}

function compileStep(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new ConfigError(`Invalid --expect pattern "${source}": ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Parse argv (without the node and script entries). Options end at the
 * first argument that is not an option; the rest is the command.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    command: '',
    args: [],
    steps: [],
    remote: null,
    quiet: false,
    help: argv.length === 0,
    version: false,
  };

  const value = (i: number, flag: string): string => {
    const next = argv[i + 1];
    if (next === undefined) {
      throw new ConfigError(`${flag} needs a value`);
    }
    return next;
  };

  let i = 0;
  for (; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-v') {
      options.version = true;
    } else if (arg === '--quiet' || arg === '-q') {
      options.quiet = true;
    } else if (arg === '--expect') {
      options.steps.push({ kind: 'expect', pattern: compileStep(value(i, arg)) });
      i++;
    } else if (arg === '--send') {
      options.steps.push({ kind: 'send', text: value(i, arg) });
      i++;
    } else if (arg === '--remote') {
      options.remote = parseRemote(value(i, arg));
      i++;
    } else if (arg === '--') {
      i++;
      break;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${arg}`, 'Run termexpect --help for usage');
    } else {
      break;
    }
  }

  const [command = '', ...args] = argv.slice(i);
  options.command = command;
  options.args = args;

  if (!command && !options.help && !options.version) {
    throw new ConfigError('No command specified', 'Run termexpect --help for usage');
  }

  return options;
}

/**
 * Run the steps, then forward output until the program exits. Resolves with
 * its exit status; an expect step that hits the end of the stream rejects
 * with UnexpectedEndOfStreamError.
 */
export async function runScript(
  session: ExpectSession,
  steps: readonly ScriptStep[],
  options: { quiet?: boolean } = {}
): Promise<number> {
  const echo = !options.quiet;

  for (const step of steps) {
    if (step.kind === 'expect') {
      await session.expect(step.pattern, { echo });
    } else {
      session.send(step.text);
    }
  }

  await session.expect(END_OF_STREAM, { echo });
  return session.waitForExit(echo ? undefined : () => {});
}
