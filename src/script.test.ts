/**
 * CLI script Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { parseCliArgs, parseRemote, runScript, HELP, VERSION } from './script.js';
import { ConfigError, UnexpectedEndOfStreamError } from './errors.js';
import { ExpectSession } from './expect.js';
import { MemoryTransport } from './transports.js';

describe('parseCliArgs', () => {
  it('shows help with no arguments', () => {
    const options = parseCliArgs([]);
    expect(options.help).toBe(true);
    expect(options.command).toBe('');
  });

  it('parses help and version flags', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--version']).version).toBe(true);
  });

  it('collects steps in order', () => {
    const options = parseCliArgs(['--expect', 'Password: ', '--send', 'test-secret', 'passwd']);

    expect(options.steps).toEqual([
      { kind: 'expect', pattern: /Password: / },
      { kind: 'send', text: 'test-secret' },
    ]);
    expect(options.command).toBe('passwd');
    expect(options.args).toEqual([]);
  });

  it('stops at the command and keeps its arguments', () => {
    const options = parseCliArgs(['-q', '--remote', 'deploy@web-01:2222', 'bash', '-l', '--quiet']);

    expect(options.quiet).toBe(true);
    expect(options.remote).toEqual({ username: 'deploy', host: 'web-01', port: 2222 });
    expect(options.command).toBe('bash');
    expect(options.args).toEqual(['-l', '--quiet']);
  });

  it('treats everything after -- as the command', () => {
    const options = parseCliArgs(['--', '--odd-name', 'x']);
    expect(options.command).toBe('--odd-name');
    expect(options.args).toEqual(['x']);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--nope', 'ls'])).toThrow('Unknown option: --nope');
  });

  it('rejects an option without its value', () => {
    expect(() => parseCliArgs(['--send'])).toThrow('--send needs a value');
  });

  it('rejects a missing command', () => {
    expect(() => parseCliArgs(['--quiet'])).toThrow(ConfigError);
  });

  it('rejects an invalid expect pattern', () => {
    expect(() => parseCliArgs(['--expect', '(', 'ls'])).toThrow(/^Invalid --expect pattern "\("/);
  });
});

describe('parseRemote', () => {
  it('defaults the port to 22', () => {
    expect(parseRemote('alice@example.test')).toEqual({ username: 'alice', host: 'example.test', port: 22 });
  });

  it('rejects malformed targets', () => {
    expect(() => parseRemote('example.test')).toThrow('Invalid remote "example.test"');
    expect(() => parseRemote('a@b:70000')).toThrow('Invalid port in "a@b:70000"');
  });
});

describe('runScript', () => {
  it('runs the steps and returns the exit status', async () => {
    const transport = new MemoryTransport('Password: ');
    const output: string[] = [];
    const session = new ExpectSession(transport, { printer: (text) => output.push(text) });

    const done = runScript(session, [
      { kind: 'expect', pattern: /Password: / },
      { kind: 'send', text: 'test-secret' },
    ]);

    await vi.waitFor(() => expect(transport.written).toEqual(['test-secret\n']));
    transport.feed('\r\npassword updated\r\n').end(0);

    expect(await done).toBe(0);
    expect(output.join('')).toBe('Password: \r\npassword updated\r\n');
  });

  it('prints nothing when quiet', async () => {
    const transport = new MemoryTransport('hello\r\n').end(4);
    const output: string[] = [];
    const session = new ExpectSession(transport, { printer: (text) => output.push(text) });

    expect(await runScript(session, [], { quiet: true })).toBe(4);
    expect(output).toEqual([]);
  });

  it('fails when the program ends before an expected prompt', async () => {
    const transport = new MemoryTransport('nothing here\r\n', { ended: true });
    const session = new ExpectSession(transport, { echo: false });

    await expect(runScript(session, [{ kind: 'expect', pattern: /Password: / }], { quiet: true }))
      .rejects.toThrow(UnexpectedEndOfStreamError);
  });
});

describe('help', () => {
  it('names the tool and its options', () => {
    expect(HELP).toContain('termexpect [options] <command> [args...]');
    expect(HELP).toContain('--expect <regex>');
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
