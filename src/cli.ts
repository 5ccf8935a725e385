#!/usr/bin/env node
/**
 * termexpect CLI
 *
 * Runs a command locally or over SSH and scripts it with expect/send steps.
 *
 * Usage:
 *   termexpect [options] <command> [args...]
 *   termexpect --expect 'Password: ' --send test-secret passwd
 *   termexpect --remote deploy@web-01:2222 --expect '\$ ' --send exit bash
 *
 * Environment:
 *   TERMEXPECT_SSH_PASSWORD=...  Password for --remote
 *   TERMEXPECT_SSH_KEY=file      Private key for --remote
 *   TERMEXPECT_DEBUG=1           Enable debug output
 */

import { readFileSync } from 'node:fs';
import { TermExpectError, UnexpectedEndOfStreamError, toError } from './errors.js';
import { createLogger } from './logger.js';
import { HELP, VERSION, parseCliArgs, runScript } from './script.js';
import { LocalShell, RemoteShell, type Shell } from './shell.js';
import { getTerminalSize, quoteArg } from './utils.js';

const log = createLogger('CLI');

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(HELP);
    return 0;
  }
  if (options.version) {
    console.log(VERSION);
    return 0;
  }

  const { cols, rows } = getTerminalSize();
  const commandLine = [options.command, ...options.args].map(quoteArg).join(' ');

  let remote: RemoteShell | null = null;
  if (options.remote) {
    const keyFile = process.env.TERMEXPECT_SSH_KEY;
    remote = await RemoteShell.connect({
      ...options.remote,
      password: process.env.TERMEXPECT_SSH_PASSWORD,
      privateKey: keyFile ? readFileSync(keyFile) : undefined,
    });
  }
  const shell: Shell = remote ?? new LocalShell();

  try {
    const session = await shell.interact(commandLine, { cols, rows, echo: !options.quiet });

    const cleanup = () => {
      session.close();
      remote?.close();
      process.exit(130);
    };
    process.on('SIGINT', cleanup);
    process.on('SIGTERM', cleanup);

    const code = await runScript(session, options.steps, { quiet: options.quiet });
    log.debug(`${options.command} exited with ${code}`);
    return code;
  } finally {
    remote?.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof UnexpectedEndOfStreamError) {
      log.error(err.message);
      if (err.output) process.stderr.write(err.output);
      process.exit(2);
    }
    if (err instanceof TermExpectError) {
      log.error(err.message);
      if (err.hint) log.info(err.hint);
      process.exit(1);
    }
    process.stderr.write(`Fatal: ${toError(err).message}\n`);
    process.exit(1);
  }
);
