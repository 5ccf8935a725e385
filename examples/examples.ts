/**
 * termexpect - Practical Examples
 *
 * Run with a TypeScript loader, e.g.:
 *   TERMEXPECT_DEBUG=1 npx tsx examples/examples.ts
 */

import {
  LocalShell,
  RemoteShell,
  RsyncCommand,
  RsyncProgress,
  Rsync,
  END_OF_STREAM,
  UnexpectedEndOfStreamError,
} from '../src/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// EXAMPLE 1: Answer a prompt
// ═══════════════════════════════════════════════════════════════════════════════

async function answerPrompt() {
  const session = await new LocalShell().interact(`sh -c 'printf "Name: "; read name; echo "hello $name"'`);

  await session.expect('Name: ');
  session.send('termexpect');

  const { token } = await session.expectMatch(/hello (\w+)\r?\n/);
  if (token.kind === 'match') {
    console.log('\ngreeted:', token.groups[0]);
  }

  console.log('exit status:', await session.waitForExit());
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXAMPLE 2: Branch on what the program prints
// ═══════════════════════════════════════════════════════════════════════════════

async function sudoIfNeeded(password: string) {
  const session = await new LocalShell().interact('sudo -k id -u', { echo: false });

  const index = await session.expect([END_OF_STREAM, /\[sudo\] password for [^:]+: /, /^\d+\r?\n/]);
  if (index === 1) {
    session.send(password);
    await session.expect(/^\d+\r?\n/);
  }

  return session.waitForExit();
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXAMPLE 3: Remote identity and rsync progress
// ═══════════════════════════════════════════════════════════════════════════════

async function deploy() {
  const shell = await RemoteShell.connect({
    host: process.env.DEPLOY_HOST ?? 'localhost',
    username: process.env.DEPLOY_USER ?? 'deploy',
    password: process.env.TERMEXPECT_SSH_PASSWORD,
  });

  try {
    const { uid, groups } = await shell.identity();
    console.log(`running as ${uid.name} (${groups.map(g => g.name).join(', ')})`);

    const rsync = new RsyncCommand()
      .exclude('.git', 'node_modules')
      .source('./dist/')
      .destination('/srv/app/');

    const session = await shell.interact(rsync.toString(), { echo: false });
    const summary = await new RsyncProgress(session, { multiple: true }).run();
    console.log('summary:', summary);
    console.log('exit status:', await session.waitForExit());

    if (!(await shell.pathExists('/srv/app/config'))) {
      await shell.mkdir('/srv/app/config');
    }
  } finally {
    shell.close();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXAMPLE 4: Push a build from this machine
// ═══════════════════════════════════════════════════════════════════════════════

async function push(host: string) {
  const rsync = new Rsync(new LocalShell(), { password: () => process.env.TERMEXPECT_SSH_PASSWORD ?? null });
  const ok = await rsync.transferFolder('./dist', `deploy@${host}:/srv/app`, { exclusions: ['*.map'] });
  console.log(ok ? 'pushed' : 'push failed');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  await answerPrompt();

  if (process.env.SUDO_PASSWORD) {
    console.log('sudo exit status:', await sudoIfNeeded(process.env.SUDO_PASSWORD));
  }

  const host = process.env.DEPLOY_HOST;
  if (host) {
    await deploy();
    await push(host);
  }
}

main().catch((err: unknown) => {
  if (err instanceof UnexpectedEndOfStreamError) {
    console.error(err.message);
    console.error(err.output);
  } else {
    console.error(err);
  }
  process.exit(1);
});
