/**
 * Shells
 *
 * Session owners: spawn a command on a local pseudo-terminal or on a remote
 * host over SSH and hand back an {@link ExpectSession} for it.
 *
 * @example
 * ```typescript
 * import { RemoteShell, END_OF_STREAM } from 'termexpect';
 *
 * const shell = await RemoteShell.connect({
 *   host: 'build-01',
 *   username: 'deploy',
 *   password: process.env.DEPLOY_PASSWORD,
 * });
 * const session = await shell.interact('sudo -k true');
 * if (await session.expect([END_OF_STREAM, /\[sudo\] password for .*: /]) === 1) {
 *   session.send(process.env.DEPLOY_PASSWORD ?? '');
 * }
 * const code = await session.waitForExit();
 * shell.close();
 * ```
 *
 * @packageDocumentation
 */

import type { IPtyForkOptions } from 'node-pty';
import type { Client, ClientChannel, ConnectConfig } from 'ssh2';
import { END_OF_STREAM } from './types.js';
import { resolveConfig, type SessionConfig } from './config.js';
import { TransportError, toError } from './errors.js';
import { ExpectSession } from './expect.js';
import { parseIdString, type Identity } from './id.js';
import { createLogger } from './logger.js';
import { LocalTransport, RemoteTransport } from './transports.js';
import { quoteArg, sleep, splitCommandLine } from './utils.js';

const log = createLogger('Shell');

export interface InteractOptions extends Partial<SessionConfig> {
  /** Working directory; remote commands are prefixed with `cd` */
  cwd?: string;
  /** Extra environment variables (merged over process.env for local shells) */
  env?: Record<string, string>;
}

/**
 * Something that can run a command interactively
 */
export abstract class Shell {
  abstract readonly remote: boolean;

  abstract interact(command: string, options?: InteractOptions): Promise<ExpectSession>;

  /**
   * Run `id` and parse who the shell runs as
   */
  async identity(): Promise<Identity> {
    const { code, output } = await this.capture('id');
    if (code !== 0) {
      throw new TransportError(`id exited with status ${code}`);
    }
    return parseIdString(output.trim());
  }

  /**
   * Run a command to completion and return its exit status
   */
  async run(command: string, options: InteractOptions = {}): Promise<number> {
    const session = await this.interact(command, options);
    await session.expect(END_OF_STREAM, { echo: options.echo });
    return session.waitForExit();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // File system helpers
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run a command quietly and return only its exit status
   */
  execStatusOnly(command: string): Promise<number> {
    return this.run(command, { echo: false });
  }

  /** `mkdir -p`; true on success */
  async mkdir(path: string, options: { sudo?: boolean } = {}): Promise<boolean> {
    const command = `${options.sudo ? 'sudo ' : ''}mkdir -p ${quoteArg(path)}`;
    return (await this.execStatusOnly(command)) === 0;
  }

  /**
   * Change permissions; a number is written in octal (`0o755` becomes `755`)
   */
  async chmod(mode: number | string, path: string): Promise<boolean> {
    const perms = typeof mode === 'number' ? mode.toString(8) : mode;
    return (await this.execStatusOnly(`chmod ${perms} ${quoteArg(path)}`)) === 0;
  }

  async pathExists(path: string): Promise<boolean> {
    return (await this.execStatusOnly(`test -e ${quoteArg(path)}`)) === 0;
  }

  /**
   * Size of a file in bytes, or null if it cannot be read
   */
  async filesize(path: string): Promise<number | null> {
    const { code, output } = await this.capture(`stat -c %s ${quoteArg(path)}`);
    return code === 0 ? parseSize(output) : null;
  }

  /**
   * Disk usage of a directory in bytes (`du -sk`, so a multiple of 1024),
   * or null if it cannot be read
   */
  async dirsize(path: string): Promise<number | null> {
    const { code, output } = await this.capture(`du -sk ${quoteArg(path)}`);
    if (code !== 0) return null;
    const kib = parseSize(output);
    return kib === null ? null : kib * 1024;
  }

  private async capture(command: string): Promise<{ code: number; output: string }> {
    const session = await this.interact(command, { echo: false });
    let output = '';
    const code = await session.waitForExit((text) => {
      output += text;
    });
    return { code, output };
  }
}

/** Leading integer of command output such as `4096\t/srv/app` */
function parseSize(output: string): number | null {
  const m = /^\s*(\d+)/.exec(output);
  return m ? parseInt(m[1], 10) : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Local
// ═══════════════════════════════════════════════════════════════════════════════

export class LocalShell extends Shell {
  readonly remote = false;

  async interact(command: string, options: InteractOptions = {}): Promise<ExpectSession> {
    const argv = splitCommandLine(command);
    if (argv.length === 0) {
      throw new TransportError('Cannot spawn an empty command');
    }

    const { cwd, env, ...sessionOptions } = options;
    const config = resolveConfig(sessionOptions);

    const childEnv: Record<string, string> = {};
    for (const [key, value] of Object.entries({ ...process.env, ...env })) {
      if (value !== undefined) childEnv[key] = value;
    }

    const ptyOptions: IPtyForkOptions = {
      name: config.term,
      cols: config.cols,
      rows: config.rows,
      cwd: cwd ?? process.cwd(),
      env: childEnv,
    };

    let file = argv[0];
    let args = argv.slice(1);
    if (process.platform === 'win32') {
      // cmd.exe resolves .cmd/.bat shims that node-pty cannot spawn directly
      args = ['/c', file, ...args];
      file = 'cmd.exe';
    }

    try {
      const nodePty = await import('node-pty');
      const pty = nodePty.spawn(file, args, ptyOptions);
      log.debug(`Spawned: ${command} (PID=${pty.pid})`);
      return new ExpectSession(new LocalTransport(pty), config);
    } catch (err) {
      throw new TransportError(`Failed to spawn ${command}: ${toError(err).message}`, toError(err));
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Remote
// ═══════════════════════════════════════════════════════════════════════════════

export interface RemoteShellConfig {
  host: string;
  port?: number;
  username: string;
  password?: string;
  /** Private key contents (not a path) */
  privateKey?: string | Buffer;
  passphrase?: string;
  /** Connection handshake timeout in ms (default: 20000) */
  readyTimeout?: number;
  keepaliveInterval?: number;
  /** Extra connection attempts after a network failure (default: 2) */
  retries?: number;
  /** Delay between connection attempts in ms (default: 1000) */
  retryDelay?: number;
}

export class RemoteShell extends Shell {
  readonly remote = true;

  constructor(
    private readonly client: Client,
    readonly config: Readonly<RemoteShellConfig>
  ) {
    super();
  }

  get hostname(): string {
    return this.config.host;
  }

  get username(): string {
    return this.config.username;
  }

  /**
   * Open an SSH connection. Network failures are retried; authentication
   * failures are not.
   *
   * @throws TransportError if the connection or authentication fails
   */
  static async connect(config: RemoteShellConfig): Promise<RemoteShell> {
    const retries = config.retries ?? 2;
    const retryDelay = config.retryDelay ?? 1000;

    for (let attempt = 0; ; attempt++) {
      try {
        const client = await openClient(config);
        log.info(`Connected to ${config.username}@${config.host}`);
        return new RemoteShell(client, Object.freeze({ ...config }));
      } catch (err) {
        if (attempt >= retries || isAuthFailure(err)) throw err;
        log.warn(`SSH connection to ${config.host} failed (attempt ${attempt + 1}/${retries + 1}), retrying`);
        await sleep(retryDelay);
      }
    }
  }

  async interact(command: string, options: InteractOptions = {}): Promise<ExpectSession> {
    const { cwd, env, ...sessionOptions } = options;
    const config = resolveConfig(sessionOptions);
    const remoteCommand = cwd ? `cd ${quoteArg(cwd)} && ${command}` : command;

    const channel = await new Promise<ClientChannel>((resolve, reject) => {
      this.client.exec(
        remoteCommand,
        {
          pty: { term: config.term, cols: config.cols, rows: config.rows },
          env,
        },
        (err, stream) => {
          if (err) {
            reject(new TransportError(`Remote exec failed: ${err.message}`, err));
          } else {
            resolve(stream);
          }
        }
      );
    });

    log.debug(`Remote exec: ${remoteCommand}`);
    return new ExpectSession(new RemoteTransport(channel), config);
  }

  close(): void {
    this.client.end();
    log.debug(`Disconnected from ${this.config.host}`);
  }
}

async function openClient(config: RemoteShellConfig): Promise<Client> {
  const ssh2 = await import('ssh2');
  const client = new ssh2.Client();

  const connectConfig: ConnectConfig = {
    host: config.host,
    port: config.port ?? 22,
    username: config.username,
    password: config.password,
    privateKey: config.privateKey,
    passphrase: config.passphrase,
    readyTimeout: config.readyTimeout ?? 20000,
    keepaliveInterval: config.keepaliveInterval,
  };

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      client.removeListener('ready', onReady);
      reject(new TransportError(`SSH connection to ${config.host} failed: ${err.message}`, err));
    };
    const onReady = () => {
      client.removeListener('error', onError);
      resolve();
    };
    client.once('ready', onReady);
    client.once('error', onError);
    client.connect(connectConfig);
  });

  client.on('error', (err: Error) => {
    log.error(`SSH client error (${config.host}):`, err.message);
  });

  return client;
}

/** ssh2 tags authentication errors with `level: 'client-authentication'` */
function isAuthFailure(err: unknown): boolean {
  const cause = err instanceof TransportError ? err.cause : err;
  return cause instanceof Error && 'level' in cause && cause.level === 'client-authentication';
}
