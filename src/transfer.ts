/**
 * Transfer
 *
 * Builds rsync command lines, follows rsync's `--progress` output through an
 * expect session and runs whole transfers with {@link Rsync}.
 *
 * @example
 * ```typescript
 * import { LocalShell, RsyncCommand, RsyncProgress } from 'termexpect';
 *
 * const cmd = new RsyncCommand()
 *   .flags('az')
 *   .exclude('node_modules')
 *   .source('./build/')
 *   .destination('deploy@web-01:/srv/app/');
 *
 * const session = await new LocalShell().interact(cmd.toString());
 * const summary = await new RsyncProgress(session, {
 *   multiple: true,
 *   reporter: { file: (name) => console.log('sending', name) },
 * }).run();
 * const code = await session.waitForExit();
 * ```
 *
 * @packageDocumentation
 */

import { END_OF_STREAM } from './types.js';
import type { PatternInput } from './types.js';
import type { ExpectSession } from './expect.js';
import type { Shell } from './shell.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('Rsync');

// ═══════════════════════════════════════════════════════════════════════════════
// Command
// ═══════════════════════════════════════════════════════════════════════════════

export class RsyncCommand {
  private _flags = 'az';
  private _remoteRsync: string | null = null;
  private _remoteShell: string | null = null;
  private _exclusions: string[] = [];
  private _progress = true;
  private _delete = false;
  private _source: string | null = null;
  private _destination: string | null = null;

  /** Short flags without the leading dash, e.g. `az` */
  flags(flags: string): this {
    this._flags = flags;
    return this;
  }

  /** `--rsync-path`, e.g. `sudo rsync` */
  remoteRsync(path: string | null): this {
    this._remoteRsync = path;
    return this;
  }

  /** `-e`, e.g. `ssh -oStrictHostKeyChecking=no` */
  remoteShell(rsh: string | null): this {
    this._remoteShell = rsh;
    return this;
  }

  exclude(...patterns: string[]): this {
    this._exclusions.push(...patterns);
    return this;
  }

  progress(enabled: boolean): this {
    this._progress = enabled;
    return this;
  }

  deleteExtraneous(enabled: boolean): this {
    this._delete = enabled;
    return this;
  }

  source(path: string): this {
    this._source = path;
    return this;
  }

  destination(path: string): this {
    this._destination = path;
    return this;
  }

  /**
   * @throws ConfigError if source or destination is missing
   */
  toString(): string {
    if (!this._source || !this._destination) {
      throw new ConfigError(
        'rsync needs both a source and a destination',
        'Call source() and destination() before building the command'
      );
    }

    const parts = ['rsync'];
    if (this._remoteRsync) parts.push(`--rsync-path="${this._remoteRsync}"`);
    if (this._remoteShell) parts.push(`-e "${this._remoteShell}"`);
    parts.push(`-${this._flags || 'az'}`);
    if (this._progress) parts.push('--no-human-readable', '--progress');
    if (this._delete) parts.push('--delete');
    for (const pattern of this._exclusions) parts.push(`--exclude=${pattern}`);
    parts.push(this._source, this._destination);

    return parts.join(' ');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Progress
// ═══════════════════════════════════════════════════════════════════════════════

/** `   32768  50%    1.00MB/s    0:00:00` followed by whitespace */
export const PROGRESS_LINE = /\s+(\d+)\s*(\d+)%\s+([\d.]+.B\/s)\s+([0-9:]+)(?=\s)/;

/** An in-flight update, overwritten in place with `\r` */
export const PROGRESS_UPDATE = /\s+(\d+)\s*(\d+)%\s+([\d.]+.B\/s)\s+([0-9:]+)(?=\r)/;

/** A finished file: `... 0:00:00 (xfr#1, to-chk=2/4)` (older rsync: `xfer#`, `to-check=`) */
export const PROGRESS_DONE =
  /\s+(\d+)\s*(\d+)%\s+([\d.]+.B\/s)\s+([0-9:]+)\s\((?:xfer|xfr)#(\d+),\s*to-(?:check|chk)=(\d+)\/(\d+)\)/;

/** A file name on a line of its own */
export const FILE_NAME = /(?!sending |sent |total size |created directory |receiving |deleting )(\S[^\r\n]*?)\r?\n/;

export const SUMMARY = /total size is (\d+)\s+speedup is ([\d.]+)(?=\s)/;

export interface RsyncProgressEvent {
  /** Bytes of the current file transferred so far */
  bytes: number;
  percent: number;
  /** Rate as printed, e.g. `1.00MB/s` */
  speed: string;
  elapsed: string;
  /** Multi-file mode, finished files only: files checked so far and in total */
  filesChecked?: number;
  filesTotal?: number;
}

export interface RsyncSummary {
  totalSize: number;
  speedup: number;
}

export interface ProgressReporter {
  progress?(event: RsyncProgressEvent): void;
  file?(name: string): void;
  summary?(summary: RsyncSummary): void;
}

export interface RsyncProgressOptions {
  /** Follow a directory transfer (file names and per-file checks) */
  multiple?: boolean;
  reporter?: ProgressReporter;
  /** Echo rsync output while following it (default: false) */
  echo?: boolean;
}

const logReporter: ProgressReporter = {
  progress: (e) => log.debug(`${e.bytes} bytes ${e.percent}% ${e.speed} ${e.elapsed}`),
  file: (name) => log.info(name),
  summary: (s) => {
    if (s.speedup > 1) log.info(`rsync speedup factor was ${s.speedup}`);
  },
};

function int(value: string | undefined): number {
  return value === undefined ? 0 : parseInt(value, 10);
}

export class RsyncProgress {
  private readonly reporter: ProgressReporter;

  constructor(
    private readonly session: ExpectSession,
    private readonly options: RsyncProgressOptions = {}
  ) {
    this.reporter = options.reporter ?? logReporter;
  }

  /**
   * Follow the output until the stream ends. Resolves with rsync's summary,
   * or null if it never printed one.
   */
  async run(): Promise<RsyncSummary | null> {
    return this.options.multiple ? this.followMultiple() : this.followSingle();
  }

  private async followSingle(): Promise<RsyncSummary | null> {
    const patterns: PatternInput[] = [END_OF_STREAM, PROGRESS_LINE, SUMMARY];
    let summary: RsyncSummary | null = null;

    for (;;) {
      const { index, token } = await this.session.expectMatch(patterns, { echo: this.options.echo ?? false });
      if (token.kind === 'eof') break;

      if (index === 1) {
        this.reportProgress(token.groups);
      } else if (index === 2) {
        summary = this.reportSummary(token.groups);
      }
    }

    return summary;
  }

  private async followMultiple(): Promise<RsyncSummary | null> {
    const patterns: PatternInput[] = [END_OF_STREAM, PROGRESS_DONE, PROGRESS_UPDATE, FILE_NAME, SUMMARY];
    let summary: RsyncSummary | null = null;

    for (;;) {
      const { index, token } = await this.session.expectMatch(patterns, { echo: this.options.echo ?? false });
      if (token.kind === 'eof') break;

      switch (index) {
        case 1: {
          const [, , , , xfer, remaining, total] = token.groups;
          this.reportProgress(token.groups, {
            filesChecked: int(total) - int(remaining),
            filesTotal: int(total),
          });
          log.debug(`finished transfer #${int(xfer)}`);
          break;
        }
        case 2:
          this.reportProgress(token.groups);
          break;
        case 3:
          this.reporter.file?.(token.groups[0] ?? '');
          break;
        case 4:
          summary = this.reportSummary(token.groups);
          break;
        default:
          log.warn(`Unexpected pattern index ${index}`);
          break;
      }
    }

    return summary;
  }

  private reportProgress(
    groups: (string | undefined)[],
    files: Pick<RsyncProgressEvent, 'filesChecked' | 'filesTotal'> = {}
  ): void {
    const [bytes, percent, speed, elapsed] = groups;
    this.reporter.progress?.({
      bytes: int(bytes),
      percent: int(percent),
      speed: speed ?? '',
      elapsed: elapsed ?? '',
      ...files,
    });
  }

  private reportSummary(groups: (string | undefined)[]): RsyncSummary {
    const summary = {
      totalSize: int(groups[0]),
      speedup: parseFloat(groups[1] ?? '0'),
    };
    this.reporter.summary?.(summary);
    return summary;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Runner
// ═══════════════════════════════════════════════════════════════════════════════

/** ssh asking for the remote user's password */
export const PASSWORD_PROMPT = /[^\r\n]*'s password:/;

const ANY_LINE = /[^\n]*\n/;

/** `[user@]host:path` */
const REMOTE_PATH = /^(?:[^@/:\s]+@)?([^/:\s]+):/;

/** rsync exit statuses that count as success (24: source files vanished) */
const SUCCESS = new Set([0, 24]);

/** ssh failed, usually a changed host key */
const SSH_FAILURE = 255;

export interface RsyncOptions {
  /** Answer for ssh's password prompt; a function is only called when asked */
  password?: string | (() => string | null | Promise<string | null>);
  /** Run rsync as root on the remote side */
  sudo?: boolean;
  /** Private key file for ssh */
  sshKey?: string;
  /** Where progress goes (default: the logger); false to skip following it */
  progress?: ProgressReporter | false;
  /** Times to forget the host key and retry after ssh exits with 255 (default: 1) */
  hostKeyRetries?: number;
}

export interface RsyncRunOptions {
  flags?: string;
  /** The source is a directory */
  multiple?: boolean;
  deleteExtraneous?: boolean;
  exclusions?: string[];
}

/**
 * Run rsync on a shell. One side may be remote (`user@host:path`); ssh is
 * then used as the remote shell and its password prompt is answered.
 *
 * @example
 * ```typescript
 * const rsync = new Rsync(new LocalShell(), { password: 'test-secret' });
 * const ok = await rsync.transferFolder('./dist', 'deploy@web-01:/srv/app');
 * ```
 */
export class Rsync {
  constructor(
    private readonly shell: Shell,
    private readonly options: RsyncOptions = {}
  ) {}

  /** Copy one file (`-czvP`) */
  transferFile(source: string, destination: string): Promise<boolean> {
    return this.run(source, destination, { flags: 'czvP' });
  }

  /**
   * Copy a directory's contents (`-aczvP`), deleting extraneous files at the
   * destination unless told otherwise
   */
  transferFolder(
    source: string,
    destination: string,
    options: { deleteExtraneous?: boolean; exclusions?: string[] } = {}
  ): Promise<boolean> {
    return this.run(source.endsWith('/') ? source : `${source}/`, destination, {
      flags: 'aczvP',
      multiple: true,
      deleteExtraneous: options.deleteExtraneous ?? true,
      exclusions: options.exclusions,
    });
  }

  command(source: string, destination: string, options: RsyncRunOptions = {}): RsyncCommand {
    const cmd = new RsyncCommand()
      .flags(options.flags ?? 'az')
      .deleteExtraneous(options.deleteExtraneous ?? false)
      .exclude(...(options.exclusions ?? []))
      .source(source)
      .destination(destination);

    if (remoteHost(source) !== null || remoteHost(destination) !== null) {
      const rsh = ['ssh -oStrictHostKeyChecking=no'];
      if (this.options.sshKey) rsh.push(`-i${this.options.sshKey}`);
      cmd.remoteShell(rsh.join(' ')).remoteRsync(this.options.sudo ? 'sudo rsync' : null);
    }
    return cmd;
  }

  /**
   * Run the transfer to completion. Resolves true when rsync exits with 0 or 24.
   */
  async run(source: string, destination: string, options: RsyncRunOptions = {}): Promise<boolean> {
    const host = remoteHost(source) ?? remoteHost(destination);
    let retries = this.options.hostKeyRetries ?? 1;

    for (;;) {
      const code = await this.attempt(this.command(source, destination, options), host !== null, options);
      if (code === null) return false;

      if (code === SSH_FAILURE && host !== null && retries > 0) {
        retries--;
        log.warn(`ssh to ${host} failed, forgetting its host key and retrying`);
        await this.shell.execStatusOnly(`ssh-keygen -R ${host}`);
        continue;
      }

      if (!SUCCESS.has(code)) {
        log.error(`rsync exited with status ${code}`);
      }
      return SUCCESS.has(code);
    }
  }

  /**
   * One rsync invocation; null when a password was needed and none was given
   */
  private async attempt(cmd: RsyncCommand, remote: boolean, options: RsyncRunOptions): Promise<number | null> {
    log.info(`rsync: ${cmd.toString()}`);
    const session = await this.shell.interact(cmd.toString(), { echo: false });
    let ended = false;

    if (remote) {
      const index = await session.expect([END_OF_STREAM, PASSWORD_PROMPT, ANY_LINE], { echo: false });
      ended = index === 0;
      if (index === 1) {
        const password = await this.password();
        if (password === null) {
          log.error('rsync asked for a password and none was given');
          session.close();
          return null;
        }
        session.send(password);
      }
    }

    if (!ended) {
      const progress = this.options.progress;
      if (progress === false) {
        await session.expect(END_OF_STREAM, { echo: false });
      } else {
        await new RsyncProgress(session, { multiple: options.multiple, reporter: progress }).run();
      }
    }

    return session.waitForExit();
  }

  private async password(): Promise<string | null> {
    const { password } = this.options;
    if (typeof password === 'function') return password();
    return password ?? null;
  }
}

/**
 * Host of a `[user@]host:path` argument, or null for a local path
 */
export function remoteHost(path: string): string | null {
  return REMOTE_PATH.exec(path)?.[1] ?? null;
}
