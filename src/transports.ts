/**
 * Transports
 *
 * Byte sources behind an expect session. Output arrives through events
 * (node-pty `onData`, ssh2 channel `data`) and is queued; `read` takes from
 * the queue and never blocks, `readable()` lets the session sleep until
 * the next read has something to report.
 *
 * @example
 * ```typescript
 * import { spawn } from 'node-pty';
 * import { LocalTransport, ExpectSession } from 'termexpect';
 *
 * const pty = spawn('bash', [], { name: 'xterm-256color', cols: 120, rows: 30 });
 * const session = new ExpectSession(new LocalTransport(pty));
 * ```
 *
 * @packageDocumentation
 */

import type { Duplex } from 'node:stream';
import type { IPty } from 'node-pty';
import type { ReadResult, Transport } from './types.js';
import { TransportError, toError } from './errors.js';
import { createLogger, type Logger } from './logger.js';

export const DEFAULT_READ_SIZE = 1024;

/**
 * The part of a node-pty process a local transport relies on
 */
export type PtyProcess = Pick<IPty, 'pid' | 'onData' | 'onExit' | 'write' | 'kill'>;

// ═══════════════════════════════════════════════════════════════════════════════
// Queue
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Shared queueing for event-fed transports. Subclasses call `push` for
 * output, `setExit` once the exit status is known, `finish` once no more
 * output can arrive and `release` once the exit status cannot arrive either.
 */
export abstract class QueuedTransport implements Transport {
  abstract readonly kind: string;

  protected readonly log: Logger;

  private chunks: Buffer[] = [];
  private closed = false;
  private released = false;
  private exitKnown = false;
  private _exitCode: number | null = null;
  private readWaiters: Array<() => void> = [];
  private exitWaiters: Array<() => void> = [];

  constructor(logName: string) {
    this.log = createLogger(`Transport:${logName}`);
  }

  get exitCode(): number | null {
    return this._exitCode;
  }

  /** Bytes queued and not yet read */
  get queued(): number {
    return this.chunks.reduce((n, c) => n + c.length, 0);
  }

  read(maxBytes = DEFAULT_READ_SIZE): ReadResult {
    if (this.chunks.length === 0) {
      return this.closed ? { kind: 'eof' } : { kind: 'empty' };
    }

    const parts: Buffer[] = [];
    let remaining = maxBytes;
    while (remaining > 0 && this.chunks.length > 0) {
      const head = this.chunks[0];
      if (head.length <= remaining) {
        parts.push(head);
        remaining -= head.length;
        this.chunks.shift();
      } else {
        parts.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }

    return { kind: 'data', data: parts.length === 1 ? parts[0] : Buffer.concat(parts) };
  }

  isAlive(): boolean {
    return !this.exitKnown && !this.closed;
  }

  readable(): Promise<void> {
    if (this.chunks.length > 0 || this.closed) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.readWaiters.push(resolve));
  }

  exited(): Promise<void> {
    if (this.exitKnown || this.released) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.exitWaiters.push(resolve));
  }

  abstract write(data: string | Buffer): void;

  abstract close(): void;

  protected push(data: Buffer): void {
    if (this.closed || data.length === 0) return;
    this.chunks.push(data);
    this.wake();
  }

  protected setExit(code: number | null): void {
    if (this.exitKnown) return;
    this.exitKnown = true;
    this._exitCode = code;
    this.log.event('exit', { code });
    this.wakeExit();
  }

  /** No more output; the exit status may still follow */
  protected finish(): void {
    if (this.closed) return;
    this.closed = true;
    this.log.event('ended', { queued: this.queued });
    this.wake();
  }

  /** No more output and no exit status */
  protected release(): void {
    this.finish();
    if (this.released) return;
    this.released = true;
    this.wakeExit();
  }

  protected get isClosed(): boolean {
    return this.closed;
  }

  private wake(): void {
    const waiters = this.readWaiters;
    this.readWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private wakeExit(): void {
    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Local (node-pty)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Transport over a local pseudo-terminal process
 */
export class LocalTransport extends QueuedTransport {
  readonly kind = 'local';

  private readonly subscriptions: Array<{ dispose(): void }>;

  constructor(private readonly pty: PtyProcess) {
    super('local');

    this.subscriptions = [
      pty.onData((data: string) => {
        this.push(Buffer.from(data, 'utf8'));
      }),
      pty.onExit(({ exitCode, signal }) => {
        this.log.debug(`Exited: code=${exitCode}, signal=${signal}`);
        this.setExit(exitCode);
        this.release();
      }),
    ];

    this.log.debug(`Attached to PID=${pty.pid}`);
  }

  get pid(): number {
    return this.pty.pid;
  }

  write(data: string | Buffer): void {
    if (this.isClosed) {
      throw new TransportError(`Cannot write to exited process ${this.pty.pid}`);
    }
    this.pty.write(typeof data === 'string' ? data : data.toString('utf8'));
  }

  /**
   * Stop listening; kills the process if it is still running
   */
  close(): void {
    if (this.isAlive()) {
      this.pty.kill();
      this.log.debug(`Kill signal: SIGHUP -> ${this.pty.pid}`);
    }
    for (const sub of this.subscriptions) sub.dispose();
    this.release();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Remote (ssh2 session channel)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Transport over a remote session channel. Any Duplex works; ssh2's
 * ClientChannel additionally emits `exit` with the remote exit status.
 * Servers may send EOF (`end`) before the exit status, so only `close`
 * gives up on the status.
 */
export class RemoteTransport extends QueuedTransport {
  readonly kind = 'remote';

  constructor(private readonly channel: Duplex) {
    super('remote');

    channel.on('data', (data: Buffer | string) => {
      this.push(typeof data === 'string' ? Buffer.from(data, 'utf8') : data);
    });
    channel.on('exit', (code: unknown, signal: unknown) => {
      if (typeof code === 'number') {
        this.setExit(code);
      } else {
        this.log.debug(`Remote process killed by signal ${String(signal)}`);
        this.setExit(null);
      }
    });
    channel.on('end', () => this.finish());
    channel.on('close', () => this.release());
    channel.on('error', (err: unknown) => {
      this.log.warn('Channel error:', toError(err).message);
      this.release();
    });
  }

  write(data: string | Buffer): void {
    if (this.isClosed || this.channel.destroyed) {
      throw new TransportError('Cannot write to a closed channel');
    }
    this.channel.write(data);
  }

  close(): void {
    if (!this.channel.destroyed) {
      this.channel.end();
    }
    this.release();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Memory
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * In-process transport: output is whatever `feed` was given, input is
 * recorded in `written`. Used by tests and for replaying captured output.
 */
export class MemoryTransport extends QueuedTransport {
  readonly kind = 'memory';

  /** Everything written to the transport, in order */
  readonly written: string[] = [];

  constructor(output?: string | Buffer, options: { ended?: boolean } = {}) {
    super('memory');
    if (output !== undefined) this.feed(output);
    if (options.ended) this.end();
  }

  feed(output: string | Buffer): this {
    this.push(typeof output === 'string' ? Buffer.from(output, 'utf8') : output);
    return this;
  }

  /**
   * Close the stream, optionally reporting an exit status first
   */
  end(exitCode?: number): this {
    if (exitCode !== undefined) this.setExit(exitCode);
    this.release();
    return this;
  }

  exit(code: number): this {
    this.setExit(code);
    return this;
  }

  write(data: string | Buffer): void {
    if (this.isClosed) {
      throw new TransportError('Cannot write to a closed memory transport');
    }
    this.written.push(typeof data === 'string' ? data : data.toString('utf8'));
  }

  close(): void {
    this.release();
  }
}
