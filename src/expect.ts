/**
 * Expect Engine
 *
 * Drives a transport through the decoder, screen sink and line iterator and
 * exposes the automation contract: `send`, `expect`, `waitForExit`.
 *
 * @example
 * ```typescript
 * import { ExpectSession, LocalShell, PROMPT, END_OF_STREAM } from 'termexpect';
 *
 * const session = await new LocalShell().interact('bash --norc');
 * await session.expect(PROMPT);
 * session.send('ls -1');
 * await session.expect(PROMPT);
 * console.log(session.currentOutput);
 *
 * session.send('exit');
 * await session.expect([END_OF_STREAM, PROMPT]);
 * const code = await session.waitForExit();
 * ```
 *
 * @packageDocumentation
 */

import { END_OF_STREAM } from './types.js';
import type {
  DecodedChunk,
  ExpectOptions,
  ExpectResult,
  LineToken,
  OutputPrinter,
  PatternInput,
  Transport,
} from './types.js';
import { resolveConfig, type SessionConfig } from './config.js';
import { StreamDecoder } from './decoder.js';
import { UnexpectedEndOfStreamError } from './errors.js';
import { LineIterator } from './line-iterator.js';
import { createLogger, type Logger } from './logger.js';
import { compilePatterns, sentinelIndex } from './patterns.js';
import { ScreenSink } from './screen.js';
import { settlesWithin } from './utils.js';

/** Returned by waitForExit when the exit status never arrived */
export const EXIT_STATUS_UNKNOWN = -1;

/**
 * Writes output to stdout as-is
 */
export const defaultPrinter: OutputPrinter = (output) => {
  process.stdout.write(output);
};

let sessionCount = 0;

export class ExpectSession {
  readonly config: Readonly<SessionConfig>;

  private readonly screen = new ScreenSink();
  private readonly decoder = new StreamDecoder(this.screen);
  private readonly lines: LineIterator;
  private readonly log: Logger;
  private readonly printer: OutputPrinter;
  private readonly _history: LineToken[] = [];
  private outputWindow: string[] = [];
  private closed = false;

  constructor(
    readonly transport: Transport,
    options: Partial<SessionConfig> & { printer?: OutputPrinter } = {}
  ) {
    const { printer, ...config } = options;
    this.config = Object.freeze(resolveConfig(config));
    this.printer = printer ?? defaultPrinter;
    this.lines = new LineIterator({ pull: () => this.pull() });
    this.log = createLogger(`Session:${transport.kind}#${++sessionCount}`);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Getters
  // ═══════════════════════════════════════════════════════════════════════════

  /** Every token produced so far, oldest first (NoLineYet excluded) */
  get history(): readonly LineToken[] {
    return this._history;
  }

  /** Unmatched output collected by the most recent expect call */
  get currentOutput(): string {
    return this.outputWindow.join('');
  }

  /** Last window title the program set */
  get title(): string {
    return this.screen.title;
  }

  get exitCode(): number | null {
    return this.transport.exitCode;
  }

  isAlive(): boolean {
    return this.transport.isAlive();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // I/O
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Discard unconsumed output, then write `text` and the line terminator.
   */
  send(text: string, lineTerminator = '\n'): void {
    const stale = this.lines.drainPending();
    if (typeof stale === 'string' && stale) {
      this.log.debug(`Discarded ${stale.length} unconsumed chars before send`);
    }
    this.log.event('send', text);
    this.transport.write(text + lineTerminator);
  }

  /**
   * Wait for one of `patterns` and return its index.
   *
   * @throws UnexpectedEndOfStreamError when the stream ends and END_OF_STREAM
   *   is not in the list
   */
  async expect(
    patterns: PatternInput | readonly PatternInput[],
    options: ExpectOptions = {}
  ): Promise<number> {
    const { index } = await this.expectMatch(patterns, options);
    return index;
  }

  /**
   * Like {@link expect}, but also returns the matched token with its captures.
   */
  async expectMatch(
    patterns: PatternInput | readonly PatternInput[],
    options: ExpectOptions = {}
  ): Promise<ExpectResult> {
    const compiled = compilePatterns(patterns);
    const echo = options.echo ?? this.config.echo;
    const onOutput = options.onOutput ?? this.printer;
    const startTime = Date.now();

    this.outputWindow = [];
    this.log.debug(`expect [${compiled.map(p => p.source).join(', ')}]`);

    for (;;) {
      const token = this.lines.nextLine(compiled);

      switch (token.kind) {
        case 'none':
          await this.transport.readable();
          break;

        case 'line':
          this._history.push(token);
          this.outputWindow.push(token.text);
          if (echo) onOutput(token.text);
          break;

        case 'match':
          this._history.push(token);
          if (echo) onOutput(token.line);
          this.log.timing(`matched #${token.index}`, startTime);
          return { index: token.index, token };

        case 'eof': {
          this._history.push(token);
          const index = sentinelIndex(compiled);
          if (index === -1) {
            throw new UnexpectedEndOfStreamError(
              compiled.map(p => p.source),
              this.currentOutput
            );
          }
          this.log.debug('matched END_OF_STREAM');
          return { index, token };
        }
      }
    }
  }

  /**
   * Forward all remaining output until the process exits, close the
   * transport and return the exit status. Returns EXIT_STATUS_UNKNOWN if the
   * status does not arrive within `config.exitTimeout`.
   */
  async waitForExit(onOutput: OutputPrinter = this.printer): Promise<number> {
    const held = this.lines.drainPending();
    if (held !== END_OF_STREAM && held) onOutput(held);

    for (;;) {
      const result = this.transport.read(this.config.readSize);
      if (result.kind === 'data') {
        this.decoder.feed(result.data);
        const text = this.screen.drainBuffer();
        if (text) onOutput(text);
        continue;
      }
      if (result.kind === 'eof' || !this.transport.isAlive()) break;
      await this.transport.readable();
    }

    this.decoder.end();
    const rest = this.screen.drainBuffer();
    if (rest) onOutput(rest);

    if (this.transport.exitCode === null) {
      const arrived = await settlesWithin(this.transport.exited(), this.config.exitTimeout);
      if (!arrived) this.log.warn(`No exit status after ${this.config.exitTimeout}ms`);
    }

    const code = this.transport.exitCode;
    this.close();
    return code ?? EXIT_STATUS_UNKNOWN;
  }

  /**
   * Close the transport. Further reads report end of stream.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.transport.close();
    this.log.debug('closed');
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internal
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * One non-blocking read, decoded and drained from the screen sink
   */
  private pull(): DecodedChunk {
    const result = this.transport.read(this.config.readSize);

    if (result.kind === 'empty') {
      return { kind: 'empty' };
    }

    if (result.kind === 'eof') {
      this.decoder.end();
      const rest = this.screen.drainBuffer();
      return rest ? { kind: 'text', text: rest } : { kind: 'eof' };
    }

    this.decoder.feed(result.data);
    return { kind: 'text', text: this.screen.drainBuffer() };
  }
}
