/**
 * Line Iterator
 *
 * Buffers decoded output and hands it out as {@link LineToken}s: whole lines
 * split on `\r\n` or `\n`, or a prefix that one of the caller's patterns
 * matched before any terminator arrived (shell prompts end without one).
 *
 * @packageDocumentation
 */

import { END_OF_STREAM } from './types.js';
import type { ChunkSource, EndOfStream, LineToken, Pattern } from './types.js';
import { firstMatch } from './patterns.js';

const NO_LINE: LineToken = Object.freeze({ kind: 'none' });
const EOF: LineToken = Object.freeze({ kind: 'eof' });
const NO_PATTERNS: readonly Pattern[] = Object.freeze([]);

/**
 * Length of the line terminator starting at `at`, or 0
 */
function terminatorAt(buffer: string, at: number): number {
  if (buffer.startsWith('\r\n', at)) return 2;
  if (buffer[at] === '\n') return 1;
  return 0;
}

/**
 * The match ending at `at` is followed by a `\r` that may be the first half
 * of a CRLF still in flight (or is itself a `\r` whose `\n` may follow).
 */
function terminatorMayFollow(buffer: string, at: number): boolean {
  if (buffer[at] === '\r') return at + 1 === buffer.length;
  return at + 2 === buffer.length && buffer[at + 1] === '\r';
}

export class LineIterator {
  private buffer = '';
  /** The buffer ends in an unterminated tail that needs more input */
  private partial = false;
  /** The source reported end of stream while the buffer was non-empty */
  private ended = false;
  /** Prefix positions below this were already tested against `scannedWith` */
  private scanned = 0;
  private scannedWith: readonly Pattern[] = NO_PATTERNS;

  constructor(private readonly source: ChunkSource) {}

  /** Characters held back for the next call */
  get buffered(): string {
    return this.buffer;
  }

  /**
   * Produce the next token. Performs at most one pull from the source.
   */
  nextLine(patterns: readonly Pattern[] = NO_PATTERNS): LineToken {
    if (!this.buffer || this.partial) {
      const chunk = this.ended ? { kind: 'eof' as const } : this.source.pull();
      if (chunk.kind === 'eof') {
        if (!this.buffer) return EOF;
        this.ended = true;
      } else if (chunk.kind === 'text') {
        this.buffer += chunk.text;
      }
      if (!this.buffer) return NO_LINE;
    }

    return this.scan(patterns);
  }

  /**
   * Pull once more, then hand back and forget everything buffered.
   * Returns END_OF_STREAM when the stream is over and nothing was left.
   */
  drainPending(): string | EndOfStream {
    const chunk = this.ended ? { kind: 'eof' as const } : this.source.pull();
    const text = chunk.kind === 'text' ? this.buffer + chunk.text : this.buffer;
    this.buffer = '';
    this.partial = false;
    this.scanned = 0;
    if (chunk.kind === 'eof') {
      this.ended = true;
      return text || END_OF_STREAM;
    }
    return text;
  }

  private scan(patterns: readonly Pattern[]): LineToken {
    const buffer = this.buffer;
    if (patterns !== this.scannedWith) {
      this.scanned = 0;
      this.scannedWith = patterns;
    }

    for (let i = this.scanned; i < buffer.length; i++) {
      if (patterns.length > 0) {
        const prefix = buffer.slice(0, i + 1);
        const hit = firstMatch(patterns, prefix);
        if (hit && !this.ended && !prefix.endsWith('\n') && terminatorMayFollow(buffer, i)) {
          // hold the match until the rest of a split CRLF arrives
          this.scanned = i;
          this.partial = true;
          return NO_LINE;
        }
        if (hit) {
          // a terminator right after the matched prefix belongs to this line
          const end = prefix.endsWith('\n') ? i + 1 : i + 1 + terminatorAt(buffer, i + 1);
          this.consume(end);
          return {
            kind: 'match',
            index: hit.pattern.index,
            text: prefix,
            line: buffer.slice(0, end),
            groups: hit.match.groups,
            named: hit.match.named,
          };
        }
      }

      // covers CRLF as well: the \r is already part of the line
      if (buffer[i] === '\n') {
        this.consume(i + 1);
        return { kind: 'line', text: buffer.slice(0, i + 1) };
      }
    }

    if (this.ended) {
      this.consume(buffer.length);
      return { kind: 'line', text: buffer };
    }

    this.scanned = buffer.length;
    this.partial = true;
    return NO_LINE;
  }

  private consume(end: number): void {
    this.buffer = this.buffer.slice(end);
    this.partial = false;
    this.scanned = 0;
  }
}
