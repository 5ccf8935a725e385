// ═══════════════════════════════════════════════════════════════════════════════
// Patterns
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Sentinel that may be mixed into a pattern list to accept the end of the
 * stream as a regular outcome of `expect`.
 */
export const END_OF_STREAM: unique symbol = Symbol('END_OF_STREAM');

export type EndOfStream = typeof END_OF_STREAM;

/**
 * What callers hand to `expect`: literal text (matched as an exact prefix),
 * a regular expression (anchored at the start of the line), or the sentinel.
 */
export type PatternInput = string | RegExp | EndOfStream;

export type PatternKind = 'literal' | 'regex' | 'eos';

/**
 * Result of probing a single pattern against a line prefix
 */
export interface PatternMatch {
  /** The part of the prefix the pattern consumed */
  text: string;
  /** Positional capture groups (undefined for groups that did not participate) */
  groups: (string | undefined)[];
  /** Named capture groups */
  named: Record<string, string | undefined>;
}

/**
 * A compiled pattern plus its position in the caller's list
 */
export interface Pattern {
  index: number;
  kind: PatternKind;
  /** Human readable form, used in errors and logs */
  source: string;
  /** Returns null when the pattern does not match the start of `text` */
  test: (text: string) => PatternMatch | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Line Tokens
// ═══════════════════════════════════════════════════════════════════════════════

/** Nothing complete is available yet; poll again once the transport has data */
export interface NoLineYet {
  kind: 'none';
}

/** The transport closed and everything it produced has been consumed */
export interface EndOfStreamToken {
  kind: 'eof';
}

/** A terminated line that no pattern matched */
export interface UnmatchedLine {
  kind: 'line';
  /** Line text, terminator included */
  text: string;
}

/** A pattern matched a prefix of the buffered output */
export interface MatchedLine {
  kind: 'match';
  /** Index of the winning pattern in the caller's list */
  index: number;
  /** The prefix the pattern matched against */
  text: string;
  /** Everything consumed from the buffer for this token */
  line: string;
  groups: (string | undefined)[];
  named: Record<string, string | undefined>;
}

export type LineToken = NoLineYet | EndOfStreamToken | UnmatchedLine | MatchedLine;

// ═══════════════════════════════════════════════════════════════════════════════
// Transport
// ═══════════════════════════════════════════════════════════════════════════════

export type ReadResult =
  | { kind: 'data'; data: Buffer }
  | { kind: 'empty' }
  | { kind: 'eof' };

/**
 * A byte source/sink behind an expect session.
 *
 * `read` never blocks. `empty` means "try again later" and must never be
 * reported for a closed resource; `eof` is only reported once the resource
 * is closed and nothing is left to read.
 */
export interface Transport {
  /** Short name used in logs ('local', 'remote', 'memory') */
  readonly kind: string;

  /** Exit status once known, null before that */
  readonly exitCode: number | null;

  read(maxBytes?: number): ReadResult;

  write(data: string | Buffer): void;

  /** False once the underlying process reported its exit */
  isAlive(): boolean;

  /** Resolves once a `read` would return something other than `empty` */
  readable(): Promise<void>;

  /** Resolves when the exit status is known or the transport has closed */
  exited(): Promise<void>;

  close(): void;
}

/** Decoded output pulled from a transport, one read's worth */
export type DecodedChunk =
  | { kind: 'text'; text: string }
  | { kind: 'empty' }
  | { kind: 'eof' };

/**
 * Where the line iterator gets its text from
 */
export interface ChunkSource {
  pull(): DecodedChunk;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Session
// ═══════════════════════════════════════════════════════════════════════════════

/** Receives output as it is consumed */
export type OutputPrinter = (output: string) => void;

export interface ExpectOptions {
  /** Forward each consumed line to `onOutput` (default: true) */
  echo?: boolean;
  /** Output sink (default: stdout) */
  onOutput?: OutputPrinter;
}

export interface ExpectResult {
  /** Index of the matching pattern (or of the sentinel) */
  index: number;
  token: MatchedLine | EndOfStreamToken;
}
