/**
 * termexpect
 *
 * Expect-style automation for terminal programs: spawn a command on a
 * pseudo-terminal (locally or over SSH), wait for output patterns, send
 * replies, collect the exit status.
 *
 * @example
 * ```typescript
 * import { LocalShell, PROMPT, END_OF_STREAM } from 'termexpect';
 *
 * const session = await new LocalShell().interact('bash --norc');
 *
 * // Wait for the prompt, run something
 * await session.expect(PROMPT);
 * session.send('uname -s');
 *
 * // Capture groups come with expectMatch
 * const { token } = await session.expectMatch(/(Linux|Darwin)/);
 *
 * // End of stream is an ordinary outcome when listed
 * session.send('exit');
 * await session.expect([END_OF_STREAM, PROMPT]);
 * const code = await session.waitForExit();
 * ```
 *
 * @packageDocumentation
 */

// Core
export { ExpectSession, EXIT_STATUS_UNKNOWN, defaultPrinter } from './expect.js';
export { LocalShell, RemoteShell, Shell } from './shell.js';
export type { InteractOptions, RemoteShellConfig } from './shell.js';

// Pipeline
export { StreamDecoder } from './decoder.js';
export { ScreenSink } from './screen.js';
export type { TerminalOp, TerminalOpKind, OpHandler } from './screen.js';
export { LineIterator } from './line-iterator.js';
export { PROMPT, compilePattern, compilePatterns, firstMatch } from './patterns.js';

// Transports
export {
  QueuedTransport,
  LocalTransport,
  RemoteTransport,
  MemoryTransport,
  DEFAULT_READ_SIZE,
} from './transports.js';
export type { PtyProcess } from './transports.js';

// Extras
export { parseIdString } from './id.js';
export type { Identity, IdEntry } from './id.js';
export {
  Rsync,
  RsyncCommand,
  RsyncProgress,
  remoteHost,
  PASSWORD_PROMPT,
  PROGRESS_LINE,
  PROGRESS_UPDATE,
  PROGRESS_DONE,
  FILE_NAME,
  SUMMARY,
} from './transfer.js';
export type {
  ProgressReporter,
  RsyncOptions,
  RsyncRunOptions,
  RsyncProgressEvent,
  RsyncProgressOptions,
  RsyncSummary,
} from './transfer.js';

// Configuration
export { DEFAULT_CONFIG, configFromEnv, resolveConfig } from './config.js';
export type { SessionConfig } from './config.js';

// Errors
export {
  TermExpectError,
  UnexpectedEndOfStreamError,
  TransportError,
  ConfigError,
  ParseError,
} from './errors.js';

// Logging
export { createLogger, setLogLevel, getLogLevel, LogLevel } from './logger.js';
export type { Logger } from './logger.js';

// Utils
export { splitCommandLine, quoteArg, sleep, withTimeout, settlesWithin } from './utils.js';

// Types
export { END_OF_STREAM } from './types.js';
export type {
  EndOfStream,
  PatternInput,
  Pattern,
  PatternMatch,
  LineToken,
  NoLineYet,
  EndOfStreamToken,
  UnmatchedLine,
  MatchedLine,
  Transport,
  ReadResult,
  DecodedChunk,
  ChunkSource,
  OutputPrinter,
  ExpectOptions,
  ExpectResult,
} from './types.js';
