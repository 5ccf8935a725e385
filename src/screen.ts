/**
 * Screen Sink
 *
 * Reduces terminal operations to a linear text buffer plus a title. Cursor
 * addressing, margins, charsets and graphic rendition are irrelevant to
 * automation and are dropped; line breaks and the few control characters a
 * transcript needs are kept as their literal characters.
 *
 * @packageDocumentation
 */

import { createLogger } from './logger.js';

const log = createLogger('Screen');

// ═══════════════════════════════════════════════════════════════════════════════
// Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Operations the decoder dispatches. Only a handful change the sink; the
 * rest are listed so the decoder can name what it recognised.
 */
export type TerminalOp =
  | { kind: 'print'; text: string }
  | { kind: 'carriageReturn' }
  | { kind: 'lineFeed' }
  | { kind: 'backspace' }
  | { kind: 'tab' }
  | { kind: 'bell' }
  | { kind: 'shiftIn' }
  | { kind: 'shiftOut' }
  | { kind: 'eraseDisplay'; mode: number }
  | { kind: 'eraseLine'; mode: number }
  | { kind: 'setTitle'; text: string }
  | { kind: 'setIconName'; text: string }
  | { kind: 'cursorUp'; count: number }
  | { kind: 'cursorDown'; count: number }
  | { kind: 'cursorForward'; count: number }
  | { kind: 'cursorBack'; count: number }
  | { kind: 'cursorPosition'; row: number; column: number }
  | { kind: 'cursorToColumn'; column: number }
  | { kind: 'cursorToLine'; row: number }
  | { kind: 'saveCursor' }
  | { kind: 'restoreCursor' }
  | { kind: 'index' }
  | { kind: 'reverseIndex' }
  | { kind: 'insertCharacters'; count: number }
  | { kind: 'deleteCharacters'; count: number }
  | { kind: 'eraseCharacters'; count: number }
  | { kind: 'insertLines'; count: number }
  | { kind: 'deleteLines'; count: number }
  | { kind: 'setMargins'; top: number; bottom: number }
  | { kind: 'setMode'; modes: number[]; private: boolean }
  | { kind: 'resetMode'; modes: number[]; private: boolean }
  | { kind: 'selectGraphicRendition'; attrs: number[] }
  | { kind: 'defineCharset'; slot: string; charset: string }
  | { kind: 'setTabStop' }
  | { kind: 'clearTabStop'; mode: number }
  | { kind: 'reportDeviceAttributes' }
  | { kind: 'reportDeviceStatus'; mode: number }
  | { kind: 'alignmentDisplay' }
  | { kind: 'reset' }
  | { kind: 'unknown'; sequence: string };

export type TerminalOpKind = TerminalOp['kind'];

/**
 * Anything that accepts decoded terminal operations
 */
export interface OpHandler {
  dispatch(op: TerminalOp): void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Sink
// ═══════════════════════════════════════════════════════════════════════════════

export class ScreenSink implements OpHandler {
  private _buffer = '';
  private _title = '';

  get title(): string {
    return this._title;
  }

  /** Characters appended since the last drain */
  get pending(): number {
    return this._buffer.length;
  }

  dispatch(op: TerminalOp): void {
    switch (op.kind) {
      case 'print':
        this._buffer += op.text;
        break;
      case 'carriageReturn':
        this._buffer += '\r';
        break;
      case 'lineFeed':
        this._buffer += '\n';
        break;
      case 'backspace':
        this._buffer += '\b';
        break;
      case 'tab':
        this._buffer += '\t';
        break;
      case 'eraseDisplay':
        if (op.mode >= 2) {
          this._buffer = '';
        } else {
          log.debug(`erase in display (mode ${op.mode}) ignored`);
        }
        break;
      case 'setTitle':
        this._title = op.text;
        log.debug('title:', op.text);
        break;
      default:
        // layout, rendition and device queries do not affect the text
        break;
    }
  }

  appendText(text: string): void {
    this.dispatch({ kind: 'print', text });
  }

  /**
   * Return everything appended since the previous drain and clear it
   */
  drainBuffer(): string {
    const text = this._buffer;
    this._buffer = '';
    return text;
  }
}
