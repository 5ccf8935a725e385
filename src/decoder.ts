/**
 * Stream Decoder
 *
 * Turns raw terminal output into {@link TerminalOp}s. Bytes are decoded as
 * UTF-8 (malformed input becomes U+FFFD) and handed to node-ansiparser, a
 * DEC VT500-style escape sequence parser. Its print, execute, ESC, CSI and
 * OSC callbacks are translated into operations for the handler. Parser
 * state survives across `feed` calls, so a sequence split between two reads
 * is still recognised.
 *
 * @packageDocumentation
 */

import AnsiParser from 'node-ansiparser';
import type { OpHandler, TerminalOp } from './screen.js';

const PRIVATE_MARKERS = '<=>?';

export class StreamDecoder {
  private readonly utf8 = new TextDecoder('utf-8');
  private readonly parser: AnsiParser;
  private text = '';

  constructor(private readonly handler: OpHandler) {
    this.parser = new AnsiParser({
      inst_p: (text) => {
        this.text += text;
      },
      inst_x: (flag) => this.execute(flag),
      inst_e: (collected, flag) => this.escape(collected, flag),
      inst_c: (collected, params, flag) => this.csi(collected, params, flag),
      inst_o: (payload) => this.osc(payload),
    });
  }

  /**
   * Feed a chunk of terminal output
   */
  feed(data: Buffer | string): void {
    const input = typeof data === 'string' ? data : this.utf8.decode(data, { stream: true });
    if (input) this.parser.parse(input);
    this.flushText();
  }

  /**
   * Flush bytes held back by the UTF-8 decoder (end of stream)
   */
  end(): void {
    const rest = this.utf8.decode();
    if (rest) {
      this.feed(rest);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Parser callbacks
  // ═══════════════════════════════════════════════════════════════════════════

  /** C0 control */
  private execute(flag: string): void {
    switch (flag) {
      case '\x07': this.emit({ kind: 'bell' }); break;
      case '\b': this.emit({ kind: 'backspace' }); break;
      case '\t': this.emit({ kind: 'tab' }); break;
      case '\n':
      case '\x0b':
      case '\x0c': this.emit({ kind: 'lineFeed' }); break;
      case '\r': this.emit({ kind: 'carriageReturn' }); break;
      case '\x0e': this.emit({ kind: 'shiftOut' }); break;
      case '\x0f': this.emit({ kind: 'shiftIn' }); break;
      default: break;
    }
  }

  /** ESC sequence */
  private escape(collected: string, flag: string): void {
    if (collected === '#' && flag === '8') {
      this.emit({ kind: 'alignmentDisplay' });
      return;
    }
    if (collected === '(' || collected === ')') {
      this.emit({ kind: 'defineCharset', slot: collected, charset: flag });
      return;
    }
    if (collected) {
      this.emit({ kind: 'unknown', sequence: `\x1b${collected}${flag}` });
      return;
    }

    switch (flag) {
      case '7': this.emit({ kind: 'saveCursor' }); break;
      case '8': this.emit({ kind: 'restoreCursor' }); break;
      case 'D': this.emit({ kind: 'index' }); break;
      case 'E': this.emit({ kind: 'lineFeed' }); break;
      case 'M': this.emit({ kind: 'reverseIndex' }); break;
      case 'H': this.emit({ kind: 'setTabStop' }); break;
      case 'c': this.emit({ kind: 'reset' }); break;
      // string terminator closing an OSC or DCS
      case '\\': break;
      default: this.emit({ kind: 'unknown', sequence: `\x1b${flag}` }); break;
    }
  }

  /** CSI sequence; `collected` holds the private marker and intermediates */
  private csi(collected: string, params: number[], flag: string): void {
    const marker = collected && PRIVATE_MARKERS.includes(collected[0]) ? collected[0] : '';
    const intermediates = collected.slice(marker.length);
    const param = (i: number, fallback: number): number => params[i] || fallback;

    if (intermediates) {
      this.emit({ kind: 'unknown', sequence: `\x1b[${collected}${params.join(';')}${flag}` });
      return;
    }

    const isPrivate = marker === '?';
    switch (flag) {
      case 'A':
      case 'F': this.emit({ kind: 'cursorUp', count: param(0, 1) }); break;
      case 'B':
      case 'E':
      case 'e': this.emit({ kind: 'cursorDown', count: param(0, 1) }); break;
      case 'C':
      case 'a': this.emit({ kind: 'cursorForward', count: param(0, 1) }); break;
      case 'D': this.emit({ kind: 'cursorBack', count: param(0, 1) }); break;
      case 'G':
      case '`': this.emit({ kind: 'cursorToColumn', column: param(0, 1) }); break;
      case 'd': this.emit({ kind: 'cursorToLine', row: param(0, 1) }); break;
      case 'H':
      case 'f': this.emit({ kind: 'cursorPosition', row: param(0, 1), column: param(1, 1) }); break;
      case 'J': this.emit({ kind: 'eraseDisplay', mode: params[0] ?? 0 }); break;
      case 'K': this.emit({ kind: 'eraseLine', mode: params[0] ?? 0 }); break;
      case '@': this.emit({ kind: 'insertCharacters', count: param(0, 1) }); break;
      case 'P': this.emit({ kind: 'deleteCharacters', count: param(0, 1) }); break;
      case 'X': this.emit({ kind: 'eraseCharacters', count: param(0, 1) }); break;
      case 'L': this.emit({ kind: 'insertLines', count: param(0, 1) }); break;
      case 'M': this.emit({ kind: 'deleteLines', count: param(0, 1) }); break;
      case 'r': this.emit({ kind: 'setMargins', top: param(0, 1), bottom: param(1, 0) }); break;
      case 'h': this.emit({ kind: 'setMode', modes: [...params], private: isPrivate }); break;
      case 'l': this.emit({ kind: 'resetMode', modes: [...params], private: isPrivate }); break;
      case 'm': this.emit({ kind: 'selectGraphicRendition', attrs: params.length ? [...params] : [0] }); break;
      case 'c': this.emit({ kind: 'reportDeviceAttributes' }); break;
      case 'n': this.emit({ kind: 'reportDeviceStatus', mode: params[0] ?? 0 }); break;
      case 'g': this.emit({ kind: 'clearTabStop', mode: params[0] ?? 0 }); break;
      default:
        this.emit({ kind: 'unknown', sequence: `\x1b[${collected}${params.join(';')}${flag}` });
        break;
    }
  }

  /** OSC payload, e.g. `0;title` */
  private osc(payload: string): void {
    const sep = payload.indexOf(';');
    const command = sep === -1 ? payload : payload.slice(0, sep);
    const text = sep === -1 ? '' : payload.slice(sep + 1);

    switch (command) {
      case '0':
        this.emit({ kind: 'setIconName', text });
        this.emit({ kind: 'setTitle', text });
        break;
      case '1':
        this.emit({ kind: 'setIconName', text });
        break;
      case '2':
        this.emit({ kind: 'setTitle', text });
        break;
      default:
        this.emit({ kind: 'unknown', sequence: `\x1b]${payload}\x07` });
        break;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internal
  // ═══════════════════════════════════════════════════════════════════════════

  private emit(op: TerminalOp): void {
    this.flushText();
    this.handler.dispatch(op);
  }

  private flushText(): void {
    if (this.text) {
      const text = this.text;
      this.text = '';
      this.handler.dispatch({ kind: 'print', text });
    }
  }
}
