/**
 * StreamDecoder Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StreamDecoder } from './decoder.js';
import type { OpHandler, TerminalOp } from './screen.js';

class Recorder implements OpHandler {
  readonly ops: TerminalOp[] = [];

  dispatch(op: TerminalOp): void {
    this.ops.push(op);
  }
}

describe('StreamDecoder', () => {
  let recorder: Recorder;
  let decoder: StreamDecoder;

  beforeEach(() => {
    recorder = new Recorder();
    decoder = new StreamDecoder(recorder);
  });

  describe('text and controls', () => {
    it('emits printable text as one print op', () => {
      decoder.feed('hello world');
      expect(recorder.ops).toEqual([{ kind: 'print', text: 'hello world' }]);
    });

    it('splits text around C0 controls', () => {
      decoder.feed('a\r\nb\tc\x07');
      expect(recorder.ops).toEqual([
        { kind: 'print', text: 'a' },
        { kind: 'carriageReturn' },
        { kind: 'lineFeed' },
        { kind: 'print', text: 'b' },
        { kind: 'tab' },
        { kind: 'print', text: 'c' },
        { kind: 'bell' },
      ]);
    });

    it('treats vertical tab and form feed as line feeds', () => {
      decoder.feed('\x0b\x0c');
      expect(recorder.ops).toEqual([{ kind: 'lineFeed' }, { kind: 'lineFeed' }]);
    });

    it('drops C0 controls without a text meaning', () => {
      decoder.feed('a\x00\x05b');
      expect(recorder.ops).toEqual([{ kind: 'print', text: 'ab' }]);
    });
  });

  describe('UTF-8', () => {
    it('decodes multi-byte characters', () => {
      decoder.feed(Buffer.from('naïve €', 'utf8'));
      expect(recorder.ops).toEqual([{ kind: 'print', text: 'naïve €' }]);
    });

    it('joins a character split across feeds', () => {
      decoder.feed(Buffer.from([0xe2, 0x82]));
      decoder.feed(Buffer.from([0xac]));
      expect(recorder.ops).toEqual([{ kind: 'print', text: '€' }]);
    });

    it('replaces malformed bytes with U+FFFD', () => {
      decoder.feed(Buffer.from([0x61, 0xff, 0x62]));
      expect(recorder.ops).toEqual([{ kind: 'print', text: 'a\uFFFDb' }]);
    });

    it('flushes a truncated character on end', () => {
      decoder.feed(Buffer.from([0xe2]));
      decoder.end();
      expect(recorder.ops).toEqual([{ kind: 'print', text: '\uFFFD' }]);
    });
  });

  describe('CSI', () => {
    it('parses graphic rendition parameters', () => {
      decoder.feed('\x1b[1;31mred\x1b[m');
      expect(recorder.ops).toEqual([
        { kind: 'selectGraphicRendition', attrs: [1, 31] },
        { kind: 'print', text: 'red' },
        { kind: 'selectGraphicRendition', attrs: [0] },
      ]);
    });

    it('uses defaults for missing parameters', () => {
      decoder.feed('\x1b[H\x1b[5;10H\x1b[A\x1b[J');
      expect(recorder.ops).toEqual([
        { kind: 'cursorPosition', row: 1, column: 1 },
        { kind: 'cursorPosition', row: 5, column: 10 },
        { kind: 'cursorUp', count: 1 },
        { kind: 'eraseDisplay', mode: 0 },
      ]);
    });

    it('recognises private modes', () => {
      decoder.feed('\x1b[?25l\x1b[?1049h');
      expect(recorder.ops).toEqual([
        { kind: 'resetMode', modes: [25], private: true },
        { kind: 'setMode', modes: [1049], private: true },
      ]);
    });

    it('survives a sequence split across feeds', () => {
      decoder.feed('before\x1b[');
      decoder.feed('2J');
      expect(recorder.ops).toEqual([
        { kind: 'print', text: 'before' },
        { kind: 'eraseDisplay', mode: 2 },
      ]);
    });

    it('reports unrecognised finals as unknown', () => {
      decoder.feed('\x1b[5z');
      expect(recorder.ops).toEqual([{ kind: 'unknown', sequence: '\x1b[5z' }]);
    });

    it('aborts a sequence on CAN', () => {
      decoder.feed('\x1b[12\x18ok');
      expect(recorder.ops).toEqual([{ kind: 'print', text: 'ok' }]);
    });
  });

  describe('ESC', () => {
    it('dispatches single-character escapes', () => {
      decoder.feed('\x1b7\x1b8\x1bM\x1bc');
      expect(recorder.ops).toEqual([
        { kind: 'saveCursor' },
        { kind: 'restoreCursor' },
        { kind: 'reverseIndex' },
        { kind: 'reset' },
      ]);
    });

    it('parses charset designation', () => {
      decoder.feed('\x1b(B\x1b)0');
      expect(recorder.ops).toEqual([
        { kind: 'defineCharset', slot: '(', charset: 'B' },
        { kind: 'defineCharset', slot: ')', charset: '0' },
      ]);
    });

    it('parses the alignment test', () => {
      decoder.feed('\x1b#8');
      expect(recorder.ops).toEqual([{ kind: 'alignmentDisplay' }]);
    });
  });

  describe('OSC', () => {
    it('sets icon name and title with OSC 0', () => {
      decoder.feed('\x1b]0;my title\x07');
      expect(recorder.ops).toEqual([
        { kind: 'setIconName', text: 'my title' },
        { kind: 'setTitle', text: 'my title' },
      ]);
    });

    it('ends an OSC at the string terminator', () => {
      decoder.feed('\x1b]2;build\x1b\\');
      expect(recorder.ops[0]).toEqual({ kind: 'setTitle', text: 'build' });
    });

    it('reports other OSC commands as unknown', () => {
      decoder.feed('\x1b]7;file:///tmp\x07');
      expect(recorder.ops).toEqual([{ kind: 'unknown', sequence: '\x1b]7;file:///tmp\x07' }]);
    });

    it('keeps OSC state across feeds', () => {
      decoder.feed('\x1b]2;split ');
      decoder.feed('title\x07');
      expect(recorder.ops).toEqual([{ kind: 'setTitle', text: 'split title' }]);
    });
  });
});
