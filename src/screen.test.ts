/**
 * ScreenSink Tests
 */

import { describe, it, expect } from 'vitest';
import { ScreenSink } from './screen.js';
import { StreamDecoder } from './decoder.js';

describe('ScreenSink', () => {
  it('drain reconstructs appended text in order', () => {
    const screen = new ScreenSink();
    screen.appendText('Hello');
    screen.appendText(', ');
    screen.appendText('World');

    expect(screen.pending).toBe(12);
    expect(screen.drainBuffer()).toBe('Hello, World');
  });

  it('second drain returns empty string', () => {
    const screen = new ScreenSink();
    screen.appendText('once');

    expect(screen.drainBuffer()).toBe('once');
    expect(screen.drainBuffer()).toBe('');
    expect(screen.pending).toBe(0);
  });

  it('keeps line breaks and control characters as literals', () => {
    const screen = new ScreenSink();
    screen.dispatch({ kind: 'print', text: 'a' });
    screen.dispatch({ kind: 'tab' });
    screen.dispatch({ kind: 'print', text: 'b' });
    screen.dispatch({ kind: 'backspace' });
    screen.dispatch({ kind: 'carriageReturn' });
    screen.dispatch({ kind: 'lineFeed' });

    expect(screen.drainBuffer()).toBe('a\tb\b\r\n');
  });

  it('records the title without touching the buffer', () => {
    const screen = new ScreenSink();
    screen.dispatch({ kind: 'setTitle', text: 'vim README.md' });

    expect(screen.title).toBe('vim README.md');
    expect(screen.drainBuffer()).toBe('');
  });

  it('clears the buffer on erase of the whole display', () => {
    const screen = new ScreenSink();
    screen.appendText('stale');
    screen.dispatch({ kind: 'eraseDisplay', mode: 2 });
    screen.appendText('fresh');

    expect(screen.drainBuffer()).toBe('fresh');
  });

  it('ignores partial display erase and layout operations', () => {
    const screen = new ScreenSink();
    screen.appendText('keep');
    screen.dispatch({ kind: 'eraseDisplay', mode: 0 });
    screen.dispatch({ kind: 'cursorPosition', row: 5, column: 10 });
    screen.dispatch({ kind: 'selectGraphicRendition', attrs: [1, 31] });
    screen.dispatch({ kind: 'bell' });
    screen.dispatch({ kind: 'eraseLine', mode: 2 });

    expect(screen.drainBuffer()).toBe('keep');
  });

  describe('with decoder', () => {
    it('strips colour codes from program output', () => {
      const screen = new ScreenSink();
      const decoder = new StreamDecoder(screen);
      decoder.feed('\x1b[1;32mPASS\x1b[0m src/app.test.ts\r\n');

      expect(screen.drainBuffer()).toBe('PASS src/app.test.ts\r\n');
    });

    it('takes the title from an OSC sequence', () => {
      const screen = new ScreenSink();
      const decoder = new StreamDecoder(screen);
      decoder.feed('\x1b]0;user@box: ~\x07$ ');

      expect(screen.title).toBe('user@box: ~');
      expect(screen.drainBuffer()).toBe('$ ');
    });

    it('drops what came before a clear screen', () => {
      const screen = new ScreenSink();
      const decoder = new StreamDecoder(screen);
      decoder.feed('old\x1b[H\x1b[2Jnew\n');

      expect(screen.drainBuffer()).toBe('new\n');
    });
  });
});
