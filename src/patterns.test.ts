/**
 * Pattern Tests
 */

import { describe, it, expect } from 'vitest';
import { PROMPT, compilePattern, compilePatterns, firstMatch, sentinelIndex } from './patterns.js';
import { END_OF_STREAM } from './types.js';

describe('compilePattern', () => {
  it('matches literals as an exact prefix', () => {
    const pattern = compilePattern('Password:', 0);

    expect(pattern.kind).toBe('literal');
    expect(pattern.test('Password: ')).toEqual({ text: 'Password:', groups: [], named: {} });
    expect(pattern.test('Old Password: ')).toBeNull();
  });

  it('anchors regular expressions at the start', () => {
    const pattern = compilePattern(/\d+ files/, 0);

    expect(pattern.test('12 files copied')).toEqual({ text: '12 files', groups: [], named: {} });
    expect(pattern.test('copied 12 files')).toBeNull();
  });

  it('keeps case-insensitive flags', () => {
    const pattern = compilePattern(/continue\?/i, 0);
    expect(pattern.test('Continue? [y/N]')?.text).toBe('Continue?');
  });

  it('is repeatable with a global regex', () => {
    const pattern = compilePattern(/ok/g, 0);

    expect(pattern.test('ok')).not.toBeNull();
    expect(pattern.test('ok')).not.toBeNull();
  });

  it('returns positional and named captures', () => {
    const pattern = compilePattern(/(?<key>\w+)=(\d+)?;/, 2);
    const match = pattern.test('retries=;');

    expect(pattern.index).toBe(2);
    expect(match?.groups).toEqual(['retries', undefined]);
    expect(match?.named).toEqual({ key: 'retries' });
  });

  it('describes each kind of pattern', () => {
    expect(compilePattern('$ ', 0).source).toBe('"$ "');
    expect(compilePattern(/done/i, 1).source).toBe('/done/i');
    expect(compilePattern(END_OF_STREAM, 2).source).toBe('END_OF_STREAM');
  });

  it('never matches text with the sentinel', () => {
    const pattern = compilePattern(END_OF_STREAM, 0);

    expect(pattern.kind).toBe('eos');
    expect(pattern.test('anything')).toBeNull();
  });
});

describe('compilePatterns', () => {
  it('treats a single pattern as a list of one', () => {
    const patterns = compilePatterns('ready');

    expect(patterns).toHaveLength(1);
    expect(patterns[0].index).toBe(0);
  });

  it('indexes patterns by list position', () => {
    const patterns = compilePatterns([END_OF_STREAM, /a/, 'b']);
    expect(patterns.map(p => [p.index, p.kind])).toEqual([
      [0, 'eos'],
      [1, 'regex'],
      [2, 'literal'],
    ]);
  });
});

describe('firstMatch', () => {
  it('returns the first matching pattern in list order', () => {
    const patterns = compilePatterns(['ab', /a./]);
    expect(firstMatch(patterns, 'ab')?.pattern.index).toBe(0);

    const reversed = compilePatterns([/a./, 'ab']);
    expect(firstMatch(reversed, 'ab')?.pattern.index).toBe(0);
  });

  it('skips the sentinel', () => {
    const patterns = compilePatterns([END_OF_STREAM, 'x']);
    expect(firstMatch(patterns, 'x')?.pattern.index).toBe(1);
  });

  it('returns null when nothing matches', () => {
    expect(firstMatch(compilePatterns(['a', /b/]), 'c')).toBeNull();
  });
});

describe('sentinelIndex', () => {
  it('finds the sentinel position', () => {
    expect(sentinelIndex(compilePatterns(['a', END_OF_STREAM]))).toBe(1);
  });

  it('is -1 without a sentinel', () => {
    expect(sentinelIndex(compilePatterns(['a']))).toBe(-1);
  });
});

describe('PROMPT', () => {
  const prompt = compilePattern(PROMPT, 0);

  it('matches a user prompt', () => {
    expect(prompt.test('[test-user@malehorse ~]$ ')?.text).toBe('[test-user@malehorse ~]$ ');
  });

  it('matches a root prompt with a virtualenv prefix', () => {
    expect(prompt.test('(venv) [root@box /srv]# ')?.text).toBe('(venv) [root@box /srv]# ');
  });

  it('needs the trailing space', () => {
    expect(prompt.test('[user@box ~]$')).toBeNull();
  });
});
