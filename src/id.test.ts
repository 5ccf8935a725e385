import { describe, it, expect } from 'vitest';
import { lexIdString, parseIdString } from './id.js';
import { ParseError } from './errors.js';

describe('lexIdString', () => {
  it('splits into runs of the same class', () => {
    expect(lexIdString('uid=1000(alice) g')).toEqual([
      { kind: 'word', text: 'uid' },
      { kind: 'equals', text: '=' },
      { kind: 'word', text: '1000' },
      { kind: 'paren', text: '(' },
      { kind: 'word', text: 'alice' },
      { kind: 'paren', text: ')' },
      { kind: 'sep', text: ' ' },
      { kind: 'word', text: 'g' },
    ]);
  });

  it('keeps adjacent parens apart', () => {
    expect(lexIdString(')(').map(l => l.text)).toEqual([')', '(']);
  });
});

describe('parseIdString', () => {
  it('parses uid, gid and groups', () => {
    expect(parseIdString('uid=1000(alice) gid=1000(alice) groups=1000(alice),27(sudo)')).toEqual({
      uid: { id: 1000, name: 'alice' },
      gid: { id: 1000, name: 'alice' },
      groups: [
        { id: 1000, name: 'alice' },
        { id: 27, name: 'sudo' },
      ],
    });
  });

  it('accepts names with dashes and dots', () => {
    const identity = parseIdString('uid=1001(ci-runner) gid=1001(ci.runner) groups=999(docker-users)\r\n');

    expect(identity.uid.name).toBe('ci-runner');
    expect(identity.gid.name).toBe('ci.runner');
    expect(identity.groups).toEqual([{ id: 999, name: 'docker-users' }]);
  });

  it('skips fields it does not know', () => {
    const identity = parseIdString(
      'uid=0(root) gid=0(root) groups=0(root) context=unconfined_u:unconfined_r:unconfined_t:s0-s0:c0.c1023'
    );

    expect(identity.uid).toEqual({ id: 0, name: 'root' });
    expect(identity.groups).toEqual([{ id: 0, name: 'root' }]);
  });

  it('allows a missing groups field', () => {
    expect(parseIdString('uid=5(games) gid=60(games)').groups).toEqual([]);
  });

  it('rejects a non-numeric id', () => {
    expect(() => parseIdString('uid=abc(alice) gid=1(alice)')).toThrow(
      'Invalid id string: expected a numeric id, got "abc"'
    );
  });

  it('rejects truncated input', () => {
    expect(() => parseIdString('uid=1000(alice')).toThrow('Invalid id string: unexpected end of input');
  });

  it('rejects input without a uid', () => {
    expect(() => parseIdString('gid=1000(alice)')).toThrow('Invalid id string: missing uid');
  });

  it('keeps the input on the error', () => {
    const err = (() => {
      try {
        parseIdString('id: unknown user');
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) {
      expect(err.input).toBe('id: unknown user');
      expect(err.code).toBe('ERR_PARSE');
    }
  });
});
