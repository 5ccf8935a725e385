/**
 * Parsing for the output of `id`:
 *
 *   uid=1000(alice) gid=1000(alice) groups=1000(alice),27(sudo)
 *
 * Fields other than uid, gid and groups (e.g. SELinux `context=`) are skipped.
 */

import { ParseError } from './errors.js';

export interface IdEntry {
  id: number;
  name: string;
}

export interface Identity {
  uid: IdEntry;
  gid: IdEntry;
  groups: IdEntry[];
}

export type LexKind = 'sep' | 'comma' | 'equals' | 'paren' | 'word';

export interface Lexeme {
  kind: LexKind;
  text: string;
}

function classify(ch: string): LexKind {
  if (' \t\r\n'.includes(ch)) return 'sep';
  if (ch === ',') return 'comma';
  if (ch === '=') return 'equals';
  if (ch === '(' || ch === ')') return 'paren';
  return 'word';
}

/**
 * Split into runs of the same character class. Parens are always single
 * lexemes so `)(` cannot merge.
 */
export function lexIdString(input: string): Lexeme[] {
  const out: Lexeme[] = [];
  for (const ch of input) {
    const kind = classify(ch);
    const last = out[out.length - 1];
    if (last && last.kind === kind && kind !== 'paren') {
      last.text += ch;
    } else {
      out.push({ kind, text: ch });
    }
  }
  return out;
}

class Cursor {
  private pos = 0;

  constructor(
    private readonly lexemes: Lexeme[],
    private readonly input: string
  ) {}

  peek(): Lexeme | undefined {
    return this.lexemes[this.pos];
  }

  next(): Lexeme {
    const lexeme = this.lexemes[this.pos];
    if (!lexeme) throw this.fail('unexpected end of input');
    this.pos++;
    return lexeme;
  }

  expect(kind: LexKind, text?: string): Lexeme {
    const lexeme = this.next();
    if (lexeme.kind !== kind || (text !== undefined && lexeme.text !== text)) {
      throw this.fail(`expected ${text ?? kind}, got "${lexeme.text}"`);
    }
    return lexeme;
  }

  fail(reason: string): ParseError {
    return new ParseError(`Invalid id string: ${reason}`, this.input);
  }
}

/** `1000(alice)` */
function readEntry(cursor: Cursor): IdEntry {
  const idText = cursor.expect('word').text;
  if (!/^\d+$/.test(idText)) {
    throw cursor.fail(`expected a numeric id, got "${idText}"`);
  }
  cursor.expect('paren', '(');
  const name = cursor.expect('word').text;
  cursor.expect('paren', ')');
  return { id: Number(idText), name };
}

export function parseIdString(input: string): Identity {
  const cursor = new Cursor(lexIdString(input), input);
  let uid: IdEntry | undefined;
  let gid: IdEntry | undefined;
  const groups: IdEntry[] = [];

  while (cursor.peek()) {
    const lexeme = cursor.next();
    if (lexeme.kind !== 'word') continue;

    const key = lexeme.text;
    if (key !== 'uid' && key !== 'gid' && key !== 'groups') {
      // unknown field: skip to the next separator
      while (cursor.peek() && cursor.peek()?.kind !== 'sep') cursor.next();
      continue;
    }

    cursor.expect('equals', '=');
    if (key === 'uid') {
      uid = readEntry(cursor);
    } else if (key === 'gid') {
      gid = readEntry(cursor);
    } else {
      groups.push(readEntry(cursor));
      while (cursor.peek()?.kind === 'comma') {
        cursor.next();
        groups.push(readEntry(cursor));
      }
    }
  }

  if (!uid) throw cursor.fail('missing uid');
  if (!gid) throw cursor.fail('missing gid');
  return { uid, gid, groups };
}
