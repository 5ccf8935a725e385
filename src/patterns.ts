import { END_OF_STREAM } from './types.js';
import type { Pattern, PatternInput, PatternMatch } from './types.js';

/**
 * Default shell prompt: an optional `(venv) ` prefix, then `[user@host dir]$ `
 * or `# ` for root.
 */
export const PROMPT = /(\(.*\)\s+)?\[.*\][$#]\s+/;

/**
 * Compile one pattern input. Literals match when the tested text starts with
 * them; regular expressions are anchored at the start of the tested text.
 */
export function compilePattern(input: PatternInput, index: number): Pattern {
  if (input === END_OF_STREAM) {
    return { index, kind: 'eos', source: 'END_OF_STREAM', test: () => null };
  }

  if (typeof input === 'string') {
    const literal = input;
    return {
      index,
      kind: 'literal',
      source: JSON.stringify(literal),
      test: (text) => text.startsWith(literal)
        ? { text: literal, groups: [], named: {} }
        : null,
    };
  }

  // sticky + lastIndex 0 anchors the match at the start without rewriting the source
  const anchored = new RegExp(input.source, input.flags.replace(/[gy]/g, '') + 'y');
  return {
    index,
    kind: 'regex',
    source: String(input),
    test: (text): PatternMatch | null => {
      anchored.lastIndex = 0;
      const m = anchored.exec(text);
      if (!m) return null;
      return {
        text: m[0],
        groups: m.slice(1),
        named: { ...m.groups },
      };
    },
  };
}

/**
 * Compile a pattern list (a single pattern counts as a one-element list)
 */
export function compilePatterns(input: PatternInput | readonly PatternInput[]): Pattern[] {
  const list: readonly PatternInput[] = isPatternList(input) ? input : [input];
  return list.map((p, i) => compilePattern(p, i));
}

function isPatternList(input: PatternInput | readonly PatternInput[]): input is readonly PatternInput[] {
  return Array.isArray(input);
}

/**
 * Test a prefix against the patterns in list order; the first hit wins.
 */
export function firstMatch(
  patterns: readonly Pattern[],
  text: string
): { pattern: Pattern; match: PatternMatch } | null {
  for (const pattern of patterns) {
    if (pattern.kind === 'eos') continue;
    const match = pattern.test(text);
    if (match) return { pattern, match };
  }
  return null;
}

/**
 * Index of the END_OF_STREAM sentinel in a compiled list, or -1
 */
export function sentinelIndex(patterns: readonly Pattern[]): number {
  const eos = patterns.find(p => p.kind === 'eos');
  return eos ? eos.index : -1;
}
