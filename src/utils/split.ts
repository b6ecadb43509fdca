import type { Token, TokenKind } from '../types';
import { TokenizationFailure } from '../errors';

export function uuid() {
  return crypto.randomUUID?.() ??
    'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, c => {
      const r = (Math.random() * 16) | 0;
      const v = c === 'x' ? r : (r & 0x3) | 0x8;
      return v.toString(16);
    });
}

// word: letters/digits/marks, apostrophes only between them (don't, l’homme)
// space: any whitespace run
// other: exactly one code point (the u flag keeps surrogate pairs whole)
const TOKEN_RE = /([\p{L}\p{N}\p{M}]+(?:['’][\p{L}\p{N}\p{M}]+)*)|(\s+)|([\s\S])/gu;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function tokenize(text: unknown): Token[] {
  if (typeof text !== 'string') throw new TokenizationFailure(`expected a string, got ${text === null ? 'null' : typeof text}`);
  if (LONE_SURROGATE.test(text)) throw new TokenizationFailure('unpaired surrogate in input');

  const out: Token[] = [];
  for (const m of text.matchAll(TOKEN_RE)) {
    let kind: TokenKind;
    if (m[1] !== undefined) kind = 'word';
    else if (m[2] !== undefined) kind = m[2].includes('\n') ? 'linebreak' : 'whitespace';
    else kind = 'punctuation';
    out.push(Object.freeze({ kind, text: m[0], sourceIndex: m.index ?? 0 }));
  }
  return out;
}

export function joinTokens(tokens: readonly Token[]): string {
  return tokens.map(t => t.text).join('');
}

export function wordsOf(text: string): string[] {
  return tokenize(text).filter(t => t.kind === 'word').map(t => t.text);
}

// Normalized lookup form: trimmed, casefolded, inner whitespace collapsed.
export function normalizeKey(s: string): string {
  return s.trim().replace(/\s+/g, ' ').toLowerCase();
}
