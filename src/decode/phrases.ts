import type { Token } from '../types';
import { wordsOf } from '../utils/split';

export interface PhraseMatcher {
  readonly size: number;
  /** End index (exclusive) of the longest phrase starting at `start`, or undefined. */
  match(tokens: readonly Token[], start: number): number | undefined;
}

/**
 * Greedy longest-match over multi-word hints. Words compare
 * case-insensitively; between two words of a phrase there must be exactly one
 * whitespace token whose text is a single space.
 */
export function createPhraseMatcher(hints: Iterable<string>): PhraseMatcher {
  const byFirst = new Map<string, string[][]>();
  let size = 0;
  const seen = new Set<string>();
  for (const hint of hints) {
    const words = wordsOf(hint).map(w => w.toLowerCase());
    if (words.length < 2) continue;
    const id = words.join(' ');
    if (seen.has(id)) continue;
    seen.add(id);
    size++;
    const list = byFirst.get(words[0]) ?? [];
    list.push(words);
    byFirst.set(words[0], list);
  }
  for (const list of byFirst.values()) list.sort((a, b) => b.length - a.length);

  const matchOne = (tokens: readonly Token[], start: number, words: string[]): number | undefined => {
    let j = start;
    for (let k = 1; k < words.length; k++) {
      const gap = tokens[j + 1];
      const next = tokens[j + 2];
      if (!gap || !next) return undefined;
      if (gap.kind !== 'whitespace' || gap.text !== ' ') return undefined;
      if (next.kind !== 'word' || next.text.toLowerCase() !== words[k]) return undefined;
      j += 2;
    }
    return j + 1;
  };

  return {
    size,
    match(tokens, start) {
      const first = tokens[start];
      if (!first || first.kind !== 'word') return undefined;
      const candidates = byFirst.get(first.text.toLowerCase());
      if (!candidates) return undefined;
      for (const words of candidates) {
        const end = matchOne(tokens, start, words);
        if (end !== undefined) return end;
      }
      return undefined;
    },
  };
}
