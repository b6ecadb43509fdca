import type { DecodedSegment, DecodedText, Lang, Token, TranslationUnit } from '../types';
import type { TranslationCache } from '../translate/cache';
import { createPhraseMatcher, type PhraseMatcher } from './phrases';
import { joinTokens } from '../utils/split';
import { mapPool } from '../utils/async';
import { DecodeCancelled } from '../errors';
import { createLogger } from '../log';

const log = createLogger('decode');

export const DEFAULT_DECODE_CONCURRENCY = 6;

export type PhraseHints = readonly string[] | ReadonlySet<string> | PhraseMatcher;

export type DecodeOptions = {
  signal?: AbortSignal;
  concurrency?: number;
};

type PendingUnit = { span: Token[]; isPhrase: boolean };

/**
 * Splits the token stream into lookup units (one word, or one hinted
 * phrase) and passthrough tokens. Pure; no lookups happen here.
 */
function segmentTokens(tokens: readonly Token[], matcher: PhraseMatcher): Array<PendingUnit | Token> {
  const out: Array<PendingUnit | Token> = [];
  let i = 0;
  while (i < tokens.length) {
    const t = tokens[i];
    if (t.kind !== 'word') {
      out.push(t);
      i++;
      continue;
    }
    const end = matcher.match(tokens, i);
    if (end !== undefined) {
      out.push({ span: tokens.slice(i, end), isPhrase: true });
      i = end;
    } else {
      out.push({ span: [t], isPhrase: false });
      i++;
    }
  }
  return out;
}

function isPending(x: PendingUnit | Token): x is PendingUnit {
  return 'span' in x;
}

/**
 * Word-by-word ("decoded") translation. Each word, or each phrase from
 * `phraseHints`, is looked up on its own through the cache, and the output
 * keeps the source order token for token. A failed lookup leaves the source
 * word in place with `fallback: true`; it never fails the whole text.
 */
export async function decode(
  tokens: readonly Token[],
  sourceLang: Lang,
  targetLang: Lang,
  phraseHints: PhraseHints,
  cache: TranslationCache,
  opts: DecodeOptions = {},
): Promise<DecodedText> {
  const { signal, concurrency = DEFAULT_DECODE_CONCURRENCY } = opts;
  if (signal?.aborted) throw new DecodeCancelled(signal.reason);

  const matcher = isMatcher(phraseHints) ? phraseHints : createPhraseMatcher(phraseHints);
  const parts = segmentTokens(tokens, matcher);
  const pending = parts.filter(isPending);

  let translated: TranslationUnit[];
  try {
    translated = await mapPool(pending, concurrency, async ({ span, isPhrase }): Promise<TranslationUnit> => {
      const sourceText = joinTokens(span);
      const res = await cache.lookup(sourceText, sourceLang, targetLang, signal);
      if (res.status === 'ok') {
        return { kind: 'unit', sourceSpan: span, sourceText, translatedText: res.text, isPhrase, fallback: false };
      }
      return { kind: 'unit', sourceSpan: span, sourceText, translatedText: sourceText, isPhrase, fallback: true };
    }, signal);
  } catch (e) {
    if (signal?.aborted) throw new DecodeCancelled(e);
    throw e;
  }

  let u = 0;
  const segments: DecodedSegment[] = parts.map((p): DecodedSegment => (isPending(p) ? translated[u++] : { kind: 'passthrough', token: p }));
  const decoded: DecodedText = { sourceText: joinTokens(tokens), sourceLang, targetLang, segments };
  const fb = fallbackCount(decoded);
  if (fb) log.info(`${fb} of ${pending.length} units left untranslated (${sourceLang}→${targetLang})`);
  return decoded;
}

function isMatcher(x: PhraseHints): x is PhraseMatcher {
  return 'match' in x && typeof x.match === 'function';
}

export function units(decoded: DecodedText): TranslationUnit[] {
  return decoded.segments.filter((s): s is TranslationUnit => s.kind === 'unit');
}

export function fallbackCount(decoded: DecodedText): number {
  return units(decoded).filter(u => u.fallback).length;
}

/** Flattens segments back to tokens; equals the decoder's input token list. */
export function segmentTokensOf(decoded: DecodedText): Token[] {
  return decoded.segments.flatMap(s => (s.kind === 'unit' ? [...s.sourceSpan] : [s.token]));
}
