import type { Lang } from '../types';
import type { TranslationCache } from '../translate/cache';

/**
 * Fluent translation of a whole text: one `translateText` call, cached
 * under the full (trimmed) text. Rejects with TranslationUnavailable when
 * the translator fails.
 */
export async function translateFull(
  text: string,
  sourceLang: Lang,
  targetLang: Lang,
  cache: TranslationCache,
  signal?: AbortSignal,
): Promise<string> {
  const trimmed = text.trim();
  if (!trimmed) return '';
  const res = await cache.lookupText(trimmed, sourceLang, targetLang, signal);
  if (res.status === 'unavailable') throw res.error;
  return res.text;
}
