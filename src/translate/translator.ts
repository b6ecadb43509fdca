import type { Lang } from '../types';

/**
 * Anything that can translate a single word/phrase and a whole text.
 * Both methods may reject (network, quota, unknown word); callers go
 * through TranslationCache, which turns a rejection into an
 * `unavailable` result.
 */
export interface Translator {
  readonly name: string;
  translateWord(word: string, sourceLang: Lang, targetLang: Lang): Promise<string>;
  translateText(text: string, sourceLang: Lang, targetLang: Lang): Promise<string>;
}

/** Tries each translator in order; first success wins. */
export class ChainTranslator implements Translator {
  readonly name: string;

  constructor(private readonly translators: readonly Translator[]) {
    if (!translators.length) throw new Error('ChainTranslator needs at least one translator');
    this.name = translators.map(t => t.name).join(' → ');
  }

  translateWord(word: string, sourceLang: Lang, targetLang: Lang) {
    return this.first(t => t.translateWord(word, sourceLang, targetLang));
  }

  translateText(text: string, sourceLang: Lang, targetLang: Lang) {
    return this.first(t => t.translateText(text, sourceLang, targetLang));
  }

  private async first(call: (t: Translator) => Promise<string>): Promise<string> {
    let lastError: unknown;
    for (const t of this.translators) {
      try {
        return await call(t);
      } catch (e) {
        lastError = e;
      }
    }
    throw lastError;
  }
}
