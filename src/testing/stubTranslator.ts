import type { Lang } from '../types';
import type { Translator } from '../translate/translator';

export type StubOptions = {
  words?: Record<string, string>; // lowercase source → translation
  texts?: Record<string, string>;
  fail?: Iterable<string>; // lowercase words/texts that reject
  delayMs?: number;
};

/** In-process Translator for tests: fixed tables, failure list, call log. */
export class StubTranslator implements Translator {
  readonly name = 'stub';
  readonly calls: Array<{ method: 'word' | 'text'; input: string; sourceLang: Lang; targetLang: Lang }> = [];
  private readonly fail: Set<string>;
  private gate?: Promise<void>;
  private release?: () => void;

  constructor(private readonly opts: StubOptions = {}) {
    this.fail = new Set(opts.fail ?? []);
  }

  /** Holds every call until `open()` is called. */
  hold() {
    this.gate = new Promise<void>(r => { this.release = r; });
  }

  open() {
    this.release?.();
    this.gate = undefined;
  }

  async translateWord(word: string, sourceLang: Lang, targetLang: Lang): Promise<string> {
    this.calls.push({ method: 'word', input: word, sourceLang, targetLang });
    await this.wait();
    const key = word.toLowerCase();
    if (this.fail.has(key)) throw new Error(`stub: no translation for ${word}`);
    return this.opts.words?.[key] ?? `<${word}>`;
  }

  async translateText(text: string, sourceLang: Lang, targetLang: Lang): Promise<string> {
    this.calls.push({ method: 'text', input: text, sourceLang, targetLang });
    await this.wait();
    if (this.fail.has(text.toLowerCase())) throw new Error('stub: text translation failed');
    return this.opts.texts?.[text] ?? `[${text}]`;
  }

  private async wait() {
    if (this.gate) await this.gate;
    if (this.opts.delayMs) await new Promise(r => setTimeout(r, this.opts.delayMs));
  }
}
