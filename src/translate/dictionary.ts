import { readFile } from 'node:fs/promises';
import type { Lang } from '../types';
import type { Translator } from './translator';
import { normalizeKey, tokenize } from '../utils/split';

/**
 * Offline translator over a bilingual word list, one `headword<TAB>translation`
 * pair per line (the layout of a FreeDict TEI export flattened to TSV).
 * The first translation listed for a headword wins. Lines starting with `#`
 * are comments.
 */
export class DictionaryTranslator implements Translator {
  readonly name: string;
  private readonly entries = new Map<string, string>();

  constructor(tsv: string, readonly sourceLang: Lang, readonly targetLang: Lang) {
    this.name = `Dictionary(${sourceLang}→${targetLang})`;
    for (const line of tsv.split(/\r?\n/)) {
      if (!line.trim() || line.startsWith('#')) continue;
      const tab = line.indexOf('\t');
      if (tab < 0) continue;
      const head = normalizeKey(line.slice(0, tab));
      const tr = line.slice(tab + 1).split('\t')[0].trim();
      if (head && tr && !this.entries.has(head)) this.entries.set(head, tr);
    }
  }

  static async fromFile(path: string, sourceLang: Lang, targetLang: Lang): Promise<DictionaryTranslator> {
    return new DictionaryTranslator(await readFile(path, 'utf8'), sourceLang, targetLang);
  }

  get size() { return this.entries.size; }

  async translateWord(word: string, sourceLang: Lang, targetLang: Lang): Promise<string> {
    this.checkPair(sourceLang, targetLang);
    const hit = this.entries.get(normalizeKey(word));
    if (hit === undefined) throw new Error(`"${word}" is not in the dictionary`);
    return hit;
  }

  // word by word; unknown words stay as they are
  async translateText(text: string, sourceLang: Lang, targetLang: Lang): Promise<string> {
    this.checkPair(sourceLang, targetLang);
    return tokenize(text)
      .map(t => (t.kind === 'word' ? this.entries.get(normalizeKey(t.text)) ?? t.text : t.text))
      .join('');
  }

  private checkPair(sourceLang: Lang, targetLang: Lang) {
    if (sourceLang !== this.sourceLang || targetLang !== this.targetLang) {
      throw new Error(`${this.name} cannot translate ${sourceLang}→${targetLang}`);
    }
  }
}
