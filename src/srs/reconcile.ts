import type { Card, CardStore, CsvRecord, Lang } from '../types';
import { MalformedImportRecord } from '../errors';
import { createMutex, type Mutex } from '../utils/async';
import { createLogger } from '../log';
import { cardKey, newCard, withContent } from './cards';

const log = createLogger('reconcile');

export type ImportResult = {
  added: number;
  updated: number;
  skipped: number;
  errors: MalformedImportRecord[];
};

export type ImportRecord = Partial<CsvRecord> & { line?: number };

/**
 * Merges CSV vocabulary into the live CardSet. Content (translation,
 * example) comes from the file; box, due date and history of matching cards
 * are never touched.
 */
export class Reconciler {
  constructor(
    private readonly store: CardStore,
    private readonly lock: Mutex = createMutex(),
    private readonly clock: () => number = Date.now,
  ) {}

  importCsv(records: readonly ImportRecord[], langs: { sourceLang: Lang; targetLang: Lang }, now = this.clock()): Promise<ImportResult> {
    return this.lock(async () => {
      const result: ImportResult = { added: 0, updated: 0, skipped: 0, errors: [] };
      // staged by key so duplicate rows within one file hit the same card
      const staged = new Map<string, Card>();
      for (let i = 0; i < records.length; i++) {
        const rec = records[i];
        const line = rec.line ?? i + 1;
        const word = rec.word?.trim() ?? '';
        const translation = rec.translation?.trim() ?? '';
        if (!word) {
          result.skipped++;
          result.errors.push(new MalformedImportRecord(line, 'missing word'));
          continue;
        }
        const key = cardKey(word, langs.sourceLang, langs.targetLang);
        const existing = staged.get(key) ?? await this.store.findByKey(key);
        if (existing && !existing.deleted) {
          staged.set(key, withContent(existing, { translation, exampleSentence: rec.example }, now));
          result.updated++;
        } else {
          staged.set(key, newCard({ word, translation, exampleSentence: rec.example, ...langs }, now));
          result.added++;
        }
      }
      await this.store.putMany([...staged.values()]);
      if (result.skipped) log.warn(`skipped ${result.skipped} malformed record(s)`, result.errors.map(e => e.message));
      log.info(`import: ${result.added} added, ${result.updated} updated, ${result.skipped} skipped`);
      return result;
    });
  }
}

/** Content-only export; scheduler state stays out of the file. */
export function exportCsv(cards: readonly Card[]): CsvRecord[] {
  return cards
    .filter(c => !c.deleted)
    .map(c => ({ word: c.word, translation: c.translation, example: c.exampleSentence ?? '' }));
}
