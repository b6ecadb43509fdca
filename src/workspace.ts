import type { Card, CardStore, DecodedText, Lang, ReviewOutcome, StoredText, TextStore } from './types';
import type { Translator } from './translate/translator';
import { ChainTranslator } from './translate/translator';
import { LruCacheStore, MapCacheStore, TranslationCache } from './translate/cache';
import { GeminiTranslator } from './translate/gemini';
import { DictionaryTranslator } from './translate/dictionary';
import { decode, type PhraseHints } from './decode/decoder';
import { translateFull } from './decode/contextual';
import { formatAligned } from './decode/format';
import { LeitnerScheduler } from './srs/scheduler';
import { leitnerSettings } from './srs/leitner';
import { Reconciler, exportCsv, type ImportResult } from './srs/reconcile';
import { createMutex } from './utils/async';
import { formatCsv, parseCsv } from './utils/csv';
import { tokenize, uuid } from './utils/split';
import { openDatabase } from './storage/db';
import { DexieCardStore, DexieTextStore } from './storage/repo';
import { SupabaseCardStore, SupabaseTextStore } from './storage/remote';
import { createSupabase } from './shims/supabaseClient';
import { DEFAULT_CONFIG, type DecoderConfig } from './config';
import { DecodeCancelled, TranslationUnavailable } from './errors';
import { createLogger, setLogLevel } from './log';

const log = createLogger('workspace');

export type WorkspaceDeps = {
  translator: Translator;
  cards: CardStore;
  texts: TextStore;
  config?: Partial<DecoderConfig>;
  clock?: () => number;
};

export type ImportTextInput = {
  title: string;
  raw: string;
  sourceLang: Lang;
  targetLang: Lang;
  phraseHints?: readonly string[] | ReadonlySet<string>;
  notes?: string;
  folderId?: string;
  signal?: AbortSignal;
};

type LangPair = { sourceLang: Lang; targetLang: Lang };

/**
 * What the surrounding app talks to: imports texts (decoded + contextual),
 * turns looked-up words into cards, runs reviews and CSV import/export.
 * Scheduler and Reconciler share one mutex, so all CardSet writes are serial.
 */
export class Workspace {
  readonly config: DecoderConfig;
  readonly cache: TranslationCache;
  readonly scheduler: LeitnerScheduler;
  readonly reconciler: Reconciler;
  readonly cards: CardStore;
  readonly texts: TextStore;
  private readonly clock: () => number;

  constructor(deps: WorkspaceDeps) {
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    this.clock = deps.clock ?? Date.now;
    this.cards = deps.cards;
    this.texts = deps.texts;
    const store = this.config.cacheMaxEntries > 0 ? new LruCacheStore<string>(this.config.cacheMaxEntries) : new MapCacheStore<string>();
    this.cache = new TranslationCache(deps.translator, store);
    const lock = createMutex();
    this.scheduler = new LeitnerScheduler(this.cards, {
      settings: leitnerSettings({
        boxCount: this.config.boxCount,
        baseIntervalMs: this.config.baseIntervalMs,
        incorrectPolicy: this.config.incorrectPolicy,
      }),
      clock: this.clock,
      mutex: lock,
    });
    this.reconciler = new Reconciler(this.cards, lock, this.clock);
  }

  decodeText(raw: string, langs: LangPair, phraseHints: PhraseHints = [], signal?: AbortSignal): Promise<DecodedText> {
    return decode(tokenize(raw), langs.sourceLang, langs.targetLang, phraseHints, this.cache, {
      signal,
      concurrency: this.config.decodeConcurrency,
    });
  }

  translateFull(raw: string, langs: LangPair, signal?: AbortSignal): Promise<string> {
    return translateFull(raw, langs.sourceLang, langs.targetLang, this.cache, signal);
  }

  /** Decodes and translates a text, then stores it. A failed contextual translation is left out, not fatal. */
  async importText(input: ImportTextInput): Promise<StoredText> {
    const langs = { sourceLang: input.sourceLang, targetLang: input.targetLang };
    const decoded = await this.decodeText(input.raw, langs, input.phraseHints, input.signal);
    let contextual: string | undefined;
    try {
      contextual = await this.translateFull(input.raw, langs, input.signal);
    } catch (e) {
      if (input.signal?.aborted) throw new DecodeCancelled(e);
      if (!(e instanceof TranslationUnavailable)) throw e;
      log.warn(`contextual translation unavailable for "${input.title}"`, e.message);
    }
    const now = this.clock();
    const text: StoredText = { id: uuid(), title: input.title, ...langs, raw: input.raw, decoded, createdAt: now, updatedAt: now };
    if (contextual !== undefined) text.contextual = contextual;
    if (input.notes) text.notes = input.notes;
    if (input.folderId) text.folderId = input.folderId;
    await this.texts.save(text);
    return text;
  }

  renderAligned(decoded: DecodedText, maxLineLength = 80): string {
    return formatAligned(decoded, maxLineLength);
  }

  /** Word picked in the reader: translate it (cached) and file it as a card. */
  async lookupWord(word: string, langs: LangPair, exampleSentence?: string): Promise<Card> {
    const res = await this.cache.lookup(word, langs.sourceLang, langs.targetLang);
    if (res.status === 'unavailable') throw res.error;
    return this.scheduler.addCard({ word, translation: res.text, exampleSentence, ...langs });
  }

  review(cardId: string, outcome: ReviewOutcome): Promise<Card> {
    return this.scheduler.review(cardId, outcome);
  }

  dueCards(now?: number): Promise<Card[]> {
    return this.scheduler.dueCards(now);
  }

  importCsvText(csv: string, langs: LangPair): Promise<ImportResult> {
    return this.reconciler.importCsv(parseCsv(csv), langs);
  }

  async exportCsvText(): Promise<string> {
    return formatCsv(exportCsv(await this.cards.all()));
  }
}

/** Translator from config: offline dictionary first, then Gemini. */
export async function translatorFromConfig(config: DecoderConfig, langs: LangPair): Promise<Translator> {
  const chain: Translator[] = [];
  if (config.dictionaryPath) chain.push(await DictionaryTranslator.fromFile(config.dictionaryPath, langs.sourceLang, langs.targetLang));
  if (config.gemini) chain.push(new GeminiTranslator({ apiKey: config.gemini.apiKey, model: config.gemini.model }));
  if (!chain.length) throw new Error('no translator configured: set DECODER_DICTIONARY_PATH or DECODER_GEMINI_API_KEY');
  return chain.length === 1 ? chain[0] : new ChainTranslator(chain);
}

/** Supabase when configured, else the local Dexie database. */
export async function createWorkspace(config: DecoderConfig, langs: LangPair, opts: { dbName?: string } = {}): Promise<Workspace> {
  setLogLevel(config.logLevel);
  const translator = await translatorFromConfig(config, langs);
  if (config.supabase) {
    const supabase = createSupabase(config.supabase.url, config.supabase.anonKey);
    return new Workspace({ translator, cards: new SupabaseCardStore(supabase), texts: new SupabaseTextStore(supabase), config });
  }
  const db = openDatabase(opts.dbName);
  return new Workspace({ translator, cards: new DexieCardStore(db), texts: new DexieTextStore(db), config });
}
