export * from './types';
export * from './errors';
export { createLogger, setLogLevel, type LogLevel, type Logger } from './log';
export { loadConfig, configFromEnv, DEFAULT_CONFIG, type DecoderConfig, type IncorrectPolicy } from './config';
export { tokenize, joinTokens, normalizeKey } from './utils/split';
export { parseCsv, formatCsv, CSV_HEADER, type ParsedCsvRecord } from './utils/csv';
export { createMutex, mapPool, type Mutex } from './utils/async';
export { ChainTranslator, type Translator } from './translate/translator';
export { TranslationCache, MapCacheStore, LruCacheStore, type CacheStore, type LookupResult, type CacheStats } from './translate/cache';
export { GeminiTranslator } from './translate/gemini';
export { DictionaryTranslator } from './translate/dictionary';
export { createPhraseMatcher, type PhraseMatcher } from './decode/phrases';
export { decode, units, fallbackCount, segmentTokensOf, type DecodeOptions, type PhraseHints } from './decode/decoder';
export { translateFull } from './decode/contextual';
export { formatAligned } from './decode/format';
export { applyReview, resetCard, leitnerSettings, doublingIntervals, intervalFor, type LeitnerSettings } from './srs/leitner';
export { cardKey, type CardInput } from './srs/cards';
export { LeitnerScheduler, type SchedulerOptions } from './srs/scheduler';
export { Reconciler, exportCsv, type ImportResult, type ImportRecord } from './srs/reconcile';
export { MemoryCardStore, MemoryTextStore } from './storage/memory';
export { DecoderDB, openDatabase } from './storage/db';
export { DexieCardStore, DexieTextStore, wipeAllLocalData } from './storage/repo';
export { SupabaseCardStore, SupabaseTextStore } from './storage/remote';
export { createSupabase } from './shims/supabaseClient';
export { Workspace, createWorkspace, translatorFromConfig, type WorkspaceDeps, type ImportTextInput } from './workspace';
