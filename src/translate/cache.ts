import type { Lang } from '../types';
import type { Translator } from './translator';
import { TranslationUnavailable } from '../errors';
import { normalizeKey } from '../utils/split';
import { raceAbort } from '../utils/async';
import { createLogger } from '../log';

const log = createLogger('cache');

/** Storage behind the cache. Map satisfies it; LruCacheStore bounds it. */
export interface CacheStore<V> {
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  has(key: string): boolean;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}

export class MapCacheStore<V> extends Map<string, V> implements CacheStore<V> {}

/** Least-recently-used eviction; `get` refreshes recency. */
export class LruCacheStore<V> implements CacheStore<V> {
  private readonly map = new Map<string, V>();

  constructor(readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) throw new RangeError('maxEntries must be a positive integer');
  }

  get size() { return this.map.size; }

  get(key: string): V | undefined {
    const v = this.map.get(key);
    if (v === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, v);
    return v;
  }

  set(key: string, value: V) {
    this.map.delete(key);
    this.map.set(key, value);
    while (this.map.size > this.maxEntries) {
      const oldest = this.map.keys().next();
      if (oldest.done) break;
      this.map.delete(oldest.value);
    }
  }

  has(key: string) { return this.map.has(key); }
  delete(key: string) { return this.map.delete(key); }
  clear() { this.map.clear(); }
}

export type LookupResult =
  | { status: 'ok'; text: string; cached: boolean }
  | { status: 'unavailable'; error: TranslationUnavailable };

export type LookupKind = 'word' | 'text';

export type CacheStats = { hits: number; misses: number; failures: number; size: number };

export function cacheKey(kind: LookupKind, unit: string, sourceLang: Lang, targetLang: Lang): string {
  return `${kind}|${sourceLang}|${targetLang}|${normalizeKey(unit)}`;
}

/**
 * Memoizes Translator calls per (unit, sourceLang, targetLang). Concurrent
 * misses on one key share a single Translator call. Failures are never
 * stored, so the next lookup retries.
 */
export class TranslationCache {
  private readonly inflight = new Map<string, Promise<LookupResult>>();
  private hits = 0;
  private misses = 0;
  private failures = 0;

  constructor(
    readonly translator: Translator,
    private readonly store: CacheStore<string> = new MapCacheStore<string>(),
  ) {}

  lookup(unit: string, sourceLang: Lang, targetLang: Lang, signal?: AbortSignal): Promise<LookupResult> {
    return this.resolve('word', unit, sourceLang, targetLang, signal);
  }

  lookupText(text: string, sourceLang: Lang, targetLang: Lang, signal?: AbortSignal): Promise<LookupResult> {
    return this.resolve('text', text, sourceLang, targetLang, signal);
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, failures: this.failures, size: this.store.size };
  }

  clear() { this.store.clear(); }

  private resolve(kind: LookupKind, unit: string, sourceLang: Lang, targetLang: Lang, signal?: AbortSignal): Promise<LookupResult> {
    const key = cacheKey(kind, unit, sourceLang, targetLang);
    const hit = this.store.get(key);
    if (hit !== undefined) {
      this.hits++;
      return Promise.resolve<LookupResult>({ status: 'ok', text: hit, cached: true });
    }
    let pending = this.inflight.get(key);
    if (!pending) {
      this.misses++;
      pending = this.fetch(kind, key, unit.trim(), sourceLang, targetLang)
        .finally(() => this.inflight.delete(key));
      this.inflight.set(key, pending);
    }
    // the shared call finishes (and fills the store) even if this caller gives up
    return raceAbort(pending, signal);
  }

  private async fetch(kind: LookupKind, key: string, unit: string, sourceLang: Lang, targetLang: Lang): Promise<LookupResult> {
    try {
      const text = kind === 'word'
        ? await this.translator.translateWord(unit, sourceLang, targetLang)
        : await this.translator.translateText(unit, sourceLang, targetLang);
      this.store.set(key, text);
      return { status: 'ok', text, cached: false };
    } catch (e) {
      this.failures++;
      log.warn(`${this.translator.name} failed for "${unit}" (${sourceLang}→${targetLang})`, e);
      return { status: 'unavailable', error: new TranslationUnavailable(unit, this.translator.name, e) };
    }
  }
}
