import { describe, expect, it } from 'vitest';
import { LruCacheStore, MapCacheStore, TranslationCache, cacheKey } from './cache';
import { StubTranslator } from '../testing/stubTranslator';
import { TranslationUnavailable } from '../errors';
import { setLogLevel } from '../log';

setLogLevel('silent');

describe('TranslationCache', () => {
  it('calls the translator once per normalized key', async () => {
    const tr = new StubTranslator({ words: { haus: 'house' } });
    const cache = new TranslationCache(tr);
    expect(await cache.lookup('Haus', 'de', 'en')).toEqual({ status: 'ok', text: 'house', cached: false });
    expect(await cache.lookup(' haus ', 'de', 'en')).toEqual({ status: 'ok', text: 'house', cached: true });
    expect(tr.calls).toHaveLength(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, failures: 0, size: 1 });
  });

  it('keeps language pairs apart', async () => {
    const tr = new StubTranslator();
    const cache = new TranslationCache(tr);
    await cache.lookup('casa', 'pt', 'de');
    await cache.lookup('casa', 'pt', 'en');
    expect(tr.calls.map(c => c.targetLang)).toEqual(['de', 'en']);
  });

  it('keeps word and full-text entries apart', async () => {
    const tr = new StubTranslator({ words: { hallo: 'hello' }, texts: { Hallo: 'Hi there' } });
    const cache = new TranslationCache(tr);
    expect(await cache.lookup('Hallo', 'de', 'en')).toMatchObject({ text: 'hello' });
    expect(await cache.lookupText('Hallo', 'de', 'en')).toMatchObject({ text: 'Hi there' });
    expect(cacheKey('word', 'Hallo', 'de', 'en')).toBe('word|de|en|hallo');
  });

  it('collapses concurrent misses into one translator call', async () => {
    const tr = new StubTranslator({ words: { baum: 'tree' } });
    tr.hold();
    const cache = new TranslationCache(tr);
    const pending = Array.from({ length: 10 }, () => cache.lookup('Baum', 'de', 'en'));
    tr.open();
    const results = await Promise.all(pending);
    expect(tr.calls).toHaveLength(1);
    expect(results.every(r => r.status === 'ok' && r.text === 'tree')).toBe(true);
  });

  it('reports failures as unavailable and does not cache them', async () => {
    const tr = new StubTranslator({ fail: ['haus'] });
    const cache = new TranslationCache(tr);
    const res = await cache.lookup('Haus', 'de', 'en');
    expect(res.status).toBe('unavailable');
    if (res.status === 'unavailable') {
      expect(res.error).toBeInstanceOf(TranslationUnavailable);
      expect(res.error.code).toBe('TRANSLATION_UNAVAILABLE');
      expect(res.error.unit).toBe('Haus');
    }
    await cache.lookup('Haus', 'de', 'en');
    expect(tr.calls).toHaveLength(2);
    expect(cache.stats()).toMatchObject({ failures: 2, size: 0 });
  });

  it('lets one caller abort while the shared call still fills the cache', async () => {
    const tr = new StubTranslator({ words: { see: 'lake' } });
    tr.hold();
    const cache = new TranslationCache(tr);
    const ctrl = new AbortController();
    const aborted = cache.lookup('See', 'de', 'en', ctrl.signal);
    const other = cache.lookup('See', 'de', 'en');
    ctrl.abort(new Error('left the page'));
    await expect(aborted).rejects.toThrow('left the page');
    tr.open();
    expect(await other).toEqual({ status: 'ok', text: 'lake', cached: false });
    expect(await cache.lookup('see', 'de', 'en')).toMatchObject({ cached: true });
    expect(tr.calls).toHaveLength(1);
  });

  it('works with a bounded store without changing the interface', async () => {
    const tr = new StubTranslator();
    const cache = new TranslationCache(tr, new LruCacheStore<string>(2));
    await cache.lookup('a', 'de', 'en');
    await cache.lookup('b', 'de', 'en');
    await cache.lookup('c', 'de', 'en');
    await cache.lookup('a', 'de', 'en');
    expect(tr.calls.map(c => c.input)).toEqual(['a', 'b', 'c', 'a']);
    expect(cache.stats().size).toBe(2);
  });
});

describe('LruCacheStore', () => {
  it('evicts the least recently used entry', () => {
    const lru = new LruCacheStore<number>(2);
    lru.set('a', 1);
    lru.set('b', 2);
    expect(lru.get('a')).toBe(1); // a is now most recent
    lru.set('c', 3);
    expect(lru.has('b')).toBe(false);
    expect(lru.has('a')).toBe(true);
    expect(lru.size).toBe(2);
  });

  it('rejects a non-positive bound', () => {
    expect(() => new LruCacheStore(0)).toThrow(RangeError);
  });
});

describe('MapCacheStore', () => {
  it('is an unbounded Map', () => {
    const m = new MapCacheStore<string>();
    for (let i = 0; i < 100; i++) m.set(String(i), 'x');
    expect(m.size).toBe(100);
  });
});
