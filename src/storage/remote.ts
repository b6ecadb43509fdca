import type { SupabaseClient } from '@supabase/supabase-js';
import type { Card, CardStore, DecodedText, ReviewEntry, StoredText, TextStore } from '../types';
import { keyOf } from '../srs/cards';

// Remote rows use snake_case columns and ISO timestamps:
//   cards(id, key, word, translation, example_sentence, source_lang, target_lang,
//         box, due_at, last_reviewed_at, created_at, updated_at, history jsonb, deleted)
//   texts(id, title, source_lang, target_lang, raw, decoded jsonb, contextual,
//         notes, folder_id, created_at, updated_at, deleted)

export type CardRemoteRow = {
  id: string;
  key: string;
  word: string;
  translation: string;
  example_sentence: string | null;
  source_lang: string;
  target_lang: string;
  box: number;
  due_at: string;
  last_reviewed_at: string | null;
  created_at: string;
  updated_at: string;
  history: ReviewEntry[];
  deleted: boolean;
};

export type TextRemoteRow = {
  id: string;
  title: string;
  source_lang: string;
  target_lang: string;
  raw: string;
  decoded: DecodedText;
  contextual: string | null;
  notes: string | null;
  folder_id: string | null;
  created_at: string;
  updated_at: string;
  deleted: boolean;
};

function isoToMs(iso?: string | null) { if (!iso) return 0; const t = Date.parse(iso); return Number.isNaN(t) ? 0 : t; }
const msToIso = (ms: number) => new Date(ms).toISOString();

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

export function isCardRemoteRow(v: unknown): v is CardRemoteRow {
  return isRecord(v) && typeof v.id === 'string' && typeof v.word === 'string' && typeof v.box === 'number' && typeof v.due_at === 'string';
}

export function isTextRemoteRow(v: unknown): v is TextRemoteRow {
  return isRecord(v) && typeof v.id === 'string' && typeof v.raw === 'string' && isRecord(v.decoded);
}

export function cardToRemote(c: Card): CardRemoteRow {
  return {
    id: c.id,
    key: keyOf(c),
    word: c.word,
    translation: c.translation,
    example_sentence: c.exampleSentence ?? null,
    source_lang: c.sourceLang,
    target_lang: c.targetLang,
    box: c.box,
    due_at: msToIso(c.dueAt),
    last_reviewed_at: c.lastReviewedAt === undefined ? null : msToIso(c.lastReviewedAt),
    created_at: msToIso(c.createdAt),
    updated_at: msToIso(c.updatedAt),
    history: c.history,
    deleted: !!c.deleted,
  };
}

export function cardFromRemote(r: CardRemoteRow): Card {
  const card: Card = {
    id: r.id,
    word: r.word,
    translation: r.translation,
    sourceLang: r.source_lang,
    targetLang: r.target_lang,
    box: r.box,
    dueAt: isoToMs(r.due_at),
    createdAt: isoToMs(r.created_at),
    updatedAt: isoToMs(r.updated_at),
    history: Array.isArray(r.history) ? r.history : [],
  };
  if (r.example_sentence) card.exampleSentence = r.example_sentence;
  if (r.last_reviewed_at) card.lastReviewedAt = isoToMs(r.last_reviewed_at);
  if (r.deleted) card.deleted = true;
  return card;
}

export function textToRemote(t: StoredText): TextRemoteRow {
  return {
    id: t.id,
    title: t.title,
    source_lang: t.sourceLang,
    target_lang: t.targetLang,
    raw: t.raw,
    decoded: t.decoded,
    contextual: t.contextual ?? null,
    notes: t.notes ?? null,
    folder_id: t.folderId ?? null,
    created_at: msToIso(t.createdAt),
    updated_at: msToIso(t.updatedAt),
    deleted: !!t.deleted,
  };
}

export function textFromRemote(r: TextRemoteRow): StoredText {
  const t: StoredText = {
    id: r.id,
    title: r.title,
    sourceLang: r.source_lang,
    targetLang: r.target_lang,
    raw: r.raw,
    decoded: r.decoded,
    createdAt: isoToMs(r.created_at),
    updatedAt: isoToMs(r.updated_at),
  };
  if (r.contextual !== null) t.contextual = r.contextual;
  if (r.notes !== null) t.notes = r.notes;
  if (r.folder_id !== null) t.folderId = r.folder_id;
  return t;
}

export class SupabaseCardStore implements CardStore {
  constructor(private readonly supabase: SupabaseClient, private readonly table = 'cards') {}

  async all(): Promise<Card[]> {
    const { data, error } = await this.supabase.from(this.table).select('*').eq('deleted', false);
    if (error) throw error;
    return (data ?? []).filter(isCardRemoteRow).map(cardFromRemote);
  }

  async get(id: string): Promise<Card | undefined> {
    return this.first('id', id);
  }

  async findByKey(key: string): Promise<Card | undefined> {
    return this.first('key', key);
  }

  async put(card: Card) {
    await this.putMany([card]);
  }

  async putMany(cards: Card[]) {
    if (!cards.length) return;
    const { error } = await this.supabase.from(this.table).upsert(cards.map(cardToRemote));
    if (error) throw error;
  }

  async remove(id: string) {
    const { error } = await this.supabase.from(this.table)
      .update({ deleted: true, updated_at: msToIso(Date.now()) })
      .eq('id', id);
    if (error) throw error;
  }

  private async first(column: 'id' | 'key', value: string): Promise<Card | undefined> {
    const { data, error } = await this.supabase.from(this.table).select('*').eq(column, value).eq('deleted', false).limit(1);
    if (error) throw error;
    const row = (data ?? []).find(isCardRemoteRow);
    return row ? cardFromRemote(row) : undefined;
  }
}

export class SupabaseTextStore implements TextStore {
  constructor(private readonly supabase: SupabaseClient, private readonly table = 'texts') {}

  async save(text: StoredText) {
    const { error } = await this.supabase.from(this.table).upsert(textToRemote({ ...text, updatedAt: Date.now() }));
    if (error) throw error;
  }

  async get(id: string): Promise<StoredText | undefined> {
    const { data, error } = await this.supabase.from(this.table).select('*').eq('id', id).eq('deleted', false).limit(1);
    if (error) throw error;
    const row = (data ?? []).find(isTextRemoteRow);
    return row ? textFromRemote(row) : undefined;
  }

  async list(limit = 20): Promise<StoredText[]> {
    const { data, error } = await this.supabase.from(this.table)
      .select('*')
      .eq('deleted', false)
      .order('created_at', { ascending: false })
      .limit(limit);
    if (error) throw error;
    return (data ?? []).filter(isTextRemoteRow).map(textFromRemote);
  }

  async remove(id: string) {
    const { error } = await this.supabase.from(this.table)
      .update({ deleted: true, updated_at: msToIso(Date.now()) })
      .eq('id', id);
    if (error) throw error;
  }
}
