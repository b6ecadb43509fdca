import type { Card, CardStore, StoredText, TextStore } from '../types';
import { keyOf } from '../srs/cards';
import type { CardRow, DecoderDB } from './db';

function toRow(card: Card): CardRow {
  return { ...card, key: keyOf(card) };
}

function fromRow(row: CardRow): Card {
  const { key: _key, ...card } = row;
  return card;
}

// Deletes are soft (deleted flag + updatedAt), the same as the remote rows.

export class DexieCardStore implements CardStore {
  constructor(private readonly db: DecoderDB) {}

  async all(): Promise<Card[]> {
    return (await this.db.cards.toArray()).filter(c => !c.deleted).map(fromRow);
  }

  async get(id: string): Promise<Card | undefined> {
    const row = await this.db.cards.get(id);
    return row && !row.deleted ? fromRow(row) : undefined;
  }

  async findByKey(key: string): Promise<Card | undefined> {
    const row = await this.db.cards.where('key').equals(key).filter(c => !c.deleted).first();
    return row ? fromRow(row) : undefined;
  }

  async put(card: Card) { await this.db.cards.put(toRow(card)); }

  async putMany(cards: Card[]) {
    if (cards.length) await this.db.cards.bulkPut(cards.map(toRow));
  }

  async remove(id: string) {
    const row = await this.db.cards.get(id);
    if (!row) return;
    row.deleted = true; row.updatedAt = Date.now();
    await this.db.cards.put(row);
  }
}

export class DexieTextStore implements TextStore {
  constructor(private readonly db: DecoderDB) {}

  async save(text: StoredText) {
    await this.db.texts.put({ ...text, updatedAt: Date.now() });
  }

  async get(id: string): Promise<StoredText | undefined> {
    const t = await this.db.texts.get(id);
    if (t?.deleted) return undefined;
    return t;
  }

  async list(limit = 20): Promise<StoredText[]> {
    return this.db.texts.orderBy('createdAt').reverse().filter(t => !t.deleted).limit(limit).toArray();
  }

  async remove(id: string) {
    const t = await this.db.texts.get(id);
    if (!t) return;
    t.deleted = true; t.updatedAt = Date.now();
    await this.db.texts.put(t);
  }
}

export async function wipeAllLocalData(db: DecoderDB) {
  await Promise.all([db.cards.clear(), db.texts.clear()]);
}
