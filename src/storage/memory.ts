import type { Card, CardStore, StoredText, TextStore } from '../types';
import { keyOf } from '../srs/cards';

// Plain in-process stores, for tests and throwaway sessions.

export class MemoryCardStore implements CardStore {
  private readonly rows = new Map<string, Card>();

  constructor(initial: Card[] = []) {
    for (const c of initial) this.rows.set(c.id, structuredClone(c));
  }

  async all() { return [...this.rows.values()].filter(c => !c.deleted).map(c => structuredClone(c)); }

  async get(id: string) {
    const c = this.rows.get(id);
    return c && !c.deleted ? structuredClone(c) : undefined;
  }

  async findByKey(key: string) {
    for (const c of this.rows.values()) if (!c.deleted && keyOf(c) === key) return structuredClone(c);
    return undefined;
  }

  async put(card: Card) { this.rows.set(card.id, structuredClone(card)); }

  async putMany(cards: Card[]) { for (const c of cards) await this.put(c); }

  async remove(id: string) {
    const c = this.rows.get(id);
    if (c) this.rows.set(id, { ...c, deleted: true, updatedAt: Date.now() });
  }
}

export class MemoryTextStore implements TextStore {
  private readonly rows = new Map<string, StoredText>();

  async save(text: StoredText) { this.rows.set(text.id, structuredClone({ ...text, updatedAt: Date.now() })); }

  async get(id: string) {
    const t = this.rows.get(id);
    return t && !t.deleted ? structuredClone(t) : undefined;
  }

  async list(limit = 20) {
    return [...this.rows.values()]
      .filter(t => !t.deleted)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map(t => structuredClone(t));
  }

  async remove(id: string) {
    const t = this.rows.get(id);
    if (t) this.rows.set(id, { ...t, deleted: true, updatedAt: Date.now() });
  }
}
