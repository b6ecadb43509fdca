import Dexie, { type DexieOptions, type Table } from 'dexie';
import { indexedDB as fakeIndexedDB, IDBKeyRange as FakeIDBKeyRange } from 'fake-indexeddb';
import type { Card, StoredText } from '../types';

export type CardRow = Card & { key: string }; // key: normalized (lang pair, word), indexed

type IDBDeps = Required<Pick<DexieOptions, 'indexedDB' | 'IDBKeyRange'>>;

// Browsers bring IndexedDB; under Node the fake-indexeddb implementation stands in.
function defaultDeps(): IDBDeps {
  if (typeof globalThis.indexedDB !== 'undefined') {
    return { indexedDB: globalThis.indexedDB, IDBKeyRange: globalThis.IDBKeyRange };
  }
  return { indexedDB: fakeIndexedDB, IDBKeyRange: FakeIDBKeyRange };
}

export class DecoderDB extends Dexie {
  cards!: Table<CardRow, string>;
  texts!: Table<StoredText, string>;

  constructor(name = 'decoder-trainer', deps: IDBDeps = defaultDeps()) {
    super(name, deps);
    this.version(1).stores({
      cards: 'id, key, dueAt, box',
      texts: 'id, createdAt',
    });
  }
}

export function openDatabase(name?: string): DecoderDB {
  return new DecoderDB(name);
}
