import type { Card, Lang } from '../types';
import { normalizeKey, uuid } from '../utils/split';

export type CardInput = {
  word: string;
  translation: string;
  exampleSentence?: string;
  sourceLang: Lang;
  targetLang: Lang;
};

export function cardKey(word: string, sourceLang: Lang, targetLang: Lang): string {
  return `${sourceLang}|${targetLang}|${normalizeKey(word)}`;
}

export function keyOf(card: Pick<Card, 'word' | 'sourceLang' | 'targetLang'>): string {
  return cardKey(card.word, card.sourceLang, card.targetLang);
}

// New cards start in box 1 and are due right away.
export function newCard(input: CardInput, now: number): Card {
  const card: Card = {
    id: uuid(),
    word: input.word.trim(),
    translation: input.translation.trim(),
    sourceLang: input.sourceLang,
    targetLang: input.targetLang,
    box: 1,
    dueAt: now,
    createdAt: now,
    updatedAt: now,
    history: [],
  };
  const example = input.exampleSentence?.trim();
  if (example) card.exampleSentence = example;
  return card;
}

/** Replaces content fields only; box, due date and history stay. */
export function withContent(card: Card, content: { translation: string; exampleSentence?: string }, now: number): Card {
  const next: Card = { ...card, translation: content.translation.trim(), updatedAt: now };
  const example = content.exampleSentence?.trim();
  if (example) next.exampleSentence = example;
  else delete next.exampleSentence;
  return next;
}
