import type { Card, CardStore, ReviewOutcome } from '../types';
import { CardNotFound } from '../errors';
import { createMutex, type Mutex } from '../utils/async';
import { createLogger } from '../log';
import { applyReview, compareDue, isDue, leitnerSettings, resetCard, type LeitnerSettings } from './leitner';
import { cardKey, newCard, withContent, type CardInput } from './cards';

const log = createLogger('leitner');

export type SchedulerOptions = {
  settings?: LeitnerSettings;
  clock?: () => number;
  mutex?: Mutex; // share with the Reconciler so both write one CardSet in turn
};

/**
 * Owns the Leitner state of one CardSet. Every write runs under the CardSet
 * mutex; the box/due changes themselves are the pure functions in leitner.ts.
 */
export class LeitnerScheduler {
  readonly settings: LeitnerSettings;
  readonly lock: Mutex;
  private readonly clock: () => number;

  constructor(private readonly store: CardStore, opts: SchedulerOptions = {}) {
    this.settings = opts.settings ?? leitnerSettings();
    this.clock = opts.clock ?? Date.now;
    this.lock = opts.mutex ?? createMutex();
  }

  /** New word: box 1, due now. Known word: content updated, scheduling kept. */
  addCard(input: CardInput, now = this.clock()): Promise<Card> {
    return this.lock(async () => {
      const existing = await this.store.findByKey(cardKey(input.word, input.sourceLang, input.targetLang));
      const card = existing
        ? withContent(existing, { translation: input.translation, exampleSentence: input.exampleSentence ?? existing.exampleSentence }, now)
        : newCard(input, now);
      await this.store.put(card);
      return card;
    });
  }

  review(cardId: string, outcome: ReviewOutcome, now = this.clock()): Promise<Card> {
    return this.lock(async () => {
      const card = await this.live(cardId);
      const next = applyReview(card, outcome, now, this.settings);
      await this.store.put(next);
      log.debug(`${card.word}: ${outcome}, box ${card.box} → ${next.box}`);
      return next;
    });
  }

  reset(cardId: string, now = this.clock()): Promise<Card> {
    return this.lock(async () => {
      const next = resetCard(await this.live(cardId), now);
      await this.store.put(next);
      return next;
    });
  }

  /** Every card with dueAt <= now, oldest due first. */
  async dueCards(now = this.clock()): Promise<Card[]> {
    return (await this.store.all()).filter(c => isDue(c, now)).sort(compareDue);
  }

  async cardsByBox(): Promise<Record<number, Card[]>> {
    const by: Record<number, Card[]> = {};
    for (let b = 1; b <= this.settings.boxCount; b++) by[b] = [];
    for (const c of await this.store.all()) {
      if (c.deleted) continue;
      (by[c.box] ??= []).push(c);
    }
    for (const list of Object.values(by)) list.sort(compareDue);
    return by;
  }

  private async live(cardId: string): Promise<Card> {
    const card = await this.store.get(cardId);
    if (!card || card.deleted) throw new CardNotFound(cardId);
    return card;
  }
}
