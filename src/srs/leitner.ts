import type { Card, ReviewOutcome } from '../types';
import type { IncorrectPolicy } from '../config';

export type LeitnerSettings = {
  boxCount: number;
  intervalsMs: readonly number[]; // intervalsMs[box - 1]
  incorrectPolicy: IncorrectPolicy;
};

const DAY = 24 * 60 * 60 * 1000;

/** base, 2·base, 4·base, ... one entry per box */
export function doublingIntervals(boxCount: number, baseMs = DAY): number[] {
  return Array.from({ length: boxCount }, (_, i) => baseMs * 2 ** i);
}

export function leitnerSettings(params: {
  boxCount?: number;
  baseIntervalMs?: number;
  intervalsMs?: readonly number[];
  incorrectPolicy?: IncorrectPolicy;
} = {}): LeitnerSettings {
  const boxCount = params.boxCount ?? params.intervalsMs?.length ?? 5;
  if (!Number.isInteger(boxCount) || boxCount < 2) throw new RangeError(`boxCount must be an integer >= 2, got ${boxCount}`);
  const intervalsMs = params.intervalsMs ?? doublingIntervals(boxCount, params.baseIntervalMs);
  if (intervalsMs.length !== boxCount) throw new RangeError(`expected ${boxCount} intervals, got ${intervalsMs.length}`);
  intervalsMs.forEach((ms, i) => {
    if (!(ms > 0) || (i > 0 && ms <= intervalsMs[i - 1])) throw new RangeError('intervals must be positive and strictly increasing');
  });
  return { boxCount, intervalsMs, incorrectPolicy: params.incorrectPolicy ?? 'demote' };
}

export function intervalFor(box: number, s: LeitnerSettings): number {
  return s.intervalsMs[clampBox(box, s) - 1];
}

export function clampBox(box: number, s: LeitnerSettings): number {
  return Math.min(Math.max(Math.trunc(box), 1), s.boxCount);
}

export function nextBox(box: number, outcome: ReviewOutcome, s: LeitnerSettings): number {
  if (outcome === 'correct') return Math.min(box + 1, s.boxCount);
  return s.incorrectPolicy === 'reset' ? 1 : Math.max(box - 1, 1);
}

/** The one transition for a graded review. Returns a new card value. */
export function applyReview(card: Card, outcome: ReviewOutcome, now: number, s: LeitnerSettings): Card {
  const fromBox = clampBox(card.box, s);
  const toBox = nextBox(fromBox, outcome, s);
  return {
    ...card,
    box: toBox,
    dueAt: now + intervalFor(toBox, s),
    lastReviewedAt: now,
    updatedAt: now,
    history: [...card.history, { at: now, outcome, fromBox, toBox }],
  };
}

/** Explicit reset, e.g. to take a card out of the top box. Due immediately. */
export function resetCard(card: Card, now: number): Card {
  return {
    ...card,
    box: 1,
    dueAt: now,
    updatedAt: now,
    history: [...card.history, { at: now, outcome: 'reset', fromBox: card.box, toBox: 1 }],
  };
}

export function isDue(card: Card, now: number): boolean {
  return !card.deleted && card.dueAt <= now;
}

export function compareDue(a: Card, b: Card): number {
  return a.dueAt - b.dueAt || a.createdAt - b.createdAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}
