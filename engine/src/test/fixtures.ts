import { VocabDatabase } from '../db/database';
import type { Card, Review, Word } from '../types';

let databaseCount = 0;

// Each test gets its own database so nothing leaks between tests
export function createTestDatabase(): VocabDatabase {
  databaseCount++;
  return new VocabDatabase(`VocabDrillTest-${databaseCount}`);
}

export function fixedClock(iso: string): { now: () => Date; set: (next: string) => void } {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    set: next => {
      current = new Date(next);
    },
  };
}

// Sequential ids: id-1, id-2, ...
export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function createMockWord(id: string, text: string, overrides: Partial<Word> = {}): Word {
  return {
    id,
    text,
    translation: null,
    language: 'Dutch',
    chapter: null,
    group_name: null,
    sentence: null,
    created_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function createMockCard(id: string, wordId: string, overrides: Partial<Card> = {}): Card {
  return {
    id,
    word_id: wordId,
    due_at: '2026-01-01T00:00:00.000Z',
    interval_days: 0,
    ease: 2.5,
    reps: 0,
    lapses: 0,
    ...overrides,
  };
}

export function createMockReview(id: string, cardId: string, overrides: Partial<Review> = {}): Review {
  return {
    id,
    card_id: cardId,
    grade: 4,
    reviewed_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}
