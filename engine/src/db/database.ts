import Dexie, { type DexieOptions, type Table } from 'dexie';
import { indexedDB, IDBKeyRange } from 'fake-indexeddb';
import type { Word, Card, Review } from '../types';

export const DEFAULT_DB_NAME = 'VocabDrillDB';

// Dexie database class
export class VocabDatabase extends Dexie {
  words!: Table<Word, string>;
  cards!: Table<Card, string>;
  reviews!: Table<Review, string>;

  /**
   * Under Node there is no IndexedDB, so the in-process implementation from
   * fake-indexeddb is used unless the caller provides another one.
   */
  constructor(name: string = DEFAULT_DB_NAME, options: DexieOptions = { indexedDB, IDBKeyRange }) {
    super(name, options);

    this.version(1).stores({
      words: 'id, [text+language], chapter, [chapter+created_at]',
      // &word_id: exactly one card per word
      cards: 'id, &word_id, due_at, [due_at+id]',
      reviews: 'id, card_id, [card_id+reviewed_at]',
    });
  }
}

export function createDatabase(name?: string): VocabDatabase {
  return new VocabDatabase(name);
}

// Helper functions for common operations

export async function getCardByWordId(db: VocabDatabase, wordId: string): Promise<Card | undefined> {
  return db.cards.where('word_id').equals(wordId).first();
}

export async function getCardReviews(db: VocabDatabase, cardId: string): Promise<Review[]> {
  return db.reviews
    .where('[card_id+reviewed_at]')
    .between([cardId, Dexie.minKey], [cardId, Dexie.maxKey])
    .toArray();
}

// Words of a chapter, oldest first
export async function getChapterWords(db: VocabDatabase, chapter: string): Promise<Word[]> {
  return db.words
    .where('[chapter+created_at]')
    .between([chapter, Dexie.minKey], [chapter, Dexie.maxKey])
    .toArray();
}

// Cards due at or before `nowIso`, ordered by due_at then id
export async function getDueCards(db: VocabDatabase, nowIso: string, limit?: number): Promise<Card[]> {
  const collection = db.cards
    .where('[due_at+id]')
    .between([Dexie.minKey, Dexie.minKey], [nowIso, Dexie.maxKey], true, true);
  return limit === undefined ? collection.toArray() : collection.limit(limit).toArray();
}

export async function countDueCards(db: VocabDatabase, nowIso: string): Promise<number> {
  return db.cards.where('due_at').belowOrEqual(nowIso).count();
}

export async function clearAllData(db: VocabDatabase): Promise<void> {
  await db.transaction('rw', [db.words, db.cards, db.reviews], async () => {
    await db.reviews.clear();
    await db.cards.clear();
    await db.words.clear();
  });
}

// Get database stats for debugging
export async function getDatabaseStats(db: VocabDatabase): Promise<{
  words: number;
  cards: number;
  reviews: number;
}> {
  const [words, cards, reviews] = await Promise.all([
    db.words.count(),
    db.cards.count(),
    db.reviews.count(),
  ]);

  return { words, cards, reviews };
}
