/**
 * Card Store
 *
 * Durable keyed storage for words, their retention records (cards) and the
 * append-only review log. Every mutation runs in a Dexie transaction, so a
 * card and its review are written together or not at all, and readers in a
 * read-only transaction never see one without the other.
 */

import {
  transition,
  initialRetentionState,
  ratingToQuality,
  DEFAULT_SCHEDULER_SETTINGS,
  type SchedulerSettings,
} from '@vocab-drill/shared/scheduler';
import {
  type VocabDatabase,
  getCardByWordId,
  getCardReviews,
  getChapterWords,
  getDueCards,
  countDueCards,
  clearAllData,
} from '../db/database';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import {
  isNoopCorrection,
  type Card,
  type ContentCorrection,
  type Counts,
  type DueCard,
  type Language,
  type NewWordInput,
  type Rating,
  type Review,
  type Snapshot,
  type Word,
} from '../types';

export interface CardStoreOptions {
  settings?: SchedulerSettings;
  clock?: () => Date;
  generateId?: () => string;
}

// Trim and collapse empty strings to null for optional text fields
function optionalText(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Trim a correction's text and reject a blank one. Run before any write,
 * local or remote, so both sides receive the same value.
 */
export function normalizeCorrection(correction: ContentCorrection): ContentCorrection {
  if (correction.text.kind === 'unchanged') {
    return correction;
  }
  const text = correction.text.value.trim();
  if (text === '') {
    throw new ValidationError('Word text is required', ['text: must not be empty']);
  }
  return { ...correction, text: { kind: 'set', value: text } };
}

export class CardStore {
  readonly settings: SchedulerSettings;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  // Cards with a grade currently being applied
  private readonly grading = new Set<string>();

  constructor(readonly db: VocabDatabase, options: CardStoreOptions = {}) {
    this.settings = options.settings ?? DEFAULT_SCHEDULER_SETTINGS;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  now(): Date {
    return this.clock();
  }

  newId(): string {
    return this.generateId();
  }

  /**
   * Create a word together with its fresh card.
   */
  async create(input: NewWordInput, now: Date = this.clock()): Promise<DueCard> {
    const text = input.text.trim();
    if (text === '') {
      throw new ValidationError('Word text is required', ['text: must not be empty']);
    }

    const word: Word = {
      id: this.generateId(),
      text,
      translation: optionalText(input.translation),
      language: input.language ?? 'Dutch',
      chapter: optionalText(input.chapter),
      group_name: optionalText(input.group_name),
      sentence: optionalText(input.sentence),
      created_at: now.toISOString(),
    };
    const card: Card = {
      id: this.generateId(),
      word_id: word.id,
      ...initialRetentionState(now, this.settings),
    };

    await this.db.transaction('rw', [this.db.words, this.db.cards], async () => {
      await this.db.words.add(word);
      await this.db.cards.add(card);
    });

    return { word, card };
  }

  async exists(text: string, language: Language): Promise<boolean> {
    const count = await this.db.words.where('[text+language]').equals([text.trim(), language]).count();
    return count > 0;
  }

  async getItem(wordId: string): Promise<Word> {
    const word = await this.db.words.get(wordId);
    if (!word) {
      throw new NotFoundError('word', wordId);
    }
    return word;
  }

  async getRecord(cardId: string): Promise<Card> {
    const card = await this.db.cards.get(cardId);
    if (!card) {
      throw new NotFoundError('card', cardId);
    }
    return card;
  }

  async getCard(cardId: string): Promise<DueCard> {
    return this.db.transaction('r', [this.db.cards, this.db.words], async () => {
      const card = await this.getRecord(cardId);
      const word = await this.getItem(card.word_id);
      return { card, word };
    });
  }

  /**
   * Cards due at or before `now`, ascending due_at with ties broken by id.
   */
  async getDue(now: Date = this.clock(), limit?: number): Promise<DueCard[]> {
    return this.db.transaction('r', [this.db.cards, this.db.words], async () => {
      const cards = await getDueCards(this.db, now.toISOString(), limit);
      const words = await this.db.words.bulkGet(cards.map(card => card.word_id));

      const due: DueCard[] = [];
      cards.forEach((card, index) => {
        const word = words[index];
        if (word) {
          due.push({ card, word });
        } else {
          console.warn('[card-store] card without word', card.id);
        }
      });
      return due;
    });
  }

  /**
   * Grade a card: compute the next retention state, persist it and append the
   * review, as one transaction.
   */
  async applyGrade(cardId: string, rating: Rating, now: Date = this.clock()): Promise<Card> {
    if (this.grading.has(cardId)) {
      throw new ConflictError(`A grade for card ${cardId} is already being applied`);
    }
    this.grading.add(cardId);

    try {
      return await this.db.transaction('rw', [this.db.cards, this.db.reviews], async () => {
        const card = await this.db.cards.get(cardId);
        if (!card) {
          throw new NotFoundError('card', cardId);
        }

        const next = transition(card, rating, now, this.settings);
        await this.db.cards.put(next);

        const review: Review = {
          id: this.generateId(),
          card_id: cardId,
          grade: ratingToQuality(rating),
          reviewed_at: now.toISOString(),
        };
        await this.db.reviews.add(review);

        return next;
      });
    } finally {
      this.grading.delete(cardId);
    }
  }

  async counts(now: Date = this.clock()): Promise<Counts> {
    return this.db.transaction('r', [this.db.cards], async () => {
      const [due, total] = await Promise.all([
        countDueCards(this.db, now.toISOString()),
        this.db.cards.count(),
      ]);
      return { due, total };
    });
  }

  /**
   * Edit a word's text and/or translation. Never touches the card.
   */
  async correctContent(wordId: string, correction: ContentCorrection): Promise<Word> {
    return this.db.transaction('rw', [this.db.words], async () => {
      const word = await this.getItem(wordId);
      if (isNoopCorrection(correction)) {
        return word;
      }

      const normalized = normalizeCorrection(correction);
      const updated: Word = { ...word };
      if (normalized.text.kind === 'set') {
        updated.text = normalized.text.value;
      }
      if (normalized.translation.kind === 'set') {
        updated.translation = normalized.translation.value;
      }

      await this.db.words.put(updated);
      return updated;
    });
  }

  /**
   * Remove a word with its card and review log. Confirmation is the caller's job.
   */
  async delete(wordId: string): Promise<void> {
    await this.db.transaction('rw', [this.db.words, this.db.cards, this.db.reviews], async () => {
      const word = await this.db.words.get(wordId);
      if (!word) {
        throw new NotFoundError('word', wordId);
      }
      const card = await getCardByWordId(this.db, wordId);
      if (card) {
        await this.db.reviews.where('card_id').equals(card.id).delete();
        await this.db.cards.delete(card.id);
      }
      await this.db.words.delete(wordId);
    });
  }

  async deleteAll(): Promise<void> {
    await clearAllData(this.db);
  }

  // Review history for a card, oldest first
  async reviewsFor(cardId: string): Promise<Review[]> {
    await this.getRecord(cardId);
    return getCardReviews(this.db, cardId);
  }

  async listChapters(): Promise<string[]> {
    const chapters = await this.db.words.orderBy('chapter').uniqueKeys();
    return chapters.filter((key): key is string => typeof key === 'string' && key !== '');
  }

  // Group label of the most recently created word in a chapter
  async lastGroupForChapter(chapter: string): Promise<string | null> {
    const words = await getChapterWords(this.db, chapter);
    const latest = words.reverse().find(word => word.group_name !== null);
    return latest?.group_name ?? null;
  }

  async exportSnapshot(): Promise<Snapshot> {
    return this.db.transaction('r', [this.db.words, this.db.cards, this.db.reviews], async () => {
      const [words, cards, reviews] = await Promise.all([
        this.db.words.toArray(),
        this.db.cards.toArray(),
        this.db.reviews.toArray(),
      ]);
      return { words, cards, reviews };
    });
  }

  /**
   * Replace the whole store with a previously exported snapshot.
   */
  async replaceAll(snapshot: Snapshot): Promise<void> {
    await this.db.transaction('rw', [this.db.words, this.db.cards, this.db.reviews], async () => {
      await this.db.reviews.clear();
      await this.db.cards.clear();
      await this.db.words.clear();
      await this.db.words.bulkAdd(snapshot.words);
      await this.db.cards.bulkAdd(snapshot.cards);
      await this.db.reviews.bulkAdd(snapshot.reviews);
    });
  }
}
