import { describe, it, expect, beforeEach } from 'vitest';
import { CardStore } from './card-store';
import type { VocabDatabase } from '../db/database';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { correctionFrom } from '../types';
import {
  createTestDatabase,
  createMockCard,
  createMockWord,
  fixedClock,
  sequentialIds,
} from '../test/fixtures';

const T0 = '2026-03-01T09:00:00.000Z';

describe('CardStore', () => {
  let db: VocabDatabase;
  let clock: ReturnType<typeof fixedClock>;
  let store: CardStore;

  beforeEach(() => {
    db = createTestDatabase();
    clock = fixedClock(T0);
    store = new CardStore(db, { clock: clock.now, generateId: sequentialIds() });
  });

  describe('create', () => {
    it('creates a word with a fresh card that is due immediately', async () => {
      const { word, card } = await store.create({ text: '  de kat ', translation: 'the cat' });

      expect(word).toEqual({
        id: 'id-1',
        text: 'de kat',
        translation: 'the cat',
        language: 'Dutch',
        chapter: null,
        group_name: null,
        sentence: null,
        created_at: T0,
      });
      expect(card).toEqual({
        id: 'id-2',
        word_id: 'id-1',
        due_at: T0,
        interval_days: 0,
        ease: 2.5,
        reps: 0,
        lapses: 0,
      });
      expect(await store.counts()).toEqual({ due: 1, total: 1 });
    });

    it('rejects empty text without writing anything', async () => {
      await expect(store.create({ text: '   ' })).rejects.toBeInstanceOf(ValidationError);
      expect(await db.words.count()).toBe(0);
      expect(await db.cards.count()).toBe(0);
    });

    it('detects existing words per language', async () => {
      await store.create({ text: 'hond', language: 'Dutch' });

      expect(await store.exists('hond', 'Dutch')).toBe(true);
      expect(await store.exists(' hond ', 'Dutch')).toBe(true);
      expect(await store.exists('hond', 'English')).toBe(false);
    });
  });

  describe('applyGrade', () => {
    it('grades a fresh card Good, then Again', async () => {
      const { card } = await store.create({ text: 'de kat' });

      const good = await store.applyGrade(card.id, 2);
      expect(good).toEqual({
        id: 'id-2',
        word_id: 'id-1',
        due_at: '2026-03-02T09:00:00.000Z',
        interval_days: 1,
        ease: 2.5,
        reps: 1,
        lapses: 0,
      });

      const again = await store.applyGrade(card.id, 0);
      expect(again.reps).toBe(0);
      expect(again.lapses).toBe(1);
      expect(again.ease).toBe(2.3);
      expect(again.due_at).toBe('2026-03-01T09:10:00.000Z');

      expect(await store.getRecord(card.id)).toEqual(again);
      const reviews = await store.reviewsFor(card.id);
      expect(reviews.map(review => review.grade)).toEqual([4, 1]);
      expect(reviews.map(review => review.id)).toEqual(['id-3', 'id-4']);
    });

    it('orders the review log by time', async () => {
      const { card } = await store.create({ text: 'de kat' });
      await store.applyGrade(card.id, 2);
      clock.set('2026-03-02T09:00:00.000Z');
      await store.applyGrade(card.id, 3);

      const reviews = await store.reviewsFor(card.id);
      expect(reviews.map(review => review.reviewed_at)).toEqual([T0, '2026-03-02T09:00:00.000Z']);
      expect(reviews.map(review => review.grade)).toEqual([4, 5]);
    });

    it('pushes the due date out with each Good grade', async () => {
      const { card } = await store.create({ text: 'huis', translation: 'house' });

      const first = await store.applyGrade(card.id, 2);
      clock.set(first.due_at);
      const second = await store.applyGrade(card.id, 2);
      clock.set(second.due_at);
      const third = await store.applyGrade(card.id, 2);

      expect([first, second, third].map(state => [state.interval_days, state.due_at])).toEqual([
        [1, '2026-03-02T09:00:00.000Z'],
        [6, '2026-03-08T09:00:00.000Z'],
        [15, '2026-03-23T09:00:00.000Z'],
      ]);
      expect(await store.getRecord(card.id)).toEqual(third);
      expect((await store.reviewsFor(card.id)).map(review => review.grade)).toEqual([4, 4, 4]);
    });

    it('throws NotFoundError for an unknown card', async () => {
      await expect(store.applyGrade('missing', 2)).rejects.toBeInstanceOf(NotFoundError);
      expect(await db.reviews.count()).toBe(0);
    });

    it('rejects a second grade for the same card while one is in flight', async () => {
      const { card } = await store.create({ text: 'de kat' });

      const first = store.applyGrade(card.id, 2);
      await expect(store.applyGrade(card.id, 3)).rejects.toBeInstanceOf(ConflictError);
      await first;

      expect(await db.reviews.count()).toBe(1);
      expect((await store.getRecord(card.id)).reps).toBe(1);
    });

    it('leaves the card untouched when the review cannot be written', async () => {
      let failIds = false;
      const ids = sequentialIds();
      store = new CardStore(db, {
        clock: clock.now,
        generateId: () => {
          if (failIds) throw new Error('id generator failed');
          return ids();
        },
      });
      const { card } = await store.create({ text: 'de kat' });

      failIds = true;
      await expect(store.applyGrade(card.id, 2)).rejects.toThrow('id generator failed');

      expect(await store.getRecord(card.id)).toEqual(card);
      expect(await db.reviews.count()).toBe(0);

      // The in-flight guard is released after the failure
      failIds = false;
      const graded = await store.applyGrade(card.id, 2);
      expect(graded.reps).toBe(1);
    });
  });

  describe('getDue', () => {
    beforeEach(async () => {
      await db.words.bulkAdd([
        createMockWord('w-a', 'a'),
        createMockWord('w-b', 'b'),
        createMockWord('w-c', 'c'),
        createMockWord('w-d', 'd'),
      ]);
      await db.cards.bulkAdd([
        createMockCard('c-b', 'w-b', { due_at: '2026-03-01T09:00:00.000Z' }),
        createMockCard('c-a', 'w-a', { due_at: '2026-03-01T09:00:00.000Z' }),
        createMockCard('c-c', 'w-c', { due_at: '2026-03-01T08:00:00.000Z' }),
        createMockCard('c-d', 'w-d', { due_at: '2026-03-01T10:00:00.000Z' }),
      ]);
    });

    it('returns due cards by due time, ties broken by id', async () => {
      const due = await store.getDue();
      expect(due.map(({ card }) => card.id)).toEqual(['c-c', 'c-a', 'c-b']);
      expect(due[0].word.text).toBe('c');
    });

    it('applies the limit after ordering', async () => {
      const due = await store.getDue(clock.now(), 2);
      expect(due.map(({ card }) => card.id)).toEqual(['c-c', 'c-a']);
    });

    it('includes cards that become due later', async () => {
      const due = await store.getDue(new Date('2026-03-01T10:00:00.000Z'));
      expect(due.map(({ card }) => card.id)).toEqual(['c-c', 'c-a', 'c-b', 'c-d']);
    });

    it('counts due and total cards', async () => {
      expect(await store.counts()).toEqual({ due: 3, total: 4 });
    });
  });

  describe('correctContent', () => {
    it('updates the translation without touching the card', async () => {
      const { word, card } = await store.create({ text: 'de kat', translation: 'the dog' });
      await store.applyGrade(card.id, 2);
      const before = await store.getRecord(card.id);

      const updated = await store.correctContent(word.id, correctionFrom({ translation: 'the cat' }));

      expect(updated.text).toBe('de kat');
      expect(updated.translation).toBe('the cat');
      expect(await store.getRecord(card.id)).toEqual(before);
    });

    it('treats an empty translation as a real value', async () => {
      const { word } = await store.create({ text: 'de kat', translation: 'the cat' });
      const updated = await store.correctContent(word.id, correctionFrom({ translation: '' }));
      expect(updated.translation).toBe('');
    });

    it('rejects empty text', async () => {
      const { word } = await store.create({ text: 'de kat' });
      await expect(store.correctContent(word.id, correctionFrom({ text: ' ' }))).rejects.toBeInstanceOf(
        ValidationError
      );
      expect((await store.getItem(word.id)).text).toBe('de kat');
    });

    it('reports unknown words even when nothing would change', async () => {
      await expect(store.correctContent('missing', correctionFrom({}))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('removes the word with its card and reviews', async () => {
      const { word, card } = await store.create({ text: 'de kat' });
      await store.create({ text: 'de hond' });
      await store.applyGrade(card.id, 2);

      await store.delete(word.id);

      expect(await db.words.count()).toBe(1);
      expect(await db.cards.count()).toBe(1);
      expect(await db.reviews.count()).toBe(0);
      await expect(store.getRecord(card.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('throws NotFoundError for an unknown word', async () => {
      await expect(store.delete('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('clears everything with deleteAll', async () => {
      const { card } = await store.create({ text: 'de kat' });
      await store.applyGrade(card.id, 2);

      await store.deleteAll();

      expect(await store.counts()).toEqual({ due: 0, total: 0 });
      expect(await db.words.count()).toBe(0);
      expect(await db.reviews.count()).toBe(0);
    });
  });

  describe('chapters', () => {
    it('lists chapters and finds the last used group', async () => {
      await store.create({ text: 'de kat', chapter: 'H2', group_name: 'Dieren' });
      clock.set('2026-03-01T09:01:00.000Z');
      await store.create({ text: 'rood', chapter: 'H2', group_name: 'Kleuren' });
      clock.set('2026-03-01T09:02:00.000Z');
      await store.create({ text: 'lopen', chapter: 'H2' });
      await store.create({ text: 'een', chapter: 'H1', group_name: 'Getallen' });
      await store.create({ text: 'los' });

      expect(await store.listChapters()).toEqual(['H1', 'H2']);
      expect(await store.lastGroupForChapter('H2')).toBe('Kleuren');
      expect(await store.lastGroupForChapter('H3')).toBeNull();
    });
  });

  describe('snapshots', () => {
    it('replaces the whole store with an exported snapshot', async () => {
      const { card } = await store.create({ text: 'de kat' });
      await store.applyGrade(card.id, 2);
      const exported = await store.exportSnapshot();

      await store.create({ text: 'de hond' });
      await store.replaceAll(exported);

      const restored = await store.exportSnapshot();
      expect(restored.words.map(word => word.text)).toEqual(['de kat']);
      expect(restored.cards).toEqual(exported.cards);
      expect(restored.reviews).toEqual(exported.reviews);
    });
  });
});
