/**
 * Reconciliation with the remote data API.
 *
 * The remote is the system of record for word content; the local store is
 * authoritative for scheduling state between syncs. Ingest merges a whole
 * snapshot in one transaction, so a failure leaves the store untouched, and
 * merging the same snapshot twice changes nothing the second time.
 */

import { initialRetentionState } from '@vocab-drill/shared/scheduler';
import type { DataApiClient, WordFieldsUpdate } from '../api/client';
import { ConflictError, TransientError, ValidationError } from '../errors';
import {
  isNoopCorrection,
  type AuthContext,
  type Card,
  type ContentCorrection,
  type IngestResult,
  type Snapshot,
  type Word,
} from '../types';
import { requireAuth } from './auth';
import { normalizeCorrection, type CardStore } from './card-store';
import { parseSnapshot } from './snapshot';

export const DEFAULT_SYNC_ATTEMPTS = 3;

export interface SyncServiceOptions {
  client?: DataApiClient | null;
  attempts?: number;
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

function sameContent(local: Word, remote: Word): boolean {
  return (
    local.text === remote.text &&
    local.translation === remote.translation &&
    local.language === remote.language &&
    local.chapter === remote.chapter &&
    local.group_name === remote.group_name &&
    local.sentence === remote.sentence
  );
}

function fieldsFromCorrection(correction: ContentCorrection): WordFieldsUpdate {
  const fields: WordFieldsUpdate = {};
  if (correction.text.kind === 'set') fields.text = correction.text.value;
  if (correction.translation.kind === 'set') fields.translation = correction.translation.value;
  return fields;
}

export class SyncService {
  private isSyncing = false;
  private syncListeners: Set<(syncing: boolean) => void> = new Set();
  private readonly client: DataApiClient | null;
  private readonly attempts: number;

  constructor(private readonly store: CardStore, options: SyncServiceOptions = {}) {
    this.client = options.client ?? null;
    this.attempts = Math.max(1, options.attempts ?? DEFAULT_SYNC_ATTEMPTS);
  }

  addSyncListener(listener: (syncing: boolean) => void) {
    this.syncListeners.add(listener);
    return () => this.syncListeners.delete(listener);
  }

  private notifySyncListeners(syncing: boolean) {
    this.isSyncing = syncing;
    this.syncListeners.forEach(listener => listener(syncing));
  }

  get isSyncingNow(): boolean {
    return this.isSyncing;
  }

  private async exclusive<T>(work: () => Promise<T>): Promise<T> {
    if (this.isSyncing) {
      throw new ConflictError('A sync is already running');
    }
    this.notifySyncListeners(true);
    try {
      return await work();
    } finally {
      this.notifySyncListeners(false);
    }
  }

  private requireClient(): DataApiClient {
    if (!this.client) {
      // Surfaces as 503 at the HTTP layer
      throw new TransientError('No data API configured');
    }
    return this.client;
  }

  /**
   * Merge a snapshot received from the data API into the local store.
   */
  async ingestSnapshot(auth: AuthContext | null, input: unknown): Promise<IngestResult> {
    requireAuth(auth, this.store.now());
    const snapshot = parseSnapshot(input);
    return this.exclusive(() => this.merge(snapshot));
  }

  /**
   * Fetch a snapshot and ingest it. Transient failures are retried wholesale,
   * which is safe because ingest is idempotent.
   */
  async pullFromDataApi(auth: AuthContext | null): Promise<IngestResult> {
    const session = requireAuth(auth, this.store.now());
    const client = this.requireClient();

    return this.exclusive(async () => {
      for (let attempt = 1; ; attempt++) {
        try {
          const raw = await client.getSnapshot(session);
          return await this.merge(parseSnapshot(raw));
        } catch (error) {
          if (!(error instanceof TransientError) || attempt >= this.attempts) {
            throw error;
          }
          console.warn(`[sync] pull attempt ${attempt}/${this.attempts} failed:`, error.message);
        }
      }
    });
  }

  /**
   * Send a content correction to the data API, then apply it locally.
   */
  async pushCorrection(auth: AuthContext | null, wordId: string, correction: ContentCorrection): Promise<Word> {
    const session = requireAuth(auth, this.store.now());
    const current = await this.store.getItem(wordId);
    if (isNoopCorrection(correction)) {
      return current;
    }

    const normalized = normalizeCorrection(correction);
    const client = this.requireClient();
    await client.updateWord(session, wordId, fieldsFromCorrection(normalized));
    console.log('[sync] pushed correction for word', wordId);
    return this.store.correctContent(wordId, normalized);
  }

  private async isUngraded(card: Card): Promise<boolean> {
    if (card.reps > 0 || card.lapses > 0) return false;
    return (await this.store.db.reviews.where('card_id').equals(card.id).count()) === 0;
  }

  private async merge(snapshot: Snapshot): Promise<IngestResult> {
    const { db } = this.store;
    const now = this.store.now();

    const issues: string[] = [];
    const idsByTable: Array<[string, string[]]> = [
      ['words', snapshot.words.map(word => word.id)],
      ['cards', snapshot.cards.map(card => card.id)],
      ['reviews', snapshot.reviews.map(review => review.id)],
    ];
    for (const [table, ids] of idsByTable) {
      for (const id of findDuplicates(ids)) {
        issues.push(`${table}: duplicate id ${id}`);
      }
    }
    for (const wordId of findDuplicates(snapshot.cards.map(card => card.word_id))) {
      issues.push(`cards: more than one card for word ${wordId}`);
    }
    if (issues.length > 0) {
      throw new ValidationError('Snapshot rejected', issues);
    }

    const result = await db.transaction('rw', [db.words, db.cards, db.reviews], async () => {
      const snapshotWordIds = new Set(snapshot.words.map(word => word.id));
      const snapshotCardIds = new Set(snapshot.cards.map(card => card.id));

      // Foreign keys may also point at rows that only exist locally
      const outsideWordIds = [...new Set(snapshot.cards.map(c => c.word_id))].filter(id => !snapshotWordIds.has(id));
      const outsideCardIds = [...new Set(snapshot.reviews.map(r => r.card_id))].filter(id => !snapshotCardIds.has(id));

      const [localWords, localCards, localReviews, outsideWords, outsideCards] = await Promise.all([
        db.words.bulkGet(snapshot.words.map(word => word.id)),
        db.cards.bulkGet(snapshot.cards.map(card => card.id)),
        db.reviews.bulkGet(snapshot.reviews.map(review => review.id)),
        db.words.bulkGet(outsideWordIds),
        db.cards.bulkGet(outsideCardIds),
      ]);
      const knownOutsideWords = new Set(outsideWords.flatMap(word => (word ? [word.id] : [])));
      const knownOutsideCards = new Set(outsideCards.flatMap(card => (card ? [card.id] : [])));

      const referencedWordIds = [...new Set([...snapshotWordIds, ...snapshot.cards.map(c => c.word_id)])];
      const localCardByWord = new Map<string, Card>();
      for (const card of await db.cards.where('word_id').anyOf(referencedWordIds).toArray()) {
        localCardByWord.set(card.word_id, card);
      }

      // A locally seeded card that was never graded gives way to the remote one
      const replacedCardIds: string[] = [];
      for (const [index, card] of snapshot.cards.entries()) {
        if (!snapshotWordIds.has(card.word_id) && !knownOutsideWords.has(card.word_id)) {
          issues.push(`cards.${index} (${card.id}): unknown word_id ${card.word_id}`);
        }
        const existing = localCardByWord.get(card.word_id);
        if (existing && existing.id !== card.id) {
          if (await this.isUngraded(existing)) {
            replacedCardIds.push(existing.id);
            knownOutsideCards.delete(existing.id);
          } else {
            issues.push(`cards.${index} (${card.id}): word ${card.word_id} already has card ${existing.id}`);
          }
        }
        const local = localCards[index];
        if (local && local.word_id !== card.word_id) {
          issues.push(`cards.${index} (${card.id}): card belongs to word ${local.word_id}`);
        }
      }
      snapshot.reviews.forEach((review, index) => {
        if (!snapshotCardIds.has(review.card_id) && !knownOutsideCards.has(review.card_id)) {
          issues.push(`reviews.${index} (${review.id}): unknown card_id ${review.card_id}`);
        }
      });
      if (issues.length > 0) {
        throw new ValidationError('Snapshot rejected', issues);
      }

      // Remote wins for content
      const wordWrites: Word[] = [];
      snapshot.words.forEach((remote, index) => {
        const local = localWords[index];
        if (!local) {
          wordWrites.push(remote);
        } else if (!sameContent(local, remote)) {
          wordWrites.push({ ...remote, created_at: local.created_at });
        }
      });

      // Local wins for scheduling; unseen cards are seeded from remote values
      const cardWrites: Card[] = snapshot.cards.filter((_, index) => !localCards[index]);
      const snapshotCardWords = new Set(snapshot.cards.map(card => card.word_id));
      for (const word of snapshot.words) {
        if (!localCardByWord.has(word.id) && !snapshotCardWords.has(word.id)) {
          cardWrites.push({
            id: this.store.newId(),
            word_id: word.id,
            ...initialRetentionState(now, this.store.settings),
          });
        }
      }

      // Append-only union keyed by id
      const reviewWrites = snapshot.reviews.filter((_, index) => !localReviews[index]);

      await db.words.bulkPut(wordWrites);
      await db.cards.bulkDelete(replacedCardIds);
      await db.cards.bulkAdd(cardWrites);
      await db.reviews.bulkAdd(reviewWrites);

      return { words: wordWrites.length, cards: cardWrites.length, reviews: reviewWrites.length };
    });

    console.log(
      `[sync] ingest complete: ${result.words} words, ${result.cards} cards, ${result.reviews} reviews written`
    );
    return result;
  }
}
