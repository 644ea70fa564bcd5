/**
 * StudyEngine - the operations a front end calls.
 *
 * Wires the card store, the study session, sync and the import/issue
 * services around one database. Every method that touches the data API takes
 * the caller's AuthContext explicitly.
 */

import { RATINGS, formatInterval, getIntervalPreviews, type SchedulerSettings } from '@vocab-drill/shared/scheduler';
import type { DataApiClient } from '../api/client';
import { createDatabase, getDatabaseStats, type VocabDatabase } from '../db/database';
import { ValidationError } from '../errors';
import type {
  AuthContext,
  Card,
  CardView,
  ContentCorrection,
  Counts,
  DueCard,
  IngestResult,
  IssueReport,
  NewWordInput,
  Rating,
  Review,
  SessionSnapshot,
  Word,
} from '../types';
import { CardStore } from './card-store';
import { importFromOcr, type ImportFromOcrInput, type ImportResult } from './import';
import { IssueReporter, type ReportDetails } from './issues';
import { StudySession } from './study-session';
import { SyncService } from './sync';

export interface StudyEngineOptions {
  db?: VocabDatabase;
  dataDir: string;
  client?: DataApiClient | null;
  sessionCap?: number;
  syncAttempts?: number;
  settings?: SchedulerSettings;
  clock?: () => Date;
  generateId?: () => string;
}

export interface IntervalPreview {
  rating: Rating;
  days: number;
  label: string;
}

export interface NextCard {
  card: CardView;
  previews: IntervalPreview[];
}

export function toCardView({ card, word }: DueCard): CardView {
  return {
    record_id: card.id,
    item_id: word.id,
    text: word.text,
    translation: word.translation,
    chapter: word.chapter,
    group: word.group_name,
    language: word.language,
    due_at: card.due_at,
  };
}

export class StudyEngine {
  readonly store: CardStore;
  readonly session: StudySession;
  readonly sync: SyncService;
  readonly issues: IssueReporter;

  constructor(options: StudyEngineOptions) {
    this.store = new CardStore(options.db ?? createDatabase(), {
      settings: options.settings,
      clock: options.clock,
      generateId: options.generateId,
    });
    this.session = new StudySession(this.store, { cap: options.sessionCap });
    this.sync = new SyncService(this.store, { client: options.client, attempts: options.syncAttempts });
    this.issues = new IssueReporter(this.store, options.dataDir);
  }

  async counts(): Promise<Counts> {
    return this.store.counts(this.store.now());
  }

  async stats() {
    return getDatabaseStats(this.store.db);
  }

  async startSession(): Promise<SessionSnapshot> {
    await this.session.start(this.store.now());
    return this.session.snapshot();
  }

  endSession(): SessionSnapshot {
    this.session.end();
    return this.session.snapshot();
  }

  sessionState(): SessionSnapshot {
    return this.session.snapshot();
  }

  /**
   * Next card of the running session with the interval each rating would give.
   */
  async nextDueCard(): Promise<NextCard | null> {
    const now = this.store.now();
    const next = await this.session.nextDueCard(now);
    if (!next) {
      return null;
    }
    const days = getIntervalPreviews(next.card, now, this.store.settings);
    return {
      card: toCardView(next),
      previews: RATINGS.map(rating => ({ rating, days: days[rating], label: formatInterval(days[rating]) })),
    };
  }

  async gradeCard(cardId: string, rating: Rating): Promise<Card> {
    return this.session.gradeCard(cardId, rating, this.store.now());
  }

  async applyCorrectionLocal(wordId: string, correction: ContentCorrection): Promise<Word> {
    return this.store.correctContent(wordId, correction);
  }

  async pushCorrection(auth: AuthContext | null, wordId: string, correction: ContentCorrection): Promise<Word> {
    return this.sync.pushCorrection(auth, wordId, correction);
  }

  async reportIssue(cardId: string, note?: string | null, details?: ReportDetails): Promise<IssueReport> {
    return this.issues.report(cardId, note, details);
  }

  async refreshFromDataApi(auth: AuthContext | null, snapshot: unknown): Promise<IngestResult> {
    const result = await this.sync.ingestSnapshot(auth, snapshot);
    this.session.invalidate();
    return result;
  }

  async pullFromDataApi(auth: AuthContext | null): Promise<IngestResult> {
    const result = await this.sync.pullFromDataApi(auth);
    this.session.invalidate();
    return result;
  }

  async addWord(input: NewWordInput): Promise<CardView> {
    if (await this.store.exists(input.text, input.language ?? 'Dutch')) {
      throw new ValidationError(`"${input.text.trim()}" already exists`, ['text: duplicate for language']);
    }
    return toCardView(await this.store.create(input, this.store.now()));
  }

  /**
   * Deletion is destructive; callers must pass confirmed = true.
   */
  async deleteWord(wordId: string, confirmed: boolean): Promise<void> {
    if (!confirmed) {
      throw new ValidationError('Deletion must be confirmed', ['confirm: required']);
    }
    await this.store.delete(wordId);
  }

  async deleteAll(confirmed: boolean): Promise<void> {
    if (!confirmed) {
      throw new ValidationError('Deletion must be confirmed', ['confirm: required']);
    }
    await this.store.deleteAll();
    this.session.end();
  }

  async reviewsFor(cardId: string): Promise<Review[]> {
    return this.store.reviewsFor(cardId);
  }

  async listChapters(): Promise<string[]> {
    return this.store.listChapters();
  }

  async importFromOcr(input: ImportFromOcrInput): Promise<ImportResult> {
    return importFromOcr(this.store, input);
  }
}
