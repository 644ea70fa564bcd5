/**
 * StudySession - a bounded run of due-card reviews
 *
 * States: idle -> active -> prompt -> (active | idle).
 *
 * Starting a session pulls up to `cap` due cards into a local queue. Once the
 * queue is exhausted after at least one review, the session moves to `prompt`
 * ("session complete, continue?") instead of silently going idle. The cap
 * paces the UI only; it never changes scheduling. Nothing here is persisted.
 */

import { isDue } from '@vocab-drill/shared/scheduler';
import { NotFoundError } from '../errors';
import type { CardStore } from './card-store';
import type { Card, DueCard, Rating, SessionSnapshot, SessionState } from '../types';

export const DEFAULT_SESSION_CAP = 10;

export interface StudySessionOptions {
  cap?: number;
}

export class StudySession {
  readonly cap: number;
  private state: SessionState = 'idle';
  private reviewed = 0;
  private queue: string[] = [];

  constructor(private readonly store: CardStore, options: StudySessionOptions = {}) {
    const cap = options.cap ?? DEFAULT_SESSION_CAP;
    this.cap = Number.isInteger(cap) && cap > 0 ? cap : DEFAULT_SESSION_CAP;
  }

  get current(): SessionState {
    return this.state;
  }

  get reviewedCount(): number {
    return this.reviewed;
  }

  /**
   * Begin a new bounded run. Also how a `prompt` is answered with "continue".
   */
  async start(now: Date = this.store.now()): Promise<void> {
    const due = await this.store.getDue(now, this.cap);
    this.reviewed = 0;
    this.queue = due.map(({ card }) => card.id);
    this.state = 'active';
    console.log(`[session] started with ${this.queue.length} of cap ${this.cap}`);
  }

  /**
   * The next card to show, or null. Only an active session hands out cards.
   */
  async nextDueCard(now: Date = this.store.now()): Promise<DueCard | null> {
    if (this.state !== 'active') {
      return null;
    }

    while (this.queue.length > 0) {
      const cardId = this.queue[0];
      try {
        const next = await this.store.getCard(cardId);
        if (isDue(next.card, now)) {
          return next;
        }
      } catch (error) {
        // Deleted or replaced by a sync since the session started
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
      }
      this.queue.shift();
    }

    this.state = this.reviewed > 0 ? 'prompt' : 'idle';
    console.log(`[session] queue exhausted after ${this.reviewed} reviews, now ${this.state}`);
    return null;
  }

  /**
   * Grade a card through the store. Does not advance the state machine; the
   * caller asks for the next card.
   */
  async gradeCard(cardId: string, rating: Rating, now: Date = this.store.now()): Promise<Card> {
    const updated = await this.store.applyGrade(cardId, rating, now);
    this.reviewed++;
    this.queue = this.queue.filter(id => id !== cardId);
    return updated;
  }

  /**
   * Explicit end, or "no" at the prompt. Never touches stored cards.
   */
  end(): void {
    this.state = 'idle';
    this.reviewed = 0;
    this.queue = [];
  }

  // Drop queued ids after the store was replaced underneath the session
  invalidate(): void {
    this.queue = [];
  }

  snapshot(): SessionSnapshot {
    return {
      state: this.state,
      reviewed: this.reviewed,
      cap: this.cap,
      remaining: this.queue.length,
    };
  }
}
