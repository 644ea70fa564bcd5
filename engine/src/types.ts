import type { Rating } from '@vocab-drill/shared/scheduler';

export type { Rating };

// Source language of a word
export type Language = 'Dutch' | 'English';

// Database models (snake_case, same shape as the data API rows)
export interface Word {
  id: string;
  text: string;
  translation: string | null;
  language: Language;
  chapter: string | null;
  group_name: string | null;
  sentence: string | null;
  created_at: string;
}

// Retention record: scheduling state for exactly one word
export interface Card {
  id: string;
  word_id: string;
  due_at: string;
  interval_days: number;
  ease: number;
  reps: number;
  lapses: number;
}

// One grading action. grade is the SM-2 quality score (0-5).
export interface Review {
  id: string;
  card_id: string;
  grade: number;
  reviewed_at: string;
}

export interface Snapshot {
  words: Word[];
  cards: Card[];
  reviews: Review[];
}

// A due card joined with its word
export interface DueCard {
  card: Card;
  word: Word;
}

// What the UI renders for one review prompt
export interface CardView {
  record_id: string;
  item_id: string;
  text: string;
  translation: string | null;
  chapter: string | null;
  group: string | null;
  language: Language;
  due_at: string;
}

export interface Counts {
  due: number;
  total: number;
}

export interface NewWordInput {
  text: string;
  translation?: string | null;
  language?: Language;
  chapter?: string | null;
  group_name?: string | null;
  sentence?: string | null;
}

// Explicit "set or leave alone" per field, so an empty string is a real value
export type FieldUpdate<T> = { kind: 'unchanged' } | { kind: 'set'; value: T };

export interface ContentCorrection {
  text: FieldUpdate<string>;
  translation: FieldUpdate<string>;
}

export const UNCHANGED = { kind: 'unchanged' } as const;

export function setField<T>(value: T): FieldUpdate<T> {
  return { kind: 'set', value };
}

/**
 * Build a correction from optional inputs: `undefined` leaves a field alone.
 */
export function correctionFrom(fields: { text?: string; translation?: string }): ContentCorrection {
  return {
    text: fields.text === undefined ? UNCHANGED : setField(fields.text),
    translation: fields.translation === undefined ? UNCHANGED : setField(fields.translation),
  };
}

export function isNoopCorrection(correction: ContentCorrection): boolean {
  return correction.text.kind === 'unchanged' && correction.translation.kind === 'unchanged';
}

// Authenticated session, passed explicitly into every remote-touching call
export interface AuthContext {
  token: string;
  userId?: string;
  expiresAt?: string;
}

// Out-of-band feedback about a card
export interface IssueReport {
  card_id: string;
  word_id: string;
  text: string;
  translation: string | null;
  note: string | null;
  reported_at: string;
}

// Session state machine
export type SessionState = 'idle' | 'active' | 'prompt';

export interface SessionSnapshot {
  state: SessionState;
  reviewed: number;
  cap: number;
  remaining: number;
}

export interface IngestResult {
  words: number;
  cards: number;
  reviews: number;
}
