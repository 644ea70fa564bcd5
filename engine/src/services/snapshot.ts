/**
 * Wire contract for data API snapshots: { words, cards, reviews }.
 *
 * Parsing normalizes timestamps to canonical ISO strings (the store orders
 * cards by comparing them as strings) and reports every bad row at once.
 */

import { z } from 'zod';
import { DEFAULT_SCHEDULER_SETTINGS } from '@vocab-drill/shared/scheduler';
import { ValidationError } from '../errors';
import type { Snapshot } from '../types';

// Four-digit years only, so canonical strings keep sorting by time
const LATEST_TIMESTAMP = Date.parse('9999-12-31T23:59:59.999Z');

const timestamp = z
  .string()
  .refine(value => !Number.isNaN(Date.parse(value)), { message: 'must be a timestamp' })
  .refine(value => Date.parse(value) >= 0 && Date.parse(value) <= LATEST_TIMESTAMP, {
    message: 'must be between 1970 and 9999',
  })
  .transform(value => new Date(value).toISOString());

const optionalText = z
  .string()
  .nullish()
  .transform(value => value ?? null);

export const WordRowSchema = z.object({
  id: z.string().min(1),
  text: z.string().trim().min(1),
  language: z.enum(['Dutch', 'English']),
  translation: optionalText,
  chapter: optionalText,
  group_name: optionalText,
  sentence: optionalText,
  created_at: timestamp,
});

export const CardRowSchema = z.object({
  id: z.string().min(1),
  word_id: z.string().min(1),
  due_at: timestamp,
  interval_days: z.number().finite().nonnegative().max(DEFAULT_SCHEDULER_SETTINGS.maximum_interval),
  ease: z.number().finite().positive(),
  reps: z.number().int().nonnegative(),
  lapses: z.number().int().nonnegative(),
});

export const ReviewRowSchema = z.object({
  id: z.string().min(1),
  card_id: z.string().min(1),
  grade: z.number().int().min(0).max(5),
  reviewed_at: timestamp,
});

export const SnapshotSchema = z.object({
  words: z.array(WordRowSchema),
  cards: z.array(CardRowSchema),
  reviews: z.array(ReviewRowSchema),
});

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validate an untrusted snapshot. Throws ValidationError listing every
 * offending field; nothing downstream sees a partially valid snapshot.
 */
export function parseSnapshot(input: unknown): Snapshot {
  const result = SnapshotSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Malformed snapshot', result.error.issues.map(formatIssue));
  }
  return result.data;
}
