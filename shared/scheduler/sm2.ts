/**
 * SM-2 Retention State Transitions
 *
 * Pure, deterministic computation of the next retention state for a card
 * given the learner's self-reported rating. No I/O and no clock access: the
 * caller supplies `now`, which keeps the scheduler trivially testable.
 *
 * Used by the local engine when grading and by anything that needs interval
 * previews for the rating buttons.
 */

// ============ Types ============

export type Rating = 0 | 1 | 2 | 3; // 0=again, 1=hard, 2=good, 3=easy

export const RATINGS: readonly Rating[] = [0, 1, 2, 3];

/**
 * The scheduling fields of a card. Anything carrying these (a local card row,
 * a snapshot row) can be passed to `transition`.
 */
export interface RetentionState {
  due_at: string;         // ISO timestamp
  interval_days: number;  // Fractional days
  ease: number;
  reps: number;           // Successful repetitions since the last lapse
  lapses: number;
}

export interface SchedulerSettings {
  starting_ease: number;
  minimum_ease: number;             // Ease floor
  lapse_penalty: number;            // Ease lost on Again
  relapse_interval_minutes: number; // Interval after a lapse (interval floor)
  first_interval: number;           // Days, first successful repetition
  second_interval: number;          // Days, second successful repetition
  hard_multiplier: number;
  easy_bonus: number;
  maximum_interval: number;         // Days, cap for any successful repetition
}

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
  starting_ease: 2.5,
  minimum_ease: 1.3,
  lapse_penalty: 0.2,
  relapse_interval_minutes: 10,
  first_interval: 1,
  second_interval: 6,
  hard_multiplier: 1.2,
  easy_bonus: 1.3,
  maximum_interval: 36500,
};

const MINUTES_PER_DAY = 24 * 60;
const MS_PER_DAY = MINUTES_PER_DAY * 60 * 1000;

// ============ Rating Conversion ============

// SM-2 quality scores (0-5). The review log stores these.
const RATING_QUALITY: Record<Rating, number> = {
  0: 1,
  1: 3,
  2: 4,
  3: 5,
};

const RATING_NAMES: Record<Rating, string> = {
  0: 'Again',
  1: 'Hard',
  2: 'Good',
  3: 'Easy',
};

export function isRating(value: unknown): value is Rating {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

export function ratingToQuality(rating: Rating): number {
  return RATING_QUALITY[rating];
}

/**
 * Map a stored quality score back to the rating that would produce it.
 * Scores below 3 are lapses.
 */
export function qualityToRating(quality: number): Rating {
  if (quality < 3) return 0;
  if (quality < 4) return 1;
  if (quality < 5) return 2;
  return 3;
}

export function getRatingName(rating: Rating): string {
  return RATING_NAMES[rating];
}

// ============ Helpers ============

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function addDays(now: Date, days: number): string {
  return new Date(now.getTime() + Math.round(days * MS_PER_DAY)).toISOString();
}

function nonNegativeInt(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/**
 * Ease change for a quality score.
 * EF' = EF + (0.1 - (5-q) * (0.08 + (5-q) * 0.02))
 */
export function easeDelta(quality: number): number {
  const miss = 5 - quality;
  return 0.1 - miss * (0.08 + miss * 0.02);
}

export function relapseIntervalDays(settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS): number {
  return settings.relapse_interval_minutes / MINUTES_PER_DAY;
}

// Lift out-of-domain values (e.g. from a remote snapshot) into the valid range
function normalize(state: RetentionState, settings: SchedulerSettings) {
  return {
    ease: Number.isFinite(state.ease)
      ? Math.max(state.ease, settings.minimum_ease)
      : settings.starting_ease,
    interval: Number.isFinite(state.interval_days) && state.interval_days > 0 ? state.interval_days : 0,
    reps: nonNegativeInt(state.reps),
    lapses: nonNegativeInt(state.lapses),
  };
}

// ============ Core ============

/**
 * Creates the retention state for a card that has never been reviewed.
 * It is due immediately.
 */
export function initialRetentionState(
  now: Date,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): RetentionState {
  return {
    due_at: now.toISOString(),
    interval_days: 0,
    ease: settings.starting_ease,
    reps: 0,
    lapses: 0,
  };
}

/**
 * Apply one rating to a retention state.
 *
 * Total over its input domain: never throws, never yields an interval below
 * the relapse interval or above `maximum_interval`, an ease below the floor,
 * or a due date before `now`.
 */
export function transition<T extends RetentionState>(
  state: T,
  rating: Rating,
  now: Date,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): T {
  const current = normalize(state, settings);

  if (rating === 0) {
    const interval = relapseIntervalDays(settings);
    return {
      ...state,
      ease: roundTo2(Math.max(current.ease - settings.lapse_penalty, settings.minimum_ease)),
      interval_days: interval,
      reps: 0,
      lapses: current.lapses + 1,
      due_at: addDays(now, interval),
    };
  }

  const ease = roundTo2(
    Math.max(current.ease + easeDelta(RATING_QUALITY[rating]), settings.minimum_ease)
  );
  const reps = current.reps + 1;
  const interval = roundTo2(
    Math.min(successInterval(rating, reps, current.interval, ease, settings), settings.maximum_interval)
  );

  return {
    ...state,
    ease,
    interval_days: interval,
    reps,
    lapses: current.lapses,
    due_at: addDays(now, interval),
  };
}

function successInterval(
  rating: Exclude<Rating, 0>,
  reps: number,
  previousInterval: number,
  ease: number,
  settings: SchedulerSettings
): number {
  let good: number;
  if (reps === 1) {
    good = settings.first_interval;
  } else if (reps === 2) {
    good = settings.second_interval;
  } else {
    good = Math.max(1, previousInterval * ease);
  }

  switch (rating) {
    case 1:
      if (reps === 1) return settings.first_interval;
      // Hard never outgrows Good from the same state
      return Math.max(1, Math.min(good, previousInterval * settings.hard_multiplier));
    case 2:
      return good;
    case 3:
      return good * settings.easy_bonus;
  }
}

export function isDue(state: Pick<RetentionState, 'due_at'>, now: Date): boolean {
  return Date.parse(state.due_at) <= now.getTime();
}

// ============ Previews ============

/**
 * Interval (days) each rating would produce from the given state.
 * Used to label the rating buttons (Anki-style).
 */
export function getIntervalPreviews(
  state: RetentionState,
  now: Date,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): Record<Rating, number> {
  return {
    0: transition(state, 0, now, settings).interval_days,
    1: transition(state, 1, now, settings).interval_days,
    2: transition(state, 2, now, settings).interval_days,
    3: transition(state, 3, now, settings).interval_days,
  };
}

/**
 * Format an interval in days to a human-readable string.
 */
export function formatInterval(days: number): string {
  const minutes = days * MINUTES_PER_DAY;
  if (minutes < 60) {
    return `${Math.max(1, Math.round(minutes))}m`;
  }
  if (days < 1) {
    return `${Math.round(minutes / 60)}h`;
  }
  if (days < 7) {
    const rounded = Math.round(days);
    return `${rounded}d`;
  }
  if (days < 30) {
    const weeks = days / 7;
    return weeks === Math.floor(weeks) ? `${weeks}w` : `${weeks.toFixed(1)}w`;
  }
  if (days < 365) {
    const months = days / 30;
    return months === Math.floor(months) ? `${months}mo` : `${months.toFixed(1)}mo`;
  }
  const years = days / 365;
  return years === Math.floor(years) ? `${years}y` : `${years.toFixed(1)}y`;
}
