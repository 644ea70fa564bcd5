/**
 * Shared Scheduler Module - SM-2 Implementation
 *
 * Pure retention-state transitions used by the local engine (grading,
 * interval previews) and by snapshot ingest (initial state for new cards).
 */

export {
  // Types
  type Rating,
  type RetentionState,
  type SchedulerSettings,

  // Constants
  RATINGS,
  DEFAULT_SCHEDULER_SETTINGS,

  // Core functions
  initialRetentionState,
  transition,
  isDue,
  easeDelta,
  relapseIntervalDays,

  // Rating helpers
  isRating,
  ratingToQuality,
  qualityToRating,
  getRatingName,

  // Previews
  getIntervalPreviews,
  formatInterval,
} from './sm2';
