/**
 * Scheduling Module
 *
 * Re-exports from scheduling submodules for convenient access.
 */

// Scheduler (main API)
export {
  Scheduler,
  DEFAULT_DECK_PREFS,
  type SchedulerOptions,
  type AddNoteOptions,
  type ReviewOutcome,
  type LeechEvent,
} from "./scheduler";

// State machine
export {
  applyRating,
  suspendCard,
  unsuspendCard,
  buryCard,
  isValidRating,
  DEFAULT_SCHEDULING_POLICY,
  ALMOST_MIN_DELAY_MINUTES,
  type SchedulingPolicy,
  type TransitionContext,
  type TransitionResult,
} from "./card-state-machine";

// Interval/ease calculator
export {
  calculateReviewUpdate,
  clampEase,
  DEFAULT_INTERVAL_POLICY,
  type IntervalPolicy,
  type HardIntervalPolicy,
} from "./interval-calculator";

// Card model
export {
  type Card,
  type CardPhase,
  type ActivePhase,
  type Note,
  DEFAULT_EASE,
  MIN_EASE,
  SECONDS_PER_DAY,
  SECONDS_PER_MINUTE,
  nowSeconds,
} from "./card-schema";

// Sessions
export { SessionBuilder, type SessionLimits } from "./session-builder";
export { SiblingFilter, isBuried } from "./sibling-filter";
export { ReviewLedger } from "./review-ledger";
export { getStudyDate, getNextRollover, hostUtcOffsetMinutes, type StudyClock } from "./study-day";

// Storage
export type { CardStore, CandidateBucket, SessionCandidate, DailyCounts } from "./card-store";
export { SqliteCardStore, createMemoryCardStore, loadSqlJs, openCardStore } from "./sqlite-card-store";

// Import
export {
  importBundledDeck,
  importBundledDeckFile,
  parseBundledDeck,
  type ImportResult,
} from "./deck-import";

// Errors
export * from "./errors";
