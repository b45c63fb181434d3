/**
 * Cardwise Shared Types
 *
 * Core type definitions for decks, cards and the review ledger.
 * These types are used by the engine and by anything that calls it.
 */

/**
 * Lifecycle state of a card as persisted in the card store.
 */
export type CardStateName = "new" | "learning" | "review" | "relearning" | "suspended";

/**
 * Graded response to a card.
 *
 * - 0: Missed
 * - 1: Almost
 * - 2: Got it
 */
export type RatingValue = 0 | 1 | 2;

/**
 * Named ratings, so call sites read `Rating.GotIt` instead of `2`.
 */
export const Rating = {
  Missed: 0,
  Almost: 1,
  GotIt: 2,
} as const satisfies Record<string, RatingValue>;

/**
 * How review and new cards of one deck are merged in a session.
 */
export type SessionMix = "new-first" | "review-first" | "alternate";

/**
 * Card template tags. Every note has a front->back card; the reverse card
 * exists only when enabled for the note.
 */
export type CardTemplate = "front->back" | "back->front";

/**
 * Error codes returned by the engine and its REST surface.
 *
 * These codes let callers tell validation, referential, conflict and
 * persistence failures apart without parsing messages.
 */
export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_RATING"
  | "INVALID_DECK_CONFIG"
  | "UNKNOWN_CARD"
  | "UNKNOWN_DECK"
  | "UNKNOWN_NOTE"
  | "DUPLICATE_NOTE"
  | "INVALID_STATE"
  | "PERSISTENCE_FAILED"
  | "INTERNAL_ERROR";
