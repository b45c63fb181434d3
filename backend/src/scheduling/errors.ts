/**
 * Scheduler Errors
 *
 * Every failure the engine reports carries an ErrorCode so callers (and the
 * REST error handler) can tell the four failure classes apart:
 * - validation: INVALID_RATING, INVALID_DECK_CONFIG, VALIDATION_ERROR
 * - referential: UNKNOWN_CARD, UNKNOWN_DECK, UNKNOWN_NOTE
 * - conflict: DUPLICATE_NOTE, INVALID_STATE
 * - persistence: PERSISTENCE_FAILED
 */

import type { ErrorCode } from "@cardwise/shared";

/**
 * Base class for errors raised by the scheduling engine.
 */
export class SchedulerError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchedulerError";
    this.code = code;
  }
}

export class ValidationError extends SchedulerError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

/**
 * Thrown when a rating is outside {0, 1, 2}. Ratings are never clamped.
 */
export class InvalidRatingError extends SchedulerError {
  constructor(rating: unknown) {
    super(`Invalid rating: ${String(rating)}. Must be one of: 0, 1, 2`, "INVALID_RATING");
    this.name = "InvalidRatingError";
  }
}

export class InvalidDeckConfigError extends SchedulerError {
  constructor(message: string) {
    super(message, "INVALID_DECK_CONFIG");
    this.name = "InvalidDeckConfigError";
  }
}

export class UnknownCardError extends SchedulerError {
  constructor(cardId: string) {
    super(`Card not found: ${cardId}`, "UNKNOWN_CARD");
    this.name = "UnknownCardError";
  }
}

export class UnknownDeckError extends SchedulerError {
  constructor(deckId: string) {
    super(`Deck not found: ${deckId}`, "UNKNOWN_DECK");
    this.name = "UnknownDeckError";
  }
}

export class UnknownNoteError extends SchedulerError {
  constructor(noteId: string) {
    super(`Note not found: ${noteId}`, "UNKNOWN_NOTE");
    this.name = "UnknownNoteError";
  }
}

/**
 * Thrown when a note with the same (deck, front, back) already exists.
 * The caller decides whether to merge or ignore.
 */
export class DuplicateNoteError extends SchedulerError {
  readonly existingNoteId: string;

  constructor(existingNoteId: string) {
    super(`An identical note already exists: ${existingNoteId}`, "DUPLICATE_NOTE");
    this.name = "DuplicateNoteError";
    this.existingNoteId = existingNoteId;
  }
}

/**
 * Thrown for commands that do not apply to the card's current state,
 * e.g. reviewing a suspended card.
 */
export class InvalidStateError extends SchedulerError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
    this.name = "InvalidStateError";
  }
}

/**
 * Wraps a store failure. The operation it interrupted has been rolled back.
 */
export class PersistenceError extends SchedulerError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation}: ${detail}`, "PERSISTENCE_FAILED", { cause });
    this.name = "PersistenceError";
  }
}

/**
 * Checks for a SchedulerError, including instances from a second copy of
 * this module where instanceof fails.
 */
export function isSchedulerError(error: unknown): error is SchedulerError {
  if (error instanceof SchedulerError) {
    return true;
  }
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    KNOWN_CODES.has(error.code)
  );
}

const KNOWN_CODES: ReadonlySet<string> = new Set<ErrorCode>([
  "VALIDATION_ERROR",
  "INVALID_RATING",
  "INVALID_DECK_CONFIG",
  "UNKNOWN_CARD",
  "UNKNOWN_DECK",
  "UNKNOWN_NOTE",
  "DUPLICATE_NOTE",
  "INVALID_STATE",
  "PERSISTENCE_FAILED",
  "INTERNAL_ERROR",
]);
