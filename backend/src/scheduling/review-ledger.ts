/**
 * Review Ledger Writer
 *
 * Appends one immutable row per graded answer. Rows are written inside the
 * caller's transaction; a failed append throws and takes the card update
 * down with it, so a review is never half-committed.
 */

import type { RatingValue, ReviewEvent } from "@cardwise/shared";
import { stateOf, type Card } from "./card-schema";
import type { CardStore } from "./card-store";

export interface ReviewRecord {
  cardId: string;
  rating: RatingValue;
  answerMs: number;
  /** Card before the answer */
  prior: Card;
  /** Card after the answer */
  posterior: Card;
  /** Epoch seconds */
  timestamp: number;
}

/**
 * Build the persisted ledger row for a review.
 */
export function toReviewEvent(record: ReviewRecord): ReviewEvent {
  return {
    cardId: record.cardId,
    ts: record.timestamp,
    rating: record.rating,
    answerMs: Math.round(record.answerMs),
    prevState: stateOf(record.prior.phase),
    prevInterval: record.prior.intervalDays,
    nextInterval: record.posterior.intervalDays,
  };
}

export class ReviewLedger {
  constructor(private readonly store: CardStore) {}

  /**
   * Append a review row. Errors from the store propagate unchanged.
   */
  record(record: ReviewRecord): ReviewEvent {
    const event = toReviewEvent(record);
    this.store.appendReviewEvent(event);
    return event;
  }

  /**
   * Every ledger row for a card, oldest first.
   */
  history(cardId: string): ReviewEvent[] {
    return this.store.getReviewEvents(cardId);
  }
}
