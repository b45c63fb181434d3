/**
 * Card Store Contract
 *
 * The engine reaches persistence only through this interface. All methods
 * are synchronous; `transaction` runs its callback atomically and rolls
 * back every write made inside it when the callback throws.
 */

import type { DeckPrefs, ReviewEvent } from "@cardwise/shared";
import type { Card, Deck, Note } from "./card-schema";

/**
 * Which slice of a deck a session asks for.
 * - learning: learning and relearning cards due now
 * - review: review cards due now, oldest due first
 * - new: new cards in creation order
 */
export type CandidateBucket = "learning" | "review" | "new";

/**
 * A card plus the note and deck fields a session summary needs.
 */
export interface SessionCandidate {
  card: Card;
  deckId: string;
  front: string;
  back: string;
}

/** Cards studied per deck and study day, counted against daily limits */
export interface DailyCounts {
  newStudied: number;
  reviewStudied: number;
}

/** Due cards grouped by bucket (relearning counts as learning) */
export interface DueCounts {
  new: number;
  learning: number;
  review: number;
}

export interface CardStore {
  transaction<T>(fn: () => T): T;

  // Decks
  insertDeck(deck: Deck): void;
  getDeck(deckId: string): Deck | null;
  findDeckByName(name: string): Deck | null;
  listDecks(): Deck[];
  updateDeckPrefs(deckId: string, prefs: DeckPrefs): void;
  /** Returns false when no deck had this id */
  deleteDeck(deckId: string): boolean;

  // Notes
  insertNote(note: Note): void;
  getNote(noteId: string): Note | null;
  findNote(deckId: string, front: string, back: string): Note | null;
  deleteNote(noteId: string): boolean;

  // Cards
  insertCard(card: Card): void;
  getCard(cardId: string): Card | null;
  getCardsForNote(noteId: string): Card[];
  /** The deck owning a card, via its note */
  getDeckIdForCard(cardId: string): string | null;
  updateCard(card: Card): void;
  /**
   * Unsuspended, unburied cards of one deck in the bucket, in presentation
   * order (due ascending, insertion order on ties).
   */
  getCandidates(deckId: string, bucket: CandidateBucket, now: number): SessionCandidate[];
  countDue(deckIds: readonly string[], now: number): DueCounts;

  // Review ledger (append-only)
  appendReviewEvent(event: ReviewEvent): void;
  getReviewEvents(cardId: string): ReviewEvent[];

  // Daily counters
  getDailyCounts(deckId: string, studyDate: string): DailyCounts;
  incrementDailyCounts(deckId: string, studyDate: string, delta: DailyCounts): void;

  close(): void;
}
