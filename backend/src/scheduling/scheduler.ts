/**
 * Scheduler
 *
 * The engine API. Coordinates the card store, the state machine, the
 * session builder and the review ledger.
 *
 * Every mutating call runs in one store transaction: for a review, the card
 * update, the ledger row and the daily counter commit together or not at
 * all. Store failures surface as PersistenceError; nothing is retried.
 */

import { randomUUID } from "node:crypto";
import {
  TimestampSchema,
  safeParseDeckPrefs,
  type CardTemplate,
  type Deck,
  type DeckPrefs,
  type DeckPrefsPatch,
  type NoteMeta,
  type ReviewEvent,
  type SessionCard,
  type StatsToday,
} from "@cardwise/shared";
import { createNewCard, nowSeconds, stateOf, type Card, type Note } from "./card-schema";
import type { CardStore } from "./card-store";
import {
  DEFAULT_SCHEDULING_POLICY,
  applyRating,
  buryCard,
  isValidRating,
  suspendCard,
  unsuspendCard,
  type SchedulingPolicy,
} from "./card-state-machine";
import { ReviewLedger } from "./review-ledger";
import { SessionBuilder } from "./session-builder";
import { DEFAULT_STUDY_CLOCK, getNextRollover, getStudyDate, type StudyClock } from "./study-day";
import {
  DuplicateNoteError,
  InvalidDeckConfigError,
  InvalidRatingError,
  PersistenceError,
  UnknownCardError,
  UnknownDeckError,
  UnknownNoteError,
  ValidationError,
  isSchedulerError,
} from "./errors";
import { schedulerLog as log } from "../logger";

// =============================================================================
// Types
// =============================================================================

/** Preferences given to decks created without explicit ones */
export const DEFAULT_DECK_PREFS: DeckPrefs = {
  new_per_day: 10,
  rev_per_day: 100,
  steps_min: [10, 1440],
};

export interface LeechEvent {
  cardId: string;
  noteId: string;
  deckId: string;
  lapses: number;
}

export interface SchedulerOptions {
  policy?: Partial<SchedulingPolicy>;
  clock?: StudyClock;
  learningJitterSeconds?: number;
  /** Random source for session jitter */
  random?: () => number;
  defaultDeckPrefs?: DeckPrefs;
  /**
   * Called after a review commits when the card reached the leech
   * threshold. The engine only reports leeches; suspending is up to the
   * caller.
   */
  onLeech?: (event: LeechEvent) => void;
  /** Time source in epoch seconds, used when a call omits `now` */
  now?: () => number;
}

export interface AddNoteOptions {
  /** Also create the back->front card */
  reverse?: boolean;
  now?: number;
}

export interface ReviewOutcome {
  card: Card;
  event: ReviewEvent;
  leech: boolean;
}

/**
 * Card rows store whole epoch seconds; reject anything else before it is written.
 */
function checkTimestamp(now: number): number {
  if (!TimestampSchema.safeParse(now).success) {
    throw new ValidationError(`now must be a non-negative integer of epoch seconds, got ${now}`);
  }
  return now;
}

// =============================================================================
// Scheduler Class
// =============================================================================

export class Scheduler {
  readonly policy: SchedulingPolicy;
  private readonly clock: StudyClock;
  private readonly defaultDeckPrefs: DeckPrefs;
  private readonly sessions: SessionBuilder;
  private readonly ledger: ReviewLedger;
  private readonly onLeech?: (event: LeechEvent) => void;
  private readonly now: () => number;

  constructor(
    private readonly store: CardStore,
    options: SchedulerOptions = {}
  ) {
    this.policy = { ...DEFAULT_SCHEDULING_POLICY, ...options.policy };
    this.clock = options.clock ?? DEFAULT_STUDY_CLOCK;
    this.defaultDeckPrefs = options.defaultDeckPrefs ?? DEFAULT_DECK_PREFS;
    this.onLeech = options.onLeech;
    this.now = options.now ?? nowSeconds;
    this.ledger = new ReviewLedger(store);
    this.sessions = new SessionBuilder(store, {
      clock: this.clock,
      learningJitterSeconds: options.learningJitterSeconds,
      random: options.random,
    });
  }

  // ---------------------------------------------------------------------------
  // Decks
  // ---------------------------------------------------------------------------

  /**
   * Create a deck.
   * @throws ValidationError for an empty or taken name
   * @throws InvalidDeckConfigError for invalid preferences
   */
  createDeck(name: string, prefs: DeckPrefs = this.defaultDeckPrefs, isBuiltin = false): Deck {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new ValidationError("Deck name is required");
    }

    const deck: Deck = {
      id: randomUUID(),
      name: trimmed,
      isBuiltin,
      prefs: validatePrefs(prefs),
    };

    this.persist("create deck", () => {
      if (this.store.findDeckByName(trimmed)) {
        throw new ValidationError(`A deck named "${trimmed}" already exists`);
      }
      this.store.insertDeck(deck);
    });

    log.info(`Created deck ${deck.id}: "${deck.name}"`);
    return deck;
  }

  getDeck(deckId: string): Deck {
    const deck = this.query("load deck", () => this.store.getDeck(deckId));
    if (!deck) {
      throw new UnknownDeckError(deckId);
    }
    return deck;
  }

  listDecks(): Deck[] {
    return this.query("list decks", () => this.store.listDecks());
  }

  /**
   * Apply a partial preference update.
   * @throws InvalidDeckConfigError when the merged preferences are invalid
   */
  updateDeckPrefs(deckId: string, patch: DeckPrefsPatch): Deck {
    const deck = this.getDeck(deckId);
    const prefs = validatePrefs({ ...deck.prefs, ...patch });

    this.persist("update deck preferences", () => this.store.updateDeckPrefs(deckId, prefs));
    log.info(`Updated preferences for deck ${deckId}`);
    return { ...deck, prefs };
  }

  /**
   * Delete a deck with its notes and cards.
   */
  deleteDeck(deckId: string): void {
    const deleted = this.persist("delete deck", () => this.store.deleteDeck(deckId));
    if (!deleted) {
      throw new UnknownDeckError(deckId);
    }
    log.info(`Deleted deck ${deckId}`);
  }

  // ---------------------------------------------------------------------------
  // Notes
  // ---------------------------------------------------------------------------

  /**
   * Add a note and its card(s).
   *
   * @returns The new note's id
   * @throws UnknownDeckError when the deck does not exist
   * @throws DuplicateNoteError when (deck, front, back) already exists
   */
  addNote(
    deckId: string,
    front: string,
    back: string,
    meta?: NoteMeta,
    options: AddNoteOptions = {}
  ): string {
    const trimmedFront = front.trim();
    const trimmedBack = back.trim();
    if (trimmedFront.length === 0 || trimmedBack.length === 0) {
      throw new ValidationError("Both front and back are required");
    }

    const now = checkTimestamp(options.now ?? this.now());
    const note: Note = {
      id: randomUUID(),
      deckId,
      front: trimmedFront,
      back: trimmedBack,
      meta: meta ?? null,
      createdAt: now,
    };
    const templates: CardTemplate[] = options.reverse
      ? ["front->back", "back->front"]
      : ["front->back"];

    this.persist("add note", () => {
      if (!this.store.getDeck(deckId)) {
        throw new UnknownDeckError(deckId);
      }
      const existing = this.store.findNote(deckId, trimmedFront, trimmedBack);
      if (existing) {
        throw new DuplicateNoteError(existing.id);
      }

      this.store.insertNote(note);
      for (const template of templates) {
        this.store.insertCard(createNewCard(randomUUID(), note.id, template, now));
      }
    });

    log.debug(`Added note ${note.id} to deck ${deckId} (${templates.length} card(s))`);
    return note.id;
  }

  /**
   * Create the back->front card for a note. Returns the existing card when
   * the reverse is already enabled.
   */
  enableReverse(noteId: string, now: number = this.now()): Card {
    checkTimestamp(now);
    return this.persist("enable reverse card", () => {
      if (!this.store.getNote(noteId)) {
        throw new UnknownNoteError(noteId);
      }
      const existing = this.store
        .getCardsForNote(noteId)
        .find((card) => card.template === "back->front");
      if (existing) {
        return existing;
      }

      const card = createNewCard(randomUUID(), noteId, "back->front", now);
      this.store.insertCard(card);
      return card;
    });
  }

  getNote(noteId: string): Note {
    const note = this.query("load note", () => this.store.getNote(noteId));
    if (!note) {
      throw new UnknownNoteError(noteId);
    }
    return note;
  }

  deleteNote(noteId: string): void {
    const deleted = this.persist("delete note", () => this.store.deleteNote(noteId));
    if (!deleted) {
      throw new UnknownNoteError(noteId);
    }
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  /**
   * Build the ordered list of cards to study now.
   * An empty deck list gives an empty session.
   */
  buildSession(
    deckIds: readonly string[],
    now: number = this.now(),
    maxNew?: number,
    maxReview?: number
  ): SessionCard[] {
    checkTimestamp(now);
    return this.query("build session", () =>
      this.sessions.build(deckIds, now, { maxNew, maxReview })
    );
  }

  /**
   * Due counts by bucket for the given decks.
   */
  getStatsToday(deckIds: readonly string[], now: number = this.now()): StatsToday {
    checkTimestamp(now);
    for (const deckId of deckIds) {
      this.getDeck(deckId);
    }
    const counts = this.query("count due cards", () => this.store.countDue(deckIds, now));
    return { ...counts, total: counts.new + counts.learning + counts.review };
  }

  // ---------------------------------------------------------------------------
  // Reviews
  // ---------------------------------------------------------------------------

  getCard(cardId: string): Card {
    const card = this.query("load card", () => this.store.getCard(cardId));
    if (!card) {
      throw new UnknownCardError(cardId);
    }
    return card;
  }

  /**
   * Grade a card.
   *
   * @param rating - 0 (Missed), 1 (Almost) or 2 (Got it)
   * @param answerMs - Time taken to answer, in milliseconds
   * @throws InvalidRatingError when rating is not 0, 1 or 2
   * @throws UnknownCardError when the card does not exist
   * @throws InvalidStateError when the card is suspended
   * @throws ValidationError when `now` is not whole epoch seconds
   * @throws PersistenceError when the commit fails (nothing is written)
   */
  review(cardId: string, rating: number, answerMs: number, now: number = this.now()): ReviewOutcome {
    if (!isValidRating(rating)) {
      throw new InvalidRatingError(rating);
    }
    if (!Number.isFinite(answerMs) || answerMs < 0) {
      throw new ValidationError(`answerMs must be a non-negative number, got ${answerMs}`);
    }
    checkTimestamp(now);

    const outcome = this.persist("record review", () => {
      const prior = this.store.getCard(cardId);
      if (!prior) {
        throw new UnknownCardError(cardId);
      }
      const deckId = this.store.getDeckIdForCard(cardId);
      const deck = deckId === null ? null : this.store.getDeck(deckId);
      if (!deck) {
        throw new UnknownDeckError(deckId ?? `(deck of card ${cardId})`);
      }

      const { card, leech } = applyRating(prior, rating, {
        now,
        stepsMinutes: deck.prefs.steps_min,
        policy: this.policy,
      });

      this.store.updateCard(card);
      const event = this.ledger.record({
        cardId,
        rating,
        answerMs,
        prior,
        posterior: card,
        timestamp: now,
      });

      const priorState = stateOf(prior.phase);
      if (priorState === "new" || priorState === "review") {
        this.store.incrementDailyCounts(deck.id, getStudyDate(now, this.clock), {
          newStudied: priorState === "new" ? 1 : 0,
          reviewStudied: priorState === "review" ? 1 : 0,
        });
      }

      return { card, event, leech, deckId: deck.id };
    });

    log.debug(
      `Card ${cardId} reviewed: rating=${rating} ${outcome.event.prevState} -> ` +
        `${stateOf(outcome.card.phase)}, interval=${outcome.card.intervalDays}`
    );

    if (outcome.leech) {
      this.reportLeech({
        cardId,
        noteId: outcome.card.noteId,
        deckId: outcome.deckId,
        lapses: outcome.card.lapses,
      });
    }

    return { card: outcome.card, event: outcome.event, leech: outcome.leech };
  }

  /**
   * Ledger rows for a card, oldest first.
   */
  getReviewHistory(cardId: string): ReviewEvent[] {
    this.getCard(cardId);
    return this.query("read review history", () => this.ledger.history(cardId));
  }

  // ---------------------------------------------------------------------------
  // Card Commands
  // ---------------------------------------------------------------------------

  suspend(cardId: string): Card {
    return this.updateCard("suspend card", cardId, suspendCard);
  }

  unsuspend(cardId: string): Card {
    return this.updateCard("unsuspend card", cardId, unsuspendCard);
  }

  /**
   * Keep a card out of sessions until the next study-day rollover.
   */
  bury(cardId: string, now: number = this.now()): Card {
    checkTimestamp(now);
    const until = getNextRollover(now, this.clock);
    return this.updateCard("bury card", cardId, (card) => buryCard(card, until));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private updateCard(operation: string, cardId: string, change: (card: Card) => Card): Card {
    const updated = this.persist(operation, () => {
      const card = this.store.getCard(cardId);
      if (!card) {
        throw new UnknownCardError(cardId);
      }
      const next = change(card);
      this.store.updateCard(next);
      return next;
    });
    log.info(`${operation}: ${cardId} is now ${stateOf(updated.phase)}`);
    return updated;
  }

  private reportLeech(event: LeechEvent): void {
    log.warn(`Card ${event.cardId} is a leech (${event.lapses} lapses)`);
    if (!this.onLeech) {
      return;
    }
    try {
      this.onLeech(event);
    } catch (error) {
      // The review is already committed; a failing hook must not undo that
      log.error(`Leech hook failed for card ${event.cardId}`, error);
    }
  }

  /**
   * Run writes atomically. Engine errors pass through; anything else is a
   * store failure and becomes a PersistenceError.
   */
  private persist<T>(operation: string, fn: () => T): T {
    try {
      return this.store.transaction(fn);
    } catch (error) {
      throw this.wrapStoreError(operation, error);
    }
  }

  private query<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw this.wrapStoreError(operation, error);
    }
  }

  private wrapStoreError(operation: string, error: unknown): Error {
    if (isSchedulerError(error)) {
      return error;
    }
    log.error(`Failed to ${operation}`, error);
    return new PersistenceError(operation, error);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validatePrefs(prefs: unknown): DeckPrefs {
  const result = safeParseDeckPrefs(prefs);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidDeckConfigError(`Invalid deck preferences: ${issues}`);
  }
  return result.data;
}
