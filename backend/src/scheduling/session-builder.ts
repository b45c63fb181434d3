/**
 * Session Queue Builder
 *
 * Builds the ordered list of cards for one review pass:
 *
 * 1. Per deck, fetch learning (due now), review (due now, oldest first) and
 *    new (creation order) candidates from the store.
 * 2. Select in priority order learning → review → new, under each deck's
 *    remaining daily allowance and the optional global caps, suppressing
 *    siblings as cards are selected.
 * 3. Order: learning first (due plus a bounded jitter so identical due
 *    times do not cluster), then each deck's review and new cards merged
 *    by the deck's mix policy.
 *
 * The result is a snapshot. Grading a card does not change a session that
 * was already returned; rebuild to see a relearning card come back.
 */

import type { Deck, SessionCard, SessionMix } from "@cardwise/shared";
import { stateOf } from "./card-schema";
import type { CandidateBucket, CardStore, SessionCandidate } from "./card-store";
import { SiblingFilter } from "./sibling-filter";
import { DEFAULT_STUDY_CLOCK, getStudyDate, type StudyClock } from "./study-day";
import { UnknownDeckError, ValidationError } from "./errors";
import { createLogger } from "../logger";

const log = createLogger("SessionBuilder");

// =============================================================================
// Types
// =============================================================================

export interface SessionLimits {
  /** Global cap on new cards across all requested decks */
  maxNew?: number;
  /** Global cap on review cards across all requested decks */
  maxReview?: number;
}

export interface SessionBuilderOptions {
  clock: StudyClock;
  /** Upper bound of the apparent-due skew added to learning cards */
  learningJitterSeconds: number;
  /** Uniform [0, 1) source for the jitter */
  random: () => number;
}

export const DEFAULT_LEARNING_JITTER_SECONDS = 300;

const DEFAULT_MIX: SessionMix = "new-first";

interface DeckSelection {
  deck: Deck;
  reviews: SessionCandidate[];
  news: SessionCandidate[];
}

// =============================================================================
// Ordering Helpers
// =============================================================================

/**
 * Merge a deck's review and new cards, keeping each bucket's order.
 */
export function mixBuckets<T>(reviews: readonly T[], news: readonly T[], mix: SessionMix): T[] {
  switch (mix) {
    case "new-first":
      return [...news, ...reviews];
    case "review-first":
      return [...reviews, ...news];
    case "alternate": {
      const merged: T[] = [];
      const longest = Math.max(reviews.length, news.length);
      for (let i = 0; i < longest; i++) {
        if (i < news.length) merged.push(news[i]);
        if (i < reviews.length) merged.push(reviews[i]);
      }
      return merged;
    }
  }
}

/**
 * Sort learning cards by due plus a random skew in [0, maxJitter] seconds.
 * Ties keep their fetch order.
 */
export function jitterLearning(
  candidates: readonly SessionCandidate[],
  maxJitterSeconds: number,
  random: () => number
): SessionCandidate[] {
  return candidates
    .map((candidate, index) => ({
      candidate,
      index,
      key: candidate.card.due + Math.floor(random() * (maxJitterSeconds + 1)),
    }))
    .sort((a, b) => a.key - b.key || a.index - b.index)
    .map((entry) => entry.candidate);
}

function toSessionCard(candidate: SessionCandidate): SessionCard {
  return {
    cardId: candidate.card.id,
    noteId: candidate.card.noteId,
    deckId: candidate.deckId,
    front: candidate.front,
    back: candidate.back,
    state: stateOf(candidate.card.phase),
    template: candidate.card.template,
    due: candidate.card.due,
  };
}

function assertLimit(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

// =============================================================================
// SessionBuilder Class
// =============================================================================

export class SessionBuilder {
  private readonly options: SessionBuilderOptions;

  constructor(
    private readonly store: CardStore,
    options: Partial<SessionBuilderOptions> = {}
  ) {
    this.options = {
      clock: options.clock ?? DEFAULT_STUDY_CLOCK,
      learningJitterSeconds: options.learningJitterSeconds ?? DEFAULT_LEARNING_JITTER_SECONDS,
      random: options.random ?? Math.random,
    };
  }

  /**
   * Build the ordered session for the given decks.
   *
   * @param deckIds - Decks to study, in the order their cards are presented
   * @param now - Epoch seconds
   * @param limits - Optional global caps overriding the decks' daily limits
   * @throws UnknownDeckError when a deck id does not exist
   * @throws ValidationError when a cap is not a non-negative integer
   */
  build(deckIds: readonly string[], now: number, limits: SessionLimits = {}): SessionCard[] {
    if (deckIds.length === 0) {
      return [];
    }

    assertLimit("maxNew", limits.maxNew);
    assertLimit("maxReview", limits.maxReview);

    const decks = [...new Set(deckIds)].map((deckId) => {
      const deck = this.store.getDeck(deckId);
      if (!deck) {
        throw new UnknownDeckError(deckId);
      }
      return deck;
    });

    const studyDate = getStudyDate(now, this.options.clock);
    const filter = new SiblingFilter(now);

    // Learning cards are time-critical and not subject to daily limits
    const learning: SessionCandidate[] = [];
    for (const deck of decks) {
      for (const candidate of this.store.getCandidates(deck.id, "learning", now)) {
        if (filter.admit(candidate.card)) {
          learning.push(candidate);
        }
      }
    }

    const selections: DeckSelection[] = decks.map((deck) => ({ deck, reviews: [], news: [] }));

    let reviewBudget = limits.maxReview ?? Number.POSITIVE_INFINITY;
    for (const selection of selections) {
      const counts = this.store.getDailyCounts(selection.deck.id, studyDate);
      const allowance = Math.max(0, selection.deck.prefs.rev_per_day - counts.reviewStudied);
      selection.reviews = this.take(selection.deck.id, "review", now, Math.min(allowance, reviewBudget), filter);
      reviewBudget -= selection.reviews.length;
    }

    let newBudget = limits.maxNew ?? Number.POSITIVE_INFINITY;
    for (const selection of selections) {
      const counts = this.store.getDailyCounts(selection.deck.id, studyDate);
      const allowance = Math.max(0, selection.deck.prefs.new_per_day - counts.newStudied);
      selection.news = this.take(selection.deck.id, "new", now, Math.min(allowance, newBudget), filter);
      newBudget -= selection.news.length;
    }

    const ordered = [
      ...jitterLearning(learning, this.options.learningJitterSeconds, this.options.random),
      ...selections.flatMap((selection) =>
        mixBuckets(selection.reviews, selection.news, selection.deck.prefs.mix ?? DEFAULT_MIX)
      ),
    ];

    log.debug(
      `Built session for ${decks.length} deck(s): ${learning.length} learning, ` +
        `${ordered.length - learning.length} review/new`
    );

    return ordered.map(toSessionCard);
  }

  /**
   * Take up to `cap` admissible candidates from one bucket. A cap of 0 skips
   * the bucket without querying it.
   */
  private take(
    deckId: string,
    bucket: CandidateBucket,
    now: number,
    cap: number,
    filter: SiblingFilter
  ): SessionCandidate[] {
    if (cap <= 0) {
      return [];
    }

    const selected: SessionCandidate[] = [];
    for (const candidate of this.store.getCandidates(deckId, bucket, now)) {
      if (selected.length >= cap) break;
      if (filter.admit(candidate.card)) {
        selected.push(candidate);
      }
    }
    return selected;
  }
}
