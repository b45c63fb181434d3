/**
 * Card State Machine
 *
 * Pure mapping (card, rating, learning steps, policy) → next card. No I/O
 * and no randomness: the same inputs always give the same card.
 *
 * Phases: new → learning → review ⇄ relearning, and suspended from any of
 * them. Dispatch is a switch over the phase tag; each phase has its own
 * transition function.
 */

import type { RatingValue } from "@cardwise/shared";
import {
  DEFAULT_EASE,
  MIN_EASE,
  addDays,
  addMinutes,
  type ActivePhase,
  type Card,
} from "./card-schema";
import {
  DEFAULT_INTERVAL_POLICY,
  boundInterval,
  calculateReviewUpdate,
  type IntervalPolicy,
} from "./interval-calculator";
import { InvalidDeckConfigError, InvalidRatingError, InvalidStateError } from "./errors";

// =============================================================================
// Constants
// =============================================================================

/** An Almost answer in learning never comes back sooner than this */
export const ALMOST_MIN_DELAY_MINUTES = 10;

// =============================================================================
// Types
// =============================================================================

export interface SchedulingPolicy extends IntervalPolicy {
  /** Interval given the first time a card leaves Learning for Review */
  firstGraduationDays: number;
  /** Interval given on every later graduation (out of Relearning) */
  graduationDays: number;
  /** Lapse count at which a card is reported as a leech */
  leechThreshold: number;
}

export const DEFAULT_SCHEDULING_POLICY: SchedulingPolicy = {
  ...DEFAULT_INTERVAL_POLICY,
  firstGraduationDays: 6,
  graduationDays: 1,
  leechThreshold: 8,
};

export interface TransitionContext {
  now: number;
  /** The owning deck's learning steps in minutes */
  stepsMinutes: readonly number[];
  policy: SchedulingPolicy;
}

export interface TransitionResult {
  card: Card;
  /** True when this answer pushed the lapse count to the leech threshold */
  leech: boolean;
}

type LearningPhase = Extract<ActivePhase, { tag: "learning" | "relearning" }>;

// =============================================================================
// Validation
// =============================================================================

export function isValidRating(value: unknown): value is RatingValue {
  return value === 0 || value === 1 || value === 2;
}

function assertSteps(steps: readonly number[]): void {
  if (steps.length === 0) {
    throw new InvalidDeckConfigError("Deck has no learning steps");
  }
  for (const step of steps) {
    if (!Number.isFinite(step) || step < 1) {
      throw new InvalidDeckConfigError(`Invalid learning step: ${step}. Steps must be >= 1 minute`);
    }
  }
}

// =============================================================================
// Transitions
// =============================================================================

/**
 * Apply a graded answer to a card.
 *
 * @throws InvalidRatingError when rating is not 0, 1 or 2
 * @throws InvalidDeckConfigError when the learning steps are unusable
 * @throws InvalidStateError when the card is suspended
 */
export function applyRating(card: Card, rating: number, ctx: TransitionContext): TransitionResult {
  if (!isValidRating(rating)) {
    throw new InvalidRatingError(rating);
  }
  assertSteps(ctx.stepsMinutes);

  const phase = card.phase;
  const reviewed: Card = { ...card, lastReviewAt: ctx.now };

  switch (phase.tag) {
    case "new":
      return fromNew(reviewed, rating, ctx);
    case "learning":
    case "relearning":
      return fromLearning(reviewed, phase, rating, ctx);
    case "review":
      return fromReview(reviewed, rating, ctx);
    case "suspended":
      throw new InvalidStateError(`Card ${card.id} is suspended and cannot be reviewed`);
  }
}

/**
 * A new card always enters learning. Got it counts as passing the first
 * step, so a single-step deck graduates the card immediately.
 */
function fromNew(card: Card, rating: RatingValue, ctx: TransitionContext): TransitionResult {
  const entry: LearningPhase = { tag: "learning", step: 0 };

  if (rating === 2) {
    return fromLearning(card, entry, rating, ctx);
  }

  return {
    card: {
      ...card,
      phase: entry,
      intervalDays: 0,
      due: addMinutes(ctx.now, ctx.stepsMinutes[0]),
    },
    leech: false,
  };
}

function fromLearning(
  card: Card,
  phase: LearningPhase,
  rating: RatingValue,
  ctx: TransitionContext
): TransitionResult {
  const steps = ctx.stepsMinutes;
  const lastStep = steps.length - 1;
  // Steps may have been shortened since the card entered learning
  const step = Math.min(phase.step, lastStep);

  switch (rating) {
    case 2:
      if (step >= lastStep) {
        return { card: graduate(card, phase.tag === "learning", ctx), leech: false };
      }
      return {
        card: {
          ...card,
          phase: { tag: phase.tag, step: step + 1 },
          due: addMinutes(ctx.now, steps[step + 1]),
        },
        leech: false,
      };

    case 1:
      return {
        card: {
          ...card,
          phase: { tag: phase.tag, step },
          due: addMinutes(ctx.now, Math.max(steps[step], ALMOST_MIN_DELAY_MINUTES)),
        },
        leech: false,
      };

    case 0: {
      const lapsed = phase.tag === "relearning";
      const lapses = lapsed ? card.lapses + 1 : card.lapses;
      return {
        card: {
          ...card,
          phase: { tag: phase.tag, step: 0 },
          lapses,
          due: addMinutes(ctx.now, steps[0]),
        },
        leech: lapsed && lapses === ctx.policy.leechThreshold,
      };
    }
  }
}

/**
 * Move a card from (re)learning into review.
 */
function graduate(card: Card, firstGraduation: boolean, ctx: TransitionContext): Card {
  const days = firstGraduation ? ctx.policy.firstGraduationDays : ctx.policy.graduationDays;
  const intervalDays = boundInterval(days, ctx.policy);
  const ease = Number.isFinite(card.ease) && card.ease >= MIN_EASE ? card.ease : DEFAULT_EASE;

  return {
    ...card,
    phase: { tag: "review" },
    intervalDays,
    ease,
    due: addDays(ctx.now, intervalDays),
  };
}

function fromReview(card: Card, rating: RatingValue, ctx: TransitionContext): TransitionResult {
  const next = calculateReviewUpdate(
    { ease: card.ease, intervalDays: card.intervalDays },
    rating,
    ctx.policy
  );

  if (rating === 0) {
    const lapses = card.lapses + 1;
    return {
      card: {
        ...card,
        phase: { tag: "relearning", step: 0 },
        ease: next.ease,
        intervalDays: next.intervalDays,
        lapses,
        due: addMinutes(ctx.now, ctx.stepsMinutes[0]),
      },
      leech: lapses === ctx.policy.leechThreshold,
    };
  }

  return {
    card: {
      ...card,
      ease: next.ease,
      intervalDays: next.intervalDays,
      due: addDays(ctx.now, next.intervalDays),
    },
    leech: false,
  };
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Suspend a card. Interval, ease, due and step are left as they are.
 * @throws InvalidStateError if the card is already suspended
 */
export function suspendCard(card: Card): Card {
  if (card.phase.tag === "suspended") {
    throw new InvalidStateError(`Card ${card.id} is already suspended`);
  }
  return { ...card, phase: { tag: "suspended", prior: card.phase } };
}

/**
 * Restore the phase a card was suspended from.
 * @throws InvalidStateError if the card is not suspended
 */
export function unsuspendCard(card: Card): Card {
  if (card.phase.tag !== "suspended") {
    throw new InvalidStateError(`Card ${card.id} is not suspended`);
  }
  return { ...card, phase: card.phase.prior };
}

/**
 * Mark a card as buried until the given instant.
 * @throws InvalidStateError if the card is suspended
 */
export function buryCard(card: Card, until: number): Card {
  if (card.phase.tag === "suspended") {
    throw new InvalidStateError(`Card ${card.id} is suspended and cannot be buried`);
  }
  return { ...card, buriedUntil: until };
}
