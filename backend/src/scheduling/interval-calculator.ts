/**
 * Interval/Ease Calculator
 *
 * Closed-form ease-factor update applied to Review-state cards. Pure
 * functions only; the state machine decides when they apply.
 *
 * - Got it: interval × ease, ease unchanged
 * - Almost: ease − 0.15, interval × adjusted ease (or × 1.2 under the
 *   fixed-multiplier policy)
 * - Missed: ease − 0.8, interval dropped (the card goes to relearning)
 *
 * Ease never drops below 1.3. Review intervals never drop below one day and
 * never exceed the configured maximum. There is no late-review bonus.
 *
 * A probabilistic (difficulty/stability) model would be a second
 * `IntervalPolicy.model`; only the closed-form model exists today.
 */

import type { RatingValue } from "@cardwise/shared";
import { MIN_EASE } from "./card-schema";

// =============================================================================
// Constants
// =============================================================================

/** Ease change per rating */
export const EASE_ADJUSTMENTS: Readonly<Record<RatingValue, number>> = {
  0: -0.8,
  1: -0.15,
  2: 0,
};

/** Shortest interval a Review-state card can carry */
export const MIN_REVIEW_INTERVAL_DAYS = 1;

// =============================================================================
// Types
// =============================================================================

/**
 * How the Almost path computes the next interval.
 * - "ease-adjusted": previous interval × the already-lowered ease
 * - "fixed-multiplier": previous interval × hardMultiplier
 */
export type HardIntervalPolicy = "ease-adjusted" | "fixed-multiplier";

export interface IntervalPolicy {
  model: "closed-form";
  maxIntervalDays: number;
  hardInterval: HardIntervalPolicy;
  hardMultiplier: number;
}

export const DEFAULT_INTERVAL_POLICY: IntervalPolicy = {
  model: "closed-form",
  maxIntervalDays: 36_500,
  hardInterval: "ease-adjusted",
  hardMultiplier: 1.2,
};

export interface EaseInterval {
  ease: number;
  intervalDays: number;
}

// =============================================================================
// Core Algorithm
// =============================================================================

/**
 * Calculate the next ease and interval for a Review-state card.
 *
 * @param current - The card's ease and interval before the answer
 * @param rating - Graded response
 * @param policy - Interval bounds and Almost-path policy
 */
export function calculateReviewUpdate(
  current: EaseInterval,
  rating: RatingValue,
  policy: IntervalPolicy = DEFAULT_INTERVAL_POLICY
): EaseInterval {
  const ease = clampEase(current.ease + EASE_ADJUSTMENTS[rating]);

  switch (rating) {
    case 0:
      return { ease, intervalDays: 0 };

    case 1: {
      const multiplier = policy.hardInterval === "ease-adjusted" ? ease : policy.hardMultiplier;
      return { ease, intervalDays: boundInterval(current.intervalDays * multiplier, policy) };
    }

    case 2: {
      // A ceiling lowered below the stored interval holds it in place
      const grown = boundInterval(current.intervalDays * ease, policy);
      return { ease, intervalDays: Math.max(current.intervalDays, grown) };
    }
  }
}

/**
 * Apply the review interval floor and the configured ceiling.
 */
export function boundInterval(days: number, policy: IntervalPolicy): number {
  return Math.min(policy.maxIntervalDays, Math.max(MIN_REVIEW_INTERVAL_DAYS, days));
}

/**
 * Clamp ease to the 1.3 floor. Rounded to four decimals so repeated
 * adjustments do not accumulate binary floating-point noise.
 */
export function clampEase(ease: number): number {
  return Math.max(MIN_EASE, Math.round(ease * 10_000) / 10_000);
}
