/**
 * Interval/Ease Calculator Tests
 *
 * - Got it: interval × ease, ease unchanged
 * - Almost: ease − 0.15, interval × new ease (or × hardMultiplier)
 * - Missed: ease − 0.8, interval 0
 * - Ease floor 1.3, interval bounds [1, maxIntervalDays]
 */

import { describe, expect, test } from "vitest";
import {
  DEFAULT_INTERVAL_POLICY,
  EASE_ADJUSTMENTS,
  boundInterval,
  calculateReviewUpdate,
  clampEase,
  type IntervalPolicy,
} from "../interval-calculator";
import { MIN_EASE } from "../card-schema";

const FIXED: IntervalPolicy = { ...DEFAULT_INTERVAL_POLICY, hardInterval: "fixed-multiplier" };

// =============================================================================
// Core Algorithm Tests
// =============================================================================

describe("calculateReviewUpdate", () => {
  test("got it: multiplies interval by ease and leaves ease unchanged", () => {
    const result = calculateReviewUpdate({ ease: 2.5, intervalDays: 10 }, 2);

    expect(result.ease).toBe(2.5);
    expect(result.intervalDays).toBe(25);
  });

  test("almost: lowers ease by 0.15 and multiplies by the lowered ease", () => {
    const result = calculateReviewUpdate({ ease: 2.5, intervalDays: 10 }, 1);

    expect(result.ease).toBe(2.35);
    expect(result.intervalDays).toBeCloseTo(23.5, 10);
  });

  test("almost under fixed-multiplier: multiplies by hardMultiplier", () => {
    const result = calculateReviewUpdate({ ease: 2.5, intervalDays: 10 }, 1, FIXED);

    expect(result.ease).toBe(2.35);
    expect(result.intervalDays).toBeCloseTo(12, 10);
  });

  test("fixed-multiplier honours a custom hardMultiplier", () => {
    const result = calculateReviewUpdate(
      { ease: 2.5, intervalDays: 10 },
      1,
      { ...FIXED, hardMultiplier: 1.5 }
    );

    expect(result.intervalDays).toBe(15);
  });

  test("missed: lowers ease by 0.8 and drops the interval", () => {
    const result = calculateReviewUpdate({ ease: 2.5, intervalDays: 10 }, 0);

    expect(result.ease).toBe(1.7);
    expect(result.intervalDays).toBe(0);
  });

  test("ease never drops below 1.3", () => {
    expect(calculateReviewUpdate({ ease: 1.4, intervalDays: 10 }, 0).ease).toBe(MIN_EASE);
    expect(calculateReviewUpdate({ ease: 1.3, intervalDays: 10 }, 1).ease).toBe(MIN_EASE);
  });

  test("got it never shortens the interval", () => {
    const result = calculateReviewUpdate({ ease: MIN_EASE, intervalDays: 3 }, 2);

    expect(result.intervalDays).toBeGreaterThanOrEqual(3);
  });

  test("interval is capped at maxIntervalDays", () => {
    const result = calculateReviewUpdate({ ease: 2.5, intervalDays: 30_000 }, 2);

    expect(result.intervalDays).toBe(36_500);
  });

  test("a custom maximum applies", () => {
    const result = calculateReviewUpdate(
      { ease: 2.5, intervalDays: 100 },
      2,
      { ...DEFAULT_INTERVAL_POLICY, maxIntervalDays: 180 }
    );

    expect(result.intervalDays).toBe(180);
  });

  test("got it keeps an interval already above a lowered maximum", () => {
    const result = calculateReviewUpdate(
      { ease: 2.5, intervalDays: 400 },
      2,
      { ...DEFAULT_INTERVAL_POLICY, maxIntervalDays: 180 }
    );

    expect(result.intervalDays).toBe(400);
  });

  test("almost still applies a lowered maximum", () => {
    const result = calculateReviewUpdate(
      { ease: 2.5, intervalDays: 400 },
      1,
      { ...DEFAULT_INTERVAL_POLICY, maxIntervalDays: 180 }
    );

    expect(result.intervalDays).toBe(180);
  });

  test("review intervals never drop below one day", () => {
    const result = calculateReviewUpdate({ ease: 2.5, intervalDays: 0.2 }, 1, FIXED);

    expect(result.intervalDays).toBe(1);
  });
});

// =============================================================================
// Helper Tests
// =============================================================================

describe("EASE_ADJUSTMENTS", () => {
  test("maps each rating to its ease change", () => {
    expect(EASE_ADJUSTMENTS[0]).toBe(-0.8);
    expect(EASE_ADJUSTMENTS[1]).toBe(-0.15);
    expect(EASE_ADJUSTMENTS[2]).toBe(0);
  });
});

describe("clampEase", () => {
  test("rounds to four decimals", () => {
    expect(clampEase(2.5 - 0.15 - 0.15)).toBe(2.2);
  });

  test("raises values below the floor", () => {
    expect(clampEase(0.5)).toBe(1.3);
  });

  test("has no upper cap", () => {
    expect(clampEase(4.2)).toBe(4.2);
  });
});

describe("boundInterval", () => {
  test("passes values inside the bounds through", () => {
    expect(boundInterval(42, DEFAULT_INTERVAL_POLICY)).toBe(42);
  });

  test("clamps to [1, max]", () => {
    expect(boundInterval(0, DEFAULT_INTERVAL_POLICY)).toBe(1);
    expect(boundInterval(50_000, DEFAULT_INTERVAL_POLICY)).toBe(36_500);
  });
});
