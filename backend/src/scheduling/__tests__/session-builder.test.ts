/**
 * Session Builder Tests
 *
 * Daily limits, global caps, sibling suppression, bucket ordering and the
 * learning-card jitter, exercised through an in-memory store.
 */

import { beforeEach, describe, expect, test } from "vitest";
import type { Deck } from "@cardwise/shared";
import { jitterLearning, mixBuckets } from "../session-builder";
import { createNewCard } from "../card-schema";
import type { SessionCandidate } from "../card-store";
import { UnknownDeckError, ValidationError } from "../errors";
import { DAY, NOW, TEST_PREFS, addNotes, createTestEngine, frontCardId, type TestEngine } from "./test-helpers";

let engine: TestEngine;

beforeEach(() => {
  engine = createTestEngine();
});

function fronts(deckIds: string[], now: number, maxNew?: number, maxReview?: number): string[] {
  return engine.scheduler.buildSession(deckIds, now, maxNew, maxReview).map((card) => card.front);
}

// =============================================================================
// Limits
// =============================================================================

describe("daily limits", () => {
  let deck: Deck;

  beforeEach(() => {
    deck = engine.scheduler.createDeck("Spanish", { ...TEST_PREFS, new_per_day: 2 });
  });

  test("an empty deck list gives an empty session", () => {
    expect(engine.scheduler.buildSession([], NOW)).toEqual([]);
  });

  test("new cards are capped at new_per_day, oldest first", () => {
    addNotes(engine.scheduler, deck.id, 5);

    const session = engine.scheduler.buildSession([deck.id], NOW);
    expect(session.map((card) => card.front)).toEqual(["Q 0", "Q 1"]);
    expect(session.every((card) => card.state === "new")).toBe(true);
    expect(session[0]?.deckId).toBe(deck.id);
  });

  test("maxNew caps below the deck limit", () => {
    addNotes(engine.scheduler, deck.id, 5);

    expect(fronts([deck.id], NOW, 1)).toEqual(["Q 0"]);
    expect(fronts([deck.id], NOW, 0)).toEqual([]);
  });

  test("cards studied today use up the allowance", () => {
    const [first] = addNotes(engine.scheduler, deck.id, 3);
    engine.scheduler.review(frontCardId(engine, first), 0, 1200, NOW + 10);

    // The reviewed card is in learning and not due until NOW + 610
    expect(fronts([deck.id], NOW + 100)).toEqual(["Q 1"]);
  });

  test("learning cards come first and ignore the new limit", () => {
    const [first] = addNotes(engine.scheduler, deck.id, 3);
    engine.scheduler.review(frontCardId(engine, first), 0, 1200, NOW + 10);

    const session = engine.scheduler.buildSession([deck.id], NOW + 700);
    expect(session.map((card) => [card.front, card.state])).toEqual([
      ["Q 0", "learning"],
      ["Q 1", "new"],
    ]);
  });

  test("rejects negative or fractional caps", () => {
    expect(() => engine.scheduler.buildSession([deck.id], NOW, -1)).toThrow(ValidationError);
    expect(() => engine.scheduler.buildSession([deck.id], NOW, undefined, 1.5)).toThrow(ValidationError);
  });

  test("rejects unknown decks", () => {
    expect(() => engine.scheduler.buildSession(["missing"], NOW)).toThrow(UnknownDeckError);
  });
});

// =============================================================================
// Siblings and Exclusions
// =============================================================================

describe("sibling suppression and exclusions", () => {
  let deck: Deck;

  beforeEach(() => {
    deck = engine.scheduler.createDeck("Spanish", TEST_PREFS);
  });

  test("only one card per note is selected", () => {
    engine.scheduler.addNote(deck.id, "hola", "hello", undefined, { reverse: true, now: NOW - 10 });

    const session = engine.scheduler.buildSession([deck.id], NOW);
    expect(session).toHaveLength(1);
    expect(session[0]?.template).toBe("front->back");
  });

  test("a due learning card hides its new reverse sibling", () => {
    const noteId = engine.scheduler.addNote(deck.id, "hola", "hello", undefined, { reverse: true, now: NOW - 10 });
    engine.scheduler.review(frontCardId(engine, noteId), 0, 1200, NOW);

    const session = engine.scheduler.buildSession([deck.id], NOW + 700);
    expect(session.map((card) => [card.template, card.state])).toEqual([["front->back", "learning"]]);
  });

  test("a due review card hides its new reverse sibling", () => {
    const noteId = engine.scheduler.addNote(deck.id, "hola", "hello", undefined, { reverse: true, now: NOW - 10 });
    const front = engine.store.getCard(frontCardId(engine, noteId));
    if (!front) throw new Error("card missing");
    engine.store.updateCard({ ...front, phase: { tag: "review" }, intervalDays: 3, due: NOW });

    const session = engine.scheduler.buildSession([deck.id], NOW);
    expect(session.map((card) => [card.template, card.state])).toEqual([["front->back", "review"]]);
  });

  test("suspended cards are left out", () => {
    const [first] = addNotes(engine.scheduler, deck.id, 3);
    engine.scheduler.suspend(frontCardId(engine, first));

    expect(fronts([deck.id], NOW)).toEqual(["Q 1", "Q 2"]);
  });

  test("buried cards return after the next rollover", () => {
    const [first] = addNotes(engine.scheduler, deck.id, 2);
    engine.scheduler.bury(frontCardId(engine, first), NOW);

    expect(fronts([deck.id], NOW)).toEqual(["Q 1"]);
    expect(fronts([deck.id], NOW + DAY)).toEqual(["Q 0", "Q 1"]);
  });
});

// =============================================================================
// Ordering
// =============================================================================

describe("ordering", () => {
  const LATER = NOW + 7 * DAY;
  let deck: Deck;

  beforeEach(() => {
    deck = engine.scheduler.createDeck("Capitals", { ...TEST_PREFS, steps_min: [10] });
    // Single-step deck: got it on a new card graduates it to a 6-day interval
    for (const noteId of addNotes(engine.scheduler, deck.id, 2, "R")) {
      engine.scheduler.review(frontCardId(engine, noteId), 2, 900, NOW);
    }
    addNotes(engine.scheduler, deck.id, 2, "N", NOW - 500);
  });

  test("new-first puts new cards before reviews by default", () => {
    expect(fronts([deck.id], LATER)).toEqual(["N 0", "N 1", "R 0", "R 1"]);
  });

  test("review-first puts reviews before new cards", () => {
    engine.scheduler.updateDeckPrefs(deck.id, { mix: "review-first" });
    expect(fronts([deck.id], LATER)).toEqual(["R 0", "R 1", "N 0", "N 1"]);
  });

  test("alternate interleaves starting with a new card", () => {
    engine.scheduler.updateDeckPrefs(deck.id, { mix: "alternate" });
    expect(fronts([deck.id], LATER)).toEqual(["N 0", "R 0", "N 1", "R 1"]);
  });

  test("rev_per_day caps reviews", () => {
    engine.scheduler.updateDeckPrefs(deck.id, { rev_per_day: 1 });
    expect(fronts([deck.id], LATER)).toEqual(["N 0", "N 1", "R 0"]);
  });

  test("maxReview caps reviews", () => {
    expect(fronts([deck.id], LATER, undefined, 0)).toEqual(["N 0", "N 1"]);
  });

  test("reviews are not due before their interval elapses", () => {
    expect(fronts([deck.id], NOW + DAY)).toEqual(["N 0", "N 1"]);
  });
});

describe("multiple decks", () => {
  test("decks are presented in request order and share the global caps", () => {
    const a = engine.scheduler.createDeck("A", TEST_PREFS);
    const b = engine.scheduler.createDeck("B", TEST_PREFS);
    addNotes(engine.scheduler, a.id, 3, "A");
    addNotes(engine.scheduler, b.id, 3, "B");

    expect(fronts([b.id, a.id], NOW, 4)).toEqual(["B 0", "B 1", "B 2", "A 0"]);
  });

  test("a repeated deck id is studied once", () => {
    const a = engine.scheduler.createDeck("A", TEST_PREFS);
    addNotes(engine.scheduler, a.id, 2, "A");

    expect(fronts([a.id, a.id], NOW)).toEqual(["A 0", "A 1"]);
  });
});

// =============================================================================
// Helpers
// =============================================================================

describe("mixBuckets", () => {
  test("alternate appends the remainder of the longer bucket", () => {
    expect(mixBuckets(["r1"], ["n1", "n2", "n3"], "alternate")).toEqual(["n1", "r1", "n2", "n3"]);
    expect(mixBuckets(["r1", "r2", "r3"], ["n1"], "alternate")).toEqual(["n1", "r1", "r2", "r3"]);
  });
});

describe("jitterLearning", () => {
  function candidate(id: string, due: number): SessionCandidate {
    return {
      card: { ...createNewCard(id, `note-${id}`, "front->back", due), phase: { tag: "learning", step: 0 } },
      deckId: "deck",
      front: id,
      back: id,
    };
  }

  test("without jitter orders by due, keeping ties in fetch order", () => {
    const ordered = jitterLearning([candidate("b", 200), candidate("a", 100), candidate("c", 100)], 300, () => 0);
    expect(ordered.map((c) => c.front)).toEqual(["a", "c", "b"]);
  });

  test("jitter can reorder cards due within the window", () => {
    const draws = [0.99, 0];
    const ordered = jitterLearning([candidate("a", 100), candidate("b", 200)], 300, () => draws.shift() ?? 0);
    // a: 100 + 297 = 397, b: 200 + 0
    expect(ordered.map((c) => c.front)).toEqual(["b", "a"]);
  });

  test("skew never exceeds the maximum", () => {
    const ordered = jitterLearning([candidate("a", 100), candidate("b", 401)], 300, () => 0.999999);
    expect(ordered.map((c) => c.front)).toEqual(["a", "b"]);
  });
});
