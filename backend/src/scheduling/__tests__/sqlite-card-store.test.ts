/**
 * SQLite Card Store Tests
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Deck, ReviewEvent } from "@cardwise/shared";
import { openCardStore, type SqliteCardStore } from "../sqlite-card-store";
import { cardFromRow, cardToRow, createNewCard, type Card, type Note } from "../card-schema";
import { NOW, TEST_PREFS, createInMemoryStore } from "./test-helpers";

const DECK: Deck = { id: "deck-1", name: "Spanish", isBuiltin: false, prefs: TEST_PREFS };

function makeNote(id: string, front: string): Note {
  return { id, deckId: DECK.id, front, back: `${front} (en)`, meta: null, createdAt: NOW };
}

function makeEvent(cardId: string, ts: number): ReviewEvent {
  return { cardId, ts, rating: 2, answerMs: 800, prevState: "new", prevInterval: 0, nextInterval: 0 };
}

let store: SqliteCardStore;

beforeEach(() => {
  store = createInMemoryStore();
  store.insertDeck(DECK);
});

afterEach(() => {
  store.close();
});

// =============================================================================
// Row Conversion
// =============================================================================

describe("card rows", () => {
  test("a suspended card keeps its prior phase and step", () => {
    const card: Card = {
      ...createNewCard("c1", "n1", "back->front", NOW),
      phase: { tag: "suspended", prior: { tag: "relearning", step: 2 } },
    };
    const row = cardToRow(card);

    expect(row.state).toBe("suspended");
    expect(row.suspended_from).toBe("relearning");
    expect(row.step_index).toBe(2);
    expect(cardFromRow(row)).toEqual(card);
  });

  test("a suspended row without a prior state is rejected", () => {
    const row = { ...cardToRow(createNewCard("c1", "n1", "front->back", NOW)), state: "suspended" };
    expect(() => cardFromRow(row)).toThrow("has no suspended_from state");
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe("SqliteCardStore", () => {
  test("round-trips decks, notes and cards", () => {
    const note = { ...makeNote("n1", "hola"), meta: { tags: ["greeting"], source: "book" } };
    const card: Card = { ...createNewCard("c1", "n1", "front->back", NOW), buriedUntil: NOW + 60 };
    store.insertNote(note);
    store.insertCard(card);

    expect(store.getDeck(DECK.id)).toEqual(DECK);
    expect(store.findDeckByName("Spanish")).toEqual(DECK);
    expect(store.getNote("n1")).toEqual(note);
    expect(store.findNote(DECK.id, "hola", "hola (en)")?.id).toBe("n1");
    expect(store.getCard("c1")).toEqual(card);
    expect(store.getDeckIdForCard("c1")).toBe(DECK.id);
  });

  test("returns null for missing rows", () => {
    expect(store.getDeck("missing")).toBeNull();
    expect(store.getNote("missing")).toBeNull();
    expect(store.getCard("missing")).toBeNull();
    expect(store.getDeckIdForCard("missing")).toBeNull();
  });

  test("updateCard throws when no row matches", () => {
    expect(() => store.updateCard(createNewCard("ghost", "n1", "front->back", NOW))).toThrow(
      "No card row updated for ghost"
    );
  });

  test("a note has at most one card per template", () => {
    store.insertNote(makeNote("n1", "hola"));
    store.insertCard(createNewCard("c1", "n1", "front->back", NOW));

    expect(() => store.insertCard(createNewCard("c2", "n1", "front->back", NOW))).toThrow();
  });

  test("deleting a card's note removes its ledger rows", () => {
    store.insertNote(makeNote("n1", "hola"));
    store.insertCard(createNewCard("c1", "n1", "front->back", NOW));
    store.appendReviewEvent(makeEvent("c1", NOW));

    expect(store.deleteNote("n1")).toBe(true);
    expect(store.getReviewEvents("c1")).toEqual([]);
    expect(store.deleteNote("n1")).toBe(false);
  });

  test("review events come back oldest first", () => {
    store.insertNote(makeNote("n1", "hola"));
    store.insertCard(createNewCard("c1", "n1", "front->back", NOW));
    store.appendReviewEvent(makeEvent("c1", NOW + 100));
    store.appendReviewEvent(makeEvent("c1", NOW));

    expect(store.getReviewEvents("c1").map((event) => event.ts)).toEqual([NOW, NOW + 100]);
  });

  test("daily counters accumulate per deck and date", () => {
    store.incrementDailyCounts(DECK.id, "2024-01-15", { newStudied: 1, reviewStudied: 0 });
    store.incrementDailyCounts(DECK.id, "2024-01-15", { newStudied: 1, reviewStudied: 2 });

    expect(store.getDailyCounts(DECK.id, "2024-01-15")).toEqual({ newStudied: 2, reviewStudied: 2 });
    expect(store.getDailyCounts(DECK.id, "2024-01-16")).toEqual({ newStudied: 0, reviewStudied: 0 });
  });

  test("a thrown transaction rolls back every write", () => {
    store.insertNote(makeNote("n1", "hola"));

    expect(() =>
      store.transaction(() => {
        store.insertCard(createNewCard("c1", "n1", "front->back", NOW));
        throw new Error("abort");
      })
    ).toThrow("abort");
    expect(store.getCard("c1")).toBeNull();
  });

  test("a thrown inner transaction rolls back only its own writes", () => {
    store.insertNote(makeNote("n1", "hola"));

    store.transaction(() => {
      store.insertCard(createNewCard("c1", "n1", "front->back", NOW));
      expect(() =>
        store.transaction(() => {
          store.insertCard(createNewCard("c2", "n1", "back->front", NOW));
          throw new Error("abort inner");
        })
      ).toThrow("abort inner");
    });

    expect(store.getCard("c1")?.id).toBe("c1");
    expect(store.getCard("c2")).toBeNull();
  });

  test("foreign keys stay on after the first write", () => {
    store.insertNote(makeNote("n1", "hola"));
    store.insertCard(createNewCard("c1", "n1", "front->back", NOW));

    expect(store.deleteDeck(DECK.id)).toBe(true);
    expect(store.getNote("n1")).toBeNull();
    expect(store.getCard("c1")).toBeNull();
  });
});

// =============================================================================
// Candidates and Counts
// =============================================================================

describe("getCandidates", () => {
  beforeEach(() => {
    store.insertNote(makeNote("n1", "uno"));
    store.insertNote(makeNote("n2", "dos"));
    store.insertNote(makeNote("n3", "tres"));
    store.insertCard({ ...createNewCard("new-1", "n1", "front->back", NOW), due: NOW + 5 });
    store.insertCard({ ...createNewCard("new-2", "n2", "front->back", NOW), due: NOW - 5 });
    store.insertCard({
      ...createNewCard("learn-1", "n3", "front->back", NOW),
      phase: { tag: "relearning", step: 0 },
      due: NOW - 1,
    });
    store.insertCard({
      ...createNewCard("rev-1", "n3", "back->front", NOW),
      phase: { tag: "review" },
      intervalDays: 3,
      due: NOW + 10,
    });
  });

  test("new cards come in due order regardless of now", () => {
    expect(store.getCandidates(DECK.id, "new", 0).map((c) => c.card.id)).toEqual(["new-2", "new-1"]);
  });

  test("learning includes relearning cards that are due", () => {
    expect(store.getCandidates(DECK.id, "learning", NOW).map((c) => c.card.id)).toEqual(["learn-1"]);
    expect(store.getCandidates(DECK.id, "learning", NOW - 2)).toEqual([]);
  });

  test("review cards appear once due and carry note text", () => {
    expect(store.getCandidates(DECK.id, "review", NOW)).toEqual([]);

    const [candidate] = store.getCandidates(DECK.id, "review", NOW + 10);
    expect(candidate?.card.id).toBe("rev-1");
    expect(candidate?.deckId).toBe(DECK.id);
    expect(candidate?.front).toBe("tres");
    expect(candidate?.back).toBe("tres (en)");
  });

  test("buried cards are skipped until the bury expires", () => {
    const card = store.getCard("new-2");
    if (!card) throw new Error("card missing");
    store.updateCard({ ...card, buriedUntil: NOW + 100 });

    expect(store.getCandidates(DECK.id, "new", NOW).map((c) => c.card.id)).toEqual(["new-1"]);
    expect(store.getCandidates(DECK.id, "new", NOW + 100).map((c) => c.card.id)).toEqual(["new-2", "new-1"]);
  });

  test("countDue groups by bucket", () => {
    expect(store.countDue([DECK.id], NOW)).toEqual({ new: 1, learning: 1, review: 0 });
    expect(store.countDue([DECK.id], NOW + 10)).toEqual({ new: 2, learning: 1, review: 1 });
    expect(store.countDue([], NOW)).toEqual({ new: 0, learning: 0, review: 0 });
  });
});

// =============================================================================
// File-backed Store
// =============================================================================

describe("openCardStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cardwise-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("creates the parent directory and persists across reopen", async () => {
    const path = join(dir, "nested", "cards.db");

    const first = await openCardStore(path);
    first.insertDeck(DECK);
    first.close();

    expect((await stat(path)).isFile()).toBe(true);

    const second = await openCardStore(path);
    expect(second.getDeck(DECK.id)).toEqual(DECK);
    second.close();
  });

  test("writes committed transactions to disk and drops rolled-back ones", async () => {
    const path = join(dir, "cards.db");

    const first = await openCardStore(path);
    first.insertDeck(DECK);
    first.transaction(() => {
      first.insertNote(makeNote("n1", "hola"));
      first.insertCard(createNewCard("c1", "n1", "front->back", NOW));
    });
    expect(() =>
      first.transaction(() => {
        first.insertNote(makeNote("n2", "adios"));
        throw new Error("abort");
      })
    ).toThrow("abort");
    first.close();

    const second = await openCardStore(path);
    expect(second.getCard("c1")?.noteId).toBe("n1");
    expect(second.getNote("n2")).toBeNull();
    second.close();
  });

  test(":memory: opens a store that lives only in memory", async () => {
    const store = await openCardStore(":memory:");
    store.insertDeck(DECK);

    expect(store.getDeck(DECK.id)).toEqual(DECK);
    store.close();
  });
});
