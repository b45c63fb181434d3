/**
 * Shared fixtures for scheduling tests: an in-memory store and a scheduler
 * with a fixed clock and no jitter.
 */

import type { DeckPrefs } from "@cardwise/shared";
import { Scheduler, type SchedulerOptions } from "../scheduler";
import { SqliteCardStore, loadSqlJs } from "../sqlite-card-store";

/** 2024-01-15T04:00:00Z, the start of study day 2024-01-15 */
export const NOW = 1_705_291_200;

export const DAY = 86_400;

export const SQL = await loadSqlJs();

export function createInMemoryStore(): SqliteCardStore {
  return new SqliteCardStore(new SQL.Database());
}

export const TEST_PREFS: DeckPrefs = {
  new_per_day: 10,
  rev_per_day: 100,
  steps_min: [10, 1440],
};

export interface TestEngine {
  store: SqliteCardStore;
  scheduler: Scheduler;
}

export function createTestEngine(options: SchedulerOptions = {}): TestEngine {
  const store = createInMemoryStore();
  const scheduler = new Scheduler(store, {
    clock: { rolloverHour: 4, utcOffsetMinutes: 0 },
    random: () => 0,
    now: () => NOW,
    ...options,
  });
  return { store, scheduler };
}

/**
 * Add `count` notes named `${prefix} 0..n-1`, created one second apart so
 * their new cards come out in insertion order.
 */
export function addNotes(
  scheduler: Scheduler,
  deckId: string,
  count: number,
  prefix = "Q",
  createdAt = NOW - 1000
): string[] {
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(scheduler.addNote(deckId, `${prefix} ${i}`, `A ${i}`, undefined, { now: createdAt + i }));
  }
  return ids;
}

/**
 * Id of the front->back card of a note.
 */
export function frontCardId(engine: TestEngine, noteId: string): string {
  const card = engine.store.getCardsForNote(noteId).find((c) => c.template === "front->back");
  if (!card) {
    throw new Error(`Note ${noteId} has no front->back card`);
  }
  return card.id;
}
