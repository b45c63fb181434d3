/**
 * Card Schema
 *
 * Row schemas for the card store and the in-memory card model used by the
 * state machine. Rows are flat (one `state` column plus `step_index` and
 * `suspended_from`); the in-memory model is a tagged union so every
 * transition has to handle each lifecycle phase explicitly.
 */

import { z } from "zod";
import {
  CardStateSchema,
  CardTemplateSchema,
  DeckPrefsSchema,
  NoteMetaSchema,
  type CardStateName,
  type CardTemplate,
  type Deck,
  type NoteMeta,
} from "@cardwise/shared";

// =============================================================================
// Constants
// =============================================================================

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_DAY = 86_400;

/** Ease given to new cards and restored on graduation when unset */
export const DEFAULT_EASE = 2.5;

/** Hard lower bound for ease, never bypassed */
export const MIN_EASE = 1.3;

// =============================================================================
// Lifecycle Phases
// =============================================================================

export type ActivePhase =
  | { tag: "new" }
  | { tag: "learning"; step: number }
  | { tag: "review" }
  | { tag: "relearning"; step: number };

/**
 * Lifecycle phase of a card. A suspended card remembers the phase it was
 * suspended from so unsuspend can restore it unchanged.
 */
export type CardPhase = ActivePhase | { tag: "suspended"; prior: ActivePhase };

export type PhaseTag = CardPhase["tag"];

// =============================================================================
// Domain Model
// =============================================================================

/**
 * A card as seen by the state machine and the session builder.
 */
export interface Card {
  id: string;
  noteId: string;
  template: CardTemplate;
  phase: CardPhase;
  /** Epoch seconds. For new cards this only orders them by creation. */
  due: number;
  intervalDays: number;
  ease: number;
  lapses: number;
  lastReviewAt: number | null;
  /** Persisted manual bury mark; the card is skipped while now < buriedUntil */
  buriedUntil: number | null;
}

export interface Note {
  id: string;
  deckId: string;
  front: string;
  back: string;
  meta: NoteMeta | null;
  createdAt: number;
}

export type { Deck };

// =============================================================================
// Row Schemas
// =============================================================================

export const CardRowSchema = z.object({
  id: z.string(),
  note_id: z.string(),
  template: CardTemplateSchema,
  state: CardStateSchema,
  due: z.number().int(),
  interval_days: z.number().min(0),
  ease: z.number(),
  lapses: z.number().int().min(0),
  step_index: z.number().int().min(0),
  last_review_at: z.number().int().nullable(),
  suspended_from: CardStateSchema.exclude(["suspended"]).nullable(),
  buried_until: z.number().int().nullable(),
});

export const NoteRowSchema = z.object({
  id: z.string(),
  deck_id: z.string(),
  front: z.string(),
  back: z.string(),
  meta: z.string().nullable(),
  created_at: z.number().int(),
});

export const DeckRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  is_builtin: z.number().int(),
  prefs: z.string(),
});

export type CardRow = z.infer<typeof CardRowSchema>;
export type NoteRow = z.infer<typeof NoteRowSchema>;
export type DeckRow = z.infer<typeof DeckRowSchema>;

// =============================================================================
// Conversions
// =============================================================================

function activePhase(state: Exclude<CardStateName, "suspended">, step: number): ActivePhase {
  switch (state) {
    case "new":
      return { tag: "new" };
    case "learning":
      return { tag: "learning", step };
    case "review":
      return { tag: "review" };
    case "relearning":
      return { tag: "relearning", step };
  }
}

/**
 * Parse a raw store row into a Card.
 * @throws ZodError if the row does not match the schema
 * @throws Error if a suspended row has no prior state
 */
export function cardFromRow(raw: unknown): Card {
  const row = CardRowSchema.parse(raw);

  let phase: CardPhase;
  if (row.state === "suspended") {
    if (row.suspended_from === null) {
      throw new Error(`Suspended card ${row.id} has no suspended_from state`);
    }
    phase = { tag: "suspended", prior: activePhase(row.suspended_from, row.step_index) };
  } else {
    phase = activePhase(row.state, row.step_index);
  }

  return {
    id: row.id,
    noteId: row.note_id,
    template: row.template,
    phase,
    due: row.due,
    intervalDays: row.interval_days,
    ease: row.ease,
    lapses: row.lapses,
    lastReviewAt: row.last_review_at,
    buriedUntil: row.buried_until,
  };
}

/**
 * Flatten a Card into the column values the store persists.
 */
export function cardToRow(card: Card): CardRow {
  const active = card.phase.tag === "suspended" ? card.phase.prior : card.phase;
  const stepIndex = "step" in active ? active.step : 0;

  return {
    id: card.id,
    note_id: card.noteId,
    template: card.template,
    state: card.phase.tag,
    due: card.due,
    interval_days: card.intervalDays,
    ease: card.ease,
    lapses: card.lapses,
    step_index: stepIndex,
    last_review_at: card.lastReviewAt,
    suspended_from: card.phase.tag === "suspended" ? card.phase.prior.tag : null,
    buried_until: card.buriedUntil,
  };
}

export function noteFromRow(raw: unknown): Note {
  const row = NoteRowSchema.parse(raw);
  return {
    id: row.id,
    deckId: row.deck_id,
    front: row.front,
    back: row.back,
    meta: row.meta === null ? null : NoteMetaSchema.parse(JSON.parse(row.meta)),
    createdAt: row.created_at,
  };
}

export function deckFromRow(raw: unknown): Deck {
  const row = DeckRowSchema.parse(raw);
  return {
    id: row.id,
    name: row.name,
    isBuiltin: row.is_builtin !== 0,
    prefs: DeckPrefsSchema.parse(JSON.parse(row.prefs)),
  };
}

/**
 * Public state name for a phase (the value of the `state` column).
 */
export function stateOf(phase: CardPhase): CardStateName {
  return phase.tag;
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a fresh card for a note. New cards use their creation time as the
 * due value so older cards are introduced first.
 */
export function createNewCard(
  id: string,
  noteId: string,
  template: CardTemplate,
  now: number
): Card {
  return {
    id,
    noteId,
    template,
    phase: { tag: "new" },
    due: now,
    intervalDays: 0,
    ease: DEFAULT_EASE,
    lapses: 0,
    lastReviewAt: null,
    buriedUntil: null,
  };
}

// =============================================================================
// Time Utilities
// =============================================================================

/**
 * Current time in epoch seconds.
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function addMinutes(ts: number, minutes: number): number {
  return ts + Math.round(minutes * SECONDS_PER_MINUTE);
}

/**
 * Add a real-valued number of days. Intervals keep sub-day precision; the
 * due instant is rounded to whole seconds.
 */
export function addDays(ts: number, days: number): number {
  return ts + Math.round(days * SECONDS_PER_DAY);
}
