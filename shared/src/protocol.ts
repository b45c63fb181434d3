/**
 * Cardwise REST Protocol
 *
 * Zod schemas for validating request and response bodies exchanged with the
 * scheduling engine, plus the bundled-content line format read by importers.
 */

import { z } from "zod";

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Epoch seconds. All engine timestamps use this unit.
 */
export const TimestampSchema = z.number().int().nonnegative();

/**
 * Schema for ErrorCode enum values
 */
export const ErrorCodeSchema = z.enum([
  "VALIDATION_ERROR",
  "INVALID_RATING",
  "INVALID_DECK_CONFIG",
  "UNKNOWN_CARD",
  "UNKNOWN_DECK",
  "UNKNOWN_NOTE",
  "DUPLICATE_NOTE",
  "INVALID_STATE",
  "PERSISTENCE_FAILED",
  "INTERNAL_ERROR",
]);

export const CardStateSchema = z.enum(["new", "learning", "review", "relearning", "suspended"]);

export const CardTemplateSchema = z.enum(["front->back", "back->front"]);

export const RatingSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const SessionMixSchema = z.enum(["new-first", "review-first", "alternate"]);

// =============================================================================
// Deck Schemas
// =============================================================================

/**
 * Per-deck preference record, persisted as JSON on the deck row.
 * A daily limit of 0 disables that bucket.
 */
export const DeckPrefsSchema = z.object({
  new_per_day: z.number().int().min(0, "new_per_day must be >= 0"),
  rev_per_day: z.number().int().min(0, "rev_per_day must be >= 0"),
  steps_min: z
    .array(z.number().int().min(1, "Each learning step must be at least 1 minute"))
    .min(1, "At least one learning step is required"),
  mix: SessionMixSchema.optional(),
});

/**
 * Partial preference update. Omitted fields keep their current value.
 */
export const DeckPrefsPatchSchema = DeckPrefsSchema.partial();

export const DeckSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1, "Deck name is required"),
  isBuiltin: z.boolean(),
  prefs: DeckPrefsSchema,
});

// =============================================================================
// Note Schemas
// =============================================================================

/**
 * Free-form note metadata. Only `tags` has a fixed shape; everything else
 * (readings, parts of speech, sources) passes through untouched.
 */
export const NoteMetaSchema = z
  .object({
    tags: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * One line of a bundled deck file (JSON Lines).
 */
export const BundledNoteLineSchema = z.object({
  front: z.string().trim().min(1, "front is required"),
  back: z.string().trim().min(1, "back is required"),
  meta: NoteMetaSchema.optional(),
});

// =============================================================================
// Request Schemas
// =============================================================================

export const CreateDeckRequestSchema = z.object({
  name: z.string().trim().min(1, "Deck name is required"),
  prefs: DeckPrefsSchema.optional(),
  isBuiltin: z.boolean().optional(),
});

export const AddNoteRequestSchema = z.object({
  front: z.string().trim().min(1, "front is required"),
  back: z.string().trim().min(1, "back is required"),
  meta: NoteMetaSchema.optional(),
  reverse: z.boolean().optional(),
});

export const BuildSessionRequestSchema = z.object({
  deckIds: z.array(z.string().min(1)),
  now: TimestampSchema.optional(),
  maxNew: z.number().int().min(0).optional(),
  maxReview: z.number().int().min(0).optional(),
});

/**
 * Review submission. `rating` is deliberately any number here: the engine
 * itself rejects values outside {0, 1, 2} with INVALID_RATING.
 */
export const ReviewRequestSchema = z.object({
  rating: z.number(),
  answerMs: z.number().int().min(0, "answerMs must be >= 0"),
  now: TimestampSchema.optional(),
});

export const TimedCommandRequestSchema = z.object({
  now: TimestampSchema.optional(),
});

// =============================================================================
// Response Schemas
// =============================================================================

/**
 * One entry of a built session.
 */
export const SessionCardSchema = z.object({
  cardId: z.string(),
  noteId: z.string(),
  deckId: z.string(),
  front: z.string(),
  back: z.string(),
  state: CardStateSchema,
  template: CardTemplateSchema,
  due: TimestampSchema,
});

/**
 * Persisted review-ledger row. Field names and units are fixed because
 * analytics and recalibration read them directly.
 */
export const ReviewEventSchema = z.object({
  cardId: z.string(),
  ts: TimestampSchema,
  rating: RatingSchema,
  answerMs: z.number().int().min(0),
  prevState: CardStateSchema,
  prevInterval: z.number().min(0),
  nextInterval: z.number().min(0),
});

export const StatsTodaySchema = z.object({
  new: z.number().int().min(0),
  learning: z.number().int().min(0),
  review: z.number().int().min(0),
  total: z.number().int().min(0),
});

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string().min(1, "Error message is required"),
  }),
});

// =============================================================================
// Inferred Types
// =============================================================================

export type DeckPrefs = z.infer<typeof DeckPrefsSchema>;
export type DeckPrefsPatch = z.infer<typeof DeckPrefsPatchSchema>;
export type Deck = z.infer<typeof DeckSchema>;
export type NoteMeta = z.infer<typeof NoteMetaSchema>;
export type BundledNoteLine = z.infer<typeof BundledNoteLineSchema>;
export type CreateDeckRequest = z.infer<typeof CreateDeckRequestSchema>;
export type AddNoteRequest = z.infer<typeof AddNoteRequestSchema>;
export type BuildSessionRequest = z.infer<typeof BuildSessionRequestSchema>;
export type ReviewRequest = z.infer<typeof ReviewRequestSchema>;
export type TimedCommandRequest = z.infer<typeof TimedCommandRequestSchema>;
export type SessionCard = z.infer<typeof SessionCardSchema>;
export type ReviewEvent = z.infer<typeof ReviewEventSchema>;
export type StatsToday = z.infer<typeof StatsTodaySchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Safely parse a bundled-content line, returning success/error result
 */
export function safeParseBundledNoteLine(data: unknown) {
  return BundledNoteLineSchema.safeParse(data);
}

/**
 * Safely parse deck preferences, returning success/error result
 */
export function safeParseDeckPrefs(data: unknown) {
  return DeckPrefsSchema.safeParse(data);
}
