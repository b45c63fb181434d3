/**
 * Cardwise Shared Types and Protocols
 *
 * This package contains:
 * - Zod schemas for REST request/response validation
 * - TypeScript types for decks, cards and ledger rows
 * - The bundled-content line format consumed by importers
 */

export const VERSION = "0.1.0";

// Core types
export { Rating } from "./types";
export type {
  CardStateName,
  CardTemplate,
  ErrorCode,
  RatingValue,
  SessionMix,
} from "./types";

// Protocol schemas
export {
  TimestampSchema,
  ErrorCodeSchema,
  CardStateSchema,
  CardTemplateSchema,
  RatingSchema,
  SessionMixSchema,
  // Decks
  DeckPrefsSchema,
  DeckPrefsPatchSchema,
  DeckSchema,
  // Notes
  NoteMetaSchema,
  BundledNoteLineSchema,
  // Requests
  CreateDeckRequestSchema,
  AddNoteRequestSchema,
  BuildSessionRequestSchema,
  ReviewRequestSchema,
  TimedCommandRequestSchema,
  // Responses
  SessionCardSchema,
  ReviewEventSchema,
  StatsTodaySchema,
  ErrorResponseSchema,
  // Validation utilities
  safeParseBundledNoteLine,
  safeParseDeckPrefs,
} from "./protocol";

// Protocol types (inferred from Zod schemas)
export type {
  DeckPrefs,
  DeckPrefsPatch,
  Deck,
  NoteMeta,
  BundledNoteLine,
  CreateDeckRequest,
  AddNoteRequest,
  BuildSessionRequest,
  ReviewRequest,
  TimedCommandRequest,
  SessionCard,
  ReviewEvent,
  StatsToday,
  ErrorResponse,
} from "./protocol";
