/**
 * Deck Routes
 *
 * REST endpoints for decks and the notes inside them:
 * - GET /decks - List decks
 * - POST /decks - Create a deck
 * - GET /decks/:deckId - Get one deck
 * - DELETE /decks/:deckId - Delete a deck with its notes, cards and history
 * - PUT /decks/:deckId/prefs - Update daily limits and learning steps
 * - GET /decks/:deckId/stats - Due counts for today
 * - POST /decks/:deckId/notes - Add a note
 * - POST /decks/:deckId/import - Import a JSON Lines body
 */

import { Hono } from "hono";
import {
  AddNoteRequestSchema,
  CreateDeckRequestSchema,
  DeckPrefsPatchSchema,
  type Deck,
  type StatsToday,
} from "@cardwise/shared";
import { importBundledDeck, type ImportResult } from "../scheduling/deck-import";
import { type EngineEnv, getScheduler, readJsonBody, readNowQuery } from "../middleware/engine-context";

// =============================================================================
// Response Types
// =============================================================================

interface DeckListResponse {
  decks: Deck[];
}

interface AddNoteResponse {
  noteId: string;
}

interface DeleteResponse {
  id: string;
  deleted: true;
}

// =============================================================================
// Routes
// =============================================================================

const deckRoutes = new Hono<EngineEnv>();

deckRoutes.get("/", (c) => {
  const response: DeckListResponse = { decks: getScheduler(c).listDecks() };
  return c.json(response);
});

deckRoutes.post("/", async (c) => {
  const body = await readJsonBody(c, CreateDeckRequestSchema);
  const deck = getScheduler(c).createDeck(body.name, body.prefs, body.isBuiltin);
  return c.json(deck, 201);
});

deckRoutes.get("/:deckId", (c) => {
  const deck = getScheduler(c).getDeck(c.req.param("deckId"));
  return c.json(deck);
});

deckRoutes.delete("/:deckId", (c) => {
  const deckId = c.req.param("deckId");
  getScheduler(c).deleteDeck(deckId);
  const response: DeleteResponse = { id: deckId, deleted: true };
  return c.json(response);
});

deckRoutes.put("/:deckId/prefs", async (c) => {
  const patch = await readJsonBody(c, DeckPrefsPatchSchema);
  const deck = getScheduler(c).updateDeckPrefs(c.req.param("deckId"), patch);
  return c.json(deck);
});

deckRoutes.get("/:deckId/stats", (c) => {
  const now = readNowQuery(c);
  const stats: StatsToday = getScheduler(c).getStatsToday([c.req.param("deckId")], now);
  return c.json(stats);
});

deckRoutes.post("/:deckId/notes", async (c) => {
  const body = await readJsonBody(c, AddNoteRequestSchema);
  const noteId = getScheduler(c).addNote(c.req.param("deckId"), body.front, body.back, body.meta, {
    reverse: body.reverse,
  });
  const response: AddNoteResponse = { noteId };
  return c.json(response, 201);
});

/**
 * POST /decks/:deckId/import?reverse=true
 *
 * Body is raw JSON Lines text, one note per line.
 */
deckRoutes.post("/:deckId/import", async (c) => {
  const deckId = c.req.param("deckId");
  const text = await c.req.text();
  const reverse = c.req.query("reverse") === "true";
  const result: ImportResult = importBundledDeck(getScheduler(c), deckId, text, { reverse });
  return c.json(result);
});

export { deckRoutes };
