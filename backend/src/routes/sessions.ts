/**
 * Session Routes
 *
 * - POST /sessions - Build the ordered study queue for a set of decks
 */

import { Hono } from "hono";
import { BuildSessionRequestSchema, type SessionCard } from "@cardwise/shared";
import { type EngineEnv, getScheduler, readJsonBody } from "../middleware/engine-context";
import { createLogger } from "../logger";

const log = createLogger("SessionRoutes");

interface SessionResponse {
  cards: SessionCard[];
  count: number;
}

const sessionRoutes = new Hono<EngineEnv>();

sessionRoutes.post("/", async (c) => {
  const body = await readJsonBody(c, BuildSessionRequestSchema);
  const cards = getScheduler(c).buildSession(body.deckIds, body.now, body.maxNew, body.maxReview);
  log.info(`Built session of ${cards.length} card(s) for ${body.deckIds.length} deck(s)`);

  const response: SessionResponse = { cards, count: cards.length };
  return c.json(response);
});

export { sessionRoutes };
