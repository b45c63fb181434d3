/**
 * Card Routes
 *
 * REST endpoints for single cards:
 * - GET /cards/:cardId - Card detail with its scheduling state
 * - GET /cards/:cardId/history - Review ledger rows, oldest first
 * - POST /cards/:cardId/review - Grade the card
 * - POST /cards/:cardId/suspend - Take the card out of rotation
 * - POST /cards/:cardId/unsuspend - Restore the card's previous state
 * - POST /cards/:cardId/bury - Skip the card until the next study day
 */

import { Hono } from "hono";
import {
  ReviewRequestSchema,
  TimedCommandRequestSchema,
  type CardStateName,
  type CardTemplate,
  type ReviewEvent,
} from "@cardwise/shared";
import { stateOf, type Card } from "../scheduling/card-schema";
import { type EngineEnv, getScheduler, readJsonBody } from "../middleware/engine-context";

// =============================================================================
// Response Types
// =============================================================================

/**
 * Flat view of a card. `step` is set for learning and relearning cards;
 * `suspendedFrom` for suspended ones.
 */
export interface CardDetailResponse {
  id: string;
  noteId: string;
  template: CardTemplate;
  state: CardStateName;
  step: number | null;
  suspendedFrom: CardStateName | null;
  due: number;
  intervalDays: number;
  ease: number;
  lapses: number;
  lastReviewAt: number | null;
  buriedUntil: number | null;
}

interface ReviewResultResponse {
  card: CardDetailResponse;
  event: ReviewEvent;
  leech: boolean;
}

interface HistoryResponse {
  cardId: string;
  events: ReviewEvent[];
}

export function toCardDetail(card: Card): CardDetailResponse {
  const { phase } = card;
  const active = phase.tag === "suspended" ? phase.prior : phase;
  const step = active.tag === "learning" || active.tag === "relearning" ? active.step : null;

  return {
    id: card.id,
    noteId: card.noteId,
    template: card.template,
    state: stateOf(phase),
    step,
    suspendedFrom: phase.tag === "suspended" ? phase.prior.tag : null,
    due: card.due,
    intervalDays: card.intervalDays,
    ease: card.ease,
    lapses: card.lapses,
    lastReviewAt: card.lastReviewAt,
    buriedUntil: card.buriedUntil,
  };
}

// =============================================================================
// Routes
// =============================================================================

const cardRoutes = new Hono<EngineEnv>();

cardRoutes.get("/:cardId", (c) => {
  const card = getScheduler(c).getCard(c.req.param("cardId"));
  return c.json(toCardDetail(card));
});

cardRoutes.get("/:cardId/history", (c) => {
  const cardId = c.req.param("cardId");
  const response: HistoryResponse = { cardId, events: getScheduler(c).getReviewHistory(cardId) };
  return c.json(response);
});

/**
 * POST /cards/:cardId/review
 *
 * Body: `{ rating: 0 | 1 | 2, answerMs: number, now?: number }`
 */
cardRoutes.post("/:cardId/review", async (c) => {
  const cardId = c.req.param("cardId");
  const body = await readJsonBody(c, ReviewRequestSchema);
  const outcome = getScheduler(c).review(cardId, body.rating, body.answerMs, body.now);

  const response: ReviewResultResponse = {
    card: toCardDetail(outcome.card),
    event: outcome.event,
    leech: outcome.leech,
  };
  return c.json(response);
});

cardRoutes.post("/:cardId/suspend", (c) => {
  const card = getScheduler(c).suspend(c.req.param("cardId"));
  return c.json(toCardDetail(card));
});

cardRoutes.post("/:cardId/unsuspend", (c) => {
  const card = getScheduler(c).unsuspend(c.req.param("cardId"));
  return c.json(toCardDetail(card));
});

cardRoutes.post("/:cardId/bury", async (c) => {
  const body = await readJsonBody(c, TimedCommandRequestSchema);
  const card = getScheduler(c).bury(c.req.param("cardId"), body.now);
  return c.json(toCardDetail(card));
});

export { cardRoutes };
