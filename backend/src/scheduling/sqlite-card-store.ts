/**
 * SQLite Card Store
 *
 * CardStore backed by sql.js (SQLite compiled to WebAssembly). The database
 * lives in memory; a file-backed store writes the whole image back to disk
 * after each committed transaction. Foreign keys are on, so deleting a deck
 * or note cascades to its cards and their ledger rows.
 */

import { mkdir, readFile } from "node:fs/promises";
import { renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import initSqlJs, { type BindParams, type Database, type ParamsObject, type SqlJsStatic } from "sql.js";
import { z } from "zod";
import {
  CardStateSchema,
  ReviewEventSchema,
  type DeckPrefs,
  type ReviewEvent,
} from "@cardwise/shared";
import {
  cardFromRow,
  cardToRow,
  deckFromRow,
  noteFromRow,
  type Card,
  type Deck,
  type Note,
} from "./card-schema";
import type {
  CandidateBucket,
  CardStore,
  DailyCounts,
  DueCounts,
  SessionCandidate,
} from "./card-store";
import { storeLog as log } from "../logger";

// =============================================================================
// Row Schemas (store-only shapes)
// =============================================================================

const CandidateExtraSchema = z.object({
  deck_id: z.string(),
  front: z.string(),
  back: z.string(),
});

const ReviewLogRowSchema = z.object({
  card_id: z.string(),
  ts: z.number(),
  rating: z.number(),
  answer_ms: z.number(),
  prev_state: z.string(),
  prev_interval: z.number(),
  next_interval: z.number(),
});

const DailyStatsRowSchema = z.object({
  new_studied: z.number().int(),
  rev_studied: z.number().int(),
});

const StateCountRowSchema = z.object({
  state: CardStateSchema,
  count: z.number().int(),
});

const DeckIdRowSchema = z.object({ deck_id: z.string() });

// =============================================================================
// Schema
// =============================================================================

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS decks (
    id TEXT PRIMARY KEY,
    name TEXT UNIQUE NOT NULL,
    is_builtin INTEGER NOT NULL DEFAULT 0,
    prefs TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS notes (
    id TEXT PRIMARY KEY,
    deck_id TEXT NOT NULL,
    front TEXT NOT NULL,
    back TEXT NOT NULL,
    meta TEXT,
    created_at INTEGER NOT NULL,
    FOREIGN KEY(deck_id) REFERENCES decks(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS cards (
    id TEXT PRIMARY KEY,
    note_id TEXT NOT NULL,
    template TEXT NOT NULL,
    state TEXT NOT NULL,
    due INTEGER NOT NULL,
    interval_days REAL NOT NULL DEFAULT 0,
    ease REAL NOT NULL DEFAULT 2.5,
    lapses INTEGER NOT NULL DEFAULT 0,
    step_index INTEGER NOT NULL DEFAULT 0,
    last_review_at INTEGER,
    suspended_from TEXT,
    buried_until INTEGER,
    UNIQUE(note_id, template),
    FOREIGN KEY(note_id) REFERENCES notes(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS review_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    card_id TEXT NOT NULL,
    ts INTEGER NOT NULL,
    rating INTEGER NOT NULL,
    answer_ms INTEGER NOT NULL,
    prev_state TEXT NOT NULL,
    prev_interval REAL NOT NULL,
    next_interval REAL NOT NULL,
    FOREIGN KEY(card_id) REFERENCES cards(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS daily_stats (
    deck_id TEXT NOT NULL,
    study_date TEXT NOT NULL,
    new_studied INTEGER NOT NULL DEFAULT 0,
    rev_studied INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY(deck_id, study_date),
    FOREIGN KEY(deck_id) REFERENCES decks(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_cards_state_due ON cards(state, due);
  CREATE INDEX IF NOT EXISTS idx_cards_note ON cards(note_id);
  CREATE INDEX IF NOT EXISTS idx_notes_deck ON notes(deck_id);
  CREATE INDEX IF NOT EXISTS idx_review_log_card ON review_log(card_id, ts);
`;

let sqlJs: Promise<SqlJsStatic> | null = null;

/**
 * Load the SQLite WebAssembly module once per process.
 */
export function loadSqlJs(): Promise<SqlJsStatic> {
  if (sqlJs === null) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

/**
 * Prefix object keys with `@` to match sql.js named parameters.
 */
function named(values: Record<string, string | number | null>): ParamsObject {
  const params: ParamsObject = {};
  for (const [key, value] of Object.entries(values)) {
    params[`@${key}`] = value;
  }
  return params;
}

const BUCKET_FILTERS: Record<CandidateBucket, string> = {
  learning: "c.state IN ('learning', 'relearning') AND c.due <= @now",
  review: "c.state = 'review' AND c.due <= @now",
  new: "c.state = 'new'",
};

// =============================================================================
// SqliteCardStore Class
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const store = await openCardStore("./data/cardwise.db");
 * const scheduler = new Scheduler(store);
 * // ...
 * store.close();
 * ```
 */
export class SqliteCardStore implements CardStore {
  private depth = 0;

  /**
   * @param filePath - Where committed changes are written; null keeps the store in memory
   */
  constructor(
    private readonly db: Database,
    private readonly filePath: string | null = null
  ) {
    this.configurePragmas();
    this.db.exec(SCHEMA);
    this.flush();
    log.debug(`Opened card store${filePath ? ` at ${filePath}` : " in memory"}`);
  }

  /**
   * Pragmas reset whenever sql.js exports the image, so this runs after every flush.
   */
  private configurePragmas(): void {
    this.db.exec("PRAGMA foreign_keys = ON");
  }

  transaction<T>(fn: () => T): T {
    const savepoint = `sp_${this.depth}`;
    this.db.exec(this.depth === 0 ? "BEGIN" : `SAVEPOINT ${savepoint}`);
    this.depth++;

    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.depth--;
      this.db.exec(this.depth === 0 ? "ROLLBACK" : `ROLLBACK TO ${savepoint}; RELEASE ${savepoint}`);
      throw error;
    }

    this.depth--;
    this.db.exec(this.depth === 0 ? "COMMIT" : `RELEASE ${savepoint}`);
    this.flush();
    return result;
  }

  close(): void {
    this.db.close();
  }

  // ---------------------------------------------------------------------------
  // Statement Helpers
  // ---------------------------------------------------------------------------

  private all(sql: string, params: BindParams = []): ParamsObject[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: ParamsObject[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private get(sql: string, params: BindParams = []): ParamsObject | undefined {
    return this.all(sql, params)[0];
  }

  /**
   * Run a write and return the number of rows it changed.
   */
  private run(sql: string, params: BindParams = []): number {
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    this.flush();
    return changes;
  }

  /**
   * Write the database image to disk when no transaction is open.
   * Writes go to a temp file first so a crash never leaves a torn image.
   */
  private flush(): void {
    if (this.filePath === null || this.depth > 0) {
      return;
    }
    const tempPath = `${this.filePath}.tmp`;
    writeFileSync(tempPath, this.db.export());
    renameSync(tempPath, this.filePath);
    this.configurePragmas();
  }

  // ---------------------------------------------------------------------------
  // Decks
  // ---------------------------------------------------------------------------

  insertDeck(deck: Deck): void {
    this.run("INSERT INTO decks (id, name, is_builtin, prefs) VALUES (?, ?, ?, ?)", [
      deck.id,
      deck.name,
      deck.isBuiltin ? 1 : 0,
      JSON.stringify(deck.prefs),
    ]);
  }

  getDeck(deckId: string): Deck | null {
    const row = this.get("SELECT * FROM decks WHERE id = ?", [deckId]);
    return row === undefined ? null : deckFromRow(row);
  }

  findDeckByName(name: string): Deck | null {
    const row = this.get("SELECT * FROM decks WHERE name = ?", [name]);
    return row === undefined ? null : deckFromRow(row);
  }

  listDecks(): Deck[] {
    return this.all("SELECT * FROM decks ORDER BY is_builtin DESC, name").map((row) => deckFromRow(row));
  }

  updateDeckPrefs(deckId: string, prefs: DeckPrefs): void {
    this.run("UPDATE decks SET prefs = ? WHERE id = ?", [JSON.stringify(prefs), deckId]);
  }

  deleteDeck(deckId: string): boolean {
    return this.run("DELETE FROM decks WHERE id = ?", [deckId]) > 0;
  }

  // ---------------------------------------------------------------------------
  // Notes
  // ---------------------------------------------------------------------------

  insertNote(note: Note): void {
    this.run("INSERT INTO notes (id, deck_id, front, back, meta, created_at) VALUES (?, ?, ?, ?, ?, ?)", [
      note.id,
      note.deckId,
      note.front,
      note.back,
      note.meta === null ? null : JSON.stringify(note.meta),
      note.createdAt,
    ]);
  }

  getNote(noteId: string): Note | null {
    const row = this.get("SELECT * FROM notes WHERE id = ?", [noteId]);
    return row === undefined ? null : noteFromRow(row);
  }

  findNote(deckId: string, front: string, back: string): Note | null {
    const row = this.get("SELECT * FROM notes WHERE deck_id = ? AND front = ? AND back = ? LIMIT 1", [
      deckId,
      front,
      back,
    ]);
    return row === undefined ? null : noteFromRow(row);
  }

  deleteNote(noteId: string): boolean {
    return this.run("DELETE FROM notes WHERE id = ?", [noteId]) > 0;
  }

  // ---------------------------------------------------------------------------
  // Cards
  // ---------------------------------------------------------------------------

  insertCard(card: Card): void {
    this.run(
      `INSERT INTO cards (id, note_id, template, state, due, interval_days, ease, lapses,
         step_index, last_review_at, suspended_from, buried_until)
       VALUES (@id, @note_id, @template, @state, @due, @interval_days, @ease, @lapses,
         @step_index, @last_review_at, @suspended_from, @buried_until)`,
      named(cardToRow(card))
    );
  }

  getCard(cardId: string): Card | null {
    const row = this.get("SELECT * FROM cards WHERE id = ?", [cardId]);
    return row === undefined ? null : cardFromRow(row);
  }

  getCardsForNote(noteId: string): Card[] {
    return this.all("SELECT * FROM cards WHERE note_id = ? ORDER BY rowid", [noteId]).map((row) =>
      cardFromRow(row)
    );
  }

  getDeckIdForCard(cardId: string): string | null {
    const row = this.get("SELECT n.deck_id FROM cards c JOIN notes n ON n.id = c.note_id WHERE c.id = ?", [
      cardId,
    ]);
    return row === undefined ? null : DeckIdRowSchema.parse(row).deck_id;
  }

  updateCard(card: Card): void {
    const changes = this.run(
      `UPDATE cards SET state = @state, due = @due, interval_days = @interval_days,
         ease = @ease, lapses = @lapses, step_index = @step_index,
         last_review_at = @last_review_at, suspended_from = @suspended_from,
         buried_until = @buried_until
       WHERE id = @id`,
      named(cardToRow(card))
    );

    if (changes === 0) {
      throw new Error(`No card row updated for ${card.id}`);
    }
  }

  getCandidates(deckId: string, bucket: CandidateBucket, now: number): SessionCandidate[] {
    const rows = this.all(
      `SELECT c.*, n.deck_id, n.front, n.back
       FROM cards c
       JOIN notes n ON n.id = c.note_id
       WHERE n.deck_id = @deckId
         AND ${BUCKET_FILTERS[bucket]}
         AND (c.buried_until IS NULL OR c.buried_until <= @now)
       ORDER BY c.due, c.rowid`,
      named({ deckId, now })
    );

    return rows.map((row) => {
      const extra = CandidateExtraSchema.parse(row);
      return {
        card: cardFromRow(row),
        deckId: extra.deck_id,
        front: extra.front,
        back: extra.back,
      };
    });
  }

  countDue(deckIds: readonly string[], now: number): DueCounts {
    const counts: DueCounts = { new: 0, learning: 0, review: 0 };
    if (deckIds.length === 0) {
      return counts;
    }

    const placeholders = deckIds.map(() => "?").join(", ");
    const rows = this.all(
      `SELECT c.state AS state, COUNT(*) AS count
       FROM cards c
       JOIN notes n ON n.id = c.note_id
       WHERE n.deck_id IN (${placeholders})
         AND c.due <= ?
         AND c.state != 'suspended'
         AND (c.buried_until IS NULL OR c.buried_until <= ?)
       GROUP BY c.state`,
      [...deckIds, now, now]
    );

    for (const raw of rows) {
      const row = StateCountRowSchema.parse(raw);
      switch (row.state) {
        case "new":
          counts.new += row.count;
          break;
        case "learning":
        case "relearning":
          counts.learning += row.count;
          break;
        case "review":
          counts.review += row.count;
          break;
        case "suspended":
          break;
      }
    }
    return counts;
  }

  // ---------------------------------------------------------------------------
  // Review Ledger
  // ---------------------------------------------------------------------------

  appendReviewEvent(event: ReviewEvent): void {
    this.run(
      `INSERT INTO review_log
         (card_id, ts, rating, answer_ms, prev_state, prev_interval, next_interval)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        event.cardId,
        event.ts,
        event.rating,
        event.answerMs,
        event.prevState,
        event.prevInterval,
        event.nextInterval,
      ]
    );
  }

  getReviewEvents(cardId: string): ReviewEvent[] {
    return this.all("SELECT * FROM review_log WHERE card_id = ? ORDER BY ts, id", [cardId]).map((raw) => {
      const row = ReviewLogRowSchema.parse(raw);
      return ReviewEventSchema.parse({
        cardId: row.card_id,
        ts: row.ts,
        rating: row.rating,
        answerMs: row.answer_ms,
        prevState: row.prev_state,
        prevInterval: row.prev_interval,
        nextInterval: row.next_interval,
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Daily Counters
  // ---------------------------------------------------------------------------

  getDailyCounts(deckId: string, studyDate: string): DailyCounts {
    const row = this.get("SELECT new_studied, rev_studied FROM daily_stats WHERE deck_id = ? AND study_date = ?", [
      deckId,
      studyDate,
    ]);

    if (row === undefined) {
      return { newStudied: 0, reviewStudied: 0 };
    }
    const parsed = DailyStatsRowSchema.parse(row);
    return { newStudied: parsed.new_studied, reviewStudied: parsed.rev_studied };
  }

  incrementDailyCounts(deckId: string, studyDate: string, delta: DailyCounts): void {
    this.run(
      `INSERT INTO daily_stats (deck_id, study_date, new_studied, rev_studied)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(deck_id, study_date) DO UPDATE SET
         new_studied = new_studied + excluded.new_studied,
         rev_studied = rev_studied + excluded.rev_studied`,
      [deckId, studyDate, delta.newStudied, delta.reviewStudied]
    );
  }
}

/**
 * In-memory store, for tests and throwaway sessions.
 */
export async function createMemoryCardStore(): Promise<SqliteCardStore> {
  const SQL = await loadSqlJs();
  return new SqliteCardStore(new SQL.Database());
}

/**
 * Open a file-backed store, creating its parent directory first. An
 * existing file is loaded; otherwise the file is created on the first write.
 */
export async function openCardStore(dbPath: string): Promise<SqliteCardStore> {
  if (dbPath === ":memory:") {
    return createMemoryCardStore();
  }

  const SQL = await loadSqlJs();
  await mkdir(dirname(dbPath), { recursive: true });

  let image: Uint8Array | null = null;
  try {
    image = await readFile(dbPath);
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw error;
    }
  }

  const store = new SqliteCardStore(new SQL.Database(image), dbPath);
  log.info(`Card store ready at ${dbPath}`);
  return store;
}
