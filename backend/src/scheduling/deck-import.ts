/**
 * Bundled Deck Import
 *
 * Reads bundled content in JSON Lines form (one `{front, back, meta?}`
 * object per line) and feeds each note through `Scheduler.addNote`.
 * Blank lines are ignored, malformed lines are skipped with a warning, and
 * duplicates (inside the file or already in the deck) are counted, not
 * raised.
 */

import { readFile } from "node:fs/promises";
import { safeParseBundledNoteLine, type BundledNoteLine } from "@cardwise/shared";
import type { Scheduler } from "./scheduler";
import { DuplicateNoteError } from "./errors";
import { createLogger } from "../logger";

const log = createLogger("DeckImport");

export interface ParsedBundle {
  notes: BundledNoteLine[];
  /** 1-based line numbers that could not be parsed */
  invalidLines: number[];
}

export interface ImportResult {
  added: number;
  duplicates: number;
  invalid: number;
  noteIds: string[];
}

export interface ImportOptions {
  /** Also create back->front cards */
  reverse?: boolean;
  now?: number;
}

/**
 * Parse JSON Lines text into validated note records.
 */
export function parseBundledDeck(text: string): ParsedBundle {
  const notes: BundledNoteLine[] = [];
  const invalidLines: number[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line.length === 0) {
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Skipping line ${index + 1}: invalid JSON (${message})`);
      invalidLines.push(index + 1);
      return;
    }

    const result = safeParseBundledNoteLine(data);
    if (!result.success) {
      log.warn(`Skipping line ${index + 1}: ${result.error.issues[0]?.message ?? "invalid note"}`);
      invalidLines.push(index + 1);
      return;
    }
    notes.push(result.data);
  });

  return { notes, invalidLines };
}

/**
 * Import bundled notes into a deck.
 *
 * @throws UnknownDeckError when the deck does not exist
 */
export function importBundledDeck(
  scheduler: Scheduler,
  deckId: string,
  text: string,
  options: ImportOptions = {}
): ImportResult {
  // Fail fast on an unknown deck before touching any line
  scheduler.getDeck(deckId);

  const { notes, invalidLines } = parseBundledDeck(text);
  const seen = new Set<string>();
  const result: ImportResult = { added: 0, duplicates: 0, invalid: invalidLines.length, noteIds: [] };

  for (const note of notes) {
    const key = `${note.front}\u0000${note.back}`;
    if (seen.has(key)) {
      result.duplicates++;
      continue;
    }
    seen.add(key);

    try {
      const noteId = scheduler.addNote(deckId, note.front, note.back, note.meta, options);
      result.noteIds.push(noteId);
      result.added++;
    } catch (error) {
      if (error instanceof DuplicateNoteError) {
        result.duplicates++;
        continue;
      }
      throw error;
    }
  }

  log.info(
    `Imported into deck ${deckId}: ${result.added} added, ${result.duplicates} duplicate(s), ` +
      `${result.invalid} invalid line(s)`
  );
  return result;
}

/**
 * Read a bundled deck file from disk and import it.
 */
export async function importBundledDeckFile(
  scheduler: Scheduler,
  deckId: string,
  filePath: string,
  options: ImportOptions = {}
): Promise<ImportResult> {
  const text = await readFile(filePath, "utf-8");
  return importBundledDeck(scheduler, deckId, text, options);
}
