/**
 * Sibling Suppression Filter
 *
 * At most one card per note appears in a session. The first card of a note
 * to be selected wins; every other card of that note is dropped for the
 * rest of the build. Nothing is persisted: the filter lives for one build.
 * A persisted bury mark (`buriedUntil`) also keeps a card out.
 */

import type { Card } from "./card-schema";

export function isBuried(card: Card, now: number): boolean {
  return card.buriedUntil !== null && card.buriedUntil > now;
}

/**
 * Stateful filter for a single session build.
 */
export class SiblingFilter {
  private readonly selectedNotes = new Set<string>();

  constructor(private readonly now: number) {}

  /**
   * Returns true and claims the card's note when the card may join the
   * session; false when it is buried or a sibling was already selected.
   */
  admit(card: Card): boolean {
    if (isBuried(card, this.now) || this.selectedNotes.has(card.noteId)) {
      return false;
    }
    this.selectedNotes.add(card.noteId);
    return true;
  }
}
