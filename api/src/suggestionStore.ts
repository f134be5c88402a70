import type { SuggestionSet } from "./types.js";

export const EMPTY_SUGGESTIONS: SuggestionSet = Object.freeze({ suggestions: [] });

/** Latest suggestion set; every write replaces the previous one. */
export class SuggestionStore {
  private current: SuggestionSet = EMPTY_SUGGESTIONS;

  set(next: SuggestionSet): void {
    this.current = next;
  }

  get(): SuggestionSet {
    return this.current;
  }
}
