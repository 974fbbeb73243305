import type { IndexableDocument, MatchResult } from "./types.js";

/**
 * How one document is chosen out of the matching set.
 *
 * - `random`: uniform choice among all matches, relevance ignored
 * - `top-score`: highest relevance score, earliest docId on ties
 */
export type SelectionMode = "random" | "top-score";

export const SELECTION_MODES: readonly SelectionMode[] = ["random", "top-score"];

/** Returns a uniformly distributed float in [0, 1). */
export type RandomSource = () => number;

/**
 * Streaming consumer that keeps a single candidate in O(1) memory.
 *
 * One instance per query evaluation; state must not be shared between
 * concurrent queries.
 */
export interface MatchSelector<D extends IndexableDocument = IndexableDocument> {
  readonly mode: SelectionMode;
  offer(match: MatchResult<D>): void;
  /** The pick so far, undefined when nothing was offered. */
  selected(): MatchResult<D> | undefined;
  /** Number of matches offered since construction or the last reset. */
  seen(): number;
  reset(): void;
}

export function isSelectionMode(v: unknown): v is SelectionMode {
  return v === "random" || v === "top-score";
}
