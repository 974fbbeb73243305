import type { Term } from "./types.js";

/**
 * Pairs normalization with tokenization, separately for each side.
 *
 * Index-side and search-side output may differ on purpose (e.g. the index
 * stores shingles while queries are split on whitespace only).
 */
export interface Analyzer {
  analyzeIndex(text: string): Term[];
  analyzeSearch(text: string): Term[];
}
