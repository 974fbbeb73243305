import type { MatchSelector, RandomSource, SelectionMode } from "../selector.js";
import type { IndexableDocument, MatchResult } from "../types.js";
import { ReservoirSelector } from "./reservoirSelector.js";
import { TopScoreSelector } from "./topScoreSelector.js";

export function createSelector<D extends IndexableDocument>(mode: SelectionMode, random?: RandomSource): MatchSelector<D> {
  switch (mode) {
    case "random":
      return new ReservoirSelector<D>(random);
    case "top-score":
      return new TopScoreSelector<D>();
  }
}

/** Drains `stream` through `selector`; undefined means no match. */
export function selectOne<D extends IndexableDocument>(
  stream: Iterable<MatchResult<D>>,
  selector: MatchSelector<D> = new ReservoirSelector<D>(),
): D | undefined {
  for (const m of stream) selector.offer(m);
  return selector.selected()?.document;
}
