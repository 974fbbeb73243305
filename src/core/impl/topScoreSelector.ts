import type { MatchSelector } from "../selector.js";
import type { IndexableDocument, MatchResult } from "../types.js";

/** Keeps the highest-scoring match; on ties the first one offered stays. */
export class TopScoreSelector<D extends IndexableDocument = IndexableDocument> implements MatchSelector<D> {
  readonly mode = "top-score";

  private best: MatchResult<D> | undefined;
  private count = 0;

  offer(match: MatchResult<D>): void {
    this.count++;
    if (!this.best || match.score > this.best.score) this.best = match;
  }

  selected(): MatchResult<D> | undefined {
    return this.best;
  }

  seen(): number {
    return this.count;
  }

  reset(): void {
    this.best = undefined;
    this.count = 0;
  }
}
