import type { MatchSelector, RandomSource } from "../selector.js";
import type { IndexableDocument, MatchResult } from "../types.js";

/**
 * Reservoir sampling of size 1.
 *
 * Every offered match draws a fresh random key and the highest key wins,
 * so each of m matches is kept with probability 1/m whatever the stream
 * order or length. The relevance score is ignored.
 */
export class ReservoirSelector<D extends IndexableDocument = IndexableDocument> implements MatchSelector<D> {
  readonly mode = "random";

  private best: MatchResult<D> | undefined;
  private bestKey = -Infinity;
  private count = 0;

  constructor(private readonly random: RandomSource = Math.random) {}

  offer(match: MatchResult<D>): void {
    this.count++;
    const key = this.random();
    if (key > this.bestKey) {
      this.best = match;
      this.bestKey = key;
    }
  }

  selected(): MatchResult<D> | undefined {
    return this.best;
  }

  seen(): number {
    return this.count;
  }

  reset(): void {
    this.best = undefined;
    this.bestKey = -Infinity;
    this.count = 0;
  }
}
