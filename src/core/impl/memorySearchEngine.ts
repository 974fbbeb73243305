import type { InvertedIndex } from "../invertedIndex.js";
import { DEFAULT_TIE_BREAKER, assertTieBreaker, isEmptyQuery, matchAll, multiFieldQuery, type Query } from "../query.js";
import type { RandomSource, SelectionMode } from "../selector.js";
import type { DocId, FieldName, IndexableDocument } from "../types.js";
import { createNoopLogger, type Logger } from "../../logging.js";
import { evaluate } from "./queryEvaluator.js";
import { createSelector } from "./selectors.js";

export interface SearchOptions {
  /** overrides the engine's configured selection mode for this call */
  selection?: SelectionMode;
}

export interface SearchResult<D extends IndexableDocument> {
  document: D;
  /** relevance of the picked document (not used for the pick in "random" mode) */
  score: number;
  /** how many documents matched */
  candidates: number;
  selection: SelectionMode;
}

export interface EngineDeps<D extends IndexableDocument> {
  index: InvertedIndex<D>;
  /** fields combined with DisMax, strongest first by convention */
  fields: readonly FieldName[];
  tieBreaker?: number;
  selection?: SelectionMode;
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Query string -> at most one document.
 *
 * Each call evaluates the query once, streaming matches into a fresh
 * selector; nothing is shared between calls, so concurrent searches need no
 * locking.
 */
export class MemorySearchEngine<D extends IndexableDocument> {
  private readonly tieBreaker: number;
  private readonly selection: SelectionMode;
  private readonly logger: Logger;

  constructor(private readonly deps: EngineDeps<D>) {
    this.tieBreaker = deps.tieBreaker ?? DEFAULT_TIE_BREAKER;
    this.selection = deps.selection ?? "random";
    this.logger = deps.logger ?? createNoopLogger();
    assertTieBreaker(this.tieBreaker);
  }

  search(rawQuery: string, options?: SearchOptions): SearchResult<D> | undefined {
    const query = multiFieldQuery(this.deps.index, this.deps.fields, rawQuery, this.tieBreaker);
    if (isEmptyQuery(query)) {
      this.logger.debug("query has no terms", { operation: "search" });
      return undefined;
    }
    return this.run(query, options);
  }

  /** Any document at all, picked the same way as search results. */
  pickAny(options?: SearchOptions): SearchResult<D> | undefined {
    return this.run(matchAll(), options);
  }

  get(docId: DocId): D | undefined {
    return this.deps.index.document(docId);
  }

  size(): number {
    return this.deps.index.getStats().docCount;
  }

  private run(query: Query, options?: SearchOptions): SearchResult<D> | undefined {
    const selection = options?.selection ?? this.selection;
    const selector = createSelector<D>(selection, this.deps.random);

    evaluate(this.deps.index, query, (m) => selector.offer(m));

    const picked = selector.selected();
    this.logger.debug("query evaluated", { operation: query.kind, candidates: selector.seen(), selection, docId: picked?.docId ?? null });
    if (!picked) return undefined;

    return { document: picked.document, score: picked.score, candidates: selector.seen(), selection };
  }
}
