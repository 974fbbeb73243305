import { MemorySearchEngine } from "../core/impl/memorySearchEngine.js";
import type { RandomSource, SelectionMode } from "../core/selector.js";
import type { ArtDocument } from "../corpus/artDocument.js";
import { createArtIndex, SEARCH_FIELDS } from "../corpus/artIndex.js";
import type { Logger } from "../logging.js";

export interface ArtView {
  id: number;
  tags: readonly string[];
  blob: string;
}

export interface ArtHit extends ArtView {
  score: number;
}

export interface SearchQuery {
  query: string;
  selection?: SelectionMode;
}

export interface SearchResponse {
  result: ArtHit | null;
  candidates: number;
}

/** What the HTTP layer needs from the matching engine. */
export interface Engine {
  search(q: SearchQuery): SearchResponse;
  random(): ArtHit | null;
  get(id: number): ArtView | null;
  size(): number;
}

export interface EngineOptions {
  selection?: SelectionMode;
  tieBreaker?: number;
  random?: RandomSource;
  logger?: Logger;
}

function toView(doc: ArtDocument): ArtView {
  return { id: doc.id, tags: doc.tags, blob: doc.blob };
}

export function createInMemoryEngine(docs: readonly ArtDocument[], opts: EngineOptions = {}): Engine {
  const index = createArtIndex(docs);
  const engine = new MemorySearchEngine({
    index,
    fields: SEARCH_FIELDS,
    tieBreaker: opts.tieBreaker,
    selection: opts.selection,
    random: opts.random,
    logger: opts.logger,
  });

  return {
    search(q) {
      const r = engine.search(q.query, { selection: q.selection });
      if (!r) return { result: null, candidates: 0 };
      return { result: { ...toView(r.document), score: r.score }, candidates: r.candidates };
    },
    random() {
      const r = engine.pickAny();
      return r ? { ...toView(r.document), score: r.score } : null;
    },
    get(id) {
      const doc = engine.get(id);
      return doc ? toView(doc) : null;
    },
    size() {
      return engine.size();
    },
  };
}
