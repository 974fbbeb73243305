/** Shared core types used by module contracts. */

/** Sequential, 0-based document identifier assigned when the corpus is loaded. */
export type DocId = number;
export type Term = string;
export type FieldName = string;

/**
 * Anything that can be indexed: exposes its field values by name.
 *
 * Field values are raw (un-normalized) strings; an empty list means the
 * document contributes no postings for that field.
 */
export interface IndexableDocument {
  readonly id: DocId;
  indexableFields(): Record<FieldName, readonly string[]>;
}

/** Emitted once per matching document while a query is evaluated. */
export interface MatchResult<D extends IndexableDocument = IndexableDocument> {
  docId: DocId;
  score: number;
  document: D;
}

export type MatchConsumer<D extends IndexableDocument = IndexableDocument> = (match: MatchResult<D>) => void;
