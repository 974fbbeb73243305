import type { TermsQuery } from "./query.js";
import type { DocId, FieldName, IndexableDocument, Term } from "./types.js";

export interface Posting {
  docId: DocId;
  /** term frequency within the field value(s) of the doc */
  tf: number;
}

export interface PostingsList {
  field: FieldName;
  term: Term;
  df: number;
  /** sorted by docId */
  postings: readonly Posting[];
}

export interface IndexStats {
  docCount: number;
  /** distinct terms per indexed field */
  termCount: Record<FieldName, number>;
}

/**
 * Per-field inverted index mapping (field, term) -> postings.
 *
 * Contract notes:
 * - built once from the full corpus, read-only afterwards
 * - `getPostings` returns postings sorted by docId for streaming merges
 * - every docId in a posting list resolves through `document()`
 */
export interface InvertedIndex<D extends IndexableDocument = IndexableDocument> {
  getPostings(field: FieldName, term: Term): PostingsList | undefined;
  hasTerm(field: FieldName, term: Term): boolean;

  document(docId: DocId): D | undefined;
  /** all documents in docId order */
  documents(): readonly D[];

  /** Analyzes `queryString` with the field's search analyzer. Unknown field yields zero terms. */
  terms(field: FieldName, queryString: string): TermsQuery;

  getStats(): IndexStats;
}
