import type { Analyzer } from "../analyzer.js";
import { assertContract } from "../errors.js";
import type { IndexStats, InvertedIndex, Posting, PostingsList } from "../invertedIndex.js";
import { terms, type TermsQuery } from "../query.js";
import type { DocId, FieldName, IndexableDocument, Term } from "../types.js";

export type FieldAnalyzers = Record<FieldName, Analyzer>;

/**
 * In-memory inverted index, built once.
 *
 * Data structure:
 * - field -> term -> postings (sorted by docId)
 * - docs stored by id, so docId doubles as array index
 *
 * Documents are visited in id order during `build`, so postings come out
 * sorted without a sort pass.
 */
export class MemoryInvertedIndex<D extends IndexableDocument = IndexableDocument> implements InvertedIndex<D> {
  private constructor(
    private readonly docs: readonly D[],
    private readonly analyzers: ReadonlyMap<FieldName, Analyzer>,
    private readonly fieldToTermMap: ReadonlyMap<FieldName, ReadonlyMap<Term, PostingsList>>,
  ) {}

  /**
   * Throws ContractViolationError when ids are not exactly 0..n-1 (duplicate,
   * negative, fractional or out of range).
   */
  static build<D extends IndexableDocument>(documents: readonly D[], analyzers: FieldAnalyzers): MemoryInvertedIndex<D> {
    const byId = new Array<D | undefined>(documents.length).fill(undefined);
    for (const doc of documents) {
      assertContract(
        Number.isInteger(doc.id) && doc.id >= 0 && doc.id < documents.length,
        `document id ${doc.id} out of range [0, ${documents.length})`,
      );
      assertContract(byId[doc.id] === undefined, `duplicate document id ${doc.id}`);
      byId[doc.id] = doc;
    }
    const docs = byId.filter((d): d is D => d !== undefined);

    const analyzerMap = new Map(Object.entries(analyzers));
    const postingsByField = new Map<FieldName, Map<Term, Posting[]>>();
    for (const field of analyzerMap.keys()) postingsByField.set(field, new Map());

    for (const doc of docs) {
      const fields = doc.indexableFields();
      for (const [field, analyzer] of analyzerMap) {
        const values = fields[field];
        if (!values?.length) continue;

        const termFreqs = new Map<Term, number>();
        for (const value of values) {
          for (const term of analyzer.analyzeIndex(value)) {
            termFreqs.set(term, (termFreqs.get(term) ?? 0) + 1);
          }
        }

        const termMap = postingsByField.get(field);
        if (!termMap) continue;
        for (const [term, tf] of termFreqs) {
          let list = termMap.get(term);
          if (!list) {
            list = [];
            termMap.set(term, list);
          }
          list.push({ docId: doc.id, tf });
        }
      }
    }

    const fieldToTermMap = new Map<FieldName, Map<Term, PostingsList>>();
    for (const [field, termMap] of postingsByField) {
      const lists = new Map<Term, PostingsList>();
      for (const [term, postings] of termMap) {
        lists.set(term, { field, term, df: postings.length, postings });
      }
      fieldToTermMap.set(field, lists);
    }

    return new MemoryInvertedIndex(docs, analyzerMap, fieldToTermMap);
  }

  getPostings(field: FieldName, term: Term): PostingsList | undefined {
    return this.fieldToTermMap.get(field)?.get(term);
  }

  hasTerm(field: FieldName, term: Term): boolean {
    const pl = this.getPostings(field, term);
    return !!pl && pl.df > 0;
  }

  document(docId: DocId): D | undefined {
    return this.docs[docId];
  }

  documents(): readonly D[] {
    return this.docs;
  }

  terms(field: FieldName, queryString: string): TermsQuery {
    const analyzer = this.analyzers.get(field);
    if (!analyzer) return terms(field, []);
    // repeated query words would double count
    return terms(field, Array.from(new Set(analyzer.analyzeSearch(queryString))));
  }

  getStats(): IndexStats {
    const termCount: Record<FieldName, number> = {};
    for (const [field, lists] of this.fieldToTermMap) termCount[field] = lists.size;
    return { docCount: this.docs.length, termCount };
  }
}
