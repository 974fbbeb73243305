import { assertContract } from "./errors.js";
import type { FieldName, IndexableDocument, Term } from "./types.js";
import type { InvertedIndex } from "./invertedIndex.js";

/** Disjunction of terms inside one field. Score: sum of matched term frequencies. */
export interface TermsQuery {
  kind: "terms";
  field: FieldName;
  terms: readonly Term[];
}

/** Union of children. Score: sum of the matching children's scores. */
export interface OrQuery {
  kind: "or";
  children: readonly Query[];
}

/** Best child score plus `tieBreaker` times the other matching children's scores. */
export interface DisMaxQuery {
  kind: "disMax";
  tieBreaker: number;
  children: readonly Query[];
}

/** Every indexed document, score 1. */
export interface MatchAllQuery {
  kind: "matchAll";
}

export type Query = TermsQuery | OrQuery | DisMaxQuery | MatchAllQuery;

export const DEFAULT_TIE_BREAKER = 0.1;

export function terms(field: FieldName, values: readonly Term[]): TermsQuery {
  return { kind: "terms", field, terms: values };
}

export function or(...children: Query[]): OrQuery {
  return { kind: "or", children };
}

export function assertTieBreaker(tieBreaker: number): void {
  assertContract(
    Number.isFinite(tieBreaker) && tieBreaker >= 0 && tieBreaker <= 1,
    `tieBreaker must be in [0, 1], got ${tieBreaker}`,
  );
}

export function disMax(tieBreaker: number, ...children: Query[]): DisMaxQuery {
  assertTieBreaker(tieBreaker);
  return { kind: "disMax", tieBreaker, children };
}

export function matchAll(): MatchAllQuery {
  return { kind: "matchAll" };
}

/**
 * Default query shape: one term disjunction per field, combined with DisMax
 * so the strongest field dominates.
 *
 * Never fails: input that analyzes to nothing gives a query with no terms.
 */
export function multiFieldQuery<D extends IndexableDocument>(
  index: InvertedIndex<D>,
  fields: readonly FieldName[],
  queryString: string,
  tieBreaker: number = DEFAULT_TIE_BREAKER,
): DisMaxQuery {
  return disMax(tieBreaker, ...fields.map((f) => index.terms(f, queryString)));
}

/** True when the query can never match anything (no terms anywhere). */
export function isEmptyQuery(q: Query): boolean {
  switch (q.kind) {
    case "terms":
      return q.terms.length === 0;
    case "or":
    case "disMax":
      return q.children.every(isEmptyQuery);
    case "matchAll":
      return false;
  }
}
