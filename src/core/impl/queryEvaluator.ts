import type { InvertedIndex, Posting } from "../invertedIndex.js";
import type { Query } from "../query.js";
import type { DocId, IndexableDocument, MatchConsumer, MatchResult } from "../types.js";

/** docId of an exhausted cursor */
export const NO_MORE_DOCS = Number.MAX_SAFE_INTEGER;

/**
 * Forward-only iterator over matching docIds in ascending order.
 *
 * `docId()` is the current doc (NO_MORE_DOCS when exhausted); `score()` is
 * only meaningful while positioned on a doc.
 */
interface DocCursor {
  docId(): DocId;
  next(): DocId;
  score(): number;
}

const EMPTY_CURSOR: DocCursor = {
  docId: () => NO_MORE_DOCS,
  next: () => NO_MORE_DOCS,
  score: () => 0,
};

class PostingsCursor implements DocCursor {
  private i = 0;

  constructor(private readonly postings: readonly Posting[]) {}

  docId(): DocId {
    return this.postings[this.i]?.docId ?? NO_MORE_DOCS;
  }

  next(): DocId {
    if (this.i < this.postings.length) this.i++;
    return this.docId();
  }

  score(): number {
    return this.postings[this.i]?.tf ?? 0;
  }
}

class RangeCursor implements DocCursor {
  private current = 0;

  constructor(private readonly size: number) {}

  docId(): DocId {
    return this.current < this.size ? this.current : NO_MORE_DOCS;
  }

  next(): DocId {
    if (this.current < this.size) this.current++;
    return this.docId();
  }

  score(): number {
    return 1;
  }
}

/**
 * Union over children. Positioned on the smallest child docId; the children
 * sitting on that doc are the ones that match it.
 */
abstract class DisjunctionCursor implements DocCursor {
  private current: DocId;

  constructor(protected readonly children: readonly DocCursor[]) {
    this.current = this.minChildDoc();
  }

  docId(): DocId {
    return this.current;
  }

  next(): DocId {
    if (this.current === NO_MORE_DOCS) return NO_MORE_DOCS;
    for (const c of this.children) {
      if (c.docId() === this.current) c.next();
    }
    this.current = this.minChildDoc();
    return this.current;
  }

  score(): number {
    const scores: number[] = [];
    for (const c of this.children) {
      if (c.docId() === this.current) scores.push(c.score());
    }
    return this.combine(scores);
  }

  protected abstract combine(scores: number[]): number;

  private minChildDoc(): DocId {
    let min = NO_MORE_DOCS;
    for (const c of this.children) min = Math.min(min, c.docId());
    return min;
  }
}

class OrCursor extends DisjunctionCursor {
  protected combine(scores: number[]): number {
    let sum = 0;
    for (const s of scores) sum += s;
    return sum;
  }
}

class DisMaxCursor extends DisjunctionCursor {
  constructor(
    children: readonly DocCursor[],
    private readonly tieBreaker: number,
  ) {
    super(children);
  }

  protected combine(scores: number[]): number {
    return disMaxScore(scores, this.tieBreaker);
  }
}

/** s1 + tieBreaker * (s2 + s3 + ...), where s1 is the best child score. */
export function disMaxScore(scores: readonly number[], tieBreaker: number): number {
  if (scores.length === 0) return 0;
  let max = -Infinity;
  let sum = 0;
  for (const s of scores) {
    sum += s;
    if (s > max) max = s;
  }
  return max + tieBreaker * (sum - max);
}

function createCursor<D extends IndexableDocument>(index: InvertedIndex<D>, query: Query): DocCursor {
  switch (query.kind) {
    case "terms": {
      const children: DocCursor[] = [];
      for (const term of query.terms) {
        const pl = index.getPostings(query.field, term);
        if (pl && pl.df > 0) children.push(new PostingsCursor(pl.postings));
      }
      if (children.length === 0) return EMPTY_CURSOR;
      return new OrCursor(children);
    }
    case "or":
      return new OrCursor(query.children.map((c) => createCursor(index, c)));
    case "disMax":
      return new DisMaxCursor(
        query.children.map((c) => createCursor(index, c)),
        query.tieBreaker,
      );
    case "matchAll":
      return new RangeCursor(index.documents().length);
  }
}

/** The match stream of `query` as a lazy iterable, in ascending docId order. */
export function* matches<D extends IndexableDocument>(index: InvertedIndex<D>, query: Query): Generator<MatchResult<D>, void> {
  const cursor = createCursor(index, query);
  for (let docId = cursor.docId(); docId !== NO_MORE_DOCS; docId = cursor.next()) {
    const document = index.document(docId);
    if (!document) continue;
    yield { docId, score: cursor.score(), document };
  }
}

/**
 * Streams every matching document to `consumer` in ascending docId order.
 *
 * Single pass over the posting lists; nothing is collected. The consumer may
 * throw to abandon the pass, the index is left untouched either way.
 */
export function evaluate<D extends IndexableDocument>(index: InvertedIndex<D>, query: Query, consumer: MatchConsumer<D>): void {
  for (const match of matches(index, query)) consumer(match);
}
