import { createShinglesAnalyzer } from "../core/impl/textAnalyzer.js";
import { MemoryInvertedIndex } from "../core/impl/memoryInvertedIndex.js";
import { BLOB_FIELD, TAGS_FIELD, type ArtDocument } from "./artDocument.js";

/** Fields a free-text query is matched against, combined with DisMax. */
export const SEARCH_FIELDS = [TAGS_FIELD, BLOB_FIELD] as const;

/** Tags and blob share the shingles analyzer. */
export function createArtIndex(docs: readonly ArtDocument[]): MemoryInvertedIndex<ArtDocument> {
  const shingles = createShinglesAnalyzer();
  return MemoryInvertedIndex.build(docs, {
    [BLOB_FIELD]: shingles,
    [TAGS_FIELD]: shingles,
  });
}
