import type { DocId, FieldName, IndexableDocument } from "../core/types.js";

export const BLOB_FIELD = "blob";
export const TAGS_FIELD = "tags";

/** One ASCII art file: its full text plus short labels (the file name). */
export class ArtDocument implements IndexableDocument {
  constructor(
    readonly id: DocId,
    readonly blob: string,
    readonly tags: readonly string[],
  ) {}

  indexableFields(): Record<FieldName, readonly string[]> {
    return {
      [BLOB_FIELD]: [this.blob],
      [TAGS_FIELD]: this.tags,
    };
  }
}
