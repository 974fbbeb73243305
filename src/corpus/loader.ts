import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";

import { createNoopLogger, type Logger } from "../logging.js";
import { ArtDocument } from "./artDocument.js";

export const DEFAULT_MAX_DOCUMENT_BYTES = 3500;

export interface LoadOptions {
  /** files larger than this are skipped (they would not fit in a chat message) */
  maxBytes?: number;
  extension?: string;
  logger?: Logger;
}

/**
 * Walks `root` recursively (entries in name order) and turns every file
 * with the given extension into an `ArtDocument`. Ids are assigned
 * sequentially from 0 in walk order; the file name is the only tag.
 *
 * I/O errors propagate.
 */
export async function loadCorpus(root: string, options: LoadOptions = {}): Promise<ArtDocument[]> {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_DOCUMENT_BYTES;
  const extension = options.extension ?? ".txt";
  const logger = options.logger ?? createNoopLogger();

  const out: ArtDocument[] = [];

  for await (const file of walk(root)) {
    const name = path.basename(file);
    if (!name.endsWith(extension)) continue;

    const info = await stat(file);
    if (info.size > maxBytes) {
      logger.warn("skipping file, too big", { file, bytes: info.size, maxBytes });
      continue;
    }

    const blob = await readFile(file, "utf8");
    out.push(new ArtDocument(out.length, blob, [name]));
  }

  logger.info("corpus loaded", { root, documents: out.length });
  return out;
}

async function* walk(dir: string): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) yield* walk(full);
    else if (entry.isFile()) yield full;
    // a link is followed when it points at a file
    else if (entry.isSymbolicLink() && (await stat(full)).isFile()) yield full;
  }
}
