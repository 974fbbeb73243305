import type { Analyzer } from "../analyzer.js";
import { normalizeWith, type Normalizer } from "../normalizer.js";
import { tokenizeWith, type Tokenizer } from "../tokenizer.js";
import type { Term } from "../types.js";
import { defaultNormalizers } from "./normalizers.js";
import { ShingleTokenizer, WhitespaceTokenizer } from "./tokenizers.js";

/**
 * Normalizer chain shared by both sides, with one tokenizer chain for
 * queries and another for indexing.
 */
export class TextAnalyzer implements Analyzer {
  constructor(
    private readonly normalizers: readonly Normalizer[],
    private readonly searchTokenizers: readonly Tokenizer[],
    private readonly indexTokenizers: readonly Tokenizer[],
  ) {}

  normalize(text: string): string {
    return normalizeWith(this.normalizers, text);
  }

  analyzeIndex(text: string): Term[] {
    return this.run(this.indexTokenizers, text);
  }

  analyzeSearch(text: string): Term[] {
    return this.run(this.searchTokenizers, text);
  }

  private run(tokenizers: readonly Tokenizer[], text: string): Term[] {
    const normalized = this.normalize(text);
    if (!normalized.length) return [];
    return tokenizeWith(tokenizers, normalized).filter((t) => t.length > 0);
  }
}

/**
 * Queries split on whitespace; the index keeps unigrams plus concatenated
 * bigrams, so "happycat" finds "Happy cat!".
 */
export function createShinglesAnalyzer(substitute?: (text: string) => string): TextAnalyzer {
  return new TextAnalyzer(
    defaultNormalizers(substitute),
    [new WhitespaceTokenizer()],
    [new WhitespaceTokenizer(), new ShingleTokenizer(2, { emitUnigrams: true })],
  );
}
