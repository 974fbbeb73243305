import { assertContract } from "../errors.js";
import { restartable, type Tokenizer } from "../tokenizer.js";
import type { Term } from "../types.js";

function isSpace(ch: string): boolean {
  return /\s/u.test(ch);
}

/** Yields each maximal non-whitespace run of every input term. */
export class WhitespaceTokenizer implements Tokenizer {
  tokenize(input: Iterable<Term>): Iterable<Term> {
    return restartable(() => this.split(input));
  }

  private *split(input: Iterable<Term>): Generator<Term, void> {
    for (const text of input) {
      const n = text.length;
      let i = 0;

      while (i < n) {
        // skip separators
        while (i < n && isSpace(text.charAt(i))) i++;
        if (i >= n) break;

        const start = i;
        while (i < n && !isSpace(text.charAt(i))) i++;
        yield text.slice(start, i);
      }
    }
  }
}

export interface ShingleOptions {
  /** joins the tokens of one window; "" gives "new york" -> "newyork" */
  separator?: string;
  /** also emit every single token, ahead of the windows starting at it */
  emitUnigrams?: boolean;
}

/**
 * Overlapping windows of `width` consecutive tokens.
 *
 * - n >= width: n - width + 1 shingles
 * - 0 < n < width: one shingle of the whole sequence
 * - n = 0: nothing
 */
export class ShingleTokenizer implements Tokenizer {
  private readonly separator: string;
  private readonly emitUnigrams: boolean;

  constructor(
    private readonly width: number,
    options: ShingleOptions = {},
  ) {
    assertContract(Number.isInteger(width) && width >= 1, `shingle width must be a positive integer, got ${width}`);
    this.separator = options.separator ?? "";
    this.emitUnigrams = options.emitUnigrams ?? false;
  }

  tokenize(input: Iterable<Term>): Iterable<Term> {
    return restartable(() => this.windows(Array.from(input)));
  }

  private *windows(tokens: Term[]): Generator<Term, void> {
    const n = tokens.length;
    if (n === 0) return;

    if (n < this.width) {
      if (this.emitUnigrams) yield* tokens;
      // a lone token is already out as a unigram
      if (!this.emitUnigrams || n > 1) yield tokens.join(this.separator);
      return;
    }

    for (const [i, token] of tokens.entries()) {
      if (this.emitUnigrams) yield token;
      if (i + this.width <= n) yield tokens.slice(i, i + this.width).join(this.separator);
    }
  }
}
