import type { Term } from "./types.js";

/**
 * One stage of a tokenizer chain: turns a sequence of terms into another.
 *
 * The first stage receives the normalized text as a single-element sequence.
 *
 * Contract notes:
 * - should be deterministic for a given input
 * - output must be finite and restartable (iterating twice yields the same terms)
 */
export interface Tokenizer {
  tokenize(input: Iterable<Term>): Iterable<Term>;
}

/** Wraps a generator factory so every iteration starts over. */
export function restartable<T>(produce: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: produce };
}

export function tokenizeWith(tokenizers: readonly Tokenizer[], text: string): Term[] {
  let current: Iterable<Term> = [text];
  for (const t of tokenizers) current = t.tokenize(current);
  return Array.from(current);
}
