/**
 * Text -> text transform applied before tokenization.
 *
 * Contract notes:
 * - must be deterministic and total (never throws)
 * - chains run in order; see `normalizeWith`
 */
export interface Normalizer {
  apply(text: string): string;
}

export function normalizeWith(normalizers: readonly Normalizer[], text: string): string {
  let out = text;
  for (const n of normalizers) out = n.apply(out);
  return out;
}
