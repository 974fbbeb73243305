import type { Normalizer } from "../normalizer.js";

/** Decomposes (NFD) and drops nonspacing marks: "café" -> "cafe". */
export class UnaccentNormalizer implements Normalizer {
  apply(text: string): string {
    return text.normalize("NFD").replace(/\p{Mn}+/gu, "");
  }
}

export class LowerCaseNormalizer implements Normalizer {
  apply(text: string): string {
    return text.toLowerCase();
  }
}

/** "abc123def" -> "abc 123 def" */
export class SpaceBetweenDigitsNormalizer implements Normalizer {
  apply(text: string): string {
    return text.replace(/(\p{L})(\p{N})/gu, "$1 $2").replace(/(\p{N})(\p{L})/gu, "$1 $2");
  }
}

export class CustomNormalizer implements Normalizer {
  constructor(private readonly fn: (text: string) => string) {}

  apply(text: string): string {
    return this.fn(text);
  }
}

/** Keeps letters, digits and whitespace. */
export class RemoveNonAlphanumericNormalizer implements Normalizer {
  apply(text: string): string {
    return text.replace(/[^\p{L}\p{N}\s]+/gu, "");
  }
}

/** Every whitespace run becomes one plain space. */
export class CollapseWhitespaceNormalizer implements Normalizer {
  apply(text: string): string {
    return text.replace(/\s+/gu, " ");
  }
}

/** Strips any of `chars` from both ends. */
export class TrimNormalizer implements Normalizer {
  private readonly chars: Set<string>;

  constructor(chars: string = " ") {
    this.chars = new Set(chars);
  }

  apply(text: string): string {
    let start = 0;
    let end = text.length;
    while (start < end && this.chars.has(text.charAt(start))) start++;
    while (end > start && this.chars.has(text.charAt(end - 1))) end--;
    return text.slice(start, end);
  }
}

export function replaceHashWithSpace(text: string): string {
  return text.replaceAll("#", " ");
}

/**
 * Default chain: unaccent, lowercase, split letter/digit runs, custom
 * substitution, strip punctuation, squeeze whitespace, trim.
 *
 * Output holds only letters, digits and single interior spaces.
 */
export function defaultNormalizers(substitute: (text: string) => string = replaceHashWithSpace): Normalizer[] {
  return [
    new UnaccentNormalizer(),
    new LowerCaseNormalizer(),
    new SpaceBetweenDigitsNormalizer(),
    new CustomNormalizer(substitute),
    new RemoveNonAlphanumericNormalizer(),
    new CollapseWhitespaceNormalizer(),
    new TrimNormalizer(" "),
  ];
}
