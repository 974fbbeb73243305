import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import {
  CollapseWhitespaceNormalizer,
  CustomNormalizer,
  LowerCaseNormalizer,
  RemoveNonAlphanumericNormalizer,
  SpaceBetweenDigitsNormalizer,
  TrimNormalizer,
  UnaccentNormalizer,
  defaultNormalizers,
  normalizeWith,
} from "../../index.js";

describe("normalizers", () => {
  it("strips accents", () => {
    expect(new UnaccentNormalizer().apply("Café Crème")).toBe("Cafe Creme");
  });

  it("keeps spacing and enclosing marks", () => {
    const n = new UnaccentNormalizer();
    // hi + vowel sign i (spacing) + anusvara (nonspacing) + di + vowel sign ii (spacing)
    expect(n.apply("\u0939\u093F\u0902\u0926\u0940")).toBe("\u0939\u093F\u0926\u0940");
    expect(n.apply("a\u20DD")).toBe("a\u20DD");
  });

  it("lowercases", () => {
    expect(new LowerCaseNormalizer().apply("HeLLo")).toBe("hello");
  });

  it("splits letter and digit runs both ways", () => {
    const n = new SpaceBetweenDigitsNormalizer();
    expect(n.apply("abc123def")).toBe("abc 123 def");
    expect(n.apply("r2d2")).toBe("r 2 d 2");
    expect(n.apply("42")).toBe("42");
  });

  it("applies a custom substitution", () => {
    expect(new CustomNormalizer((s) => s.replaceAll("-", "+")).apply("a-b")).toBe("a+b");
  });

  it("removes punctuation but keeps whitespace", () => {
    expect(new RemoveNonAlphanumericNormalizer().apply("cat.txt, ok!\n")).toBe("cattxt ok\n");
  });

  it("collapses whitespace runs", () => {
    expect(new CollapseWhitespaceNormalizer().apply("a \t\n b")).toBe("a b");
  });

  it("trims only the given characters", () => {
    expect(new TrimNormalizer("-_").apply("--a-b__")).toBe("a-b");
    expect(new TrimNormalizer().apply("  a b  ")).toBe("a b");
    expect(new TrimNormalizer().apply("   ")).toBe("");
  });

  it("runs the default chain in order", () => {
    expect(normalizeWith(defaultNormalizers(), "  Héllo, World #42!  ")).toBe("hello world 42");
    expect(normalizeWith(defaultNormalizers(), "cat.txt")).toBe("cattxt");
    expect(normalizeWith(defaultNormalizers(), "Room101")).toBe("room 101");
    expect(normalizeWith(defaultNormalizers(), "")).toBe("");
  });

  it("uses the supplied substitution instead of the # default", () => {
    const chain = defaultNormalizers((s) => s.replaceAll("&", " and "));
    expect(normalizeWith(chain, "cats&dogs#1")).toBe("cats and dogs1");
  });

  it("is deterministic and only yields letters, digits and single interior spaces", () => {
    const chain = defaultNormalizers();
    const shape = /^(?:[\p{L}\p{N}]+(?: [\p{L}\p{N}]+)*)?$/u;

    fc.assert(
      fc.property(fc.oneof(fc.string(), fc.string({ unit: "binary" })), (s) => {
        const out = normalizeWith(chain, s);
        expect(normalizeWith(chain, s)).toBe(out);
        expect(out).toMatch(shape);
      }),
    );
  });
});
