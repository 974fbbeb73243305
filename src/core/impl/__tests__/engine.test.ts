import { describe, expect, it } from "vitest";
import { ContractViolationError, MemorySearchEngine, type RandomSource } from "../../index.js";
import { ArtDocument } from "../../../corpus/artDocument.js";
import { createArtIndex, SEARCH_FIELDS } from "../../../corpus/artIndex.js";
import { createTestLogger } from "../../../logging.js";

function createEngine(docs: ArtDocument[], random?: RandomSource) {
  return new MemorySearchEngine({ index: createArtIndex(docs), fields: SEARCH_FIELDS, random });
}

const petCorpus = () => [new ArtDocument(0, "a happy cat", ["cat.txt"]), new ArtDocument(1, "a happy dog", ["dog.txt"])];

describe("MemorySearchEngine", () => {
  it("returns the only matching document", () => {
    const engine = createEngine(petCorpus());
    for (let i = 0; i < 100; i++) {
      const r = engine.search("cat");
      expect(r?.document.id).toBe(0);
      expect(r?.candidates).toBe(1);
    }
  });

  it("spreads picks evenly over all matches", () => {
    const engine = createEngine(petCorpus());
    const trials = 4000;
    let zeros = 0;
    for (let i = 0; i < trials; i++) {
      const r = engine.search("happy");
      expect(r?.candidates).toBe(2);
      if (r?.document.id === 0) zeros++;
    }
    expect(Math.abs(zeros / trials - 0.5)).toBeLessThan(0.05);
  });

  it("returns nothing for empty or fully stripped queries", () => {
    const engine = createEngine(petCorpus());
    expect(engine.search("")).toBeUndefined();
    expect(engine.search("  !!! ")).toBeUndefined();
    expect(engine.search("zebra")).toBeUndefined();
  });

  it("matches tags and bigrams", () => {
    const engine = createEngine(petCorpus());
    expect(engine.search("cattxt")?.document.id).toBe(0);
    expect(engine.search("happydog")?.document.id).toBe(1);
    expect(engine.search("Cat.TXT")?.document.id).toBe(0);
  });

  it("uses the injected random source", () => {
    // equal keys never replace the first candidate
    const engine = createEngine(petCorpus(), () => 0.5);
    expect(engine.search("happy")?.document.id).toBe(0);
  });

  it("picks the best scoring document in top-score mode", () => {
    const engine = new MemorySearchEngine({
      index: createArtIndex([new ArtDocument(0, "a fox", ["a.txt"]), new ArtDocument(1, "fox fox fox", ["b.txt"])]),
      fields: SEARCH_FIELDS,
      selection: "top-score",
    });

    for (let i = 0; i < 20; i++) {
      const r = engine.search("fox");
      expect(r?.document.id).toBe(1);
      expect(r?.score).toBe(3);
      expect(r?.selection).toBe("top-score");
    }
    expect(engine.search("fox", { selection: "random" })?.selection).toBe("random");
  });

  it("picks any document", () => {
    const engine = createEngine(petCorpus());
    const r = engine.pickAny();
    expect([0, 1]).toContain(r?.document.id);
    expect(r?.candidates).toBe(2);
    expect(createEngine([]).pickAny()).toBeUndefined();
  });

  it("picks documents that have no indexed terms at all", () => {
    const logger = createTestLogger();
    const engine = new MemorySearchEngine({ index: createArtIndex([new ArtDocument(0, "!!!", [])]), fields: SEARCH_FIELDS, logger });
    expect(engine.search("anything")).toBeUndefined();

    const r = engine.pickAny();
    expect(r?.document.id).toBe(0);
    expect(r?.score).toBe(1);
    expect(logger.getLogsByLevel("debug").at(-1)?.context).toEqual({ operation: "matchAll", candidates: 1, selection: "random", docId: 0 });
  });

  it("looks documents up by id", () => {
    const engine = createEngine(petCorpus());
    expect(engine.get(1)?.blob).toBe("a happy dog");
    expect(engine.get(2)).toBeUndefined();
    expect(engine.size()).toBe(2);
  });

  it("rejects a tie breaker outside [0, 1]", () => {
    expect(() => new MemorySearchEngine({ index: createArtIndex(petCorpus()), fields: SEARCH_FIELDS, tieBreaker: 2 })).toThrow(
      ContractViolationError,
    );
  });

  it("logs each evaluation at debug level", () => {
    const logger = createTestLogger();
    const engine = new MemorySearchEngine({ index: createArtIndex(petCorpus()), fields: SEARCH_FIELDS, logger });
    engine.search("cat");

    const [entry] = logger.getLogsByLevel("debug");
    expect(entry?.message).toBe("query evaluated");
    expect(entry?.context).toEqual({ operation: "disMax", candidates: 1, selection: "random", docId: 0 });
  });
});
