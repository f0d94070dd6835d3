import { describe, expect, it } from "vitest";
import { KeywordCorpusIndex, tokenize } from "../../corpus/keywordIndex";
import { RetrievalError } from "../../errors";
import type { Passage } from "../../types";

const PASSAGES: Passage[] = [
  { id: "cover", content: "Half cover adds two to Armor Class.", source: "Dungeon Master's Guide" },
  { id: "slots", content: "Spell slots recover on a long rest.", source: "Player's Handbook" },
  { id: "rest", content: "A long rest lasts eight hours.", source: "Basic Rules" },
  { id: "concentration", content: "Concentration spell ends when you cast another.", source: "Basic Rules" }
];

describe("tokenize", () => {
  it("lower-cases, splits on punctuation and drops stop words", () => {
    expect(tokenize("What is the Grapple rule, exactly?")).toEqual(["grapple", "rule", "exactly"]);
    expect(tokenize("d20 + STR")).toEqual(["d20", "str"]);
  });
});

describe("KeywordCorpusIndex", () => {
  it("ranks by the share of question terms found", () => {
    const index = new KeywordCorpusIndex(PASSAGES);

    const ranked = index.rank("How do spell slots recover?");

    expect(ranked.map((passage) => [passage.id, passage.score])).toEqual([
      ["slots", 1],
      ["concentration", 1 / 3]
    ]);
  });

  it("keeps corpus order for equal scores", () => {
    const index = new KeywordCorpusIndex(PASSAGES);

    expect(index.rank("long rest").map((passage) => passage.id)).toEqual(["slots", "rest"]);
  });

  it("matches on the source label too", () => {
    const index = new KeywordCorpusIndex(PASSAGES);

    expect(index.rank("guide").map((passage) => passage.id)).toEqual(["cover"]);
  });

  it("limits search results and strips scores", async () => {
    const index = new KeywordCorpusIndex(PASSAGES, 1);

    await expect(index.search("long rest")).resolves.toEqual([PASSAGES[1]]);
    await expect(index.search("long rest", { limit: 5 })).resolves.toEqual([PASSAGES[1], PASSAGES[2]]);
  });

  it("returns nothing for a question made only of stop words", async () => {
    const index = new KeywordCorpusIndex(PASSAGES);

    await expect(index.search("what is it?")).resolves.toEqual([]);
  });

  it("fails on an empty corpus", async () => {
    const index = new KeywordCorpusIndex([]);

    expect(index.size).toBe(0);
    await expect(index.search("anything")).rejects.toThrow(RetrievalError);
  });
});
