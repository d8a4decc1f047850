import { describe, expect, it } from "vitest";
import { InMemoryMethodologyStore, rankMethodologies, similarity, tokenize } from "./store.js";

describe("tokenize", () => {
  it("lowercases words and drops one-character tokens", () => {
    expect([...tokenize("Fix a Parser-bug in src/index.ts")]).toEqual(["fix", "parser", "bug", "in", "src", "index", "ts"]);
  });
});

describe("similarity", () => {
  it("is the share of common tokens", () => {
    expect(similarity("fix parser tests", "fix lexer tests")).toBe(0.5);
  });

  it("is zero when either text has no tokens", () => {
    expect(similarity("", "fix parser")).toBe(0);
  });
});

describe("rankMethodologies", () => {
  const entries = [
    { problem: "add a cli flag", methodology: "A" },
    { problem: "fix parser tests", methodology: "B" },
    { problem: "fix parser tests on windows", methodology: "C" },
    { problem: "write docs", methodology: "D" },
  ];

  it("orders by similarity and drops unrelated entries", () => {
    const ranked = rankMethodologies("fix the parser tests", entries);

    expect(ranked.map((match) => match.methodology)).toEqual(["B", "C"]);
    expect(ranked[0]?.score).toBe(0.75);
  });

  it("honors the limit", () => {
    expect(rankMethodologies("fix the parser tests", entries, 1)).toHaveLength(1);
  });
});

describe("InMemoryMethodologyStore", () => {
  it("replaces a write-up for the same problem", async () => {
    const store = new InMemoryMethodologyStore([{ problem: "fix parser", methodology: "old" }]);
    await store.add("fix parser", "new");

    expect(await store.find("fix parser")).toEqual([{ problem: "fix parser", methodology: "new", score: 1 }]);
  });
});
