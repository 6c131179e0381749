import { describe, it, expect } from "vitest";
import {
  cosineSimilarity,
  keywordOverlapScore,
  tokenize,
  vectorNorm,
} from "../src/services/RelevanceScorer";

describe("cosineSimilarity", () => {
  it("scores identical, orthogonal and opposite vectors", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([3, 4], [-3, -4])).toBe(-1);
  });

  it("returns 0 for empty, zero or mismatched vectors", () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });
});

describe("vectorNorm", () => {
  it("computes the euclidean norm", () => {
    expect(vectorNorm([3, 4])).toBe(5);
    expect(vectorNorm([])).toBe(0);
  });
});

describe("tokenize", () => {
  it("lowercases, splits on punctuation and drops short tokens", () => {
    expect(tokenize("The Quick-brown fox, 2024! a an")).toEqual(
      new Set(["the", "quick", "brown", "fox", "2024"])
    );
  });

  it("keeps accented letters inside words", () => {
    expect(tokenize("Crème brûlée")).toEqual(new Set(["crème", "brûlée"]));
  });

  it("honours a custom minimum length", () => {
    expect(tokenize("go to the market", 4)).toEqual(new Set(["market"]));
  });
});

describe("keywordOverlapScore", () => {
  it("is the share of content tokens found in the query", () => {
    const query = tokenize("chef quick breakfast");
    expect(keywordOverlapScore(query, tokenize("breakfast breakfast breakfast ideas"))).toBe(0.5);
    expect(keywordOverlapScore(query, tokenize("Tax filing rules apply here"))).toBe(0);
  });

  it("is 0 for empty content", () => {
    expect(keywordOverlapScore(tokenize("breakfast"), new Set())).toBe(0);
  });
});
