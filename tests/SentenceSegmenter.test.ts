import { describe, it, expect } from "vitest";
import { segmentSentences } from "../src/services/SentenceSegmenter";

function texts(input: string): string[] {
  return segmentSentences(input).map((s) => s.text);
}

describe("segmentSentences", () => {
  describe("basic splitting", () => {
    it("should split a simple two-sentence text with offsets", () => {
      expect(segmentSentences("Hello world. Goodbye.")).toEqual([
        { index: 0, start: 0, end: 12, text: "Hello world." },
        { index: 1, start: 13, end: 21, text: "Goodbye." },
      ]);
    });

    it("should keep trailing text without a period", () => {
      expect(texts("Hello world")).toEqual(["Hello world"]);
    });

    it("should return nothing for empty or whitespace input", () => {
      expect(segmentSentences("")).toEqual([]);
      expect(segmentSentences("  \n ")).toEqual([]);
    });
  });

  describe("abbreviations", () => {
    it("should not split on Dr.", () => {
      expect(texts("Dr. Smith went home.")).toEqual(["Dr. Smith went home."]);
    });

    it("should not split on e.g.", () => {
      expect(texts("Use tools, e.g. hammers and saws.")).toEqual(["Use tools, e.g. hammers and saws."]);
    });

    it("should not split on single-letter initials", () => {
      expect(texts("J. K. Rowling wrote books.")).toEqual(["J. K. Rowling wrote books."]);
    });

    it("should split after sentence-final words that double as abbreviations", () => {
      expect(texts("The answer is no. Then we left.")).toEqual(["The answer is no.", "Then we left."]);
      expect(texts("Prices rose. The shop was est. Later it closed.")).toEqual([
        "Prices rose.",
        "The shop was est.",
        "Later it closed.",
      ]);
    });

    it("should keep No. and est. before numbers", () => {
      expect(texts("See item No. 5 for details.")).toEqual(["See item No. 5 for details."]);
      expect(texts("The bakery, est. 1990, is open.")).toEqual(["The bakery, est. 1990, is open."]);
    });
  });

  describe("sentence endings", () => {
    it("should split on exclamation and question marks", () => {
      expect(texts("Wow! That is great. Ready?")).toEqual(["Wow!", "That is great.", "Ready?"]);
    });

    it("should not split on decimal numbers", () => {
      expect(texts("Pi is 3.14 roughly.")).toEqual(["Pi is 3.14 roughly."]);
    });

    it("should split after an ellipsis followed by a capital", () => {
      expect(texts("And then... She left.")).toEqual(["And then...", "She left."]);
    });

    it("should handle a trailing ellipsis", () => {
      expect(texts("And then...")).toEqual(["And then..."]);
    });

    it("should keep closing quotes with their sentence", () => {
      expect(texts('He said "stop." Then left.')).toEqual(['He said "stop."', "Then left."]);
    });

    it("should not split inside a domain name", () => {
      expect(texts("Visit example.com today.")).toEqual(["Visit example.com today."]);
    });
  });
});
