import { describe, it, expect } from "vitest";
import { fragment } from "./setup";
import { classifyHeadings } from "../src/services/HeadingClassifier";
import { assembleSections } from "../src/services/SectionAssembler";
import { buildDocumentStructure } from "../src/orchestrator/OutlinePipeline";

describe("assembleSections", () => {
  it("attaches body text to each numbered heading", () => {
    const { sections } = buildDocumentStructure("paper.pdf", [
      fragment("1. Intro", { fontSize: 24, isBold: true, page: 1, yPosition: 50 }),
      fragment("Some text here about X.", { fontSize: 12, page: 1, yPosition: 100 }),
      fragment("2. Methods", { fontSize: 24, isBold: true, page: 2, yPosition: 50 }),
      fragment("More text about Y.", { fontSize: 12, page: 2, yPosition: 100 }),
    ]);

    expect(sections).toEqual([
      {
        documentId: "paper.pdf",
        documentIndex: 0,
        heading: { level: "H1", text: "Intro", page: 1 },
        fullContent: "Some text here about X.",
        page: 1,
      },
      {
        documentId: "paper.pdf",
        documentIndex: 0,
        heading: { level: "H1", text: "Methods", page: 2 },
        fullContent: "More text about Y.",
        page: 2,
      },
    ]);
  });

  it("produces no sections when only a title exists", () => {
    const { outline, sections } = buildDocumentStructure("a.pdf", [
      fragment("Chapter 1", { fontSize: 24, isBold: true, yPosition: 50 }),
      fragment("This is body text.", { fontSize: 12, yPosition: 100 }),
    ]);
    expect(outline.title?.text).toBe("Chapter 1");
    expect(sections).toEqual([]);
  });

  it("lets a higher heading absorb its subsections' body text", () => {
    const outline = classifyHeadings([
      fragment("Guide", { fontSize: 20, isBold: true, yPosition: 10 }),
      fragment("Packing", { fontSize: 16, isBold: true, yPosition: 20 }),
      fragment("Bring layers.", { fontSize: 10, yPosition: 30 }),
      fragment("Shoes", { fontSize: 13, isBold: true, yPosition: 40 }),
      fragment("• Hiking boots", { fontSize: 10, yPosition: 50 }),
      fragment("Food", { fontSize: 16, isBold: true, yPosition: 60 }),
      fragment("Snacks  and\nwater.", { fontSize: 10, yPosition: 70 }),
    ]);
    const sections = assembleSections("guide.pdf", outline, 3);

    expect(sections.map((s) => [s.heading.level, s.heading.text, s.fullContent])).toEqual([
      ["H2", "Packing", "Bring layers. Hiking boots"],
      ["H3", "Shoes", "Hiking boots"],
      ["H2", "Food", "Snacks and water."],
    ]);
    expect(sections.every((s) => s.documentIndex === 3)).toBe(true);
  });

  it("keeps headings without body text", () => {
    const outline = classifyHeadings([
      fragment("Guide", { fontSize: 20, isBold: true, yPosition: 10 }),
      fragment("Empty Part", { fontSize: 16, isBold: true, yPosition: 20 }),
      fragment("Full Part", { fontSize: 16, isBold: true, yPosition: 30 }),
      fragment("Content lives here.", { fontSize: 10, yPosition: 40 }),
    ]);
    const sections = assembleSections("guide.pdf", outline);
    expect(sections.map((s) => s.fullContent)).toEqual(["", "Content lives here."]);
  });
});
