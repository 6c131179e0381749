import { describe, it, expect } from "vitest";
import { formatCollectionOutput, formatOutlineOutput } from "../src/integration/outputFormat";
import type { CollectionResult } from "../src/orchestrator/CollectionPipeline";

describe("formatOutlineOutput", () => {
  it("keeps title and level/text/page per entry", () => {
    expect(
      formatOutlineOutput({
        title: null,
        outline: [{ level: "H1", text: "Intro", page: 1 }],
      })
    ).toEqual({ title: null, outline: [{ level: "H1", text: "Intro", page: 1 }] });
  });
});

describe("formatCollectionOutput", () => {
  const result: CollectionResult = {
    persona: "Travel Planner",
    task: "Plan a trip of 4 days",
    processedDocuments: ["south.pdf"],
    skippedDocuments: [],
    titles: { "south.pdf": "South of France" },
    mode: "keyword",
    sections: [
      {
        documentId: "south.pdf",
        documentIndex: 0,
        heading: { level: "H1", text: "Coastal Adventures", page: 2 },
        fullContent: "Beaches line the coast.",
        page: 2,
        relevanceScore: 0.25,
        importanceRank: 1,
      },
    ],
    refined: [
      {
        documentId: "south.pdf",
        sectionTitle: "Coastal Adventures",
        importanceRank: 1,
        refinedText: "Beaches line the coast.",
        page: 2,
      },
    ],
    processedAt: "2026-01-02T03:04:05.000Z",
  };

  it("produces the collection output document", () => {
    expect(formatCollectionOutput(result)).toEqual({
      metadata: {
        input_documents: ["south.pdf"],
        persona: "Travel Planner",
        job_to_be_done: "Plan a trip of 4 days",
        processing_timestamp: "2026-01-02T03:04:05.000Z",
        scoring_mode: "keyword",
      },
      extracted_sections: [
        { document: "south.pdf", section_title: "Coastal Adventures", importance_rank: 1, page_number: 2 },
      ],
      subsection_analysis: [
        { document: "south.pdf", refined_text: "Beaches line the coast.", page_number: 2 },
      ],
    });
  });

  it("lists skipped documents only when there are some", () => {
    const output = formatCollectionOutput({ ...result, skippedDocuments: ["missing.pdf"] });
    expect(output.metadata.skipped_documents).toEqual(["missing.pdf"]);
  });
});
