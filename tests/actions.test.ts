import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ExtractOutlineAction, renderOutline } from "../src/actions/extractOutlineAction";
import { AnalyzeCollectionAction } from "../src/actions/analyzeCollectionAction";
import { extractCollectionPathFromText, extractPdfPathFromText } from "../src/actions/messageArgs";
import { outlineLensPlugin } from "../src/index";
import { createMockRuntime } from "./setup";

// Every PDF reads as the same small field guide
vi.mock("../src/services/PdfFragmentExtractor", () => ({
  PdfFragmentExtractor: class {
    async extract() {
      return [
        { text: "Field Guide", fontSize: 20, isBold: true, page: 1, yPosition: 10, xPosition: 72 },
        { text: "1. Birds", fontSize: 20, isBold: true, page: 1, yPosition: 30, xPosition: 72 },
        { text: "Birds nest in spring near quiet water.", fontSize: 10, isBold: false, page: 1, yPosition: 50, xPosition: 72 },
      ];
    }
  },
}));

function createMessage(text: string, extras: Record<string, unknown> = {}) {
  return {
    content: { text, ...extras },
    entityId: "test-user",
    roomId: "test-room",
  } as any;
}

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "outline-lens-actions-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("message argument helpers", () => {
  it("should find PDF paths", () => {
    expect(extractPdfPathFromText("Give me the outline of ./input/report.pdf")).toBe("./input/report.pdf");
    expect(extractPdfPathFromText('outline "my file.pdf" please')).toBe("my file.pdf");
    expect(extractPdfPathFromText("no file here")).toBeNull();
  });

  it("should find collection directories", () => {
    expect(extractCollectionPathFromText("Analyze the collection in ./input/Collection 1")).toBe("./input/Collection 1");
    expect(extractCollectionPathFromText('Rank sections in "/data/My Collection 2"')).toBe("/data/My Collection 2");
    expect(extractCollectionPathFromText("analyze Collection_3.")).toBe("Collection_3");
  });
});

describe("plugin", () => {
  it("should register both actions", () => {
    expect(outlineLensPlugin.name).toBe("plugin-outline-lens");
    expect(outlineLensPlugin.actions?.map((a) => a.name)).toEqual([
      "EXTRACT_PDF_OUTLINE",
      "ANALYZE_DOCUMENT_COLLECTION",
    ]);
  });
});

describe("ExtractOutlineAction", () => {
  const runtime = createMockRuntime();

  describe("validate", () => {
    it("should match an outline request naming a PDF", async () => {
      expect(await ExtractOutlineAction.validate(runtime as any, createMessage("Give me the outline of ./input/report.pdf"))).toBe(true);
    });

    it("should match a structured filePath", async () => {
      expect(await ExtractOutlineAction.validate(runtime as any, createMessage("", { filePath: "a.pdf" }))).toBe(true);
    });

    it("should not match small talk", async () => {
      expect(await ExtractOutlineAction.validate(runtime as any, createMessage("hello there"))).toBe(false);
    });
  });

  describe("handler", () => {
    it("should return the outline of a readable PDF", async () => {
      const filePath = join(root, "guide.pdf");
      await writeFile(filePath, "%PDF-stand-in");
      const callback = vi.fn();

      const result = await ExtractOutlineAction.handler(
        runtime as any,
        createMessage("outline please", { filePath }),
        undefined,
        undefined,
        callback
      );

      expect(result).toEqual({
        success: true,
        text: "Title: Field Guide\n- [H1] Birds (p. 1)",
        data: { filePath, title: "Field Guide", outline: [{ level: "H1", text: "Birds", page: 1 }] },
      });
      expect(callback).toHaveBeenCalledWith({
        text: "Title: Field Guide\n- [H1] Birds (p. 1)",
        action: "EXTRACT_PDF_OUTLINE",
      });
    });

    it("should report an unreadable file", async () => {
      const filePath = join(root, "missing.pdf");
      const result = await ExtractOutlineAction.handler(
        runtime as any,
        createMessage("outline please", { filePath }),
        undefined,
        undefined,
        undefined
      );

      expect(result).toMatchObject({ success: false, text: `I could not read ${filePath} as a PDF.` });
    });

    it("should ask for a path when none is given", async () => {
      const result = await ExtractOutlineAction.handler(
        runtime as any,
        createMessage("give me an outline"),
        undefined,
        undefined,
        undefined
      );

      expect(result).toEqual({ success: false, text: "Which PDF should I outline? Please give me its path." });
    });
  });

  it("should indent lower levels", () => {
    expect(
      renderOutline({
        title: null,
        outline: [
          { level: "H1", text: "A", page: 1 },
          { level: "H3", text: "B", page: 2 },
        ],
      })
    ).toBe("Title: (none)\n- [H1] A (p. 1)\n    - [H3] B (p. 2)");
  });
});

describe("AnalyzeCollectionAction", () => {
  async function writeCollection(): Promise<string> {
    const dir = join(root, "Collection 1");
    await mkdir(join(dir, "PDFs"), { recursive: true });
    await writeFile(
      join(dir, "challenge1b_input.json"),
      JSON.stringify({
        documents: [{ filename: "guide.pdf" }],
        persona: { role: "Birdwatcher" },
        job_to_be_done: { task: "find nesting birds" },
      })
    );
    await writeFile(join(dir, "PDFs", "guide.pdf"), "%PDF-stand-in");
    return dir;
  }

  describe("validate", () => {
    const runtime = createMockRuntime();

    it("should match a collection analysis request", async () => {
      expect(
        await AnalyzeCollectionAction.validate(runtime as any, createMessage("Analyze the collection in ./input/Collection 1"))
      ).toBe(true);
    });

    it("should not match unrelated requests", async () => {
      expect(await AnalyzeCollectionAction.validate(runtime as any, createMessage("rank my day"))).toBe(false);
    });
  });

  describe("handler", () => {
    it("should rank sections by keywords when embeddings are off", async () => {
      const collectionPath = await writeCollection();
      const runtime = createMockRuntime({
        getSetting: vi.fn((key: string) => (key === "OUTLINE_LENS_EMBEDDINGS" ? "off" : undefined)),
      });

      const result = await AnalyzeCollectionAction.handler(
        runtime as any,
        createMessage("analyze", { collectionPath }),
        undefined,
        undefined,
        undefined
      );

      expect(result).toMatchObject({
        success: true,
        text:
          'Most relevant sections for "Birdwatcher" (task: find nesting birds), keyword scoring over 1 document(s):\n' +
          "1. Birds (guide.pdf, p. 1)",
      });
      expect(runtime.useModel).not.toHaveBeenCalled();
    });

    it("should embed through the runtime and honour persona overrides", async () => {
      const collectionPath = await writeCollection();
      const runtime = createMockRuntime({ useModel: vi.fn().mockResolvedValue([1, 0]) });

      const result = await AnalyzeCollectionAction.handler(
        runtime as any,
        createMessage("analyze", { collectionPath, persona: "Ornithologist" }),
        undefined,
        undefined,
        undefined
      );

      expect(result).toMatchObject({
        success: true,
        data: {
          metadata: { persona: "Ornithologist", scoring_mode: "vector", input_documents: ["guide.pdf"] },
        },
      });
      expect(runtime.useModel).toHaveBeenCalledWith("TEXT_EMBEDDING", { text: "find nesting birds" });
    });

    it("should report a missing collection", async () => {
      const runtime = createMockRuntime();
      const callback = vi.fn();

      const result = await AnalyzeCollectionAction.handler(
        runtime as any,
        createMessage("analyze", { collectionPath: join(root, "Collection 9") }),
        undefined,
        undefined,
        callback
      );

      expect((result as any).success).toBe(false);
      expect((result as any).text).toMatch(/^Collection analysis failed: Failed to read /);
      expect(callback).toHaveBeenCalledTimes(1);
    });
  });
});
