/**
 * PdfFragmentExtractor — PDF → TextFragment[] via unpdf.
 *
 * Text items that share a baseline, size and weight are merged into one
 * fragment, so a heading split into several runs by the PDF producer comes
 * out whole. Coordinates are flipped to top-down.
 */

import { getDocumentProxy } from "unpdf";
import { EXTRACTOR_DEFAULTS } from "../config/constants";
import { OutlineLensParseError, toError } from "../errors";
import { createLogger } from "../utils/logger";
import { collapseWhitespace } from "./TextCleaner";
import type { TextFragment } from "./outline.types";

const log = createLogger({ component: "PdfFragmentExtractor" });

// ---- Minimal pdf.js surface types, so tests can feed plain objects

export interface PdfTextContentLike {
  items: readonly unknown[];
  styles?: unknown;
}

export interface PdfFontObjectsLike {
  has?(id: string): boolean;
  get(id: string): unknown;
}

export interface PdfPageLike {
  getViewport(params: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<PdfTextContentLike>;
  getOperatorList?(): Promise<unknown>;
  commonObjs?: PdfFontObjectsLike;
}

export interface PdfDocLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
}

/** One positioned text run, before line merging */
export interface PositionedRun {
  text: string;
  x: number;
  y: number;          // top-down baseline
  width: number;
  fontSize: number;
  isBold: boolean;
}

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function roundSize(size: number): number {
  const f = 10 ** EXTRACTOR_DEFAULTS.FONT_SIZE_DECIMALS;
  return Math.round(size * f) / f;
}

function readString(obj: unknown, key: string): string | undefined {
  if (typeof obj !== "object" || obj === null) return undefined;
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

export function isBoldFontName(name: string | undefined): boolean {
  return name !== undefined && EXTRACTOR_DEFAULTS.BOLD_FONT_PATTERN.test(name);
}

/**
 * Convert raw text content items into positioned runs. `fontNameOf` maps
 * pdf.js's internal font id to the real font name when it is known.
 */
export function toPositionedRuns(
  items: readonly unknown[],
  pageHeight: number,
  fontNameOf: (fontId: string) => string | undefined
): PositionedRun[] {
  const runs: PositionedRun[] = [];

  for (const item of items) {
    const str = readString(item, "str");
    if (str === undefined || !str.trim()) continue;

    const transform: unknown = typeof item === "object" && item !== null ? Reflect.get(item, "transform") : undefined;
    const tr = Array.isArray(transform) ? transform : [];
    const [a, b, c, d, e, f] = [asNum(tr[0]), asNum(tr[1]), asNum(tr[2]), asNum(tr[3]), asNum(tr[4]), asNum(tr[5])];

    const fontSize = roundSize(Math.max(Math.hypot(a, b), Math.hypot(c, d)));
    if (!(fontSize > 0)) continue;

    const fontId = readString(item, "fontName");
    const fontName = fontId !== undefined ? fontNameOf(fontId) ?? fontId : undefined;
    const width = typeof item === "object" && item !== null ? asNum(Reflect.get(item, "width")) : 0;

    runs.push({
      text: str,
      x: e,
      y: pageHeight - f,
      width,
      fontSize,
      isBold: isBoldFontName(fontName),
    });
  }

  return runs;
}

/**
 * Merge consecutive runs on the same line with the same size and weight.
 */
export function mergeRuns(runs: readonly PositionedRun[], page: number): TextFragment[] {
  const fragments: TextFragment[] = [];
  let current: { text: string; run: PositionedRun; endX: number } | null = null;

  const flush = () => {
    if (!current) return;
    const text = collapseWhitespace(current.text);
    if (text) {
      fragments.push({
        text,
        fontSize: current.run.fontSize,
        isBold: current.run.isBold,
        page,
        yPosition: current.run.y,
        xPosition: current.run.x,
      });
    }
    current = null;
  };

  for (const run of runs) {
    if (current !== null) {
      const tolerance = current.run.fontSize * EXTRACTOR_DEFAULTS.LINE_Y_TOLERANCE_RATIO;
      const sameLine = Math.abs(run.y - current.run.y) <= tolerance;
      const sameStyle = run.fontSize === current.run.fontSize && run.isBold === current.run.isBold;
      if (sameLine && sameStyle && run.x >= current.endX - tolerance) {
        const gap = run.x - current.endX;
        const needsSpace = gap > run.fontSize * 0.2 && !current.text.endsWith(" ") && !run.text.startsWith(" ");
        current.text += (needsSpace ? " " : "") + run.text;
        current.endX = run.x + run.width;
        continue;
      }
      flush();
    }
    current = { text: run.text, run, endX: run.x + run.width };
  }
  flush();

  return fragments;
}

async function extractPage(page: PdfPageLike, pageNumber: number): Promise<TextFragment[]> {
  const viewport = page.getViewport({ scale: 1 });
  const content = await page.getTextContent();

  // Fonts resolve into commonObjs once the operator list has been built
  const fonts = page.commonObjs;
  if (fonts && page.getOperatorList) {
    await page.getOperatorList();
  }

  const styles = content.styles;
  const fontNameOf = (fontId: string): string | undefined => {
    if (fonts && (!fonts.has || fonts.has(fontId))) {
      try {
        const name = readString(fonts.get(fontId), "name");
        if (name) return name;
      } catch (err) {
        log.debug("Font object not resolved", { pageNumber, fontId, reason: toError(err).message });
      }
    }
    const style: unknown = typeof styles === "object" && styles !== null ? Reflect.get(styles, fontId) : undefined;
    return readString(style, "fontFamily");
  };

  const runs = toPositionedRuns(content.items, asNum(viewport.height, 0), fontNameOf);
  return mergeRuns(runs, pageNumber);
}

/**
 * Read every page of an opened document. A failing page is logged and
 * contributes no fragments.
 */
export async function extractFragmentsFromDocument(
  doc: PdfDocLike,
  documentId = "document"
): Promise<TextFragment[]> {
  const totalPages = Math.min(doc.numPages, EXTRACTOR_DEFAULTS.MAX_PAGES);
  const fragments: TextFragment[] = [];

  for (let pageNumber = 1; pageNumber <= totalPages; pageNumber++) {
    try {
      const page = await doc.getPage(pageNumber);
      fragments.push(...(await extractPage(page, pageNumber)));
    } catch (err) {
      log.warn("Failed to extract page", { documentId, pageNumber }, err);
    }
  }

  return fragments;
}

/** An opened document that holds worker resources until destroyed */
export interface PdfDocHandle extends PdfDocLike {
  destroy(): Promise<void>;
}

export type PdfOpener = (data: Uint8Array) => Promise<PdfDocHandle>;

export class PdfFragmentExtractor {
  constructor(private readonly open: PdfOpener = getDocumentProxy) {}

  /**
   * Throws OutlineLensParseError when the bytes are not a readable PDF.
   */
  async extract(buffer: Buffer | Uint8Array, documentId = "document"): Promise<TextFragment[]> {
    const data = new Uint8Array(buffer);
    let doc: PdfDocHandle;
    try {
      doc = await this.open(data);
    } catch (err) {
      throw OutlineLensParseError.unreadable(documentId, toError(err));
    }

    try {
      const fragments = await extractFragmentsFromDocument(doc, documentId);
      log.debug("Extracted fragments", { documentId, pages: doc.numPages, fragments: fragments.length });
      return fragments;
    } finally {
      await doc.destroy();
    }
  }
}
