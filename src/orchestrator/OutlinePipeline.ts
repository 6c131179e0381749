import type { HeadingPolicy } from "../config/HeadingPolicy";
import { classifyHeadings } from "../services/HeadingClassifier";
import { assembleSections } from "../services/SectionAssembler";
import type { Outline, OutlineEntry, Section, TextFragment } from "../services/outline.types";

/** Single-document result handed to the output assembler */
export interface DocumentOutline {
  title: string | null;
  outline: OutlineEntry[];
}

export interface DocumentStructure {
  outline: Outline;
  sections: Section[];
}

export function toDocumentOutline(outline: Outline): DocumentOutline {
  return {
    title: outline.title?.text ?? null,
    outline: outline.entries.map(({ level, text, page }) => ({ level, text, page })),
  };
}

/**
 * Title and H1–H3 outline of one document.
 */
export function extractOutline(
  fragments: readonly TextFragment[],
  policy: Partial<HeadingPolicy> = {}
): DocumentOutline {
  return toDocumentOutline(classifyHeadings(fragments, policy));
}

/**
 * Outline plus sections of one document. Each document is independent of
 * the others, so collection runs may build these concurrently.
 */
export function buildDocumentStructure(
  documentId: string,
  fragments: readonly TextFragment[],
  documentIndex = 0,
  policy: Partial<HeadingPolicy> = {}
): DocumentStructure {
  const outline = classifyHeadings(fragments, policy);
  return { outline, sections: assembleSections(documentId, outline, documentIndex) };
}
