/**
 * TextCleaner — one cleaning function shared by heading text, section
 * content and refined text, so all outputs agree.
 */

/** Bullet glyphs that may hug the text (no space required) */
const BULLET_GLYPH = /^[•●▪◦‣■□➢➤►]\s*/;

/** ASCII bullets and enumerations need trailing whitespace: "- item", "1. item", "(a) item" */
const SPACED_MARKER = /^(?:[*\-–—]|\d{1,3}[.)]|\(\d{1,3}\)|[a-zA-Z][)]|\([a-zA-Z]\))\s+/;

/** Enumerated list markers: "1.", "2)", "(3)" followed by whitespace */
export const ENUMERATED_MARKER = /^(?:\d{1,3}[.)]|\(\d{1,3}\))\s+/;

/** Bullet markers, at any font size */
export const BULLET_MARKER = /^(?:[•●▪◦‣■□➢➤►]|[*\-–—]\s)/;

/** Numeric section prefix: "1 Scope", "1. Intro", "2.3 Results", "4.1.2 Data" */
export const SECTION_NUMBER_PREFIX = /^\d{1,3}(?:\.\d{1,3})*\.?\s+\S/;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Strip one leading list marker, collapse whitespace runs, trim.
 */
export function cleanText(text: string): string {
  const collapsed = collapseWhitespace(text);
  const stripped = collapsed.replace(BULLET_GLYPH, "").replace(SPACED_MARKER, "");
  return stripped.trim();
}

export function startsWithListMarker(text: string): boolean {
  const t = text.trimStart();
  return BULLET_MARKER.test(t) || ENUMERATED_MARKER.test(t);
}

export function countWords(text: string): number {
  const t = text.trim();
  if (!t) return 0;
  return t.split(/\s+/).length;
}
