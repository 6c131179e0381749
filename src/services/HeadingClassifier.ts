/**
 * HeadingClassifier — title + H1/H2/H3 outline from font/position fragments.
 *
 * Thresholds are fractions of the document's largest font size, so the
 * result does not change when every size is scaled by the same factor.
 * Stateless: every call takes its policy as an argument.
 */

import { resolveHeadingPolicy, type HeadingPolicy } from "../config/HeadingPolicy";
import { createLogger } from "../utils/logger";
import {
  BULLET_MARKER,
  ENUMERATED_MARKER,
  SECTION_NUMBER_PREFIX,
  cleanText,
  countWords,
  startsWithListMarker,
} from "./TextCleaner";
import type {
  HeadingLevel,
  HeadingTier,
  LocatedOutlineEntry,
  Outline,
  OutlineTitle,
  TextFragment,
} from "./outline.types";

const log = createLogger({ component: "HeadingClassifier" });

/** Relative slack on band boundaries so float scaling cannot flip a tier */
const BAND_EPSILON = 1e-9;

const TERMINAL_PUNCTUATION = /[.;:]$/;
const HAS_LETTER = /\p{L}/u;

export const TIER_RANK: Record<HeadingTier, number> = { H1: 1, H2: 2, H3: 3 };

export interface TierBands {
  maxFontSize: number;
  /** Size carrying the most characters */
  bodyFontSize: number;
  h1: number;
  h2: number;
  h3: number;
}

interface Candidate {
  fragmentIndex: number;
  fragment: TextFragment;
  tier: HeadingTier;
  text: string;
  numbered: boolean;
}

/**
 * Stable sort into reading order: page ascending, then top to bottom.
 */
export function toReadingOrder(fragments: readonly TextFragment[]): TextFragment[] {
  return fragments
    .map((fragment, index) => ({ fragment, index }))
    .sort((a, b) =>
      a.fragment.page - b.fragment.page ||
      a.fragment.yPosition - b.fragment.yPosition ||
      a.index - b.index
    )
    .map(({ fragment }) => fragment);
}

export function computeTierBands(fragments: readonly TextFragment[], policy: HeadingPolicy): TierBands {
  let maxFontSize = 0;
  const charsBySize = new Map<number, number>();
  for (const f of fragments) {
    if (!Number.isFinite(f.fontSize)) continue;
    if (f.fontSize > maxFontSize) maxFontSize = f.fontSize;
    charsBySize.set(f.fontSize, (charsBySize.get(f.fontSize) ?? 0) + f.text.trim().length);
  }

  let bodyFontSize = 0;
  let bodyChars = -1;
  for (const [size, chars] of charsBySize) {
    if (chars > bodyChars || (chars === bodyChars && size < bodyFontSize)) {
      bodyFontSize = size;
      bodyChars = chars;
    }
  }

  return {
    maxFontSize,
    bodyFontSize,
    h1: maxFontSize * policy.h1Ratio,
    h2: maxFontSize * policy.h2Ratio,
    h3: maxFontSize * policy.h3Ratio,
  };
}

function atLeast(size: number, threshold: number): boolean {
  return size >= threshold * (1 - BAND_EPSILON);
}

/** Font-size band of a fragment; BODY when below every tier */
export function tierFor(fontSize: number, bands: TierBands): HeadingTier | "BODY" {
  if (bands.maxFontSize <= 0) return "BODY";
  if (atLeast(fontSize, bands.h1)) return "H1";
  if (atLeast(fontSize, bands.h2)) return "H2";
  if (atLeast(fontSize, bands.h3)) return "H3";
  return "BODY";
}

/**
 * Decide whether a fragment is a heading candidate; returns its cleaned
 * text and tier, or null for body text.
 */
function toCandidate(
  fragment: TextFragment,
  fragmentIndex: number,
  bands: TierBands,
  policy: HeadingPolicy
): Candidate | null {
  const tier = tierFor(fragment.fontSize, bands);
  if (tier === "BODY") return null;

  // Plain weight only counts in the top band, and only when larger than body text
  if (!fragment.isBold && (tier !== "H1" || fragment.fontSize <= bands.bodyFontSize)) return null;

  const raw = fragment.text.trim();

  // Bullets are list items at any size
  if (BULLET_MARKER.test(raw)) return null;
  // "1. Intro" in the top band is section numbering; below it, a list item
  if (ENUMERATED_MARKER.test(raw) && tier !== "H1") return null;

  const text = cleanText(raw);
  // "1. - Scope" keeps a marker after the numbering is stripped
  if (startsWithListMarker(text)) return null;
  if (text.length < policy.minHeadingChars || !HAS_LETTER.test(text)) return null;
  if (countWords(text) >= policy.maxHeadingWords) return null;

  const numbered = SECTION_NUMBER_PREFIX.test(raw);
  if (TERMINAL_PUNCTUATION.test(text) && !numbered) return null;

  return { fragmentIndex, fragment, tier, text, numbered };
}

function pickTitle(candidates: readonly Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const c of candidates) {
    if (c.fragment.page !== 1 || c.numbered) continue;
    if (
      best === null ||
      c.fragment.fontSize > best.fragment.fontSize ||
      (c.fragment.fontSize === best.fragment.fontSize && c.fragment.yPosition < best.fragment.yPosition)
    ) {
      best = c;
    }
  }
  return best;
}

/**
 * Classify a single fragment in isolation against precomputed bands.
 * TITLE is never returned here; title selection needs the whole document.
 */
export function classifyFragment(
  fragment: TextFragment,
  bands: TierBands,
  policy: HeadingPolicy
): HeadingLevel {
  return toCandidate(fragment, 0, bands, policy)?.tier ?? "BODY";
}

/**
 * Build the outline of one document.
 *
 * Empty input, or input without candidates, yields an empty outline and no
 * title; that is a normal outcome, not an error.
 */
export function classifyHeadings(
  fragments: readonly TextFragment[],
  policyOverrides: Partial<HeadingPolicy> = {}
): Outline {
  const policy = resolveHeadingPolicy(policyOverrides);
  const ordered = toReadingOrder(fragments);
  const bands = computeTierBands(ordered, policy);

  if (ordered.length === 0 || bands.maxFontSize <= 0) {
    return { title: null, entries: [], fragments: ordered };
  }

  log.debug("Computed heading bands", {
    maxFontSize: bands.maxFontSize,
    bodyFontSize: bands.bodyFontSize,
    h1: bands.h1,
    h2: bands.h2,
    h3: bands.h3,
  });

  const candidates: Candidate[] = [];
  ordered.forEach((fragment, index) => {
    const candidate = toCandidate(fragment, index, bands, policy);
    if (candidate) candidates.push(candidate);
  });

  const titleCandidate = pickTitle(candidates);
  const title: OutlineTitle | null = titleCandidate
    ? { text: titleCandidate.text, page: titleCandidate.fragment.page, fragmentIndex: titleCandidate.fragmentIndex }
    : null;

  const entries: LocatedOutlineEntry[] = candidates
    .filter((c) => c !== titleCandidate)
    .map((c) => ({ level: c.tier, text: c.text, page: c.fragment.page, fragmentIndex: c.fragmentIndex }));

  return { title, entries, fragments: ordered };
}
