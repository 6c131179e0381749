import { OutlineLensValidationError } from "../errors";

/**
 * Tunable heading heuristics. Ratios are fractions of the document's
 * largest font size, so classification does not depend on absolute sizes.
 */
export interface HeadingPolicy {
  /** size >= h1Ratio * max → H1 (top band) */
  h1Ratio: number;
  h2Ratio: number;
  h3Ratio: number;
  /** A heading must have fewer cleaned words than this */
  maxHeadingWords: number;
  /** Cleaned heading text shorter than this is ignored */
  minHeadingChars: number;
}

export const DEFAULT_HEADING_POLICY: Readonly<HeadingPolicy> = {
  h1Ratio: 0.9,
  h2Ratio: 0.75,
  h3Ratio: 0.6,
  maxHeadingWords: 20,
  minHeadingChars: 3,
};

function assertRatio(field: keyof HeadingPolicy, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw OutlineLensValidationError.invalidPolicy(field, "must be in (0, 1]", value);
  }
}

function assertPositiveInteger(field: keyof HeadingPolicy, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw OutlineLensValidationError.invalidPolicy(field, "must be a positive integer", value);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Tier ratios must be strictly descending.
 */
export function resolveHeadingPolicy(overrides: Partial<HeadingPolicy> = {}): HeadingPolicy {
  const policy: HeadingPolicy = { ...DEFAULT_HEADING_POLICY, ...overrides };

  assertRatio("h1Ratio", policy.h1Ratio);
  assertRatio("h2Ratio", policy.h2Ratio);
  assertRatio("h3Ratio", policy.h3Ratio);
  if (!(policy.h1Ratio > policy.h2Ratio && policy.h2Ratio > policy.h3Ratio)) {
    throw OutlineLensValidationError.invalidPolicy(
      "h2Ratio",
      "tier ratios must satisfy h1Ratio > h2Ratio > h3Ratio",
      [policy.h1Ratio, policy.h2Ratio, policy.h3Ratio]
    );
  }
  assertPositiveInteger("maxHeadingWords", policy.maxHeadingWords);
  assertPositiveInteger("minHeadingChars", policy.minHeadingChars);

  return policy;
}
