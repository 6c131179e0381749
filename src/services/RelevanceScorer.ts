/**
 * Similarity primitives shared by the ranker and the condenser.
 */

import { DEFAULT_RELEVANCE_POLICY } from "../config/RelevancePolicy";

/** How relevance is computed for a whole run */
export type ScoringMode = "vector" | "keyword";

/**
 * Cosine similarity in [-1, 1]. A zero vector (or mismatched lengths)
 * scores 0 instead of failing.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;

  const cos = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Float error can push |cos| a hair past 1
  return Math.max(-1, Math.min(1, cos));
}

export function vectorNorm(v: readonly number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

/**
 * Lowercase word set, split on anything that is not a letter or digit,
 * keeping tokens of at least `minLength` characters.
 */
export function tokenize(
  text: string,
  minLength: number = DEFAULT_RELEVANCE_POLICY.minTokenLength
): Set<string> {
  const tokens = new Set<string>();
  for (const word of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (word.length >= minLength) tokens.add(word);
  }
  return tokens;
}

/**
 * |query ∩ content| / max(1, |content|), always in [0, 1].
 */
export function keywordOverlapScore(queryTokens: ReadonlySet<string>, contentTokens: ReadonlySet<string>): number {
  if (contentTokens.size === 0) return 0;
  let matches = 0;
  for (const token of contentTokens) {
    if (queryTokens.has(token)) matches++;
  }
  return matches / Math.max(1, contentTokens.size);
}
