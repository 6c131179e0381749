/**
 * Condenser — pick the 1–3 sentences of a top-ranked section that best
 * support the task, and return them in document order.
 */

import { resolveRelevancePolicy, type RelevancePolicy } from "../config/RelevancePolicy";
import type { Scoring } from "./RelevanceRanker";
import { cosineSimilarity, keywordOverlapScore, tokenize } from "./RelevanceScorer";
import { segmentSentences, type SentenceSpan } from "./SentenceSegmenter";
import { cleanText } from "./TextCleaner";
import type { RefinedSnippet, ScoredSection } from "./outline.types";

interface ScoredSentence {
  sentence: SentenceSpan;
  score: number;
}

async function scoreSentences(
  sentences: readonly SentenceSpan[],
  task: string,
  scoring: Scoring,
  policy: RelevancePolicy
): Promise<ScoredSentence[]> {
  if (scoring.mode === "vector") {
    const taskVec = await scoring.session.vector(task);
    const scored: ScoredSentence[] = [];
    for (const sentence of sentences) {
      const vec = await scoring.session.vector(sentence.text);
      scored.push({ sentence, score: cosineSimilarity(vec, taskVec) });
    }
    return scored;
  }

  const taskTokens = tokenize(task, policy.minTokenLength);
  return sentences.map((sentence) => ({
    sentence,
    score: keywordOverlapScore(taskTokens, tokenize(sentence.text, policy.minTokenLength)),
  }));
}

/**
 * Select sentences: up to maxSentences above the floor (best first, ties
 * in original order), else the single best one. Returned in text order.
 */
export function selectSentences(
  scored: readonly ScoredSentence[],
  floor: number,
  maxSentences: number
): SentenceSpan[] {
  if (scored.length === 0) return [];

  const byScore = [...scored].sort((a, b) => b.score - a.score || a.sentence.index - b.sentence.index);
  let chosen = byScore.filter((s) => s.score > floor).slice(0, maxSentences);
  if (chosen.length === 0) chosen = byScore.slice(0, 1);

  return chosen
    .map((s) => s.sentence)
    .sort((a, b) => a.index - b.index);
}

/**
 * Refined text for one section. Never empty for non-empty content.
 */
export async function refineContent(
  content: string,
  task: string,
  scoring: Scoring,
  policyOverrides: Partial<RelevancePolicy> = {}
): Promise<string> {
  const policy = resolveRelevancePolicy(policyOverrides);
  const fallback = cleanText(content);
  if (!fallback) return "";

  const all = segmentSentences(content);
  const long = all.filter((s) => s.text.length >= policy.minSentenceChars);
  const candidates = long.length > 0 ? long : all;

  const floor = scoring.mode === "vector" ? policy.vectorSentenceFloor : policy.keywordSentenceFloor;
  const scored = await scoreSentences(candidates, task, scoring, policy);
  const selected = selectSentences(scored, floor, policy.maxSentences);

  const refined = selected
    .map((s) => cleanText(s.text))
    .filter((text) => text.length > 0)
    .join(" ");
  return refined || fallback;
}

/**
 * Refined snippets for the first topK ranked sections that have content.
 * Empty sections never take a slot.
 */
export async function condenseSections(
  ranked: readonly ScoredSection[],
  task: string,
  scoring: Scoring,
  policyOverrides: Partial<RelevancePolicy> = {}
): Promise<RefinedSnippet[]> {
  const policy = resolveRelevancePolicy(policyOverrides);
  const snippets: RefinedSnippet[] = [];

  const withContent = ranked.filter((section) => section.fullContent.trim().length > 0);

  for (const section of withContent.slice(0, policy.topK)) {
    const refinedText = await refineContent(section.fullContent, task, scoring, policy);
    snippets.push({
      documentId: section.documentId,
      sectionTitle: section.heading.text,
      importanceRank: section.importanceRank,
      refinedText,
      page: section.page,
    });
  }

  return snippets;
}
