/**
 * RelevanceRanker — score every section of a collection against the
 * persona/task query and assign collection-wide importance ranks.
 */

import { resolveRelevancePolicy, type RelevancePolicy } from "../config/RelevancePolicy";
import type { EmbeddingSession } from "./EmbeddingSession";
import {
  cosineSimilarity,
  keywordOverlapScore,
  tokenize,
  type ScoringMode,
} from "./RelevanceScorer";
import type { RelevanceQuery, ScoredSection, Section } from "./outline.types";

/**
 * Scoring strategy for one run. The mode is chosen once by the caller and
 * passed explicitly to both the ranker and the condenser.
 */
export type Scoring =
  | { mode: Extract<ScoringMode, "vector">; session: EmbeddingSession }
  | { mode: Extract<ScoringMode, "keyword"> };

export const KEYWORD_SCORING: Scoring = { mode: "keyword" };

async function scoreWithVectors(
  sections: readonly Section[],
  query: RelevanceQuery,
  session: EmbeddingSession,
  policy: RelevancePolicy
): Promise<number[]> {
  const taskVec = await session.vector(query.task);
  const personaVec = await session.vector(query.persona);

  const scores: number[] = [];
  for (const section of sections) {
    if (!section.fullContent.trim()) {
      scores.push(0);
      continue;
    }
    const contentVec = await session.vector(section.fullContent);
    scores.push(
      policy.taskWeight * cosineSimilarity(contentVec, taskVec) +
      policy.personaWeight * cosineSimilarity(contentVec, personaVec)
    );
  }
  return scores;
}

function scoreWithKeywords(
  sections: readonly Section[],
  query: RelevanceQuery,
  policy: RelevancePolicy
): number[] {
  const queryTokens = tokenize(`${query.persona} ${query.task}`, policy.minTokenLength);
  return sections.map((section) =>
    keywordOverlapScore(queryTokens, tokenize(section.fullContent, policy.minTokenLength))
  );
}

/**
 * Total order: score descending, then document order, then page, then
 * input position. Ranks are a permutation of 1..N.
 */
export function assignRanks(sections: readonly Section[], scores: readonly number[]): ScoredSection[] {
  return sections
    .map((section, position) => ({ section, position, score: scores[position] ?? 0 }))
    .sort((a, b) =>
      b.score - a.score ||
      a.section.documentIndex - b.section.documentIndex ||
      a.section.page - b.section.page ||
      a.position - b.position
    )
    .map(({ section, score }, i) => ({ ...section, relevanceScore: score, importanceRank: i + 1 }));
}

/**
 * Rank all sections of a collection. Throws OutlineLensEmbeddingError in
 * vector mode when the collaborator fails; the caller owns the fallback.
 */
export async function rankSections(
  sections: readonly Section[],
  query: RelevanceQuery,
  scoring: Scoring,
  policyOverrides: Partial<RelevancePolicy> = {}
): Promise<ScoredSection[]> {
  if (sections.length === 0) return [];
  const policy = resolveRelevancePolicy(policyOverrides);

  const scores = scoring.mode === "vector"
    ? await scoreWithVectors(sections, query, scoring.session, policy)
    : scoreWithKeywords(sections, query, policy);

  return assignRanks(sections, scores);
}
