import { OutlineLensValidationError } from "../errors";

export interface RelevancePolicy {
  /** Weight of cosine(content, task) in the vector score */
  taskWeight: number;
  /** Weight of cosine(content, persona) in the vector score */
  personaWeight: number;
  /** Number of top-ranked sections that get refined text */
  topK: number;
  /** Sentences shorter than this (characters) are not candidates */
  minSentenceChars: number;
  maxSentences: number;
  /** Sentence score floor in vector mode */
  vectorSentenceFloor: number;
  /** Sentence score floor in keyword mode */
  keywordSentenceFloor: number;
  /** Keyword tokens shorter than this are ignored */
  minTokenLength: number;
}

export const DEFAULT_RELEVANCE_POLICY: Readonly<RelevancePolicy> = {
  taskWeight: 0.7,
  personaWeight: 0.3,
  topK: 10,
  minSentenceChars: 20,
  maxSentences: 3,
  vectorSentenceFloor: 0.3,
  keywordSentenceFloor: 0.1,
  minTokenLength: 3,
};

export function resolveRelevancePolicy(overrides: Partial<RelevancePolicy> = {}): RelevancePolicy {
  const policy: RelevancePolicy = { ...DEFAULT_RELEVANCE_POLICY, ...overrides };

  for (const field of ["taskWeight", "personaWeight"] as const) {
    const value = policy[field];
    if (!Number.isFinite(value) || value < 0) {
      throw OutlineLensValidationError.invalidPolicy(field, "must be a non-negative number", value);
    }
  }
  // Weights summing to 1 keep vector scores inside [-1, 1]
  if (Math.abs(policy.taskWeight + policy.personaWeight - 1) > 1e-9) {
    throw OutlineLensValidationError.invalidPolicy(
      "personaWeight",
      "taskWeight + personaWeight must equal 1",
      [policy.taskWeight, policy.personaWeight]
    );
  }

  for (const field of ["topK", "minSentenceChars", "maxSentences", "minTokenLength"] as const) {
    const value = policy[field];
    if (!Number.isInteger(value) || value < 1) {
      throw OutlineLensValidationError.invalidPolicy(field, "must be a positive integer", value);
    }
  }

  for (const field of ["vectorSentenceFloor", "keywordSentenceFloor"] as const) {
    const value = policy[field];
    if (!Number.isFinite(value)) {
      throw OutlineLensValidationError.invalidPolicy(field, "must be a finite number", value);
    }
  }

  return policy;
}
