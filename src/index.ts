import type { Plugin, IAgentRuntime } from "@elizaos/core";
import { ModelType } from "@elizaos/core";
import { ollamaDirectEmbed } from "./providers/ollamaDirectEmbed";
import {
  embeddingsEnabled,
  headingPolicyFromSettings,
  relevancePolicyFromSettings,
} from "./config/settings";
import { logger } from "./utils/logger";

import { ExtractOutlineAction } from "./actions/extractOutlineAction";
import { AnalyzeCollectionAction } from "./actions/analyzeCollectionAction";

/**
 * Resolve settings once at load so a bad ratio or top-k fails fast instead
 * of on the first request.
 */
async function initPlugin(_config: Record<string, string>, runtime: IAgentRuntime): Promise<void> {
  const heading = headingPolicyFromSettings(runtime);
  const relevance = relevancePolicyFromSettings(runtime);
  logger.info("Plugin initialized", {
    h1Ratio: heading.h1Ratio,
    h2Ratio: heading.h2Ratio,
    h3Ratio: heading.h3Ratio,
    topK: relevance.topK,
    embeddings: embeddingsEnabled(runtime),
  });
}

export const outlineLensPlugin: Plugin = {
  name: "plugin-outline-lens",
  description:
    "Outline Lens - PDF heading outlines and persona-driven section ranking. " +
    "Extracts title and H1-H3 outlines from PDFs, then ranks and condenses the sections " +
    "of a document collection for a persona and task, with keyword scoring when embeddings are unavailable.",
  init: initPlugin,
  actions: [ExtractOutlineAction, AnalyzeCollectionAction],
  // Direct Ollama REST embedding; the agent may register another TEXT_EMBEDDING handler instead.
  models: {
    [ModelType.TEXT_EMBEDDING]: ollamaDirectEmbed,
  },
};

export default outlineLensPlugin;

// ============================================================================
// RE-EXPORTS (for external consumers)
// ============================================================================

// Outline extraction
export { classifyHeadings, computeTierBands, tierFor, toReadingOrder } from "./services/HeadingClassifier";
export { assembleSections } from "./services/SectionAssembler";
export { cleanText, collapseWhitespace, countWords, startsWithListMarker } from "./services/TextCleaner";
export { PdfFragmentExtractor, extractFragmentsFromDocument } from "./services/PdfFragmentExtractor";
export { extractOutline, buildDocumentStructure, type DocumentOutline } from "./orchestrator/OutlinePipeline";

// Relevance ranking
export { rankSections, KEYWORD_SCORING, type Scoring } from "./services/RelevanceRanker";
export { condenseSections, refineContent } from "./services/Condenser";
export { segmentSentences, type SentenceSpan } from "./services/SentenceSegmenter";
export { cosineSimilarity, keywordOverlapScore, tokenize, type ScoringMode } from "./services/RelevanceScorer";
export { EmbeddingSession, type EmbedFn } from "./services/EmbeddingSession";
export {
  analyzeCollection,
  type CollectionDocument,
  type CollectionRequest,
  type CollectionResult,
  type CollectionDependencies,
} from "./orchestrator/CollectionPipeline";

// Batch runs
export {
  extractOutlinesInDirectory,
  analyzeCollectionDirectory,
  analyzeCollectionsInDirectory,
} from "./integration/directoryRunner";
export { parseCollectionInput, type CollectionInput } from "./integration/collectionInput";
export {
  formatOutlineOutput,
  formatCollectionOutput,
  type OutlineOutput,
  type CollectionOutput,
} from "./integration/outputFormat";
export { createOllamaEmbedder } from "./providers/ollamaDirectEmbed";
export { createRuntimeEmbedder } from "./providers/runtimeEmbedder";

// Types
export type {
  TextFragment,
  HeadingTier,
  HeadingLevel,
  OutlineEntry,
  Outline,
  Section,
  ScoredSection,
  RefinedSnippet,
  RelevanceQuery,
} from "./services/outline.types";

// Configuration
export { resolveHeadingPolicy, DEFAULT_HEADING_POLICY, type HeadingPolicy } from "./config/HeadingPolicy";
export { resolveRelevancePolicy, DEFAULT_RELEVANCE_POLICY, type RelevancePolicy } from "./config/RelevancePolicy";
export { envSettings, type SettingSource } from "./config/settings";

// Error types
export {
  OutlineLensError,
  OutlineLensParseError,
  OutlineLensEmbeddingError,
  OutlineLensValidationError,
  OutlineLensCollectionError,
  ErrorCode,
  wrapError,
  isOutlineLensError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./errors";

// Utilities
export { logger, createLogger, type LogLevel, type LogEntry } from "./utils/logger";
