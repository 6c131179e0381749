/**
 * CollectionPipeline — outline every document of a collection, rank all
 * sections against one persona/task query and condense the top ones.
 *
 * Scoring mode is decided once per run. The first embedding failure
 * anywhere in ranking or condensation abandons the vector attempt and the
 * whole run is scored again by keywords, so a collection is never scored
 * in mixed mode.
 */

import { resolveHeadingPolicy, type HeadingPolicy } from "../config/HeadingPolicy";
import { resolveRelevancePolicy, type RelevancePolicy } from "../config/RelevancePolicy";
import {
  OutlineLensCollectionError,
  OutlineLensParseError,
  isEmbeddingUnavailable,
} from "../errors";
import { condenseSections } from "../services/Condenser";
import { EmbeddingSession, type EmbedFn } from "../services/EmbeddingSession";
import { KEYWORD_SCORING, rankSections, type Scoring } from "../services/RelevanceRanker";
import type { ScoringMode } from "../services/RelevanceScorer";
import type {
  RefinedSnippet,
  RelevanceQuery,
  ScoredSection,
  Section,
  TextFragment,
} from "../services/outline.types";
import { createLogger } from "../utils/logger";
import { buildDocumentStructure } from "./OutlinePipeline";

const log = createLogger({ component: "CollectionPipeline" });

export interface CollectionDocument {
  /** Identifier echoed in the output, usually the file name */
  id: string;
  title?: string;
}

export interface CollectionRequest extends RelevanceQuery {
  documents: readonly CollectionDocument[];
}

/** Throws OutlineLensParseError for unreadable documents */
export type FragmentLoader = (document: CollectionDocument) => Promise<readonly TextFragment[]>;

export interface CollectionDependencies {
  loadFragments: FragmentLoader;
  /** Omit to run in keyword mode */
  embed?: EmbedFn;
  headingPolicy?: Partial<HeadingPolicy>;
  relevancePolicy?: Partial<RelevancePolicy>;
  now?: () => Date;
}

export interface CollectionResult {
  persona: string;
  task: string;
  processedDocuments: string[];
  skippedDocuments: string[];
  titles: Record<string, string | null>;
  mode: ScoringMode;
  sections: ScoredSection[];
  refined: RefinedSnippet[];
  processedAt: string;
}

interface LoadedDocument {
  document: CollectionDocument;
  index: number;
  fragments: readonly TextFragment[] | null;
}

async function loadDocument(
  document: CollectionDocument,
  index: number,
  loadFragments: FragmentLoader
): Promise<LoadedDocument> {
  try {
    return { document, index, fragments: await loadFragments(document) };
  } catch (error) {
    if (error instanceof OutlineLensParseError) {
      log.warn("Skipping unreadable document", { documentId: document.id }, error);
      return { document, index, fragments: null };
    }
    throw error;
  }
}

async function scoreCollection(
  sections: readonly Section[],
  query: RelevanceQuery,
  scoring: Scoring,
  policy: RelevancePolicy
): Promise<{ ranked: ScoredSection[]; refined: RefinedSnippet[] }> {
  const ranked = await rankSections(sections, query, scoring, policy);
  const refined = await condenseSections(ranked, query.task, scoring, policy);
  return { ranked, refined };
}

export async function analyzeCollection(
  request: CollectionRequest,
  deps: CollectionDependencies
): Promise<CollectionResult> {
  const headingPolicy = resolveHeadingPolicy(deps.headingPolicy);
  const relevancePolicy = resolveRelevancePolicy(deps.relevancePolicy);
  const query: RelevanceQuery = { persona: request.persona, task: request.task };

  if (request.documents.length === 0) {
    throw OutlineLensCollectionError.noReadableDocuments([]);
  }

  const loaded = await Promise.all(
    request.documents.map((document, index) => loadDocument(document, index, deps.loadFragments))
  );

  const skippedDocuments = loaded.filter((d) => d.fragments === null).map((d) => d.document.id);
  const processedDocuments: string[] = [];
  const titles: Record<string, string | null> = {};
  const sections: Section[] = [];

  for (const { document, index, fragments } of loaded) {
    if (fragments === null) continue;
    const structure = buildDocumentStructure(document.id, fragments, index, headingPolicy);
    processedDocuments.push(document.id);
    titles[document.id] = structure.outline.title?.text ?? null;
    sections.push(...structure.sections);
    log.debug("Document outlined", {
      documentId: document.id,
      fragments: fragments.length,
      sections: structure.sections.length,
    });
  }

  if (processedDocuments.length === 0) {
    throw OutlineLensCollectionError.noReadableDocuments(skippedDocuments);
  }

  let mode: ScoringMode = "keyword";
  let outcome: { ranked: ScoredSection[]; refined: RefinedSnippet[] } | null = null;

  if (deps.embed) {
    const session = new EmbeddingSession(deps.embed);
    try {
      outcome = await scoreCollection(sections, query, { mode: "vector", session }, relevancePolicy);
      mode = "vector";
    } catch (error) {
      if (!isEmbeddingUnavailable(error)) throw error;
      log.warn("Embeddings unavailable, scoring the whole run by keywords", {
        embedCalls: session.callCount,
      }, error);
    }
  }

  if (outcome === null) {
    outcome = await scoreCollection(sections, query, KEYWORD_SCORING, relevancePolicy);
  }

  log.info("Collection analyzed", {
    documents: processedDocuments.length,
    skipped: skippedDocuments.length,
    sections: outcome.ranked.length,
    refined: outcome.refined.length,
    mode,
  });

  return {
    persona: request.persona,
    task: request.task,
    processedDocuments,
    skippedDocuments,
    titles,
    mode,
    sections: outcome.ranked,
    refined: outcome.refined,
    processedAt: (deps.now ?? (() => new Date()))().toISOString(),
  };
}
