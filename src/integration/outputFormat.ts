/**
 * JSON shapes written for single-document and collection runs.
 */

import type { CollectionResult } from "../orchestrator/CollectionPipeline";
import type { DocumentOutline } from "../orchestrator/OutlinePipeline";
import type { HeadingTier } from "../services/outline.types";
import type { ScoringMode } from "../services/RelevanceScorer";

export interface OutlineOutput {
  title: string | null;
  outline: Array<{ level: HeadingTier; text: string; page: number }>;
}

export interface CollectionOutput {
  metadata: {
    input_documents: string[];
    persona: string;
    job_to_be_done: string;
    processing_timestamp: string;
    scoring_mode: ScoringMode;
    skipped_documents?: string[];
  };
  extracted_sections: Array<{
    document: string;
    section_title: string;
    importance_rank: number;
    page_number: number;
  }>;
  subsection_analysis: Array<{
    document: string;
    refined_text: string;
    page_number: number;
  }>;
}

export function formatOutlineOutput(outline: DocumentOutline): OutlineOutput {
  return {
    title: outline.title,
    outline: outline.outline.map(({ level, text, page }) => ({ level, text, page })),
  };
}

export function formatCollectionOutput(result: CollectionResult): CollectionOutput {
  const metadata: CollectionOutput["metadata"] = {
    input_documents: [...result.processedDocuments],
    persona: result.persona,
    job_to_be_done: result.task,
    processing_timestamp: result.processedAt,
    scoring_mode: result.mode,
  };
  if (result.skippedDocuments.length > 0) {
    metadata.skipped_documents = [...result.skippedDocuments];
  }

  return {
    metadata,
    extracted_sections: result.sections.map((s) => ({
      document: s.documentId,
      section_title: s.heading.text,
      importance_rank: s.importanceRank,
      page_number: s.page,
    })),
    subsection_analysis: result.refined.map((r) => ({
      document: r.documentId,
      refined_text: r.refinedText,
      page_number: r.page,
    })),
  };
}
