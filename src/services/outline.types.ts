/**
 * Records flowing through the outline and relevance pipeline.
 * Every stage produces new records; nothing here is mutated after creation.
 */

/** One visually distinct run of text, as reported by the PDF collaborator */
export interface TextFragment {
  readonly text: string;
  readonly fontSize: number;   // positive, in PDF units
  readonly isBold: boolean;
  readonly page: number;       // 1-based
  readonly yPosition: number;  // distance from the top of the page
  readonly xPosition: number;
}

export type HeadingTier = "H1" | "H2" | "H3";
export type HeadingLevel = "TITLE" | HeadingTier | "BODY";

export interface OutlineEntry {
  readonly level: HeadingTier;
  readonly text: string;       // cleaned
  readonly page: number;
}

/** Outline entry plus its index in the reading-ordered fragment sequence */
export interface LocatedOutlineEntry extends OutlineEntry {
  readonly fragmentIndex: number;
}

export interface OutlineTitle {
  readonly text: string;
  readonly page: number;
  readonly fragmentIndex: number;
}

export interface Outline {
  readonly title: OutlineTitle | null;
  readonly entries: readonly LocatedOutlineEntry[];
  /** The fragments the indices above refer to, in reading order */
  readonly fragments: readonly TextFragment[];
}

export interface Section {
  readonly documentId: string;
  /** Position of the owning document in its collection (tie-breaker) */
  readonly documentIndex: number;
  readonly heading: OutlineEntry;
  readonly fullContent: string;
  readonly page: number;
}

export interface ScoredSection extends Section {
  readonly relevanceScore: number;
  readonly importanceRank: number; // 1-based, collection-wide
}

export interface RefinedSnippet {
  readonly documentId: string;
  readonly sectionTitle: string;
  readonly importanceRank: number;
  readonly refinedText: string;
  readonly page: number;
}

/** Persona/task query a collection is ranked against */
export interface RelevanceQuery {
  readonly persona: string;
  readonly task: string;
}
