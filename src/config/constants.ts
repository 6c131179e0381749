/**
 * Centralized constants for plugin-outline-lens
 * Avoids magic numbers scattered throughout codebase
 */

export const EXTRACTOR_DEFAULTS = {
  /** Decimal places kept on font sizes reported by the PDF collaborator */
  FONT_SIZE_DECIMALS: 2,
  /** Baseline distance (as a fraction of font size) under which runs share a line */
  LINE_Y_TOLERANCE_RATIO: 0.3,
  /** Font name fragments that mark a bold face */
  BOLD_FONT_PATTERN: /bold|heavy|black|semibold|demi/i,
  MAX_PAGES: 500,
} as const;

export const EMBEDDING_DEFAULTS = {
  OLLAMA_URL: "http://localhost:11434",
  MODEL: "nomic-embed-text:latest",
  /** nomic-embed-text dimension, used for the zero vector of empty input */
  DIMENSION: 768,
} as const;

export const COLLECTION_LAYOUT = {
  INPUT_FILE: "challenge1b_input.json",
  OUTPUT_FILE: "challenge1b_output.json",
  PDF_DIR: "PDFs",
  COLLECTION_PREFIX: "Collection",
} as const;

/** Setting keys read from the elizaOS runtime or the process environment */
export const SETTING_KEYS = {
  H1_RATIO: "OUTLINE_LENS_H1_RATIO",
  H2_RATIO: "OUTLINE_LENS_H2_RATIO",
  H3_RATIO: "OUTLINE_LENS_H3_RATIO",
  MAX_HEADING_WORDS: "OUTLINE_LENS_MAX_HEADING_WORDS",
  TOP_K: "OUTLINE_LENS_TOP_K",
  MIN_SENTENCE_CHARS: "OUTLINE_LENS_MIN_SENTENCE_CHARS",
  EMBEDDINGS: "OUTLINE_LENS_EMBEDDINGS",
  OLLAMA_API_ENDPOINT: "OLLAMA_API_ENDPOINT",
  OLLAMA_API_URL: "OLLAMA_API_URL",
  OLLAMA_EMBEDDING_MODEL: "OLLAMA_EMBEDDING_MODEL",
} as const;
