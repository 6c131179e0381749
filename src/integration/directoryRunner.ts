/**
 * Filesystem front ends for batch runs.
 *
 * Outline mode turns every `*.pdf` of an input directory into a sibling
 * `*.json` in the output directory. Collection mode walks `Collection*`
 * directories, each holding `challenge1b_input.json` and a `PDFs/` folder,
 * and writes `challenge1b_output.json` per collection.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { COLLECTION_LAYOUT } from "../config/constants";
import type { HeadingPolicy } from "../config/HeadingPolicy";
import type { RelevancePolicy } from "../config/RelevancePolicy";
import {
  OutlineLensError,
  OutlineLensParseError,
  OutlineLensValidationError,
  ErrorCode,
  toError,
} from "../errors";
import { analyzeCollection, type CollectionDocument } from "../orchestrator/CollectionPipeline";
import { extractOutline, type DocumentOutline } from "../orchestrator/OutlinePipeline";
import type { EmbedFn } from "../services/EmbeddingSession";
import type { RelevanceQuery, TextFragment } from "../services/outline.types";
import { PdfFragmentExtractor } from "../services/PdfFragmentExtractor";
import { createLogger } from "../utils/logger";
import { parseCollectionInput, type CollectionInput } from "./collectionInput";
import {
  formatCollectionOutput,
  formatOutlineOutput,
  type CollectionOutput,
  type OutlineOutput,
} from "./outputFormat";

const log = createLogger({ component: "directoryRunner" });

/** Source of text fragments for a PDF on disk */
export interface FragmentSource {
  extract(buffer: Buffer | Uint8Array, documentId: string): Promise<TextFragment[]>;
}

export interface OutlineRunOptions {
  extractor?: FragmentSource;
  headingPolicy?: Partial<HeadingPolicy>;
}

export interface OutlineRunSummary {
  written: string[];
  /** PDFs that could not be read; each still gets an empty outline file */
  unreadable: string[];
}

export interface CollectionRunOptions {
  extractor?: FragmentSource;
  embed?: EmbedFn;
  headingPolicy?: Partial<HeadingPolicy>;
  relevancePolicy?: Partial<RelevancePolicy>;
  /** Replaces the persona or task read from the descriptor */
  query?: Partial<RelevanceQuery>;
  now?: () => Date;
}

async function writeJson(path: string, value: unknown): Promise<void> {
  try {
    await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  } catch (err) {
    throw new OutlineLensError(`Failed to write ${path}`, ErrorCode.IO_WRITE_FAILED, {
      operation: "writeJson",
      path,
    }, { cause: toError(err) });
  }
}

async function listEntries(dir: string, operation: string) {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new OutlineLensError(`Failed to read directory ${dir}`, ErrorCode.IO_READ_FAILED, {
      operation,
      path: dir,
    }, { cause: toError(err) });
  }
}

/**
 * Read and outline one PDF. Unreadable files yield an empty outline rather
 * than an error so a batch always produces one output per input.
 */
export async function outlinePdfFile(
  path: string,
  options: OutlineRunOptions = {}
): Promise<{ outline: DocumentOutline; readable: boolean }> {
  const extractor = options.extractor ?? new PdfFragmentExtractor();
  const documentId = basename(path);

  try {
    const buffer = await readPdf(path, documentId);
    const fragments = await extractor.extract(buffer, documentId);
    return { outline: extractOutline(fragments, options.headingPolicy), readable: true };
  } catch (err) {
    if (!(err instanceof OutlineLensParseError)) throw err;
    log.warn("Writing empty outline for unreadable PDF", { documentId }, err);
    return { outline: { title: null, outline: [] }, readable: false };
  }
}

async function readPdf(path: string, documentId: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (err) {
    throw OutlineLensParseError.unreadable(documentId, toError(err), { path });
  }
}

export async function extractOutlinesInDirectory(
  inputDir: string,
  outputDir: string,
  options: OutlineRunOptions = {}
): Promise<OutlineRunSummary> {
  const entries = await listEntries(inputDir, "extractOutlinesInDirectory");
  await mkdir(outputDir, { recursive: true });

  const summary: OutlineRunSummary = { written: [], unreadable: [] };
  const pdfs = entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort();

  for (const name of pdfs) {
    if (extname(name).toLowerCase() !== ".pdf") {
      log.debug("Skipping non-PDF file", { name });
      continue;
    }
    const { outline, readable } = await outlinePdfFile(join(inputDir, name), options);
    const target = join(outputDir, `${basename(name, extname(name))}.json`);
    const output: OutlineOutput = formatOutlineOutput(outline);
    await writeJson(target, output);
    summary.written.push(target);
    if (!readable) summary.unreadable.push(name);
  }

  log.info("Outline run complete", {
    inputDir,
    written: summary.written.length,
    unreadable: summary.unreadable.length,
  });
  return summary;
}

export async function readCollectionDescriptor(collectionDir: string): Promise<CollectionInput> {
  const path = join(collectionDir, COLLECTION_LAYOUT.INPUT_FILE);
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new OutlineLensError(`Failed to read ${path}`, ErrorCode.IO_READ_FAILED, {
      operation: "readCollectionDescriptor",
      path,
    }, { cause: toError(err) });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new OutlineLensValidationError(
      `${COLLECTION_LAYOUT.INPUT_FILE} is not valid JSON: ${toError(err).message}`,
      ErrorCode.VALIDATION_INVALID_FORMAT,
      { operation: "readCollectionDescriptor", path, field: COLLECTION_LAYOUT.INPUT_FILE },
      { cause: toError(err) }
    );
  }
  return parseCollectionInput(decoded);
}

/**
 * Analyze one collection directory and return its output document. Missing
 * or unreadable PDFs are skipped and listed in the metadata.
 */
export async function analyzeCollectionDirectory(
  collectionDir: string,
  options: CollectionRunOptions = {}
): Promise<CollectionOutput> {
  const input = await readCollectionDescriptor(collectionDir);
  const extractor = options.extractor ?? new PdfFragmentExtractor();
  const pdfDir = join(collectionDir, COLLECTION_LAYOUT.PDF_DIR);

  const loadFragments = async (document: CollectionDocument) => {
    const buffer = await readPdf(join(pdfDir, document.id), document.id);
    return extractor.extract(buffer, document.id);
  };

  const result = await analyzeCollection(
    {
      persona: options.query?.persona ?? input.persona,
      task: options.query?.task ?? input.task,
      documents: input.documents.map((d) => ({ id: d.filename, title: d.title })),
    },
    {
      loadFragments,
      embed: options.embed,
      headingPolicy: options.headingPolicy,
      relevancePolicy: options.relevancePolicy,
      now: options.now,
    }
  );

  return formatCollectionOutput(result);
}

/**
 * Process every `Collection*` directory under `inputRoot` in name order.
 * A failing collection is logged and does not stop the others.
 */
export async function analyzeCollectionsInDirectory(
  inputRoot: string,
  outputRoot: string,
  options: CollectionRunOptions = {}
): Promise<{ written: string[]; failed: string[] }> {
  const entries = await listEntries(inputRoot, "analyzeCollectionsInDirectory");
  const collections = entries
    .filter((e) => e.isDirectory() && e.name.startsWith(COLLECTION_LAYOUT.COLLECTION_PREFIX))
    .map((e) => e.name)
    .sort();

  const written: string[] = [];
  const failed: string[] = [];

  for (const name of collections) {
    try {
      const output = await analyzeCollectionDirectory(join(inputRoot, name), options);
      const targetDir = join(outputRoot, name);
      await mkdir(targetDir, { recursive: true });
      const target = join(targetDir, COLLECTION_LAYOUT.OUTPUT_FILE);
      await writeJson(target, output);
      written.push(target);
      log.info("Collection written", { collection: name, mode: output.metadata.scoring_mode });
    } catch (err) {
      failed.push(name);
      log.error("Collection failed", { collection: name }, err);
    }
  }

  return { written, failed };
}
