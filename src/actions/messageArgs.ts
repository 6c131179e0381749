import type { Memory } from "@elizaos/core";

/** Non-empty string argument from structured message content */
export function stringArg(message: Memory, key: string): string | undefined {
  const value: unknown = message.content ? Reflect.get(message.content, key) : undefined;
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function messageText(message: Memory): string {
  return message.content?.text ?? "";
}

// Quoted or bare path ending in .pdf
const PDF_PATH_RE = /["'`]([^"'`]+\.pdf)["'`]|([^\s"'`]+\.pdf)\b/i;

export function extractPdfPathFromText(text: string): string | null {
  const match = text.match(PDF_PATH_RE);
  return match?.[1] ?? match?.[2] ?? null;
}

// Path whose last segment is a Collection directory, e.g. "input/Collection 1"
const COLLECTION_PATH_RE = /["'`]([^"'`]*Collection[^"'`]*)["'`]|((?:[^\s"'`]*\/)?Collection(?:[ _-]?\d+)?[^\s"'`]*)/;

export function extractCollectionPathFromText(text: string): string | null {
  const match = text.match(COLLECTION_PATH_RE);
  const path = match?.[1] ?? match?.[2];
  return path ? path.replace(/[.,;:!?]+$/, "") : null;
}
