/**
 * SentenceSegmenter — character-scanning sentence splitter.
 *
 * Pure function; used by the Condenser to pick supporting sentences.
 */

import abbreviations from "./abbreviations.json";

export interface SentenceSpan {
  index: number;   // 0-based sentence number
  start: number;   // char offset in text
  end: number;     // char offset end (exclusive)
  text: string;    // trimmed sentence text
}

/**
 * Known abbreviations that should NOT trigger sentence boundaries.
 * Lowercase, without the trailing period.
 */
const ABBREVIATIONS: ReadonlySet<string> = new Set<string>(abbreviations.always);

/** Also ordinary words ("the answer is no."): abbreviations only before a lowercase letter or digit */
const CONTEXTUAL_ABBREVIATIONS: ReadonlySet<string> = new Set<string>(abbreviations.beforeLowercaseOrDigit);

const CLOSERS = /[)"'”’]/;

/**
 * Check if the word before a period is a known abbreviation or an initial.
 */
function isAbbreviation(text: string, periodPos: number): boolean {
  let wordStart = periodPos - 1;
  while (wordStart >= 0 && /[a-zA-Z.]/.test(text[wordStart])) {
    wordStart--;
  }
  wordStart++;

  const word = text.substring(wordStart, periodPos).toLowerCase();
  if (word.length === 0) return false;

  if (ABBREVIATIONS.has(word)) return true;
  if (CONTEXTUAL_ABBREVIATIONS.has(word)) {
    return /^\s*[\p{Ll}\d]/u.test(text.substring(periodPos + 1));
  }

  // Multi-period abbreviations: "e.g", "i.e", "U.S.A"
  const stripped = word.replace(/\./g, "");
  if (ABBREVIATIONS.has(stripped)) return true;

  // Single-letter initial: "J." "K."
  if (word.length === 1) return true;

  if (/^[a-z](\.[a-z])+$/.test(word)) return true;

  return false;
}

function pushSentence(sentences: SentenceSpan[], text: string, start: number, end: number): void {
  const sentenceText = text.substring(start, end).trim();
  if (sentenceText.length === 0) return;
  sentences.push({ index: sentences.length, start, end, text: sentenceText });
}

/**
 * Split text into sentences.
 *
 * A boundary is a `.`, `!` or `?` (plus any closing quotes/parens) followed
 * by whitespace or end of text, unless the period belongs to an
 * abbreviation, an initial or a decimal number. An ellipsis ends a sentence
 * only when followed by whitespace and an uppercase letter.
 */
export function segmentSentences(text: string): SentenceSpan[] {
  if (!text.trim()) return [];

  const sentences: SentenceSpan[] = [];
  let i = 0;
  while (i < text.length && /\s/.test(text[i])) i++;
  let sentenceStart = i;

  while (i < text.length) {
    const ch = text[i];

    if (ch !== "." && ch !== "!" && ch !== "?") {
      i++;
      continue;
    }

    // Ellipsis
    if (ch === "." && text[i + 1] === ".") {
      while (i < text.length && text[i] === ".") i++;
      let afterDots = i;
      while (afterDots < text.length && CLOSERS.test(text[afterDots])) afterDots++;
      if (afterDots >= text.length) {
        pushSentence(sentences, text, sentenceStart, afterDots);
        sentenceStart = afterDots;
        break;
      }
      if (/\s/.test(text[afterDots])) {
        let peek = afterDots;
        while (peek < text.length && /\s/.test(text[peek])) peek++;
        if (peek < text.length && /[A-Z“"(]/.test(text[peek])) {
          pushSentence(sentences, text, sentenceStart, afterDots);
          sentenceStart = peek;
          i = peek;
        }
      }
      continue;
    }

    // Decimal number: 3.14
    if (ch === "." && i > 0 && /\d/.test(text[i - 1]) && /\d/.test(text[i + 1] ?? "")) {
      i++;
      continue;
    }

    if (ch === "." && isAbbreviation(text, i)) {
      i++;
      continue;
    }

    i++;
    while (i < text.length && CLOSERS.test(text[i])) i++;

    if (i >= text.length) {
      pushSentence(sentences, text, sentenceStart, i);
      sentenceStart = i;
      break;
    }

    if (/\s/.test(text[i])) {
      pushSentence(sentences, text, sentenceStart, i);
      while (i < text.length && /\s/.test(text[i])) i++;
      sentenceStart = i;
      continue;
    }

    // No whitespace after punctuation, e.g. "example.com"
  }

  // Trailing text without terminal punctuation
  if (sentenceStart < text.length) {
    pushSentence(sentences, text, sentenceStart, text.length);
  }

  return sentences;
}
