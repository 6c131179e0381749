/**
 * EmbeddingSession — per-run wrapper around the embeddings collaborator.
 *
 * Any failure (thrown error, malformed or zero-norm vector for non-empty
 * text, dimension change) surfaces as OutlineLensEmbeddingError, which the
 * collection pipeline turns into keyword mode for the whole run.
 */

import { OutlineLensEmbeddingError, toError } from "../errors";
import { vectorNorm } from "./RelevanceScorer";

export type EmbedFn = (text: string) => Promise<number[]>;

export class EmbeddingSession {
  private readonly cache = new Map<string, Promise<number[]>>();
  private dimension: number | null = null;
  private calls = 0;

  constructor(private readonly embed: EmbedFn) {}

  /** Number of collaborator calls made (cache hits excluded) */
  get callCount(): number {
    return this.calls;
  }

  /**
   * Vector for `text`. Blank text is never sent to the collaborator and
   * yields an empty vector, which cosine treats as zero.
   */
  async vector(text: string): Promise<number[]> {
    const key = text.trim();
    if (!key) return [];

    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.fetchVector(key);
    this.cache.set(key, pending);
    return pending;
  }

  private async fetchVector(text: string): Promise<number[]> {
    this.calls++;
    let raw: unknown;
    try {
      raw = await this.embed(text);
    } catch (error) {
      throw OutlineLensEmbeddingError.unavailable(toError(error));
    }

    if (!Array.isArray(raw) || raw.length === 0) {
      throw OutlineLensEmbeddingError.degenerateVector("empty or non-array result");
    }
    const vector: number[] = [];
    for (const x of raw) {
      if (typeof x !== "number" || !Number.isFinite(x)) {
        throw OutlineLensEmbeddingError.degenerateVector("non-finite component");
      }
      vector.push(x);
    }
    if (vectorNorm(vector) === 0) {
      throw OutlineLensEmbeddingError.degenerateVector("zero norm for non-empty text");
    }

    if (this.dimension === null) {
      this.dimension = vector.length;
    } else if (vector.length !== this.dimension) {
      throw OutlineLensEmbeddingError.dimensionMismatch(this.dimension, vector.length);
    }

    return vector;
  }
}
