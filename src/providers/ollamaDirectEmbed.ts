/**
 * Direct Ollama embedding provider.
 *
 * Calls the Ollama REST API directly. Registered as the plugin's
 * ModelType.TEXT_EMBEDDING handler and reused by the scripts through
 * `createOllamaEmbedder`.
 */

import { EMBEDDING_DEFAULTS, SETTING_KEYS } from "../config/constants";
import { readStringSetting, type SettingSource } from "../config/settings";
import { createLogger } from "../utils/logger";
import type { EmbedFn } from "../services/EmbeddingSession";

const log = createLogger({ component: "ollamaDirectEmbed" });

/** elizaOS passes either a params object, a bare string, or null (probe) */
export type EmbedParams = { text?: string; input?: string } | string | null | undefined;

function textOf(params: EmbedParams): string {
  if (typeof params === "string") return params;
  if (!params) return "";
  return params.text || params.input || "";
}

export async function ollamaDirectEmbed(
  runtime: SettingSource,
  params: EmbedParams
): Promise<number[]> {
  const baseUrl = readStringSetting(runtime, SETTING_KEYS.OLLAMA_API_ENDPOINT)
    || readStringSetting(runtime, SETTING_KEYS.OLLAMA_API_URL)
    || EMBEDDING_DEFAULTS.OLLAMA_URL;
  const model = readStringSetting(runtime, SETTING_KEYS.OLLAMA_EMBEDDING_MODEL) || EMBEDDING_DEFAULTS.MODEL;
  const text = textOf(params);

  if (!text.trim()) {
    log.warn("Empty text for embedding, returning zero vector");
    return new Array<number>(EMBEDDING_DEFAULTS.DIMENSION).fill(0);
  }

  const resp = await fetch(`${baseUrl.replace(/\/+$/, "")}/api/embed`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ model, input: text }),
  });

  if (!resp.ok) {
    const errText = await resp.text();
    throw new Error(`Ollama embedding failed (${resp.status}): ${errText}`);
  }

  const data: unknown = await resp.json();
  const embeddings: unknown = typeof data === "object" && data !== null ? Reflect.get(data, "embeddings") : undefined;
  const embedding: unknown = Array.isArray(embeddings) ? embeddings[0] : undefined;

  if (!Array.isArray(embedding) || embedding.length === 0) {
    throw new Error(`Ollama returned empty embedding for model ${model}`);
  }

  return embedding.map((x) => Number(x));
}

/** Embed function bound to a setting source, for runs outside elizaOS */
export function createOllamaEmbedder(settings: SettingSource): EmbedFn {
  return (text: string) => ollamaDirectEmbed(settings, { text });
}
