import type { IAgentRuntime } from "@elizaos/core";
import { ModelType } from "@elizaos/core";
import type { EmbedFn } from "../services/EmbeddingSession";

/**
 * Embed function backed by whatever TEXT_EMBEDDING handler the agent has
 * registered (this plugin's Ollama override by default).
 */
export function createRuntimeEmbedder(runtime: IAgentRuntime): EmbedFn {
  return async (text: string) => {
    const result: unknown = await runtime.useModel(ModelType.TEXT_EMBEDDING, { text });
    if (!Array.isArray(result)) {
      throw new Error("TEXT_EMBEDDING model returned a non-array result");
    }
    return result.map((x) => Number(x));
  };
}
