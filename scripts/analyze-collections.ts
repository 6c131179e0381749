/**
 * Rank and condense every Collection* directory under an input root.
 * Run with: npx tsx scripts/analyze-collections.ts [inputRoot] [outputRoot]
 *
 * Embeddings come from Ollama (OLLAMA_API_ENDPOINT, OLLAMA_EMBEDDING_MODEL);
 * set OUTLINE_LENS_EMBEDDINGS=off to score by keywords only.
 */

import {
  embeddingsEnabled,
  envSettings,
  headingPolicyFromSettings,
  relevancePolicyFromSettings,
} from "../src/config/settings";
import { analyzeCollectionsInDirectory } from "../src/integration/directoryRunner";
import { createOllamaEmbedder } from "../src/providers/ollamaDirectEmbed";

const inputRoot = process.argv[2] ?? "/app/input";
const outputRoot = process.argv[3] ?? "/app/output";

async function main() {
  const { written, failed } = await analyzeCollectionsInDirectory(inputRoot, outputRoot, {
    embed: embeddingsEnabled(envSettings) ? createOllamaEmbedder(envSettings) : undefined,
    headingPolicy: headingPolicyFromSettings(envSettings),
    relevancePolicy: relevancePolicyFromSettings(envSettings),
  });

  for (const path of written) {
    console.log(`  ✅ ${path}`);
  }
  for (const name of failed) {
    console.log(`  ❌ ${name}`);
  }
  if (failed.length > 0) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error("❌ Collection run failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
