/**
 * Check the Ollama embedding path used for vector scoring.
 * Run with: npx tsx scripts/test-embedding.ts
 */

import { envSettings } from "../src/config/settings";
import { createOllamaEmbedder } from "../src/providers/ollamaDirectEmbed";
import { EmbeddingSession } from "../src/services/EmbeddingSession";
import { cosineSimilarity } from "../src/services/RelevanceScorer";

async function main() {
  const session = new EmbeddingSession(createOllamaEmbedder(envSettings));

  console.log("\n=== STEP 1: Generate test embedding ===");
  const a = await session.vector("Planning a four day trip for a group of friends.");
  console.log(`  ✅ Embedding generated: ${a.length} dimensions`);
  console.log(`  First 5 values: [${a.slice(0, 5).map((n) => n.toFixed(4)).join(", ")}]`);

  console.log("\n=== STEP 2: Similarity sanity check ===");
  const near = await session.vector("Itinerary ideas for travelling with friends.");
  const far = await session.vector("Quarterly tax filing requirements for corporations.");
  const nearScore = cosineSimilarity(a, near);
  const farScore = cosineSimilarity(a, far);
  console.log(`  related:   ${nearScore.toFixed(4)}`);
  console.log(`  unrelated: ${farScore.toFixed(4)}`);
  console.log(nearScore > farScore ? "  ✅ Related text scores higher" : "  ⚠️ Unexpected ordering");

  console.log(`\n✅ ${session.callCount} embedding call(s) succeeded.\n`);
}

main().catch((err: unknown) => {
  console.error("❌ Embedding check failed:", err instanceof Error ? err.message : err);
  console.error("  Is Ollama running? Try 'ollama serve' and 'ollama pull nomic-embed-text'.");
  process.exitCode = 1;
});
