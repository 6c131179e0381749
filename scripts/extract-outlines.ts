/**
 * Outline every PDF of a directory into sibling JSON files.
 * Run with: npx tsx scripts/extract-outlines.ts [inputDir] [outputDir]
 */

import { envSettings, headingPolicyFromSettings } from "../src/config/settings";
import { extractOutlinesInDirectory } from "../src/integration/directoryRunner";

const inputDir = process.argv[2] ?? "/app/input";
const outputDir = process.argv[3] ?? "/app/output";

async function main() {
  const summary = await extractOutlinesInDirectory(inputDir, outputDir, {
    headingPolicy: headingPolicyFromSettings(envSettings),
  });

  console.log(`\n✅ Wrote ${summary.written.length} outline(s) to ${outputDir}`);
  if (summary.unreadable.length > 0) {
    console.log(`⚠️ Unreadable (empty outline written): ${summary.unreadable.join(", ")}`);
  }
}

main().catch((err: unknown) => {
  console.error("❌ Outline run failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
