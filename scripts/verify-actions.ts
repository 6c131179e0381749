import { outlineLensPlugin } from "../src/index";

console.log("Registered Actions:");
outlineLensPlugin.actions?.forEach((action, i) => {
  console.log(`  ${i + 1}. ${action.name}`);
  console.log(`     Description: ${action.description?.slice(0, 60)}...`);
});

const expectedActions = [
  "EXTRACT_PDF_OUTLINE",
  "ANALYZE_DOCUMENT_COLLECTION",
];

const registeredNames = outlineLensPlugin.actions?.map((a) => a.name) ?? [];
const missing = expectedActions.filter((e) => !registeredNames.includes(e));

if (missing.length > 0) {
  console.error("Missing actions:", missing);
  process.exit(1);
}

console.log("All expected actions registered");
