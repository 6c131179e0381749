import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import {
  embeddingsEnabled,
  headingPolicyFromSettings,
  relevancePolicyFromSettings,
} from "../config/settings";
import { ErrorCode, wrapError } from "../errors";
import { analyzeCollectionDirectory } from "../integration/directoryRunner";
import type { CollectionOutput } from "../integration/outputFormat";
import { createRuntimeEmbedder } from "../providers/runtimeEmbedder";
import { createLogger } from "../utils/logger";
import { extractCollectionPathFromText, messageText, stringArg } from "./messageArgs";

const log = createLogger({ component: "ANALYZE_DOCUMENT_COLLECTION" });

/** Sections shown in the chat reply; the full list is in `data` */
const REPLY_SECTIONS = 5;

export function renderCollectionSummary(output: CollectionOutput): string {
  const { metadata } = output;
  const lines = [
    `Most relevant sections for "${metadata.persona}" (task: ${metadata.job_to_be_done}), ` +
      `${metadata.scoring_mode} scoring over ${metadata.input_documents.length} document(s):`,
  ];
  for (const s of output.extracted_sections.slice(0, REPLY_SECTIONS)) {
    lines.push(`${s.importance_rank}. ${s.section_title} (${s.document}, p. ${s.page_number})`);
  }
  if (output.extracted_sections.length === 0) {
    lines.push("No sections found.");
  }
  if (metadata.skipped_documents?.length) {
    lines.push(`Skipped: ${metadata.skipped_documents.join(", ")}`);
  }
  return lines.join("\n");
}

export const AnalyzeCollectionAction: Action = {
  name: "ANALYZE_DOCUMENT_COLLECTION",
  description:
    "Rank the sections of a PDF collection directory by relevance to a persona and task, " +
    "and condense the top sections to their most relevant sentences.",
  similes: [
    "RANK_SECTIONS",
    "ANALYZE_COLLECTION",
    "RELEVANT_SECTIONS",
    "PERSONA_ANALYSIS",
  ],
  examples: [
    [
      {
        name: "{{name1}}",
        content: { text: "Analyze the collection in ./input/Collection 1" },
      },
      {
        name: "{{name2}}",
        content: {
          text:
            'Most relevant sections for "Travel Planner" (task: Plan a trip), vector scoring over 3 document(s):\n' +
            "1. Coastal Adventures (south-cities.pdf, p. 2)",
          actions: ["ANALYZE_DOCUMENT_COLLECTION"],
        },
      },
    ],
  ],

  parameters: {
    type: "object",
    properties: {
      collectionPath: {
        type: "string",
        description: "Directory holding challenge1b_input.json and a PDFs/ folder",
      },
      persona: {
        type: "string",
        description: "Optional persona role replacing the one in the collection input",
      },
      task: {
        type: "string",
        description: "Optional job to be done replacing the one in the collection input",
      },
    },
    required: ["collectionPath"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    if (stringArg(message, "collectionPath")) return true;
    const text = messageText(message);
    return /\b(analy[sz]e|rank|relevant)\b/i.test(text) && /\bcollection\b/i.test(text);
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const collectionPath =
      stringArg(message, "collectionPath") ?? extractCollectionPathFromText(messageText(message));

    if (!collectionPath) {
      const text = "Which collection directory should I analyze? Please give me its path.";
      if (callback) {
        await callback({ text, action: "ANALYZE_DOCUMENT_COLLECTION" });
      }
      return { success: false, text };
    }

    try {
      const output = await analyzeCollectionDirectory(collectionPath, {
        embed: embeddingsEnabled(runtime) ? createRuntimeEmbedder(runtime) : undefined,
        headingPolicy: headingPolicyFromSettings(runtime),
        relevancePolicy: relevancePolicyFromSettings(runtime),
        query: {
          persona: stringArg(message, "persona"),
          task: stringArg(message, "task"),
        },
      });

      const text = renderCollectionSummary(output);
      if (callback) {
        await callback({ text, action: "ANALYZE_DOCUMENT_COLLECTION" });
      }
      return {
        success: true,
        text,
        data: {
          collectionPath,
          metadata: output.metadata,
          extractedSections: output.extracted_sections,
          subsectionAnalysis: output.subsection_analysis,
        },
      };
    } catch (error) {
      const err = wrapError(error, ErrorCode.INTERNAL, {
        operation: "ANALYZE_DOCUMENT_COLLECTION",
        path: collectionPath,
      });
      log.error("Collection analysis failed", { collectionPath }, err);
      const text = `Collection analysis failed: ${err.toUserMessage()}`;
      if (callback) {
        await callback({ text, action: "ANALYZE_DOCUMENT_COLLECTION" });
      }
      return { success: false, text, error: err };
    }
  },
};
