import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { headingPolicyFromSettings } from "../config/settings";
import { ErrorCode, wrapError } from "../errors";
import { outlinePdfFile } from "../integration/directoryRunner";
import { formatOutlineOutput, type OutlineOutput } from "../integration/outputFormat";
import { createLogger } from "../utils/logger";
import { extractPdfPathFromText, messageText, stringArg } from "./messageArgs";

const log = createLogger({ component: "EXTRACT_PDF_OUTLINE" });

const INDENT: Record<OutlineOutput["outline"][number]["level"], string> = {
  H1: "",
  H2: "  ",
  H3: "    ",
};

export function renderOutline(output: OutlineOutput): string {
  const lines = [`Title: ${output.title ?? "(none)"}`];
  if (output.outline.length === 0) {
    lines.push("No headings found.");
  }
  for (const entry of output.outline) {
    lines.push(`${INDENT[entry.level]}- [${entry.level}] ${entry.text} (p. ${entry.page})`);
  }
  return lines.join("\n");
}

export const ExtractOutlineAction: Action = {
  name: "EXTRACT_PDF_OUTLINE",
  description:
    "Extract the title and H1/H2/H3 heading outline of a local PDF file, with the page of each heading.",
  similes: [
    "PDF_OUTLINE",
    "GET_HEADINGS",
    "DOCUMENT_OUTLINE",
    "TABLE_OF_CONTENTS",
  ],
  examples: [
    [
      {
        name: "{{name1}}",
        content: { text: "Give me the outline of ./input/report.pdf" },
      },
      {
        name: "{{name2}}",
        content: {
          text: "Title: Annual Report\n- [H1] Introduction (p. 1)\n  - [H2] Scope (p. 2)",
          actions: ["EXTRACT_PDF_OUTLINE"],
        },
      },
    ],
  ],

  parameters: {
    type: "object",
    properties: {
      filePath: {
        type: "string",
        description: "Path to the PDF file on the agent's filesystem",
      },
    },
    required: ["filePath"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    if (stringArg(message, "filePath")) return true;
    const text = messageText(message);
    return /\b(outline|headings?|table of contents|structure)\b/i.test(text) && /\.pdf\b/i.test(text);
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const filePath = stringArg(message, "filePath") ?? extractPdfPathFromText(messageText(message));

    if (!filePath) {
      const text = "Which PDF should I outline? Please give me its path.";
      if (callback) {
        await callback({ text, action: "EXTRACT_PDF_OUTLINE" });
      }
      return { success: false, text };
    }

    try {
      const { outline, readable } = await outlinePdfFile(filePath, {
        headingPolicy: headingPolicyFromSettings(runtime),
      });
      const output = formatOutlineOutput(outline);

      const text = readable
        ? renderOutline(output)
        : `I could not read ${filePath} as a PDF.`;
      if (callback) {
        await callback({ text, action: "EXTRACT_PDF_OUTLINE" });
      }
      return {
        success: readable,
        text,
        data: { filePath, title: output.title, outline: output.outline },
      };
    } catch (error) {
      const err = wrapError(error, ErrorCode.INTERNAL, { operation: "EXTRACT_PDF_OUTLINE", path: filePath });
      log.error("Outline extraction failed", { filePath }, err);
      const text = `Outline extraction failed: ${err.toUserMessage()}`;
      if (callback) {
        await callback({ text, action: "EXTRACT_PDF_OUTLINE" });
      }
      return { success: false, text, error: err };
    }
  },
};
