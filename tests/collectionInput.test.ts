import { describe, it, expect } from "vitest";
import { parseCollectionInput } from "../src/integration/collectionInput";
import { ErrorCode, OutlineLensValidationError } from "../src/errors";

const valid = {
  challenge_info: { challenge_id: "round_1b_002", test_case_name: "travel_planner" },
  documents: [{ filename: "south.pdf", title: "South of France" }, { filename: "north.pdf" }],
  persona: { role: "Travel Planner" },
  job_to_be_done: { task: "Plan a trip of 4 days for a group of 10 college friends." },
};

describe("parseCollectionInput", () => {
  it("reads documents, persona and task", () => {
    expect(parseCollectionInput(valid)).toEqual({
      challengeId: "round_1b_002",
      testCaseName: "travel_planner",
      documents: [{ filename: "south.pdf", title: "South of France" }, { filename: "north.pdf" }],
      persona: "Travel Planner",
      task: "Plan a trip of 4 days for a group of 10 college friends.",
    });
  });

  it("treats challenge_info as optional", () => {
    const { challenge_info: _info, ...rest } = valid;
    const parsed = parseCollectionInput(rest);
    expect(parsed.challengeId).toBeUndefined();
    expect(parsed.documents).toHaveLength(2);
  });

  it("reports a missing persona", () => {
    const { persona: _persona, ...rest } = valid;
    expect(() => parseCollectionInput(rest)).toThrow("Missing required parameter: persona");
  });

  it("reports a missing task", () => {
    expect(() => parseCollectionInput({ ...valid, job_to_be_done: {} })).toThrow(
      "Missing required parameter: job_to_be_done.task"
    );
  });

  it("reports malformed documents", () => {
    const error = (() => {
      try {
        parseCollectionInput({ ...valid, documents: [{ filename: 42 }] });
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(OutlineLensValidationError);
    expect(error).toMatchObject({
      code: ErrorCode.VALIDATION_INVALID_FORMAT,
      field: "documents[0].filename",
      value: 42,
    });
  });

  it("rejects non-object input", () => {
    expect(() => parseCollectionInput([])).toThrow("Invalid format for collection input: expected a JSON object");
    expect(() => parseCollectionInput({ ...valid, documents: "south.pdf" })).toThrow(
      "Invalid format for documents: expected an array"
    );
  });
});
