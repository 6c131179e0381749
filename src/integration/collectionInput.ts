import { OutlineLensValidationError } from "../errors";

/** Parsed collection descriptor (challenge1b_input.json) */
export interface CollectionInput {
  challengeId?: string;
  testCaseName?: string;
  documents: Array<{ filename: string; title?: string }>;
  persona: string;
  task: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

function requireObject(obj: JsonObject, key: string): JsonObject {
  const value = obj[key];
  if (value === undefined) throw OutlineLensValidationError.missingParam(key, { operation: "parseCollectionInput" });
  if (!isObject(value)) {
    throw OutlineLensValidationError.invalidFormat(key, "an object", value, { operation: "parseCollectionInput" });
  }
  return value;
}

function requireString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (value === undefined) throw OutlineLensValidationError.missingParam(path, { operation: "parseCollectionInput" });
  if (typeof value !== "string") {
    throw OutlineLensValidationError.invalidFormat(path, "a string", value, { operation: "parseCollectionInput" });
  }
  return value;
}

/**
 * Validate a decoded collection descriptor:
 * `{ challenge_info?, documents: [{ filename, title? }], persona: { role }, job_to_be_done: { task } }`
 */
export function parseCollectionInput(raw: unknown): CollectionInput {
  if (!isObject(raw)) {
    throw OutlineLensValidationError.invalidFormat("collection input", "a JSON object", raw, {
      operation: "parseCollectionInput",
    });
  }

  const rawDocuments = raw.documents;
  if (rawDocuments === undefined) {
    throw OutlineLensValidationError.missingParam("documents", { operation: "parseCollectionInput" });
  }
  if (!Array.isArray(rawDocuments)) {
    throw OutlineLensValidationError.invalidFormat("documents", "an array", rawDocuments, {
      operation: "parseCollectionInput",
    });
  }

  const documents = rawDocuments.map((doc: unknown, i) => {
    if (!isObject(doc)) {
      throw OutlineLensValidationError.invalidFormat(`documents[${i}]`, "an object", doc, {
        operation: "parseCollectionInput",
      });
    }
    const filename = requireString(doc, "filename", `documents[${i}].filename`);
    const title = optionalString(doc, "title");
    return title === undefined ? { filename } : { filename, title };
  });

  const persona = requireString(requireObject(raw, "persona"), "role", "persona.role");
  const task = requireString(requireObject(raw, "job_to_be_done"), "task", "job_to_be_done.task");

  const info = isObject(raw.challenge_info) ? raw.challenge_info : undefined;

  return {
    challengeId: info ? optionalString(info, "challenge_id") : undefined,
    testCaseName: info ? optionalString(info, "test_case_name") : undefined,
    documents,
    persona,
    task,
  };
}
