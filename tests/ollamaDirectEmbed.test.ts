import { describe, it, expect, vi, beforeEach } from "vitest";
import { createOllamaEmbedder, ollamaDirectEmbed } from "../src/providers/ollamaDirectEmbed";
import type { SettingSource } from "../src/config/settings";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function settings(values: Record<string, string> = {}): SettingSource {
  return { getSetting: (key: string) => values[key] };
}

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

describe("ollamaDirectEmbed", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("posts to the configured endpoint and returns the first embedding", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ embeddings: [[0.1, 0.2, 0.3]] }));

    const vector = await ollamaDirectEmbed(
      settings({ OLLAMA_API_ENDPOINT: "http://ollama.test:11434/", OLLAMA_EMBEDDING_MODEL: "test-embed" }),
      { text: "hello" }
    );

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(mockFetch).toHaveBeenCalledWith("http://ollama.test:11434/api/embed", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: "test-embed", input: "hello" }),
    });
  });

  it("falls back to the default endpoint and model", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ embeddings: [[1]] }));

    await ollamaDirectEmbed(settings(), "plain string");

    expect(mockFetch).toHaveBeenCalledWith(
      "http://localhost:11434/api/embed",
      expect.objectContaining({
        body: JSON.stringify({ model: "nomic-embed-text:latest", input: "plain string" }),
      })
    );
  });

  it("returns a zero vector for empty text without calling Ollama", async () => {
    const vector = await ollamaDirectEmbed(settings(), null);
    expect(vector).toHaveLength(768);
    expect(vector.every((x) => x === 0)).toBe(true);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("throws on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 500,
      text: async () => "model not found",
    });

    await expect(ollamaDirectEmbed(settings(), { text: "hello" })).rejects.toThrow(
      "Ollama embedding failed (500): model not found"
    );
  });

  it("throws on an empty embedding", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ embeddings: [] }));

    await expect(ollamaDirectEmbed(settings(), { input: "hello" })).rejects.toThrow(
      "Ollama returned empty embedding for model nomic-embed-text:latest"
    );
  });
});

describe("createOllamaEmbedder", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("binds settings into an embed function", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ embeddings: [[0.5, 0.5]] }));

    const embed = createOllamaEmbedder(settings({ OLLAMA_API_URL: "http://alt.test" }));

    expect(await embed("text")).toEqual([0.5, 0.5]);
    expect(mockFetch.mock.calls[0][0]).toBe("http://alt.test/api/embed");
  });
});
