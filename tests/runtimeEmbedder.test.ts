import { describe, it, expect, vi } from "vitest";
import { createRuntimeEmbedder } from "../src/providers/runtimeEmbedder";
import { createMockRuntime } from "./setup";

describe("createRuntimeEmbedder", () => {
  it("asks the runtime for a TEXT_EMBEDDING", async () => {
    const useModel = vi.fn().mockResolvedValue([0.25, 0.75]);
    const embed = createRuntimeEmbedder(createMockRuntime({ useModel }) as any);

    expect(await embed("breakfast")).toEqual([0.25, 0.75]);
    expect(useModel).toHaveBeenCalledWith("TEXT_EMBEDDING", { text: "breakfast" });
  });

  it("rejects non-array results", async () => {
    const useModel = vi.fn().mockResolvedValue({ vector: [1] });
    const embed = createRuntimeEmbedder(createMockRuntime({ useModel }) as any);

    await expect(embed("breakfast")).rejects.toThrow("TEXT_EMBEDDING model returned a non-array result");
  });
});
