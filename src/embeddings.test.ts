import { describe, it, expect, vi, beforeEach } from "vitest";

const sdk = vi.hoisted(() => ({
  embed: vi.fn(),
  embedMany: vi.fn(),
  createOpenAI: vi.fn(),
}));

vi.mock("ai", () => ({ embed: sdk.embed, embedMany: sdk.embedMany }));
vi.mock("@ai-sdk/openai", () => ({ createOpenAI: sdk.createOpenAI }));

import { DEFAULT_EMBEDDING_MODEL, OpenAIEmbeddings } from "./embeddings";
import { EmbeddingError } from "./errors";

beforeEach(() => {
  vi.clearAllMocks();
  sdk.createOpenAI.mockReturnValue({
    embedding: (modelId: string) => ({ modelId }),
  });
});

describe("OpenAIEmbeddings", () => {
  it("uses the default model when none is given", () => {
    expect(new OpenAIEmbeddings({ modelName: "  " }).modelName).toBe(DEFAULT_EMBEDDING_MODEL);
  });

  it("passes credentials to the provider", () => {
    new OpenAIEmbeddings({ apiKey: "test-secret", baseURL: "http://localhost:1234/v1" });

    expect(sdk.createOpenAI).toHaveBeenCalledWith({
      apiKey: "test-secret",
      baseURL: "http://localhost:1234/v1",
    });
  });

  it("embeds a single text without retries", async () => {
    sdk.embed.mockResolvedValue({ embedding: [0.5, 0.25] });
    const controller = new AbortController();
    const vector = await new OpenAIEmbeddings({ modelName: "embed-small" }).embed(
      "hello",
      controller.signal,
    );

    expect(vector).toBeInstanceOf(Float32Array);
    expect(Array.from(vector)).toEqual([0.5, 0.25]);
    expect(sdk.embed).toHaveBeenCalledWith({
      model: { modelId: "embed-small" },
      value: "hello",
      maxRetries: 0,
      abortSignal: controller.signal,
    });
  });

  it("splits large inputs into ordered batches", async () => {
    sdk.embedMany.mockImplementation(async ({ values }: { values: string[] }) => ({
      embeddings: values.map((v) => [v.length]),
    }));
    const vectors = await new OpenAIEmbeddings({ batchSize: 2 }).embedMany([
      "a",
      "bb",
      "ccc",
      "dddd",
      "eeeee",
    ]);

    expect(vectors.map((v) => v[0])).toEqual([1, 2, 3, 4, 5]);
    expect(sdk.embedMany.mock.calls.map(([arg]) => arg.values)).toEqual([
      ["a", "bb"],
      ["ccc", "dddd"],
      ["eeeee"],
    ]);
  });

  it("makes no request for an empty batch", async () => {
    expect(await new OpenAIEmbeddings().embedMany([])).toEqual([]);
    expect(sdk.embedMany).not.toHaveBeenCalled();
  });

  it("wraps provider failures", async () => {
    sdk.embed.mockRejectedValue(new Error("401 Unauthorized"));

    await expect(new OpenAIEmbeddings().embed("x")).rejects.toThrow(
      new EmbeddingError("Embedding request failed: 401 Unauthorized"),
    );
  });

  it("wraps batch failures", async () => {
    sdk.embedMany.mockRejectedValue(new Error("timeout"));

    await expect(new OpenAIEmbeddings().embedMany(["x"])).rejects.toThrow(
      "Batch embedding request failed: timeout",
    );
  });

  it("rejects a response with the wrong number of vectors", async () => {
    sdk.embedMany.mockResolvedValue({ embeddings: [[1]] });

    await expect(new OpenAIEmbeddings().embedMany(["x", "y"])).rejects.toBeInstanceOf(
      EmbeddingError,
    );
  });
});
