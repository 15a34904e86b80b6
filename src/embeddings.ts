import { embed, embedMany } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { EmbeddingError, describeError } from "./errors";
import type { EmbeddingVector } from "./types";

/**
 * Embedding capability used for both document chunks and questions. The
 * same instance must serve both, otherwise query vectors will not line up
 * with the index.
 */
export interface Embedder {
  /** Resolved model identifier. */
  readonly modelName: string;
  /** @throws {EmbeddingError} On any upstream failure, abort included. */
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;
  /**
   * Embed texts in order; the result has one vector per input.
   * @throws {EmbeddingError} On any upstream failure, abort included.
   */
  embedMany(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]>;
}

export interface OpenAIEmbeddingsOptions {
  apiKey?: string;
  baseURL?: string;
  /** Default "text-embedding-3-small" (1536 dimensions). */
  modelName?: string;
  /** Maximum inputs per upstream request (default 64). */
  batchSize?: number;
}

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

/**
 * OpenAI embeddings through the AI SDK. Requests are made with retries
 * disabled: a failure surfaces to the caller as an {@link EmbeddingError}.
 */
export class OpenAIEmbeddings implements Embedder {
  public readonly modelName: string;
  private readonly batchSize: number;
  private readonly provider: ReturnType<typeof createOpenAI>;

  public constructor(opts: OpenAIEmbeddingsOptions = {}) {
    this.modelName = opts.modelName?.trim() || DEFAULT_EMBEDDING_MODEL;
    this.batchSize = Math.max(1, Math.floor(opts.batchSize ?? 64));
    this.provider = createOpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  }

  public async embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    try {
      const { embedding } = await embed({
        model: this.provider.embedding(this.modelName),
        value: text,
        maxRetries: 0,
        abortSignal: signal,
      });
      return Float32Array.from(embedding);
    } catch (e) {
      throw new EmbeddingError(`Embedding request failed: ${describeError(e)}`, { cause: e });
    }
  }

  public async embedMany(
    texts: readonly string[],
    signal?: AbortSignal,
  ): Promise<EmbeddingVector[]> {
    const out: EmbeddingVector[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      let embeddings: number[][];
      try {
        ({ embeddings } = await embedMany({
          model: this.provider.embedding(this.modelName),
          values: batch,
          maxRetries: 0,
          abortSignal: signal,
        }));
      } catch (e) {
        throw new EmbeddingError(`Batch embedding request failed: ${describeError(e)}`, {
          cause: e,
        });
      }
      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Embedding provider returned ${embeddings.length} vectors for ${batch.length} inputs`,
        );
      }
      for (const e of embeddings) out.push(Float32Array.from(e));
    }
    return out;
  }
}
