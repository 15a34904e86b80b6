import type { Answerer } from "./answerer";
import { chunkDocument } from "./chunker";
import type { Embedder } from "./embeddings";
import type { StatusManager } from "./status";
import type { Document, RetrievalResult, ScoredChunk, SimilarityMetric } from "./types";
import { VectorIndex } from "./vector-index";

export interface BuildRagServiceOptions {
  document: Document;
  embedder: Embedder;
  answerer: Answerer;
  chunkSize?: number;
  chunkOverlap?: number;
  metric?: SimilarityMetric;
  /** Default k for search/ask (default 3). */
  topK?: number;
  /** Progress sink; optional so tests can build isolated services. */
  status?: StatusManager;
  verbose?: boolean;
  signal?: AbortSignal;
}

export interface QueryOptions {
  topK?: number;
  signal?: AbortSignal;
}

/** Result of {@link RagService.ask}. */
export interface AskResult {
  answer: string;
  /** False when the document context held no answer. */
  found: boolean;
  /** Retrieved chunks the answer was grounded on, best first. */
  sources: ScoredChunk[];
}

/**
 * Query-time facade over a fully built index. Instances only exist once the
 * build has completed, so holders never observe a partial index. Calls are
 * independent and may run concurrently.
 */
export class RagService {
  public readonly document: Document;
  public readonly index: VectorIndex;
  public readonly topK: number;
  private readonly embedder: Embedder;
  private readonly answerer: Answerer;

  public constructor(opts: {
    document: Document;
    index: VectorIndex;
    embedder: Embedder;
    answerer: Answerer;
    topK?: number;
  }) {
    this.document = opts.document;
    this.index = opts.index;
    this.embedder = opts.embedder;
    this.answerer = opts.answerer;
    this.topK = opts.topK ?? 3;
  }

  /**
   * Embed the question and return the top-k chunks.
   * @throws {EmbeddingError} When the question cannot be embedded.
   */
  public async search(question: string, opts: QueryOptions = {}): Promise<RetrievalResult> {
    const k = opts.topK ?? this.topK;
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`topK must be a non-negative integer, got ${k}`);
    }
    if (k === 0 || this.index.size === 0) return [];
    const vector = await this.embedder.embed(question, opts.signal);
    return this.index.query(vector, k);
  }

  /**
   * Retrieve context for the question and answer from it.
   * @throws {EmbeddingError | GenerationError} Upstream failures, unchanged.
   */
  public async ask(question: string, opts: QueryOptions = {}): Promise<AskResult> {
    const sources = await this.search(question, opts);
    const { answer, found } = await this.answerer.answer(
      question,
      sources.map((s) => s.chunk),
      opts.signal,
    );
    return { answer, found, sources: sources.slice() };
  }
}

/**
 * Chunk, embed and index the document, then return the ready service. The
 * index is assembled in one step after every embedding has arrived.
 * Whitespace-only chunks are not embedded.
 */
export async function buildRagService(opts: BuildRagServiceOptions): Promise<RagService> {
  const { document, embedder, status, verbose } = opts;

  const chunks = chunkDocument(document, {
    chunkSize: opts.chunkSize,
    chunkOverlap: opts.chunkOverlap,
  }).filter((c) => c.text.trim().length > 0);
  console.error(`[RAG] Created ${chunks.length} chunks from ${document.path}`);
  if (verbose) {
    for (const c of chunks) {
      console.error(`[RAG][verbose]   Chunk ${c.index}: ${c.text.length} characters`);
    }
  }
  status?.setIndexTotals(chunks.length);

  const vectors = chunks.length
    ? await embedder.embedMany(
        chunks.map((c) => c.text),
        opts.signal,
      )
    : [];
  status?.incEmbedded(vectors.length);

  const index = chunks.length
    ? VectorIndex.build(chunks, vectors, { metric: opts.metric })
    : VectorIndex.empty(opts.metric);
  console.error(
    `[RAG] Index ready: ${index.size} entries, dimension ${index.dimension}, metric ${index.metric}`,
  );

  return new RagService({
    document,
    index,
    embedder,
    answerer: opts.answerer,
    topK: opts.topK,
  });
}
