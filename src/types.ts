/**
 * Source document loaded once at startup. Immutable for the process lifetime.
 */
export interface Document {
  /** Path the text was read from (as configured, not normalized). */
  readonly path: string;
  /** Full raw text content. */
  readonly text: string;
}

/**
 * Contiguous segment of a {@link Document}. `text` is always exactly
 * `document.text.slice(start, end)`.
 */
export interface Chunk {
  /** Position of the chunk in the split sequence (0-based). */
  readonly index: number;
  /** Chunk text content. */
  readonly text: string;
  /** Start offset (inclusive) in UTF-16 code units. */
  readonly start: number;
  /** End offset (exclusive) in UTF-16 code units. */
  readonly end: number;
}

/** Embedding vector; dimensionality is fixed per model. */
export type EmbeddingVector = Float32Array;

/** Similarity function an index ranks by. Fixed per index instance. */
export type SimilarityMetric = "cosine" | "l2";

/** A retrieved chunk paired with its similarity to the query. */
export interface ScoredChunk {
  readonly chunk: Chunk;
  /** Higher is more similar. Range depends on the index metric. */
  readonly score: number;
}

/** Top-k retrieval, ordered by non-increasing score. */
export type RetrievalResult = readonly ScoredChunk[];

/**
 * Answer produced from retrieved context. `found` is false whenever the
 * context did not contain the answer (including an empty context), so
 * callers never need to match on the answer text.
 */
export interface GroundedAnswer {
  readonly answer: string;
  readonly found: boolean;
}
