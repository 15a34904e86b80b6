import { DimensionMismatchError } from "./errors";
import type { Chunk, EmbeddingVector, RetrievalResult, ScoredChunk, SimilarityMetric } from "./types";

export interface VectorIndexOptions {
  /** Similarity used for ranking (default "cosine"). */
  metric?: SimilarityMetric;
}

/** A stored (vector, chunk) pair. */
export interface IndexEntry {
  readonly chunk: Chunk;
  readonly vector: EmbeddingVector;
}

/**
 * In-memory flat vector index. Built once from aligned chunk/vector
 * sequences and read-only afterwards, so it can be shared by any number of
 * concurrent queries.
 *
 * Scoring:
 *  - cosine: vectors are L2-normalized on the way in; score is the dot
 *    product of unit vectors, in [-1, 1]. A zero vector scores 0.
 *  - l2: score is 1 / (1 + euclidean distance) on the raw vectors, in (0, 1].
 *
 * Both are "higher is better", and a vector queried against itself scores
 * the maximum. Equal scores keep insertion order.
 */
export class VectorIndex {
  public readonly metric: SimilarityMetric;
  /** Vector dimensionality; 0 for an empty index. */
  public readonly dimension: number;
  private readonly chunks: readonly Chunk[];
  // Stored as given for l2, unit-length for cosine.
  private readonly vectors: readonly EmbeddingVector[];

  private constructor(
    chunks: readonly Chunk[],
    vectors: readonly EmbeddingVector[],
    metric: SimilarityMetric,
    dimension: number,
  ) {
    this.chunks = chunks;
    this.vectors = vectors;
    this.metric = metric;
    this.dimension = dimension;
  }

  /**
   * Build an index from chunks and their embeddings (matched by position).
   * Vectors are copied, so later mutation of the inputs has no effect.
   *
   * @throws {DimensionMismatchError} On a count mismatch, an empty vector, or
   * vectors of differing dimensionality.
   */
  public static build(
    chunks: readonly Chunk[],
    vectors: readonly EmbeddingVector[],
    options: VectorIndexOptions = {},
  ): VectorIndex {
    const metric = options.metric ?? "cosine";
    if (vectors.length !== chunks.length) {
      throw new DimensionMismatchError(
        "Vector count does not match chunk count",
        chunks.length,
        vectors.length,
      );
    }
    const dimension = vectors.length > 0 ? vectors[0].length : 0;
    if (vectors.length > 0 && dimension === 0) {
      throw new DimensionMismatchError("Embedding vectors must not be empty", 1, 0);
    }
    const stored: EmbeddingVector[] = [];
    for (const v of vectors) {
      if (v.length !== dimension) {
        throw new DimensionMismatchError("Inconsistent vector dimensionality", dimension, v.length);
      }
      stored.push(metric === "cosine" ? normalize(v) : Float32Array.from(v));
    }
    return new VectorIndex(
      Object.freeze(chunks.slice()),
      Object.freeze(stored),
      metric,
      dimension,
    );
  }

  /** Empty index; every query against it returns no results. */
  public static empty(metric: SimilarityMetric = "cosine"): VectorIndex {
    return VectorIndex.build([], [], { metric });
  }

  /** Number of stored entries. */
  public get size(): number {
    return this.chunks.length;
  }

  /**
   * Copies of the stored entries in insertion order. Cosine indices yield
   * normalized vectors.
   */
  public entries(): IndexEntry[] {
    return this.chunks.map((chunk, i) => ({
      chunk,
      vector: Float32Array.from(this.vectors[i]),
    }));
  }

  /**
   * Top-k chunks for a query vector, ranked by descending score with ties in
   * insertion order. Returns every entry when `k` exceeds the index size, and
   * nothing for `k = 0` or an empty index.
   *
   * @throws {RangeError} If `k` is not a non-negative integer.
   * @throws {DimensionMismatchError} If the vector's dimensionality differs
   * from the index's (non-empty indexes only).
   */
  public query(vector: EmbeddingVector, k: number): RetrievalResult {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`k must be a non-negative integer, got ${k}`);
    }
    if (k === 0 || this.size === 0) return [];
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(
        "Query vector dimensionality does not match index",
        this.dimension,
        vector.length,
      );
    }

    const q = this.metric === "cosine" ? normalize(vector) : vector;
    const scored: ScoredChunk[] = this.chunks.map((chunk, i) => ({
      chunk,
      score: this.metric === "cosine" ? dot(q, this.vectors[i]) : l2Similarity(q, this.vectors[i]),
    }));
    // Array#sort is stable, so equal scores stay in insertion order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }
}

/** Unit-length copy of `v`; a zero vector stays zero. */
export function normalize(v: EmbeddingVector): EmbeddingVector {
  let sum = 0;
  for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  const norm = Math.sqrt(sum);
  const out = new Float32Array(v.length);
  if (norm === 0) return out;
  for (let i = 0; i < v.length; i++) out[i] = v[i] / norm;
  return out;
}

function dot(a: EmbeddingVector, b: EmbeddingVector): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  // Unit vectors can overshoot 1 by float rounding.
  return Math.max(-1, Math.min(1, s));
}

function l2Similarity(a: EmbeddingVector, b: EmbeddingVector): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    s += d * d;
  }
  return 1 / (1 + Math.sqrt(s));
}
